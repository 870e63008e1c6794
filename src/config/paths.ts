import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigurationError } from "./errors.js";

/**
 * Nearest ancestor of `startDir` holding a package.json. Modules run from
 * both `src/` and the compiled `dist/src/`, so data files are located from
 * the package root rather than relative to the module.
 */
export function findPackageRoot(startDir: string): string {
  let dir = path.resolve(startDir);
  for (;;) {
    if (fs.existsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) throw new ConfigurationError(`No package.json above ${startDir}`);
    dir = parent;
  }
}

let root: string | undefined;

/** Absolute path of a file under the package's `data/` directory. */
export function dataFilePath(fileName: string): string {
  root ??= findPackageRoot(path.dirname(fileURLToPath(import.meta.url)));
  return path.join(root, "data", fileName);
}
