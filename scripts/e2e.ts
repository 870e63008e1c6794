import fs from "node:fs";
import path from "node:path";
import { createContent, createRevisionEngineFromEnv, type Content } from "../src/engine.js";
import { SectionTypeSchema } from "../src/content/sections.js";
import { createAppLogger } from "../src/logger/index.js";

/**
 * Local end-to-end run on the rule-based provider only (no API keys).
 *
 * Usage:
 * - `npx tsx scripts/e2e.ts /path/to/section.txt [sectionType]`
 *
 * Drafts a section from a topic when no file is given, then runs the
 * revision loop over it and prints the outcome.
 */
async function main() {
  const inputPath = process.argv[2];
  const sectionType = SectionTypeSchema.parse(process.argv[3] ?? "introduction");

  const logger = createAppLogger({ serviceName: "revision-engine-e2e", level: "info" });
  const engine = createRevisionEngineFromEnv(logger, { ...process.env, PROVIDER_ORDER: "rule-based" });

  let content: Content;
  if (inputPath) {
    const abs = path.resolve(process.cwd(), inputPath);
    content = createContent(fs.readFileSync(abs, "utf8"), sectionType);
  } else {
    const draft = await engine.generateDraft({
      topic: "adaptive caching strategies for edge networks",
      sectionType,
      keyPoints: ["request locality", "cache eviction policies", "latency under load"],
    });
    if (!draft.ok) throw draft.error;
    content = draft.value.content;
  }

  const result = await engine.runCycle(content);

  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      {
        sectionType,
        initialScore: engine.assess(content).overallScore,
        finalScore: result.finalScore.overallScore,
        dimensionScores: result.finalScore.dimensionScores,
        terminationReason: result.terminationReason,
        iterations: result.iterations,
        providers: result.history.map((r) => r.providerUsed),
        finalText: result.finalText,
      },
      null,
      2
    )
  );
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
