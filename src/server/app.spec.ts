import { once } from "node:events";
import type { Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { loadEngineConfigFromEnv } from "../config/env.js";
import { createRevisionEngine } from "../engine.js";
import { createSilentLogger } from "../logger/index.js";
import { createApp } from "./app.js";

const logger = createSilentLogger();

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const engine = createRevisionEngine(loadEngineConfigFromEnv({ PROVIDER_ORDER: "rule-based" }), logger);
  const { app } = createApp({ logger, engine });
  server = app.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server is not listening on TCP");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

function post(path: string, body: unknown, headers: Record<string, string> = {}) {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "content-type": "application/json", ...headers },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

describe("HTTP API", () => {
  it("reports the provider chain on /api/health", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, providers: ["rule-based"], health: [] });
  });

  it("assesses a section", async () => {
    const res = await post("/api/assess", { text: "The analysis of the sample data shows a clear pattern.", sectionType: "results" });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      ok: true,
      metrics: {
        overallScore: expect.any(Number),
        dimensionScores: {
          clarity: expect.any(Number),
          coherence: expect.any(Number),
          academicTone: expect.any(Number),
          completeness: expect.any(Number),
          citationQuality: expect.any(Number),
        },
        stats: { wordCount: 10, sentenceCount: 1, paragraphCount: 1, avgSentenceLength: 10 },
      },
    });
  });

  it("returns directives from /api/review", async () => {
    const res = await post("/api/review", { text: "I think it's really good! We can't stop.", sectionType: "abstract" });
    expect(await res.json()).toMatchObject({
      ok: true,
      suggestions: [{ dimension: "coherence" }, { dimension: "academicTone" }, { dimension: "completeness" }],
    });
  });

  it("runs a bounded revision cycle", async () => {
    const res = await post("/api/cycle", {
      text: "I think it's really good! We can't stop.",
      sectionType: "abstract",
      maxIterations: 1,
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      ok: true,
      result: {
        iterations: 1,
        terminationReason: "MaxIterations",
        finalText: "It appears that it is good. We cannot stop.",
        history: [{ iteration: 1, providerUsed: "rule-based" }],
      },
    });
  });

  it("drafts a section", async () => {
    const res = await post("/api/draft", { topic: "edge caching", sectionType: "methods", keyPoints: ["request traces"] });
    expect(await res.json()).toMatchObject({
      ok: true,
      providerId: "rule-based",
      draft: { sectionType: "methods", text: expect.stringContaining("Key considerations include request traces.") },
    });
  });

  it("rejects invalid bodies with the error envelope", async () => {
    const res = await post("/api/assess", { text: "Some text.", sectionType: "appendix" }, { "x-request-id": "req-1" });
    expect(res.status).toBe(400);
    expect(res.headers.get("x-request-id")).toBe("req-1");
    expect(await res.json()).toMatchObject({ ok: false, error: { code: "INVALID_REQUEST", requestId: "req-1" } });
  });

  it("rejects malformed JSON", async () => {
    const res = await post("/api/assess", "{not json");
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ ok: false, error: { code: "INVALID_JSON" } });
  });
});
