import express from "express";
import { z } from "zod";
import { createContent } from "../../content/content.js";
import { SectionTypeSchema } from "../../content/sections.js";
import type { RevisionEngine } from "../../engine.js";
import { CancelledError } from "../../llm/errors.js";
import type { AppLogger } from "../../logger/index.js";
import { HttpError } from "../errors.js";
import { asyncHandler } from "./asyncHandler.js";

const MAX_TEXT_CHARS = 100_000;

const ContentBodySchema = z.object({
  text: z.string().max(MAX_TEXT_CHARS),
  sectionType: SectionTypeSchema,
});

const Unit = z.number().min(0).max(1);

const ReviewBodySchema = ContentBodySchema.extend({
  minDimensionThreshold: Unit.optional(),
});

const CycleBodySchema = ContentBodySchema.extend({
  acceptanceThreshold: Unit.optional(),
  minDimensionThreshold: Unit.optional(),
  maxIterations: z.number().int().min(0).max(10).optional(),
  noImprovementEpsilon: z.number().min(0).max(1).optional(),
});

const DraftBodySchema = z.object({
  topic: z.string().trim().min(1).max(500),
  sectionType: SectionTypeSchema,
  keyPoints: z.array(z.string().trim().min(1).max(500)).max(20).optional(),
});

/**
 * JSON API over the revision engine. Every body is validated with zod;
 * validation failures surface as 400 through the error middleware.
 */
export function createApiRouter(params: { logger: AppLogger; engine: RevisionEngine }) {
  const router = express.Router();
  const { engine } = params;

  router.get("/health", (_req, res) =>
    res.json({ ok: true, providers: engine.providerIds, health: engine.health.snapshot() })
  );

  router.post(
    "/assess",
    asyncHandler(async (req, res) => {
      const body = ContentBodySchema.parse(req.body);
      const metrics = engine.assess(createContent(body.text, body.sectionType));
      res.json({ ok: true, metrics });
    })
  );

  router.post(
    "/review",
    asyncHandler(async (req, res) => {
      const { text, sectionType, ...opts } = ReviewBodySchema.parse(req.body);
      const review = engine.review(createContent(text, sectionType), opts);
      res.json({
        ok: true,
        metrics: review.metrics,
        suggestions: review.suggestions,
        reviewedAt: review.reviewedAt,
      });
    })
  );

  router.post(
    "/cycle",
    asyncHandler(async (req, res) => {
      const log = req.log ?? params.logger;
      const { text, sectionType, ...overrides } = CycleBodySchema.parse(req.body);

      const t0 = Date.now();
      const result = await engine.runCycle(createContent(text, sectionType), overrides, { signal: req.ctx?.signal });
      log.info("Revision cycle done", {
        sectionType,
        terminationReason: result.terminationReason,
        iterations: result.iterations,
        ms: Date.now() - t0,
      });
      // client already gone
      if (result.terminationReason === "Cancelled" && req.ctx?.signal.aborted) return;
      res.json({ ok: true, result });
    })
  );

  router.post(
    "/draft",
    asyncHandler(async (req, res) => {
      const body = DraftBodySchema.parse(req.body);
      const draft = await engine.generateDraft(body, { signal: req.ctx?.signal });
      if (!draft.ok) {
        if (draft.error instanceof CancelledError) {
          if (req.ctx?.signal.aborted) return;
          throw new HttpError(503, draft.error.code, "Draft generation was cancelled");
        }
        throw new HttpError(502, draft.error.code, "No provider could generate the draft");
      }
      res.json({
        ok: true,
        draft: { text: draft.value.content.text, sectionType: draft.value.content.sectionType },
        providerId: draft.value.providerId,
        metrics: engine.assess(draft.value.content),
      });
    })
  );

  return router;
}
