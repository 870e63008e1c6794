import { ConfigurationError } from "../config/errors.js";
import { withText, type Content } from "../content/content.js";
import { CancelledError } from "../llm/errors.js";
import type { CallOptions, InvokeResult } from "../llm/types.js";
import type { AppLogger } from "../logger/index.js";
import type { EngineEventSink } from "../observability/events.js";
import type { Assessor } from "../quality/assessor.js";
import type {
  CycleResult,
  QualityMetrics,
  RevisionRecord,
  RevisionSuggestion,
  TerminationReason,
} from "../report/schema.js";
import type { SuggestionGenerator } from "./suggestions.js";

export type CycleOptions = {
  /** Overall score at or above which the text is accepted. */
  acceptanceThreshold: number;
  /** Dimensions below this get a revision directive. */
  minDimensionThreshold: number;
  maxIterations: number;
  /** Gains at or below this count as no improvement. */
  noImprovementEpsilon: number;
};

export const DEFAULT_CYCLE_OPTIONS: Readonly<CycleOptions> = Object.freeze({
  acceptanceThreshold: 0.8,
  minDimensionThreshold: 0.7,
  maxIterations: 3,
  noImprovementEpsilon: 0.01,
});

/** Consecutive non-improving iterations before the loop gives up. */
const STALL_LIMIT = 2;

export function resolveCycleOptions(
  overrides: Partial<CycleOptions> = {},
  defaults: Readonly<CycleOptions> = DEFAULT_CYCLE_OPTIONS
): CycleOptions {
  const opts: CycleOptions = {
    acceptanceThreshold: overrides.acceptanceThreshold ?? defaults.acceptanceThreshold,
    minDimensionThreshold: overrides.minDimensionThreshold ?? defaults.minDimensionThreshold,
    maxIterations: overrides.maxIterations ?? defaults.maxIterations,
    noImprovementEpsilon: overrides.noImprovementEpsilon ?? defaults.noImprovementEpsilon,
  };
  for (const key of ["acceptanceThreshold", "minDimensionThreshold"] as const) {
    const v = opts[key];
    if (!Number.isFinite(v) || v < 0 || v > 1) throw new ConfigurationError(`${key} must be within [0, 1]`);
  }
  if (!Number.isInteger(opts.maxIterations) || opts.maxIterations < 0) {
    throw new ConfigurationError("maxIterations must be a non-negative integer");
  }
  if (!Number.isFinite(opts.noImprovementEpsilon) || opts.noImprovementEpsilon < 0) {
    throw new ConfigurationError("noImprovementEpsilon must be a non-negative number");
  }
  return opts;
}

export type CycleState = "assessing" | "accepted" | "suggesting" | "revising" | "terminated";

const TRANSITIONS: Readonly<Record<CycleState, readonly CycleState[]>> = {
  assessing: ["accepted", "suggesting", "terminated"],
  accepted: ["terminated"],
  suggesting: ["revising", "terminated"],
  revising: ["assessing", "terminated"],
  terminated: [],
};

export class IllegalTransitionError extends Error {
  readonly code = "ILLEGAL_TRANSITION";
  readonly from: CycleState;
  readonly to: CycleState;

  constructor(from: CycleState, to: CycleState) {
    super(`Illegal cycle transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
    this.from = from;
    this.to = to;
  }
}

export class CycleStateMachine {
  private current: CycleState = "assessing";

  get state(): CycleState {
    return this.current;
  }

  transition(to: CycleState): void {
    if (!TRANSITIONS[this.current].includes(to)) throw new IllegalTransitionError(this.current, to);
    this.current = to;
  }
}

/** The slice of `Reviser` the loop needs. */
export interface ContentReviser {
  revise(content: Content, suggestions: readonly RevisionSuggestion[], options?: CallOptions): Promise<InvokeResult>;
}

export type RevisionCycleControllerDeps = {
  assessor: Assessor;
  suggestions: SuggestionGenerator;
  reviser: ContentReviser;
  logger: AppLogger;
  events?: EngineEventSink;
  defaults?: Readonly<CycleOptions>;
  clock?: () => Date;
};

type Candidate = {
  content: Content;
  metrics: QualityMetrics;
};

/**
 * Assess, suggest, revise, reassess, until the text is accepted or the
 * loop runs out of iterations, progress or providers.
 *
 * Each pass, in order:
 * 1. accept when the overall score reaches `acceptanceThreshold` or no
 *    dimension is below `minDimensionThreshold`;
 * 2. stop with `NoImprovement` after two consecutive revisions that did not
 *    beat the best score by more than `noImprovementEpsilon`;
 * 3. stop with `MaxIterations` once `maxIterations` revisions have run;
 * 4. otherwise revise, reassess, and append a frozen `RevisionRecord`.
 *
 * A failed revision ends the loop as `ProviderExhausted`, or `Cancelled`
 * when the caller's signal fired. Cancellation is also checked before
 * every provider call.
 *
 * The returned text is always the best-scoring candidate seen, the input
 * included; ties keep the earlier text. State moves go through
 * `CycleStateMachine`, which throws on any transition outside the table.
 */
export class RevisionCycleController {
  private readonly deps: RevisionCycleControllerDeps;
  private readonly defaults: Readonly<CycleOptions>;
  private readonly clock: () => Date;

  constructor(deps: RevisionCycleControllerDeps) {
    this.deps = deps;
    this.defaults = resolveCycleOptions({}, deps.defaults ?? DEFAULT_CYCLE_OPTIONS);
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(content: Content, overrides: Partial<CycleOptions> = {}, options: CallOptions = {}): Promise<CycleResult> {
    const opts = resolveCycleOptions(overrides, this.defaults);
    const { assessor, suggestions: generator, reviser, logger } = this.deps;
    const { signal } = options;
    const machine = new CycleStateMachine();
    const history: RevisionRecord[] = [];

    let current: Candidate = { content, metrics: assessor.assess(content) };
    let best = current;
    let iteration = 0;
    let stalled = 0;

    const finish = (reason: TerminationReason): CycleResult => {
      machine.transition("terminated");
      const result: CycleResult = Object.freeze({
        finalText: best.content.text,
        finalScore: best.metrics,
        history: Object.freeze([...history]),
        terminationReason: reason,
        iterations: iteration,
      });
      this.deps.events?.emit({
        type: "cycle.summary",
        terminationReason: reason,
        iterations: iteration,
        finalScore: best.metrics.overallScore,
      });
      return result;
    };

    for (;;) {
      const pending = generator.suggest(current.metrics, opts.minDimensionThreshold);
      if (current.metrics.overallScore >= opts.acceptanceThreshold || !pending.length) {
        machine.transition("accepted");
        return finish("AcceptedThreshold");
      }
      if (stalled >= STALL_LIMIT) return finish("NoImprovement");
      if (iteration >= opts.maxIterations) return finish("MaxIterations");

      machine.transition("suggesting");
      if (signal?.aborted) return finish("Cancelled");

      machine.transition("revising");
      const res = await reviser.revise(current.content, pending, { signal });
      if (!res.ok) {
        if (res.error instanceof CancelledError) return finish("Cancelled");
        logger.warn("Revision failed; keeping best candidate", {
          iteration: iteration + 1,
          capability: res.error.capability,
          attempts: res.error.failures.length,
        });
        return finish("ProviderExhausted");
      }

      const revised = withText(current.content, res.value.text);
      const post = assessor.assess(revised);
      iteration += 1;
      history.push(
        Object.freeze({
          iteration,
          preScore: current.metrics,
          suggestionsApplied: Object.freeze([...pending]),
          postScore: post,
          providerUsed: res.value.providerId,
          timestamp: this.clock().toISOString(),
        })
      );

      const gain = post.overallScore - best.metrics.overallScore;
      stalled = gain > opts.noImprovementEpsilon ? 0 : stalled + 1;
      current = { content: revised, metrics: post };
      if (gain > 0) best = current;

      logger.debug("Revision iteration finished", {
        iteration,
        providerId: res.value.providerId,
        preScore: round(history[history.length - 1].preScore.overallScore),
        postScore: round(post.overallScore),
        stalled,
      });
      machine.transition("assessing");
    }
  }
}

function round(n: number): number {
  return Math.round(n * 1000) / 1000;
}
