import { loadEngineConfigFromEnv, type EngineConfig } from "./config/env.js";
import type { Content } from "./content/content.js";
import { ProviderHealthTable } from "./llm/health.js";
import { ProviderOrchestrator, type BackoffOptions, type Sleep } from "./llm/orchestrator.js";
import { buildProviderConfig, createProviderRegistry } from "./llm/registry.js";
import type { CallOptions, InvokeError, ProviderConfig, ProviderRegistry, Result } from "./llm/types.js";
import type { AppLogger } from "./logger/index.js";
import { createLoggerEventSink, type EngineEventSink } from "./observability/events.js";
import { QualityAssessor, type QualityAssessorOptions } from "./quality/assessor.js";
import type { ContentReview, CycleResult, QualityMetrics } from "./report/schema.js";
import {
  DEFAULT_CYCLE_OPTIONS,
  RevisionCycleController,
  resolveCycleOptions,
  type CycleOptions,
} from "./revision/cycleController.js";
import { DraftGenerator, type Draft, type DraftRequest } from "./revision/draftGenerator.js";
import { Reviser } from "./revision/reviser.js";
import { SuggestionGenerator } from "./revision/suggestions.js";

export type RevisionEngineOptions = {
  logger: AppLogger;
  registry: ProviderRegistry;
  providers: ProviderConfig;
  events?: EngineEventSink;
  cycleDefaults?: Partial<CycleOptions>;
  assessor?: QualityAssessorOptions;
  health?: { unhealthyAfter: number; cooldownMs: number };
  backoff?: BackoffOptions;
  sleep?: Sleep;
  now?: () => number;
  clock?: () => Date;
};

/** Per-call overrides: loop thresholds and, optionally, a different provider order. */
export type RunCycleConfig = Partial<CycleOptions> & {
  providers?: ProviderConfig;
};

/**
 * Entry point for callers: assessment, single-pass review, the revision
 * loop and first drafts.
 *
 * One health table lives as long as the engine and is shared by every
 * orchestrator it builds, so a provider benched during one cycle stays
 * benched for concurrent and later ones.
 */
export class RevisionEngine {
  readonly health: ProviderHealthTable;
  readonly cycleDefaults: Readonly<CycleOptions>;
  private readonly opts: RevisionEngineOptions;
  private readonly events: EngineEventSink;
  private readonly assessor: QualityAssessor;
  private readonly suggestions = new SuggestionGenerator();
  private readonly orchestrator: ProviderOrchestrator;

  constructor(opts: RevisionEngineOptions) {
    this.opts = opts;
    this.events = opts.events ?? createLoggerEventSink(opts.logger);
    this.assessor = new QualityAssessor(opts.assessor);
    this.cycleDefaults = Object.freeze(resolveCycleOptions(opts.cycleDefaults, DEFAULT_CYCLE_OPTIONS));
    this.health = new ProviderHealthTable({
      unhealthyAfter: opts.health?.unhealthyAfter ?? 3,
      cooldownMs: opts.health?.cooldownMs ?? 60_000,
      now: opts.now,
    });
    // built eagerly so a bad provider list fails at startup
    this.orchestrator = this.createOrchestrator(opts.providers);
  }

  get providerIds(): string[] {
    return this.orchestrator.providerIds;
  }

  assess(content: Content): QualityMetrics {
    return this.assessor.assess(content);
  }

  review(content: Content, opts: { minDimensionThreshold?: number } = {}): ContentReview {
    const { minDimensionThreshold } = resolveCycleOptions(opts, this.cycleDefaults);
    const metrics = this.assessor.assess(content);
    return Object.freeze({
      content,
      metrics,
      suggestions: Object.freeze(this.suggestions.suggest(metrics, minDimensionThreshold)),
      reviewedAt: this.now().toISOString(),
    });
  }

  async runCycle(content: Content, config: RunCycleConfig = {}, options: CallOptions = {}): Promise<CycleResult> {
    const { providers, ...overrides } = config;
    const orchestrator = providers ? this.createOrchestrator(providers) : this.orchestrator;
    const controller = new RevisionCycleController({
      assessor: this.assessor,
      suggestions: this.suggestions,
      reviser: new Reviser({ orchestrator }),
      logger: this.opts.logger,
      events: this.events,
      defaults: this.cycleDefaults,
      clock: this.opts.clock,
    });
    return controller.run(content, overrides, options);
  }

  async generateDraft(request: DraftRequest, options: CallOptions = {}): Promise<Result<Draft, InvokeError>> {
    return new DraftGenerator({ orchestrator: this.orchestrator }).generate(request, options);
  }

  private createOrchestrator(entries: ProviderConfig): ProviderOrchestrator {
    return new ProviderOrchestrator({
      entries,
      registry: this.opts.registry,
      logger: this.opts.logger,
      events: this.events,
      health: this.health,
      backoff: this.opts.backoff,
      sleep: this.opts.sleep,
      now: this.opts.now,
    });
  }

  private now(): Date {
    return this.opts.clock ? this.opts.clock() : new Date();
  }
}

export function createRevisionEngine(config: EngineConfig, logger: AppLogger): RevisionEngine {
  const registry = createProviderRegistry(config, logger);
  const providers = buildProviderConfig(config, registry);
  logger.info("Provider chain configured", { providers: providers.map((p) => p.providerId) });
  return new RevisionEngine({
    logger,
    registry,
    providers,
    cycleDefaults: config.cycle,
    assessor: { completenessTolerance: config.completenessTolerance },
    health: { unhealthyAfter: config.providers.unhealthyAfter, cooldownMs: config.providers.cooldownMs },
    backoff: config.providers.backoff,
  });
}

export function createRevisionEngineFromEnv(logger: AppLogger, env: NodeJS.ProcessEnv = process.env): RevisionEngine {
  return createRevisionEngine(loadEngineConfigFromEnv(env), logger);
}

export { createContent, type Content } from "./content/content.js";
export { SECTION_TYPES, type SectionType } from "./content/sections.js";
export type { CycleOptions } from "./revision/cycleController.js";
export type { ContentReview, CycleResult, QualityMetrics, RevisionRecord, TerminationReason } from "./report/schema.js";
