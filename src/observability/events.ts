import type { AppLogger } from "../logger/index.js";
import type { ProviderId, TerminationReason } from "../report/schema.js";
import type { Capability } from "../llm/types.js";

export type ProviderAttemptOutcome =
  | "success"
  | "transient"
  | "fatal"
  | "cancelled"
  | "skipped-unhealthy"
  | "skipped-capability";

/** One per provider attempt. Carries no text, only identifiers and timings. */
export type ProviderAttemptEvent = {
  type: "provider.attempt";
  providerId: ProviderId;
  capability: Capability;
  attempt: number;
  outcome: ProviderAttemptOutcome;
  latencyMs: number;
  errorKind?: string;
};

export type CycleSummaryEvent = {
  type: "cycle.summary";
  terminationReason: TerminationReason;
  iterations: number;
  finalScore: number;
};

export type EngineEvent = ProviderAttemptEvent | CycleSummaryEvent;

export interface EngineEventSink {
  emit(event: EngineEvent): void;
}

/** Default sink: events become structured log lines. */
export function createLoggerEventSink(logger: AppLogger): EngineEventSink {
  return {
    emit(event) {
      if (event.type === "provider.attempt") {
        const level = event.outcome === "success" || event.outcome.startsWith("skipped") ? "debug" : "warn";
        logger.log(level, "Provider attempt", { ...event });
        return;
      }
      logger.info("Revision cycle finished", { ...event });
    },
  };
}
