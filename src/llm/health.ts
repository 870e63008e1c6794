import type { ProviderId } from "../report/schema.js";

export type ProviderHealthOptions = {
  /** Consecutive fatal failures before a provider is benched. */
  unhealthyAfter: number;
  cooldownMs: number;
  now?: () => number;
};

export type ProviderHealthSnapshot = {
  providerId: ProviderId;
  consecutiveFatal: number;
  available: boolean;
  unavailableUntil: number | null;
};

type HealthEntry = {
  consecutiveFatal: number;
  unavailableUntil: number;
};

/**
 * Rolling per-provider health, shared by every cycle an engine runs.
 *
 * Each update is a synchronous read-modify-write with no await in between,
 * so concurrent cycles on the event loop cannot interleave inside one.
 * Reads may lag a concurrent update by one attempt.
 */
export class ProviderHealthTable {
  private readonly entries = new Map<ProviderId, HealthEntry>();
  private readonly unhealthyAfter: number;
  private readonly cooldownMs: number;
  private readonly now: () => number;

  constructor(opts: ProviderHealthOptions) {
    this.unhealthyAfter = Math.max(1, Math.floor(opts.unhealthyAfter));
    this.cooldownMs = Math.max(0, opts.cooldownMs);
    this.now = opts.now ?? Date.now;
  }

  isAvailable(providerId: ProviderId): boolean {
    const e = this.entries.get(providerId);
    return !e || e.unavailableUntil <= this.now();
  }

  recordSuccess(providerId: ProviderId): void {
    this.entries.set(providerId, { consecutiveFatal: 0, unavailableUntil: 0 });
  }

  /** Returns true when this failure benched the provider. */
  recordFatal(providerId: ProviderId): boolean {
    const prev = this.entries.get(providerId) ?? { consecutiveFatal: 0, unavailableUntil: 0 };
    const consecutiveFatal = prev.consecutiveFatal + 1;
    if (consecutiveFatal >= this.unhealthyAfter) {
      this.entries.set(providerId, { consecutiveFatal: 0, unavailableUntil: this.now() + this.cooldownMs });
      return true;
    }
    this.entries.set(providerId, { consecutiveFatal, unavailableUntil: prev.unavailableUntil });
    return false;
  }

  snapshot(): ProviderHealthSnapshot[] {
    const now = this.now();
    return Array.from(this.entries, ([providerId, e]) => ({
      providerId,
      consecutiveFatal: e.consecutiveFatal,
      available: e.unavailableUntil <= now,
      unavailableUntil: e.unavailableUntil > now ? e.unavailableUntil : null,
    }));
  }
}
