import type { TtsProvider } from "../types/provider.js";

export type UsageRecord = {
  provider: TtsProvider;
  /** Characters billed by the provider. */
  unitsBilled: number;
  segmentCount: number;
};

export type UsageSummary = {
  providers: UsageRecord[];
  totalUnits: number;
  totalSegments: number;
};

/**
 * Per-run billing accumulator. Completions land on the event loop one at a time,
 * so each record() call is applied whole.
 */
export class UsageTracker {
  private readonly records = new Map<TtsProvider, UsageRecord>();

  /** Adds one successful synthesis call. */
  record(provider: TtsProvider, unitsBilled: number): void {
    if (!Number.isFinite(unitsBilled) || unitsBilled < 0) {
      throw new RangeError(`unitsBilled must be a non-negative number, got ${unitsBilled}`);
    }

    const existing = this.records.get(provider);
    if (existing) {
      existing.unitsBilled += unitsBilled;
      existing.segmentCount += 1;
      return;
    }

    this.records.set(provider, { provider, unitsBilled, segmentCount: 1 });
  }

  summary(): UsageSummary {
    const providers = [...this.records.values()].map((record) => ({ ...record }));
    return {
      providers,
      totalUnits: providers.reduce((sum, record) => sum + record.unitsBilled, 0),
      totalSegments: providers.reduce((sum, record) => sum + record.segmentCount, 0),
    };
  }

  /** Starts a fresh run. */
  reset(): void {
    this.records.clear();
  }
}
