import { SynthesisError, TransientProviderError } from "../errors.js";
import { synthesizeWithRetry } from "../services/tts/synthesize.js";
import { UsageTracker } from "../services/usage-tracker.js";
import type { AudioChunk } from "../types/audio.js";
import type { ProviderAdapter, ProviderRequest } from "../types/provider.js";
import { makeRequest, makeSegment, pcmChunk, silentLogger, transient } from "./helpers.js";

function scriptedAdapter(
  outcomes: Array<Error | AudioChunk>
): ProviderAdapter & { synthesize: jest.Mock<Promise<AudioChunk>, [ProviderRequest, AbortSignal?]> } {
  const synthesize = jest.fn<Promise<AudioChunk>, [ProviderRequest, AbortSignal?]>();
  for (const outcome of outcomes) {
    if (outcome instanceof Error) {
      synthesize.mockRejectedValueOnce(outcome);
    } else {
      synthesize.mockResolvedValueOnce(outcome);
    }
  }

  return {
    provider: "cartesia",
    capabilities: () => ({
      supportsQualityTiers: false,
      nativeSampleRate: 1000,
      supportsInterruptionMarkup: false,
    }),
    billableUnits: (request) => request.segment.text.length,
    synthesize,
  };
}

describe("synthesizeWithRetry", () => {
  const request = makeRequest({ segment: makeSegment({ index: 3, text: "Twelve chars" }) });

  function run(adapter: ProviderAdapter, tracker: UsageTracker, delays: number[], signal?: AbortSignal) {
    return synthesizeWithRetry(adapter, request, {
      tracker,
      signal,
      logger: silentLogger,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });
  }

  it("retries transient failures with exponential backoff, then records usage once", async () => {
    const chunk = pcmChunk(3, [0.1, 0.2]);
    const adapter = scriptedAdapter([transient("cartesia", 429), transient("cartesia", 503), chunk]);
    const tracker = new UsageTracker();
    const delays: number[] = [];

    await expect(run(adapter, tracker, delays)).resolves.toBe(chunk);

    expect(adapter.synthesize).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([500, 1000]);
    expect(tracker.summary()).toEqual({
      providers: [{ provider: "cartesia", unitsBilled: 12, segmentCount: 1 }],
      totalUnits: 12,
      totalSegments: 1,
    });
  });

  it("escalates to SynthesisError after three transient failures", async () => {
    const adapter = scriptedAdapter([
      transient("cartesia"),
      transient("cartesia"),
      transient("cartesia"),
    ]);
    const tracker = new UsageTracker();
    const delays: number[] = [];

    const error = await run(adapter, tracker, delays).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SynthesisError);
    expect(error).toMatchObject({ provider: "cartesia", segmentIndex: 3, attempts: 3 });
    expect(error).toHaveProperty("cause", expect.any(TransientProviderError));
    expect(delays).toEqual([500, 1000]);
    expect(tracker.summary().totalSegments).toBe(0);
  });

  it("surfaces non-retryable errors immediately", async () => {
    const rejection = new Error("Cartesia API error (400): bad voice");
    const adapter = scriptedAdapter([rejection]);
    const delays: number[] = [];

    const error = await run(adapter, new UsageTracker(), delays).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SynthesisError);
    expect(error).toMatchObject({
      message: "cartesia failed on segment 3: Cartesia API error (400): bad voice",
      attempts: 1,
      cause: rejection,
    });
    expect(adapter.synthesize).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it("does not call the provider once the signal is aborted", async () => {
    const adapter = scriptedAdapter([pcmChunk(3, [0.1])]);
    const controller = new AbortController();
    const reason = new Error("run cancelled");
    controller.abort(reason);

    await expect(run(adapter, new UsageTracker(), [], controller.signal)).rejects.toBe(reason);
    expect(adapter.synthesize).not.toHaveBeenCalled();
  });

  it("stops retrying when aborted between attempts", async () => {
    const adapter = scriptedAdapter([transient("cartesia"), pcmChunk(3, [0.1])]);
    const controller = new AbortController();
    const reason = new Error("run cancelled");

    const result = synthesizeWithRetry(adapter, request, {
      tracker: new UsageTracker(),
      signal: controller.signal,
      logger: silentLogger,
      sleep: async () => {
        controller.abort(reason);
      },
    });

    await expect(result).rejects.toBe(reason);
    expect(adapter.synthesize).toHaveBeenCalledTimes(1);
  });

  it("rejects audio labelled with another segment's index", async () => {
    const adapter = scriptedAdapter([pcmChunk(7, [0.1])]);

    await expect(run(adapter, new UsageTracker(), [])).rejects.toBeInstanceOf(SynthesisError);
  });
});
