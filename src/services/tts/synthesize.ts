/**
 * Bounded retry loop shared by every provider adapter.
 * Transient failures are retried with exponential backoff; anything else, or
 * exhausting the attempts, surfaces as a SynthesisError for the segment.
 */
import { setTimeout as delay } from "node:timers/promises";

import type { Logger } from "pino";

import {
  SynthesisError,
  TransientProviderError,
  describeError,
} from "../../errors.js";
import { log } from "../../logger.js";
import type { AudioChunk } from "../../types/audio.js";
import type { ProviderAdapter, ProviderRequest } from "../../types/provider.js";
import type { UsageTracker } from "../usage-tracker.js";

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  factor: 2,
  maxDelayMs: 8_000,
};

export type SynthesizeOptions = {
  tracker: UsageTracker;
  signal?: AbortSignal;
  retry?: Partial<RetryPolicy>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
};

/** Synthesizes one segment, retrying transient failures and recording usage on success. */
export async function synthesizeWithRetry(
  adapter: ProviderAdapter,
  request: ProviderRequest,
  options: SynthesizeOptions
): Promise<AudioChunk> {
  const policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  const sleep = options.sleep ?? abortableSleep;
  const logger = options.logger ?? log;
  const segmentIndex = request.segment.index;

  for (let attempt = 1; ; attempt += 1) {
    options.signal?.throwIfAborted();

    try {
      const chunk = await adapter.synthesize(request, options.signal);
      if (chunk.segmentIndex !== segmentIndex) {
        throw new SynthesisError({
          provider: adapter.provider,
          segmentIndex,
          message: `adapter returned audio for segment ${chunk.segmentIndex}`,
          attempts: attempt,
        });
      }
      options.tracker.record(adapter.provider, adapter.billableUnits(request));
      return chunk;
    } catch (error) {
      if (options.signal?.aborted || error instanceof SynthesisError) {
        throw error;
      }

      if (!(error instanceof TransientProviderError)) {
        throw new SynthesisError({
          provider: adapter.provider,
          segmentIndex,
          message: describeError(error),
          attempts: attempt,
          cause: error,
        });
      }

      if (attempt >= maxAttempts) {
        throw new SynthesisError({
          provider: adapter.provider,
          segmentIndex,
          message: `gave up after ${attempt} attempts: ${error.message}`,
          attempts: attempt,
          cause: error,
        });
      }

      const waitMs = Math.min(
        policy.maxDelayMs,
        policy.baseDelayMs * policy.factor ** (attempt - 1)
      );
      logger.warn(
        {
          provider: adapter.provider,
          segmentIndex,
          attempt,
          status: error.status,
          waitMs,
          reason: error.message,
        },
        "Transient synthesis failure; retrying"
      );
      await sleep(waitMs, options.signal);
    }
  }
}

async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}
