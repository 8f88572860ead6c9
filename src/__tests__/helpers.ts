import pino from "pino";

import type { VoiceTable } from "../config/voices.js";
import { TransientProviderError } from "../errors.js";
import type { AudioChunk, AudioEncoding } from "../types/audio.js";
import type {
  ProviderAdapter,
  ProviderRequest,
  TtsProvider,
} from "../types/provider.js";
import type { Segment } from "../types/script.js";

export const silentLogger = pino({ level: "silent" });

export const testVoices: VoiceTable = {
  speedAdjustments: { A: 1, B: 1 },
  languages: {
    en: {
      name: "English",
      defaultSpeed: 1,
      voices: {
        elevenlabs: { A: "voice-el-a", B: "voice-el-b" },
        cartesia: { A: "voice-ca-a", B: "voice-ca-b" },
      },
    },
  },
};

export function makeSegment(overrides: Partial<Segment> = {}): Segment {
  return {
    index: 0,
    speaker: "A",
    text: "Hello there.",
    emotionTags: [],
    ...overrides,
  };
}

export function makeRequest(overrides: Partial<ProviderRequest> = {}): ProviderRequest {
  return {
    segment: makeSegment(),
    resolvedTags: [],
    resolvedSpeed: 0,
    voiceId: "voice-test",
    language: "en",
    ...overrides,
  };
}

/** Encodes float samples as raw little-endian PCM in the given encoding. */
export function encodePcm(samples: readonly number[], encoding: AudioEncoding = "pcm_f32le"): Buffer {
  const bytesPerSample = encoding === "pcm_f32le" ? 4 : 2;
  const buffer = Buffer.alloc(samples.length * bytesPerSample);
  samples.forEach((sample, index) => {
    if (encoding === "pcm_f32le") {
      buffer.writeFloatLE(sample, index * 4);
    } else {
      buffer.writeInt16LE(Math.round(sample * 32768), index * 2);
    }
  });
  return buffer;
}

export function pcmChunk(
  segmentIndex: number,
  samples: readonly number[],
  options: { sampleRate?: number; channels?: number; encoding?: AudioEncoding } = {}
): AudioChunk {
  const encoding = options.encoding ?? "pcm_f32le";
  return {
    segmentIndex,
    rawBytes: encodePcm(samples, encoding),
    sampleRate: options.sampleRate ?? 1000,
    channels: options.channels ?? 1,
    encoding,
  };
}

export type FakeAdapter = ProviderAdapter & {
  requests: ProviderRequest[];
  inFlight: number;
  maxInFlight: number;
  abortedSegments: number[];
};

/**
 * In-process provider: returns `framesPerSegment` samples of value
 * `(index + 1) / 10` after an optional delay. `failOn` makes one segment fail.
 */
export function createFakeAdapter(
  provider: TtsProvider,
  options: {
    framesPerSegment?: number;
    sampleRate?: number;
    delayMs?: number | ((segmentIndex: number) => number);
    failOn?: { segmentIndex: number; error: () => Error };
    supportsQualityTiers?: boolean;
  } = {}
): FakeAdapter {
  const framesPerSegment = options.framesPerSegment ?? 100;
  const sampleRate = options.sampleRate ?? 1000;

  const adapter: FakeAdapter = {
    provider,
    requests: [],
    inFlight: 0,
    maxInFlight: 0,
    abortedSegments: [],
    capabilities: () => ({
      supportsQualityTiers: options.supportsQualityTiers ?? true,
      nativeSampleRate: sampleRate,
      supportsInterruptionMarkup: provider === "elevenlabs",
    }),
    billableUnits: (request) => request.segment.text.length,
    async synthesize(request, signal) {
      adapter.requests.push(request);
      adapter.inFlight += 1;
      adapter.maxInFlight = Math.max(adapter.maxInFlight, adapter.inFlight);
      try {
        const delay = options.delayMs ?? 0;
        await wait(typeof delay === "number" ? delay : delay(request.segment.index), signal);
        if (signal?.aborted) {
          adapter.abortedSegments.push(request.segment.index);
          throw new Error("aborted");
        }
        if (options.failOn?.segmentIndex === request.segment.index) {
          throw options.failOn.error();
        }
        const value = (request.segment.index + 1) / 10;
        return pcmChunk(request.segment.index, new Array<number>(framesPerSegment).fill(value), {
          sampleRate,
        });
      } finally {
        adapter.inFlight -= 1;
      }
    },
  };

  return adapter;
}

export function transient(provider: TtsProvider, status = 503): TransientProviderError {
  return new TransientProviderError(provider, `status ${status}`, { status });
}

export const noSleep = async (): Promise<void> => {};

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
