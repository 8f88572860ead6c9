/**
 * ElevenLabs adapter: one text-to-speech call per segment with inline audio tags.
 */
import { ElevenLabsClient } from "@elevenlabs/elevenlabs-js";

import {
  getElevenLabsAudioConfig,
  type ElevenLabsAudioConfig,
  type ElevenLabsPcmFormat,
} from "../../config/elevenlabs.js";
import { ConfigurationError, TransientProviderError, isTransientStatus } from "../../errors.js";
import type { AudioChunk } from "../../types/audio.js";
import type {
  ProviderAdapter,
  ProviderCapabilities,
  ProviderRequest,
} from "../../types/provider.js";
import { log } from "../../logger.js";
import { renderInlineTags } from "../emotion-tag-mapper.js";

export type ElevenLabsSpeechRequest = {
  text: string;
  modelId: string;
  outputFormat: ElevenLabsPcmFormat;
  voiceSettings: { speed: number };
};

export type ElevenLabsRequestOptions = {
  abortSignal?: AbortSignal;
  maxRetries: number;
  timeoutInSeconds: number;
};

/** The slice of the SDK's textToSpeech resource this adapter depends on. */
export type ElevenLabsSpeechClient = {
  convert(
    voiceId: string,
    request: ElevenLabsSpeechRequest,
    requestOptions: ElevenLabsRequestOptions
  ): Promise<ReadableStream<Uint8Array>>;
};

const CAPABILITIES: ProviderCapabilities = {
  supportsQualityTiers: true,
  nativeSampleRate: 44100,
  supportsInterruptionMarkup: true,
};

/** Creates the ElevenLabs adapter; pass a client to bypass the SDK (tests). */
export function createElevenLabsAdapter(options: {
  apiKey?: string;
  client?: ElevenLabsSpeechClient;
  config?: ElevenLabsAudioConfig;
}): ProviderAdapter {
  const config = options.config ?? getElevenLabsAudioConfig();
  const client = options.client ?? createSdkSpeechClient(options.apiKey);

  return {
    provider: "elevenlabs",
    capabilities: () => ({ ...CAPABILITIES, nativeSampleRate: config.sampleRate }),
    billableUnits: (request) =>
      renderElevenLabsRequests(request, config.maxRequestChars).reduce(
        (total, text) => total + text.length,
        0
      ),
    async synthesize(request, signal): Promise<AudioChunk> {
      const parts: Buffer[] = [];
      try {
        // Pieces go out in order; their PCM is concatenated.
        for (const text of renderElevenLabsRequests(request, config.maxRequestChars)) {
          const stream = await client.convert(
            request.voiceId,
            {
              text,
              modelId: config.modelId,
              outputFormat: config.outputFormat,
              voiceSettings: { speed: request.resolvedSpeed },
            },
            {
              abortSignal: signal,
              // Retries happen in synthesizeWithRetry so attempts stay bounded.
              maxRetries: 0,
              timeoutInSeconds: config.requestTimeoutSeconds,
            }
          );
          parts.push(await collectStream(stream));
        }
      } catch (error) {
        throw classifyElevenLabsError(error);
      }
      const rawBytes = Buffer.concat(parts);

      if (rawBytes.length === 0) {
        throw new Error("ElevenLabs returned no audio");
      }

      return {
        segmentIndex: request.segment.index,
        rawBytes,
        sampleRate: config.sampleRate,
        channels: 1,
        encoding: "pcm_s16le",
      };
    },
  };
}

/** Speaker turn text with leading `[tag]` markup and literal em-dash interruptions. */
export function renderElevenLabsText(request: ProviderRequest): string {
  return renderElevenLabsRequests(request, Number.POSITIVE_INFINITY).join(" ");
}

/**
 * Request texts for one turn. A turn longer than `maxChars` is split at sentence
 * breaks, then at spaces, and each piece repeats the leading tags.
 */
export function renderElevenLabsRequests(request: ProviderRequest, maxChars: number): string[] {
  const leading = request.resolvedTags.map((label) => `[${label}]`).join(" ");
  const body = normalizeInterruptions(
    renderInlineTags(request.segment.text, "elevenlabs")
  );
  const prefix = leading ? `${leading} ` : "";
  const bodyLimit = Math.max(1, maxChars - prefix.length);

  return splitForRequestLimit(body, bodyLimit).map((piece) => `${prefix}${piece}`);
}

export function splitForRequestLimit(text: string, maxChars: number): string[] {
  if (text.length <= maxChars) {
    return [text];
  }

  const sentences = text.split(/(?<=[.!?…])\s+/).flatMap((sentence) =>
    splitAtSpaces(sentence, maxChars)
  );
  return packPieces(sentences, maxChars, " ");
}

/** Turns `--`, `...—` and spaced en dashes into a literal em dash. */
export function normalizeInterruptions(text: string): string {
  return text
    .replace(/(?:\.\.\.|…)\s*—/g, "—")
    .replace(/\s*-{2,}\s*/g, "—")
    .replace(/\s+–\s+/g, "—")
    .trim();
}

/** Maps SDK failures onto retryable or fatal errors. */
export function classifyElevenLabsError(error: unknown): Error {
  const status = statusCodeOf(error);
  const message = error instanceof Error ? error.message : String(error);

  if (status === undefined || isTransientStatus(status)) {
    // No status means the request never completed: network failure or timeout.
    return new TransientProviderError("elevenlabs", message, { status, cause: error });
  }

  return error instanceof Error ? error : new Error(message);
}

function statusCodeOf(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  ) {
    return error.statusCode;
  }
  return undefined;
}

function splitAtSpaces(sentence: string, maxChars: number): string[] {
  if (sentence.length <= maxChars) {
    return [sentence];
  }

  const slices = sentence.split(/\s+/).flatMap((word) => {
    const pieces: string[] = [];
    for (let start = 0; start < word.length; start += maxChars) {
      pieces.push(word.slice(start, start + maxChars));
    }
    return pieces;
  });
  return packPieces(slices, maxChars, " ");
}

function packPieces(pieces: readonly string[], maxChars: number, separator: string): string[] {
  const packed: string[] = [];
  let current = "";

  for (const piece of pieces) {
    if (!piece) continue;
    const candidate = current ? `${current}${separator}${piece}` : piece;
    if (candidate.length <= maxChars) {
      current = candidate;
    } else {
      packed.push(current);
      current = piece;
    }
  }
  if (current) {
    packed.push(current);
  }

  return packed;
}

export async function collectStream(stream: ReadableStream<Uint8Array>): Promise<Buffer> {
  const parts: Buffer[] = [];
  const reader = stream.getReader();

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      parts.push(Buffer.from(value));
    }
  } catch (error) {
    await reader.cancel(error).catch((cancelError: unknown) => {
      log.debug({ err: cancelError }, "ElevenLabs stream was already closed");
    });
    throw error;
  } finally {
    reader.releaseLock();
  }

  return Buffer.concat(parts);
}

// Reuse a single SDK client per adapter so we do not re-auth on every request.
function createSdkSpeechClient(apiKey: string | undefined): ElevenLabsSpeechClient {
  if (!apiKey) {
    throw new ConfigurationError("Missing ELEVENLABS_API_KEY environment variable");
  }
  const sdk = new ElevenLabsClient({ apiKey });
  return {
    convert: (voiceId, request, requestOptions) =>
      sdk.textToSpeech.convert(voiceId, request, requestOptions),
  };
}
