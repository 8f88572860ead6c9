/**
 * Cartesia adapter: plain transcript plus structured emotion/speed controls,
 * returned as raw float PCM from the bytes endpoint.
 */
import {
  getCartesiaAudioConfig,
  type CartesiaAudioConfig,
} from "../../config/cartesia.js";
import { ConfigurationError, TransientProviderError, isTransientStatus } from "../../errors.js";
import type { AudioChunk } from "../../types/audio.js";
import type {
  ProviderAdapter,
  ProviderCapabilities,
  ProviderRequest,
} from "../../types/provider.js";
import { renderInlineTags } from "../emotion-tag-mapper.js";

export type HttpResponseLike = Pick<Response, "ok" | "status" | "arrayBuffer" | "text">;

export type FetchLike = (url: string, init: RequestInit) => Promise<HttpResponseLike>;

export type CartesiaTtsPayload = {
  model_id: string;
  transcript: string;
  voice: {
    mode: "id";
    id: string;
    __experimental_controls: {
      speed: number;
      emotion?: string[];
    };
  };
  output_format: CartesiaAudioConfig["outputFormat"];
  language: string;
};

const NEUTRAL_LABEL = "neutral";

const CAPABILITIES: ProviderCapabilities = {
  // The bytes endpoint always renders full quality.
  supportsQualityTiers: false,
  nativeSampleRate: 44100,
  supportsInterruptionMarkup: false,
};

/** Creates the Cartesia adapter; pass fetchImpl to stub the HTTP call. */
export function createCartesiaAdapter(options: {
  apiKey?: string;
  fetchImpl?: FetchLike;
  config?: CartesiaAudioConfig;
}): ProviderAdapter {
  const config = options.config ?? getCartesiaAudioConfig();
  const fetchImpl: FetchLike = options.fetchImpl ?? fetch;
  const apiKey = options.apiKey;
  if (!apiKey) {
    throw new ConfigurationError("Missing CARTESIA_API_KEY environment variable");
  }

  return {
    provider: "cartesia",
    capabilities: () => ({
      ...CAPABILITIES,
      nativeSampleRate: config.outputFormat.sample_rate,
    }),
    billableUnits: (request) => renderCartesiaTranscript(request.segment.text).length,
    async synthesize(request, signal): Promise<AudioChunk> {
      const payload = buildCartesiaPayload(request, config);
      const controller = new AbortController();
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, config.requestTimeoutMs);
      const forwardAbort = () => controller.abort(signal?.reason);
      signal?.addEventListener("abort", forwardAbort, { once: true });

      try {
        const response = await fetchImpl(`${config.baseUrl}/tts/bytes`, {
          method: "POST",
          headers: {
            "X-API-Key": apiKey,
            "Cartesia-Version": config.apiVersion,
            "Content-Type": "application/json",
          },
          body: JSON.stringify(payload),
          signal: controller.signal,
        });

        if (!response.ok) {
          const errorText = await response.text();
          const message = `Cartesia API error (${response.status}): ${errorText}`;
          if (isTransientStatus(response.status)) {
            throw new TransientProviderError("cartesia", message, {
              status: response.status,
            });
          }
          throw new Error(message);
        }

        const rawBytes = Buffer.from(await response.arrayBuffer());
        if (rawBytes.length === 0) {
          throw new Error("Cartesia returned no audio");
        }

        return {
          segmentIndex: request.segment.index,
          rawBytes,
          sampleRate: config.outputFormat.sample_rate,
          channels: 1,
          encoding: "pcm_f32le",
        };
      } catch (error) {
        if (timedOut) {
          throw new TransientProviderError(
            "cartesia",
            `Cartesia request timed out after ${config.requestTimeoutMs}ms`,
            { cause: error }
          );
        }
        // fetch rejects with a TypeError when the connection itself fails.
        if (error instanceof TypeError && !signal?.aborted) {
          throw new TransientProviderError("cartesia", error.message, { cause: error });
        }
        throw error;
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener("abort", forwardAbort);
      }
    },
  };
}

/** Builds the bytes-endpoint payload; a neutral emotion is left out entirely. */
export function buildCartesiaPayload(
  request: ProviderRequest,
  config: CartesiaAudioConfig
): CartesiaTtsPayload {
  const emotion = request.resolvedTags.filter((label) => label !== NEUTRAL_LABEL);
  return {
    model_id: config.modelId,
    transcript: renderCartesiaTranscript(request.segment.text),
    voice: {
      mode: "id",
      id: request.voiceId,
      __experimental_controls: {
        speed: request.resolvedSpeed,
        ...(emotion.length > 0 ? { emotion } : {}),
      },
    },
    output_format: config.outputFormat,
    language: request.language,
  };
}

/** Cartesia reads tags aloud, so they are removed; dashes become pauses. */
export function renderCartesiaTranscript(text: string): string {
  return renderInlineTags(text, "cartesia")
    .replace(/\s*(?:—|-{2,})\s*$/, "...")
    .replace(/\s*(?:—|-{2,})\s*/g, ", ")
    .trim();
}
