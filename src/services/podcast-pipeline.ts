/**
 * - runPodcastPipeline: exported entry that segments a script, synthesizes every segment through a
 *   bounded worker pool, assembles the chunks and writes the finished file atomically.
 * - buildProviderRequest: resolves tags, speed and voice for one segment at synthesis time.
 * - synthesizeAll: fan-out/fan-in with a shared AbortController; the first failure cancels the rest.
 * - buildOutputFileName: `<project>_<lang>_<date>_<TAG>_A<speed>_B<speed>_<TIER>.<ext>`.
 * - writeAtomically: temp file in the target directory, then rename.
 */
import fs from "node:fs/promises";
import path from "node:path";

import type { Logger } from "pino";

import { env } from "../config/env.js";
import {
  getVoiceTable,
  resolveVoiceId,
  speakerSpeeds,
  defaultSpeedFor,
  type VoiceTable,
} from "../config/voices.js";
import { ConfigurationError } from "../errors.js";
import { log } from "../logger.js";
import type { AudioChunk, OutputFormat, QualityTier } from "../types/audio.js";
import {
  PROVIDER_TAGS,
  type ProviderAdapter,
  type ProviderRequest,
  type TtsProvider,
} from "../types/provider.js";
import type { Segment, SpeakerSpeeds } from "../types/script.js";
import { assembleAudio, type AssembleAudioOptions } from "./audio/assembler.js";
import { resolveEmotionTags } from "./emotion-tag-mapper.js";
import { segmentScript } from "./script-segmenter.js";
import {
  formatSpeedLabel,
  roundDisplaySpeed,
  toDisplaySpeed,
  toProviderSpeed,
} from "./speed-normalizer.js";
import {
  createProviderAdapter,
  synthesizeWithRetry,
  type SynthesizeOptions,
} from "./tts/index.js";
import { UsageTracker, type UsageSummary } from "./usage-tracker.js";

export type PipelineStage =
  | "segmenting"
  | "resolving"
  | "synthesizing"
  | "assembling"
  | "writing"
  | "done"
  | "failed";

export type RunPodcastPipelineOptions = {
  script: string;
  provider: TtsProvider;
  language: string;
  /** One speed for both speakers, or one per speaker; defaults to the language's speed. */
  speed?: number | SpeakerSpeeds;
  qualityTier?: QualityTier;
  format?: OutputFormat;
  projectName?: string;
  outputDir?: string;
  /** Overrides the generated file name. */
  fileName?: string;
  concurrency?: number;
  crossfadeMs?: number;
  voices?: VoiceTable;
  adapter?: ProviderAdapter;
  tracker?: UsageTracker;
  retry?: SynthesizeOptions["retry"];
  sleep?: SynthesizeOptions["sleep"];
  assembly?: Pick<AssembleAudioOptions, "curve" | "decoder" | "encoder">;
  signal?: AbortSignal;
  date?: Date;
  logger?: Logger;
};

export type PodcastPipelineResult = {
  outputPath: string;
  fileName: string;
  byteSize: number;
  durationSeconds: number;
  sampleRate: number;
  channels: number;
  format: OutputFormat;
  qualityTier: QualityTier;
  provider: TtsProvider;
  language: string;
  segmentCount: number;
  speeds: {
    display: SpeakerSpeeds;
    native: SpeakerSpeeds;
  };
  usage: UsageSummary;
};

const DEFAULT_PROJECT_NAME = "podcast";

/** Runs one script through segmentation, synthesis, assembly and the final write. */
export async function runPodcastPipeline(
  options: RunPodcastPipelineOptions
): Promise<PodcastPipelineResult> {
  const runLog = (options.logger ?? log).child({
    provider: options.provider,
    language: options.language,
  });
  let stage: PipelineStage = "segmenting";
  const enter = (next: PipelineStage, details: Record<string, unknown> = {}) => {
    stage = next;
    runLog.info({ stage, ...details }, "Pipeline stage");
  };

  try {
    enter("segmenting");
    const segments = segmentScript(options.script, { logger: runLog });

    enter("resolving", { segments: segments.length });
    const voices = options.voices ?? getVoiceTable();
    const adapter =
      options.adapter ?? createProviderAdapter(options.provider, env);
    if (adapter.provider !== options.provider) {
      throw new ConfigurationError(
        `Adapter for ${adapter.provider} cannot serve provider ${options.provider}`
      );
    }

    const userSpeeds = speakerSpeeds(
      voices,
      options.speed ?? defaultSpeedFor(voices, options.language)
    );
    const nativeSpeeds: SpeakerSpeeds = {
      A: toProviderSpeed(userSpeeds.A, options.provider),
      B: toProviderSpeed(userSpeeds.B, options.provider),
    };
    const displaySpeeds: SpeakerSpeeds = {
      A: roundDisplaySpeed(toDisplaySpeed(nativeSpeeds.A, options.provider)),
      B: roundDisplaySpeed(toDisplaySpeed(nativeSpeeds.B, options.provider)),
    };

    // Fail on a missing voice before any provider call is made.
    const voiceIds = {
      A: resolveVoiceId(voices, options.provider, options.language, "A"),
      B: resolveVoiceId(voices, options.provider, options.language, "B"),
    };

    const requestedTier = options.qualityTier ?? "production";
    const qualityTier = effectiveTier(adapter, requestedTier, runLog);

    enter("synthesizing", {
      concurrency: options.concurrency ?? env.synthesisConcurrency,
      speeds: { display: displaySpeeds, native: nativeSpeeds },
    });
    const tracker = options.tracker ?? new UsageTracker();
    tracker.reset();
    const chunks = await synthesizeAll({
      segments,
      adapter,
      concurrency: options.concurrency ?? env.synthesisConcurrency,
      tracker,
      signal: options.signal,
      retry: options.retry,
      sleep: options.sleep,
      logger: runLog,
      buildRequest: (segment) =>
        buildProviderRequest({
          segment,
          provider: options.provider,
          language: options.language,
          voiceId: voiceIds[segment.speaker],
          speakerNativeSpeed: nativeSpeeds[segment.speaker],
        }),
    });

    enter("assembling", { chunks: chunks.length, qualityTier });
    const format = options.format ?? env.outputFormat;
    const assembled = await assembleAudio(chunks, qualityTier, {
      ...options.assembly,
      expectedSegmentCount: segments.length,
      crossfadeMs: options.crossfadeMs,
      format,
      logger: runLog,
    });

    const fileName =
      options.fileName ??
      buildOutputFileName({
        project: options.projectName ?? DEFAULT_PROJECT_NAME,
        language: options.language,
        provider: options.provider,
        speeds: displaySpeeds,
        qualityTier,
        date: options.date ?? new Date(),
        format,
      });
    const outputPath = path.resolve(options.outputDir ?? env.outputDir, fileName);

    enter("writing", { outputPath, byteSize: assembled.byteSize });
    await writeAtomically(outputPath, assembled.buffer);

    const usage = tracker.summary();
    enter("done", {
      durationSeconds: assembled.durationSeconds,
      totalUnits: usage.totalUnits,
    });

    return {
      outputPath,
      fileName,
      byteSize: assembled.byteSize,
      durationSeconds: assembled.durationSeconds,
      sampleRate: assembled.sampleRate,
      channels: assembled.channels,
      format,
      qualityTier,
      provider: options.provider,
      language: options.language,
      segmentCount: segments.length,
      speeds: { display: displaySpeeds, native: nativeSpeeds },
      usage,
    };
  } catch (error) {
    runLog.error({ err: error, failedDuring: stage, stage: "failed" }, "Pipeline failed");
    throw error;
  }
}

/** Builds the per-segment request; a segment's own speed tag wins over the speaker speed. */
export function buildProviderRequest(options: {
  segment: Segment;
  provider: TtsProvider;
  language: string;
  voiceId: string;
  speakerNativeSpeed: number;
}): ProviderRequest {
  const { segment, provider } = options;
  return {
    segment,
    resolvedTags: resolveEmotionTags(segment.emotionTags, provider),
    resolvedSpeed:
      segment.speedOverride !== undefined
        ? toProviderSpeed(segment.speedOverride, provider)
        : options.speakerNativeSpeed,
    voiceId: options.voiceId,
    language: options.language,
  };
}

/** Synthesizes every segment with at most `concurrency` requests in flight. */
export async function synthesizeAll(options: {
  segments: readonly Segment[];
  adapter: ProviderAdapter;
  concurrency: number;
  tracker: UsageTracker;
  buildRequest: (segment: Segment) => ProviderRequest;
  signal?: AbortSignal;
  retry?: SynthesizeOptions["retry"];
  sleep?: SynthesizeOptions["sleep"];
  logger?: Logger;
}): Promise<AudioChunk[]> {
  const { segments, adapter } = options;
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    forwardAbort();
  } else {
    options.signal?.addEventListener("abort", forwardAbort, { once: true });
  }

  const results: Array<AudioChunk | undefined> = new Array(segments.length);
  let failure: { error: unknown } | undefined;
  let cursor = 0;

  const worker = async () => {
    while (!controller.signal.aborted) {
      const segment = segments[cursor];
      if (!segment) {
        return;
      }
      cursor += 1;

      try {
        results[segment.index] = await synthesizeWithRetry(
          adapter,
          options.buildRequest(segment),
          {
            tracker: options.tracker,
            signal: controller.signal,
            retry: options.retry,
            sleep: options.sleep,
            logger: options.logger,
          }
        );
      } catch (error) {
        // After an abort, the controller's reason is what the caller sees.
        if (!failure && !controller.signal.aborted) {
          failure = { error };
          controller.abort(error);
        }
        return;
      }
    }
  };

  const poolSize = Math.max(1, Math.min(Math.floor(options.concurrency) || 1, segments.length));
  try {
    await Promise.all(Array.from({ length: poolSize }, () => worker()));
  } finally {
    options.signal?.removeEventListener("abort", forwardAbort);
  }

  if (failure) {
    results.length = 0;
    throw failure.error;
  }
  if (controller.signal.aborted) {
    results.length = 0;
    throw controller.signal.reason;
  }

  return results.filter((chunk): chunk is AudioChunk => chunk !== undefined);
}

export function buildOutputFileName(options: {
  project: string;
  language: string;
  provider: TtsProvider;
  speeds: SpeakerSpeeds;
  qualityTier: QualityTier;
  date: Date;
  format: OutputFormat;
}): string {
  const project =
    options.project
      .trim()
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, "-")
      .replace(/^-+|-+$/g, "") || DEFAULT_PROJECT_NAME;

  return [
    project,
    options.language.toLowerCase(),
    options.date.toISOString().slice(0, 10),
    PROVIDER_TAGS[options.provider],
    `A${formatSpeedLabel(options.speeds.A)}`,
    `B${formatSpeedLabel(options.speeds.B)}`,
    options.qualityTier.toUpperCase(),
  ].join("_") + `.${options.format}`;
}

/** Writes to a sibling temp file, then renames it over the target. */
export async function writeAtomically(targetPath: string, data: Buffer): Promise<void> {
  const dir = path.dirname(targetPath);
  await fs.mkdir(dir, { recursive: true });
  const tempPath = path.join(
    dir,
    `.${path.basename(targetPath)}.${process.pid}.${Date.now()}.tmp`
  );

  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

function effectiveTier(
  adapter: ProviderAdapter,
  requested: QualityTier,
  logger: Logger
): QualityTier {
  if (requested === "prototype" && !adapter.capabilities().supportsQualityTiers) {
    logger.info(
      { provider: adapter.provider, requested },
      "Provider has no quality tiers; rendering production"
    );
    return "production";
  }
  return requested;
}
