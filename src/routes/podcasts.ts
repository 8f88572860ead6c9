import type { FastifyInstance } from "fastify";
import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

import {
  AssemblyError,
  ConfigurationError,
  MalformedScriptError,
  SynthesisError,
} from "../errors.js";
import { log } from "../logger.js";
import {
  runPodcastPipeline,
  type PodcastPipelineResult,
  type RunPodcastPipelineOptions,
} from "../services/podcast-pipeline.js";
import type { OutputFormat, QualityTier } from "../types/audio.js";
import { isTtsProvider, type TtsProvider } from "../types/provider.js";
import type { SpeakerSpeeds } from "../types/script.js";

type RenderBody = {
  script?: unknown;
  provider?: unknown;
  language?: unknown;
  speed?: unknown;
  qualityTier?: unknown;
  format?: unknown;
  projectName?: unknown;
};

type AudioFileParams = {
  fileName: string;
};

export type ErrorBody = {
  message: string;
  code?: string;
  provider?: TtsProvider;
  segmentIndex?: number;
};

/** Settings shared by every render; tests swap in fake adapters here. */
export type PodcastRouteOptions = {
  outputDir: string;
  defaultProvider: TtsProvider;
  pipeline?: Partial<Omit<RunPodcastPipelineOptions, "script" | "provider" | "outputDir">>;
};

const AUDIO_FILE_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*\.(wav|mp3)$/;

const CONTENT_TYPES: Record<OutputFormat, string> = {
  wav: "audio/wav",
  mp3: "audio/mpeg",
};

/** Registers routes for rendering podcast audio and streaming finished files. */
export async function registerPodcastRoutes(
  app: FastifyInstance,
  options: PodcastRouteOptions
): Promise<void> {
  app.post<{ Body: RenderBody | undefined; Reply: PodcastPipelineResult | ErrorBody }>(
    "/podcasts/audio",
    async (request, reply) => {
      const body: RenderBody = request.body ?? {};

      const script = body.script;
      if (typeof script !== "string" || !script.trim()) {
        return reply.status(400).send({ message: "script is required" });
      }

      const provider = body.provider ?? options.defaultProvider;
      if (!isTtsProvider(provider)) {
        return reply
          .status(400)
          .send({ message: "provider must be 'cartesia' or 'elevenlabs'" });
      }

      const language = body.language ?? "en";
      if (typeof language !== "string" || !/^[a-z]{2,3}$/i.test(language)) {
        return reply
          .status(400)
          .send({ message: "language must be a two or three letter code" });
      }

      const speed = parseSpeed(body.speed);
      if (speed === null) {
        return reply
          .status(400)
          .send({ message: "speed must be a number or { A, B } numbers" });
      }

      const qualityTier = body.qualityTier ?? "production";
      if (!isQualityTier(qualityTier)) {
        return reply
          .status(400)
          .send({ message: "qualityTier must be 'prototype' or 'production'" });
      }

      const format = parseFormat(body.format);
      if (format === null) {
        return reply.status(400).send({ message: "format must be 'wav' or 'mp3'" });
      }

      const projectName = body.projectName;
      if (projectName !== undefined && typeof projectName !== "string") {
        return reply.status(400).send({ message: "projectName must be a string" });
      }

      request.log.info(
        { provider, language, speed, qualityTier, format },
        "Starting podcast render"
      );

      try {
        const result = await runPodcastPipeline({
          ...options.pipeline,
          script,
          provider,
          language: language.toLowerCase(),
          speed,
          qualityTier,
          format,
          projectName,
          outputDir: options.outputDir,
          logger: log.child({ reqId: request.id }),
        });
        request.log.info(
          { fileName: result.fileName, segments: result.segmentCount, usage: result.usage },
          "Podcast render completed"
        );
        return reply.status(200).send(result);
      } catch (error) {
        const { status, body: errorBody } = errorResponse(error);
        if (status >= 500) {
          request.log.error({ err: error }, "Podcast render failed");
        } else {
          request.log.warn({ err: error, status }, "Podcast render rejected");
        }
        return reply.status(status).send(errorBody);
      }
    }
  );

  app.get<{ Params: AudioFileParams }>(
    "/podcasts/audio/:fileName",
    async (request, reply) => {
      const fileName = request.params.fileName?.trim() ?? "";
      const match = AUDIO_FILE_NAME.exec(fileName);
      if (!match || fileName.includes("..")) {
        return reply.status(400).send({ message: "Invalid audio file name" });
      }

      const format: OutputFormat = match[1] === "mp3" ? "mp3" : "wav";
      const audioPath = path.join(options.outputDir, fileName);

      try {
        const stats = await fs.stat(audioPath);
        reply.header("Content-Type", CONTENT_TYPES[format]);
        reply.header("Content-Length", stats.size);
        return reply.send(createReadStream(audioPath));
      } catch (error) {
        if (isMissingFile(error)) {
          request.log.warn({ fileName }, "Audio not found");
          return reply.status(404).send({ message: "Audio file not found" });
        }

        request.log.error({ err: error, fileName }, "Failed to stream podcast audio");
        return reply.status(500).send({ message: "Failed to stream podcast audio" });
      }
    }
  );
}

/** Maps pipeline failures onto HTTP statuses. */
export function errorResponse(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof MalformedScriptError) {
    return { status: 422, body: { message: error.message, code: error.code } };
  }
  if (error instanceof ConfigurationError) {
    return { status: 400, body: { message: error.message, code: error.code } };
  }
  if (error instanceof SynthesisError) {
    return {
      status: 502,
      body: {
        message: error.message,
        code: error.code,
        provider: error.provider,
        segmentIndex: error.segmentIndex,
      },
    };
  }
  if (error instanceof AssemblyError) {
    return { status: 500, body: { message: error.message, code: error.code } };
  }
  return { status: 500, body: { message: "Failed to render podcast audio" } };
}

function parseSpeed(value: unknown): number | SpeakerSpeeds | undefined | null {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "object" && value !== null && "A" in value && "B" in value) {
    const { A, B } = value;
    if (typeof A === "number" && typeof B === "number" && Number.isFinite(A) && Number.isFinite(B)) {
      return { A, B };
    }
  }
  return null;
}

function parseFormat(value: unknown): OutputFormat | undefined | null {
  if (value === undefined) {
    return undefined;
  }
  return value === "wav" || value === "mp3" ? value : null;
}

function isQualityTier(value: unknown): value is QualityTier {
  return value === "prototype" || value === "production";
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
