#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";

import { env } from "./config/env.js";
import { USER_SPEED_DEFAULT } from "./config/speed.js";
import { describeError } from "./errors.js";
import { log } from "./logger.js";
import {
  runPodcastPipeline,
  type PodcastPipelineResult,
  type RunPodcastPipelineOptions,
} from "./services/podcast-pipeline.js";
import type { OutputFormat, QualityTier } from "./types/audio.js";
import { isTtsProvider } from "./types/provider.js";

const USAGE = `Usage: podcast-voice render <script.txt> [options]

Options:
  --provider <cartesia|elevenlabs>   TTS provider (default: TTS_PROVIDER)
  --language <code>                  Voice language (default: en)
  --speed <number>                   Speed for both speakers, 0.7-1.2
  --speed-a <number>                 Speed for speaker A
  --speed-b <number>                 Speed for speaker B
  --tier <prototype|production>      Quality tier (default: production)
  --format <wav|mp3>                 Output format (default: OUTPUT_FORMAT)
  --project <name>                   Project name used in the file name
  --concurrency <n>                  Parallel provider requests
  --out <dir>                        Output directory (default: PODCAST_OUTPUT_DIR)`;

export type RenderCommand = Omit<RunPodcastPipelineOptions, "script"> & {
  scriptPath: string;
};

/** Turns argv (without the node and script entries) into pipeline options. */
export function parseRenderArgs(argv: string[]): RenderCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      provider: { type: "string" },
      language: { type: "string", default: "en" },
      speed: { type: "string" },
      "speed-a": { type: "string" },
      "speed-b": { type: "string" },
      tier: { type: "string", default: "production" },
      format: { type: "string" },
      project: { type: "string" },
      concurrency: { type: "string" },
      out: { type: "string" },
    },
  });

  const [command, scriptPath] = positionals;
  if (command !== "render" || !scriptPath) {
    throw new Error(USAGE);
  }

  const provider = values.provider ?? env.ttsProvider;
  if (!isTtsProvider(provider)) {
    throw new Error(`Unknown provider "${provider}"`);
  }

  const qualityTier = values.tier ?? "production";
  if (!isQualityTier(qualityTier)) {
    throw new Error(`Unknown tier "${qualityTier}"`);
  }

  const format = values.format;
  if (format !== undefined && !isOutputFormat(format)) {
    throw new Error(`Unknown format "${format}"`);
  }

  const baseSpeed = parseNumber(values.speed, "speed");
  const speedA = parseNumber(values["speed-a"], "speed-a");
  const speedB = parseNumber(values["speed-b"], "speed-b");
  const speed =
    speedA === undefined && speedB === undefined
      ? baseSpeed
      : {
          A: speedA ?? baseSpeed ?? USER_SPEED_DEFAULT,
          B: speedB ?? baseSpeed ?? USER_SPEED_DEFAULT,
        };

  return {
    scriptPath,
    provider,
    language: (values.language ?? "en").toLowerCase(),
    speed,
    qualityTier,
    format,
    projectName: values.project ?? path.parse(scriptPath).name,
    concurrency: parseNumber(values.concurrency, "concurrency"),
    outputDir: values.out ? path.resolve(values.out) : env.outputDir,
  };
}

export async function runCli(
  argv: string[],
  render: (options: RunPodcastPipelineOptions) => Promise<PodcastPipelineResult> = runPodcastPipeline
): Promise<number> {
  try {
    const { scriptPath, ...options } = parseRenderArgs(argv);
    const script = await fs.readFile(scriptPath, "utf8");
    const result = await render({ ...options, script });
    console.log(JSON.stringify(result, null, 2));
    return 0;
  } catch (error) {
    log.debug({ err: error }, "Render command failed");
    console.error(describeError(error));
    return 1;
  }
}

function parseNumber(value: string | undefined, name: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`--${name} must be a number, got "${value}"`);
  }
  return parsed;
}

function isQualityTier(value: string): value is QualityTier {
  return value === "prototype" || value === "production";
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === "wav" || value === "mp3";
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(describeError(error));
      process.exitCode = 1;
    });
}
