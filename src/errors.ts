import type { TtsProvider } from "./types/provider.js";

export type PipelineErrorCode =
  | "MALFORMED_SCRIPT"
  | "SYNTHESIS_FAILED"
  | "TRANSIENT_PROVIDER_FAILURE"
  | "ASSEMBLY_FAILED"
  | "CONFIGURATION_INVALID";

/** Base class for every failure the pipeline reports. */
export class PodcastPipelineError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The script contains no speaker-labelled dialogue. */
export class MalformedScriptError extends PodcastPipelineError {
  constructor(message: string) {
    super("MALFORMED_SCRIPT", message);
  }
}

/** A provider rejected a segment, or retries ran out. */
export class SynthesisError extends PodcastPipelineError {
  readonly provider: TtsProvider;
  readonly segmentIndex: number;
  readonly attempts: number;

  constructor(options: {
    provider: TtsProvider;
    segmentIndex: number;
    message: string;
    attempts?: number;
    cause?: unknown;
  }) {
    super(
      "SYNTHESIS_FAILED",
      `${options.provider} failed on segment ${options.segmentIndex}: ${options.message}`,
      { cause: options.cause }
    );
    this.provider = options.provider;
    this.segmentIndex = options.segmentIndex;
    this.attempts = options.attempts ?? 1;
  }
}

/** Network, timeout or rate-limit failure; retried inside the adapter loop. */
export class TransientProviderError extends PodcastPipelineError {
  readonly provider: TtsProvider;
  readonly status?: number;

  constructor(
    provider: TtsProvider,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super("TRANSIENT_PROVIDER_FAILURE", message, { cause: options?.cause });
    this.provider = provider;
    this.status = options?.status;
  }
}

/** Chunks are missing or cannot be brought to a common format. */
export class AssemblyError extends PodcastPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ASSEMBLY_FAILED", message, options);
  }
}

/** Missing API keys, voices or other settings. */
export class ConfigurationError extends PodcastPipelineError {
  constructor(message: string) {
    super("CONFIGURATION_INVALID", message);
  }
}

/** HTTP statuses a provider may recover from on its own. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
