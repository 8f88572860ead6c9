export type AudioEncoding = "pcm_f32le" | "pcm_s16le" | "mp3";

export type QualityTier = "prototype" | "production";

export type OutputFormat = "wav" | "mp3";

export type AudioChunk = {
  segmentIndex: number;
  rawBytes: Buffer;
  sampleRate: number;
  channels: number;
  encoding: AudioEncoding;
};

/** Interleaved float PCM in the range [-1, 1]. */
export type PcmAudio = {
  samples: Float32Array;
  sampleRate: number;
  channels: number;
};

export type EncodeProfile = {
  qualityTier: QualityTier;
  /** Target bitrate for compressed output, e.g. "192k". */
  bitrate: string;
};

export type AssembledAudio = {
  buffer: Buffer;
  byteSize: number;
  durationSeconds: number;
  sampleRate: number;
  channels: number;
  format: OutputFormat;
  qualityTier: QualityTier;
};
