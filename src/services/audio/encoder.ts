/**
 * Output encoders and the compressed-chunk decoder.
 * WAV is written in-process; mp3 goes through ffmpeg in a scratch directory.
 */
import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";

import { TIER_PROFILES } from "../../config/audio.js";
import { AssemblyError } from "../../errors.js";
import type { AudioChunk, OutputFormat, PcmAudio, QualityTier } from "../../types/audio.js";
import { decodeRawPcm, pcmToWav } from "./pcm.js";

const execFileAsync = promisify(execFile);

export type AudioEncoder = (
  audio: PcmAudio,
  format: OutputFormat,
  qualityTier: QualityTier
) => Promise<Buffer>;

export type CompressedAudioDecoder = (chunk: AudioChunk) => Promise<PcmAudio>;

/** Default encoder: WAV in-process, mp3 via ffmpeg/libmp3lame. */
export const encodeAudio: AudioEncoder = async (audio, format, qualityTier) => {
  const profile = TIER_PROFILES[qualityTier];
  const wav = pcmToWav(audio, profile.wavBitsPerSample);
  if (format === "wav") {
    return wav;
  }

  return withScratchDir(async (dir) => {
    const wavPath = path.join(dir, "mix.wav");
    const mp3Path = path.join(dir, "mix.mp3");
    await fs.writeFile(wavPath, wav);
    await runFfmpeg(["-y", "-i", wavPath, "-codec:a", "libmp3lame", "-b:a", profile.mp3Bitrate, mp3Path]);
    return fs.readFile(mp3Path);
  });
};

/** Decodes an mp3 chunk to float PCM at the chunk's declared rate and layout. */
export const decodeWithFfmpeg: CompressedAudioDecoder = async (chunk) =>
  withScratchDir(async (dir) => {
    const inputPath = path.join(dir, `segment-${chunk.segmentIndex}.mp3`);
    const outputPath = path.join(dir, `segment-${chunk.segmentIndex}.f32`);
    await fs.writeFile(inputPath, chunk.rawBytes);
    await runFfmpeg([
      "-y",
      "-i",
      inputPath,
      "-f",
      "f32le",
      "-acodec",
      "pcm_f32le",
      "-ar",
      String(chunk.sampleRate),
      "-ac",
      String(chunk.channels),
      outputPath,
    ]);
    const rawBytes = await fs.readFile(outputPath);
    return decodeRawPcm({ ...chunk, rawBytes, encoding: "pcm_f32le" });
  });

async function runFfmpeg(args: string[]): Promise<void> {
  try {
    await execFileAsync("ffmpeg", args);
  } catch (error) {
    throw new AssemblyError(
      `ffmpeg failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

async function withScratchDir<T>(work: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "podcast-audio-"));
  try {
    return await work(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}
