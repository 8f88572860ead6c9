/**
 * Float PCM helpers used by the assembler: decoding raw provider bytes,
 * resampling, channel remixing, crossfaded concatenation and WAV framing.
 */
import { AssemblyError } from "../../errors.js";
import type { AudioChunk, PcmAudio } from "../../types/audio.js";

export type FadeCurve = "linear" | "equal-power";

const S16_SCALE = 32768;

/** Decodes raw little-endian PCM into interleaved float samples. */
export function decodeRawPcm(chunk: AudioChunk): PcmAudio {
  assertFormat(chunk.sampleRate, chunk.channels, `segment ${chunk.segmentIndex}`);

  const bytesPerSample = chunk.encoding === "pcm_f32le" ? 4 : 2;
  const frameSize = bytesPerSample * chunk.channels;
  if (chunk.rawBytes.length % frameSize !== 0) {
    throw new AssemblyError(
      `Segment ${chunk.segmentIndex} has ${chunk.rawBytes.length} bytes, not a multiple of the ${frameSize}-byte frame`
    );
  }

  const count = chunk.rawBytes.length / bytesPerSample;
  const samples = new Float32Array(count);
  for (let index = 0; index < count; index += 1) {
    samples[index] =
      chunk.encoding === "pcm_f32le"
        ? chunk.rawBytes.readFloatLE(index * 4)
        : chunk.rawBytes.readInt16LE(index * 2) / S16_SCALE;
  }

  return { samples, sampleRate: chunk.sampleRate, channels: chunk.channels };
}

export function frameCount(audio: PcmAudio): number {
  return audio.samples.length / audio.channels;
}

/** Linear-interpolation resampler; returns the input unchanged when rates match. */
export function resample(audio: PcmAudio, targetRate: number): PcmAudio {
  assertFormat(targetRate, audio.channels, "resample target");
  if (audio.sampleRate === targetRate) {
    return audio;
  }

  const { channels } = audio;
  const inputFrames = frameCount(audio);
  const outputFrames = Math.max(1, Math.round((inputFrames * targetRate) / audio.sampleRate));
  const ratio = audio.sampleRate / targetRate;
  const samples = new Float32Array(outputFrames * channels);

  for (let frame = 0; frame < outputFrames; frame += 1) {
    const position = frame * ratio;
    const left = Math.min(Math.floor(position), inputFrames - 1);
    const right = Math.min(left + 1, inputFrames - 1);
    const weight = position - left;
    for (let channel = 0; channel < channels; channel += 1) {
      const a = audio.samples[left * channels + channel] ?? 0;
      const b = audio.samples[right * channels + channel] ?? 0;
      samples[frame * channels + channel] = a + (b - a) * weight;
    }
  }

  return { samples, sampleRate: targetRate, channels };
}

/** Up-mixes mono by duplication or down-mixes to mono by averaging. */
export function remix(audio: PcmAudio, targetChannels: number): PcmAudio {
  if (audio.channels === targetChannels) {
    return audio;
  }

  const frames = frameCount(audio);
  const samples = new Float32Array(frames * targetChannels);

  if (audio.channels === 1) {
    for (let frame = 0; frame < frames; frame += 1) {
      samples.fill(audio.samples[frame] ?? 0, frame * targetChannels, (frame + 1) * targetChannels);
    }
  } else if (targetChannels === 1) {
    for (let frame = 0; frame < frames; frame += 1) {
      let sum = 0;
      for (let channel = 0; channel < audio.channels; channel += 1) {
        sum += audio.samples[frame * audio.channels + channel] ?? 0;
      }
      samples[frame] = sum / audio.channels;
    }
  } else {
    throw new AssemblyError(
      `Cannot reconcile a ${audio.channels}-channel segment with a ${targetChannels}-channel layout`
    );
  }

  return { samples, sampleRate: audio.sampleRate, channels: targetChannels };
}

/**
 * Joins segments sharing one format, blending `fadeFrames` of each tail into the
 * next head. The fade is capped at half of the shorter neighbour.
 */
export function concatWithCrossfade(
  parts: readonly PcmAudio[],
  fadeFrames: number,
  curve: FadeCurve = "linear"
): PcmAudio {
  const first = parts[0];
  if (!first) {
    throw new AssemblyError("No audio to concatenate");
  }
  const { sampleRate, channels } = first;
  for (const part of parts) {
    if (part.sampleRate !== sampleRate || part.channels !== channels) {
      throw new AssemblyError("Segments must share one sample rate and channel layout before concatenation");
    }
  }

  const overlaps = parts.slice(1).map((part, position) => {
    const previous = parts[position] ?? part;
    const limit = Math.floor(Math.min(frameCount(previous), frameCount(part)) / 2);
    return Math.max(0, Math.min(Math.floor(fadeFrames), limit));
  });

  const totalFrames =
    parts.reduce((sum, part) => sum + frameCount(part), 0) -
    overlaps.reduce((sum, overlap) => sum + overlap, 0);
  const samples = new Float32Array(totalFrames * channels);

  let cursor = 0;
  parts.forEach((part, position) => {
    const overlap = position === 0 ? 0 : overlaps[position - 1] ?? 0;
    const start = cursor - overlap;

    for (let frame = 0; frame < frameCount(part); frame += 1) {
      const gainIn = frame < overlap ? fadeGain((frame + 0.5) / overlap, curve) : 1;
      const gainOut = frame < overlap ? fadeGain(1 - (frame + 0.5) / overlap, curve) : 0;
      for (let channel = 0; channel < channels; channel += 1) {
        const target = (start + frame) * channels + channel;
        const incoming = part.samples[frame * channels + channel] ?? 0;
        samples[target] = frame < overlap
          ? (samples[target] ?? 0) * gainOut + incoming * gainIn
          : incoming;
      }
    }

    cursor = start + frameCount(part);
  });

  return { samples, sampleRate, channels };
}

/** Wraps float PCM in a RIFF/WAVE container, either IEEE float32 or 16-bit integer. */
export function pcmToWav(audio: PcmAudio, bitsPerSample: 16 | 32 = 32): Buffer {
  const { channels, sampleRate } = audio;
  const bytesPerSample = bitsPerSample / 8;
  const byteRate = sampleRate * channels * bytesPerSample;
  const blockAlign = channels * bytesPerSample;
  const dataSize = audio.samples.length * bytesPerSample;
  const headerSize = 44;

  const wavBuffer = Buffer.alloc(headerSize + dataSize);

  // RIFF header
  wavBuffer.write("RIFF", 0);
  wavBuffer.writeUInt32LE(36 + dataSize, 4);
  wavBuffer.write("WAVE", 8);

  // fmt sub-chunk
  wavBuffer.write("fmt ", 12);
  wavBuffer.writeUInt32LE(16, 16);
  wavBuffer.writeUInt16LE(bitsPerSample === 32 ? 3 : 1, 20); // 3 = IEEE float, 1 = PCM
  wavBuffer.writeUInt16LE(channels, 22);
  wavBuffer.writeUInt32LE(sampleRate, 24);
  wavBuffer.writeUInt32LE(byteRate, 28);
  wavBuffer.writeUInt16LE(blockAlign, 32);
  wavBuffer.writeUInt16LE(bitsPerSample, 34);

  // data sub-chunk
  wavBuffer.write("data", 36);
  wavBuffer.writeUInt32LE(dataSize, 40);

  audio.samples.forEach((sample, index) => {
    const offset = headerSize + index * bytesPerSample;
    if (bitsPerSample === 32) {
      wavBuffer.writeFloatLE(sample, offset);
    } else {
      const clamped = Math.max(-1, Math.min(1, sample));
      wavBuffer.writeInt16LE(Math.round(clamped * (S16_SCALE - 1)), offset);
    }
  });

  return wavBuffer;
}

function fadeGain(position: number, curve: FadeCurve): number {
  const t = Math.max(0, Math.min(1, position));
  return curve === "equal-power" ? Math.sin((t * Math.PI) / 2) : t;
}

function assertFormat(sampleRate: number, channels: number, label: string): void {
  if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
    throw new AssemblyError(`Invalid sample rate ${sampleRate} for ${label}`);
  }
  if (!Number.isInteger(channels) || channels <= 0) {
    throw new AssemblyError(`Invalid channel count ${channels} for ${label}`);
  }
}
