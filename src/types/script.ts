export type Speaker = "A" | "B";

export type Segment = Readonly<{
  /** Playback position, dense from 0. */
  index: number;
  speaker: Speaker;
  /** Spoken text only; leading tags and citations removed. */
  text: string;
  /** Canonical emotion tokens in encounter order. */
  emotionTags: readonly string[];
  speedOverride?: number;
}>;

export type SpeakerSpeeds = Record<Speaker, number>;
