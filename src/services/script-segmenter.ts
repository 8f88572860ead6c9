/**
 * Splits a cleaned two-speaker dialogue script into ordered segments.
 * - segmentScript: cuts the citation block, groups lines per speaker turn and lifts leading tags.
 * - cutAtBoundary: drops the boundary marker and everything after it.
 * - extractLeadingTags: peels `[tag]` tokens off the start of an utterance.
 */
import type { Logger } from "pino";

import { MalformedScriptError } from "../errors.js";
import { log } from "../logger.js";
import type { Segment, Speaker } from "../types/script.js";

export const DEFAULT_BOUNDARY_MARKER = "SOURCES FOUND:";

export type SegmentScriptOptions = {
  boundaryMarker?: string;
  logger?: Logger;
};

type DraftSegment = {
  speaker: Speaker;
  parts: string[];
  emotionTags: string[];
  speedOverride?: number;
};

// Label may be wrapped in emphasis: **Speaker A:**, **Speaker A**:, *Speaker A:*, __Speaker B:__
const SPEAKER_LINE =
  /^(?:\*{1,2}|_{1,2})?Speaker (A|B)(?:\*{1,2}|_{1,2})?:(?:\*{1,2}|_{1,2})?\s*(.*)$/;
const LEADING_TAG = /^\[([^\]]*)\]\s*/;
const SPEED_TAG = /^speed\s*[:=]\s*(\d+(?:\.\d+)?)$/;
const MARKUP_ONLY = /^[#*\-_\s]*$/;

/** Parses raw dialogue text into dense, speaker-attributed segments. */
export function segmentScript(
  script: string,
  options: SegmentScriptOptions = {}
): Segment[] {
  const logger = options.logger ?? log;
  const spoken = cutAtBoundary(
    script,
    options.boundaryMarker ?? DEFAULT_BOUNDARY_MARKER
  );

  const drafts: DraftSegment[] = [];
  let current: DraftSegment | undefined;

  for (const rawLine of spoken.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    const match = SPEAKER_LINE.exec(line);
    if (match) {
      const speaker: Speaker = match[1] === "A" ? "A" : "B";
      const { tags, speedOverride, text } = extractLeadingTags(
        stripEmphasis(match[2] ?? "")
      );
      current = { speaker, parts: [], emotionTags: tags, speedOverride };
      if (text) {
        current.parts.push(text);
      }
      drafts.push(current);
      continue;
    }

    // Preamble before the first label is not spoken.
    if (!current || line.startsWith("#") || line.startsWith("---")) {
      continue;
    }
    current.parts.push(line);
  }

  if (drafts.length === 0) {
    throw new MalformedScriptError(
      "Script has no 'Speaker A:' or 'Speaker B:' lines"
    );
  }

  const segments: Segment[] = [];
  drafts.forEach((draft, position) => {
    const text = draft.parts.join(" ").replace(/\s+/g, " ").trim();
    if (!text) {
      logger.warn(
        { position, speaker: draft.speaker, emotionTags: draft.emotionTags },
        "Dropping empty dialogue segment"
      );
      return;
    }

    segments.push(
      Object.freeze({
        index: segments.length,
        speaker: draft.speaker,
        text,
        emotionTags: Object.freeze([...draft.emotionTags]),
        ...(draft.speedOverride !== undefined
          ? { speedOverride: draft.speedOverride }
          : {}),
      })
    );
  });

  if (segments.length === 0) {
    throw new MalformedScriptError(
      "Every speaker line in the script is empty after removing tags"
    );
  }

  logger.debug(
    { segments: segments.length, dropped: drafts.length - segments.length },
    "Script segmented"
  );
  return segments;
}

/** Removes the first occurrence of the marker (case-insensitive) and everything after it. */
export function cutAtBoundary(script: string, marker: string): string {
  if (!marker) {
    return script;
  }

  const cutIndex = script.toUpperCase().indexOf(marker.toUpperCase());
  if (cutIndex < 0) {
    return script;
  }

  const kept = script.slice(0, cutIndex);
  const lastBreak = kept.lastIndexOf("\n");
  const trailing = kept.slice(lastBreak + 1);

  // Drop the "## " or "**" left in front of the marker on its own line.
  return MARKUP_ONLY.test(trailing) ? kept.slice(0, lastBreak + 1) : kept;
}

/** Lifts `[tag]` tokens at the start of an utterance into a tag list. */
export function extractLeadingTags(utterance: string): {
  tags: string[];
  speedOverride?: number;
  text: string;
} {
  const tags: string[] = [];
  let speedOverride: number | undefined;
  let rest = utterance.trim();

  let match = LEADING_TAG.exec(rest);
  while (match) {
    const token = (match[1] ?? "").trim().toLowerCase();
    const speed = SPEED_TAG.exec(token);
    if (speed) {
      speedOverride = Number.parseFloat(speed[1] ?? "");
    } else if (token) {
      tags.push(token);
    }
    rest = rest.slice(match[0].length);
    match = LEADING_TAG.exec(rest);
  }

  return { tags, speedOverride, text: rest.trim() };
}

function stripEmphasis(text: string): string {
  return text
    .replace(/^(?:\*{1,2}|_{1,2})\s*/, "")
    .replace(/\s*(?:\*{1,2}|_{1,2})$/, "")
    .trim();
}
