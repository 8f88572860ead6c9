import pino from "pino";

import { MalformedScriptError } from "../errors.js";
import {
  cutAtBoundary,
  extractLeadingTags,
  segmentScript,
} from "../services/script-segmenter.js";
import { silentLogger } from "./helpers.js";

const SCRIPT = [
  "# Episode 12",
  "Intro notes that are not spoken.",
  "",
  "**Speaker A:** [excited] [curious] Welcome back to the show!",
  "Today we talk about tides.",
  "Speaker B: [speed:1.1] Thanks for having me.",
  "__Speaker B:__ [laughs]",
  "Speaker A: [thoughtful] So where do we start?",
  "## SOURCES FOUND:",
  "- Speaker A: this citation is never spoken",
].join("\n");

describe("segmentScript", () => {
  it("produces dense, ordered segments with lifted tags", () => {
    const segments = segmentScript(SCRIPT, { logger: silentLogger });

    expect(segments).toEqual([
      {
        index: 0,
        speaker: "A",
        text: "Welcome back to the show! Today we talk about tides.",
        emotionTags: ["excited", "curious"],
      },
      {
        index: 1,
        speaker: "B",
        text: "Thanks for having me.",
        emotionTags: [],
        speedOverride: 1.1,
      },
      {
        index: 2,
        speaker: "A",
        text: "So where do we start?",
        emotionTags: ["thoughtful"],
      },
    ]);
  });

  it("drops segments left empty after tag removal and warns once", () => {
    const logger = pino({ level: "silent" });
    const warn = jest.spyOn(logger, "warn");

    const segments = segmentScript(SCRIPT, { logger });

    expect(segments.map((segment) => segment.index)).toEqual([0, 1, 2]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("never emits text from the citation block", () => {
    const segments = segmentScript(SCRIPT, { logger: silentLogger });
    expect(segments.some((segment) => segment.text.includes("citation"))).toBe(false);
  });

  it("accepts the supported emphasis variants", () => {
    const script = [
      "**Speaker A**: one",
      "*Speaker B:* two",
      "__Speaker A:__ three",
      "Speaker B: four",
    ].join("\n");

    const segments = segmentScript(script, { logger: silentLogger });

    expect(segments.map((segment) => [segment.speaker, segment.text])).toEqual([
      ["A", "one"],
      ["B", "two"],
      ["A", "three"],
      ["B", "four"],
    ]);
  });

  it("removes emphasis wrapped around the whole line", () => {
    const script = ["**Speaker A: Hello there**", "__Speaker B: [excited] Wow!__"].join("\n");

    const segments = segmentScript(script, { logger: silentLogger });

    expect(segments.map((segment) => [segment.text, segment.emotionTags])).toEqual([
      ["Hello there", []],
      ["Wow!", ["excited"]],
    ]);
  });

  it("joins continuation lines and skips headings and rules", () => {
    const script = [
      "Speaker A: First line",
      "  second   line",
      "---",
      "# Section",
      "third line",
    ].join("\n");

    const [segment] = segmentScript(script, { logger: silentLogger });

    expect(segment?.text).toBe("First line second line third line");
  });

  it("keeps duplicate tags in encounter order and lower-cases them", () => {
    const [segment] = segmentScript("Speaker A: [Excited] [ LAUGHS ] [excited] Hi", {
      logger: silentLogger,
    });

    expect(segment?.emotionTags).toEqual(["excited", "laughs", "excited"]);
  });

  it("returns frozen segments", () => {
    const [segment] = segmentScript("Speaker A: Hi", { logger: silentLogger });

    expect(Object.isFrozen(segment)).toBe(true);
    expect(Object.isFrozen(segment?.emotionTags)).toBe(true);
  });

  it("throws MalformedScriptError when no speaker label exists", () => {
    expect(() => segmentScript("Just some prose.\nNo labels here.", { logger: silentLogger })).toThrow(
      MalformedScriptError
    );
  });

  it("throws MalformedScriptError when every segment is empty", () => {
    expect(() =>
      segmentScript("Speaker A: [excited]\nSpeaker B: [laughs]", { logger: silentLogger })
    ).toThrow(MalformedScriptError);
  });

  it("ignores labels that only appear after the boundary marker", () => {
    expect(() =>
      segmentScript("Preamble\nsources found:\nSpeaker A: cited", { logger: silentLogger })
    ).toThrow(MalformedScriptError);
  });
});

describe("cutAtBoundary", () => {
  it("matches the marker case-insensitively and drops the markup before it", () => {
    expect(cutAtBoundary("Speaker A: Hi\n**Sources Found:** list", "SOURCES FOUND:")).toBe(
      "Speaker A: Hi\n"
    );
  });

  it("keeps text on the marker line when it is not markup", () => {
    expect(cutAtBoundary("Speaker A: Hi SOURCES FOUND: x", "SOURCES FOUND:")).toBe(
      "Speaker A: Hi "
    );
  });

  it("returns the script untouched when the marker is absent", () => {
    expect(cutAtBoundary("Speaker A: Hi", "SOURCES FOUND:")).toBe("Speaker A: Hi");
  });
});

describe("extractLeadingTags", () => {
  it("stops at the first non-tag text", () => {
    expect(extractLeadingTags("[curious] Is it [really] true?")).toEqual({
      tags: ["curious"],
      speedOverride: undefined,
      text: "Is it [really] true?",
    });
  });

  it("reads a speed tag as an override", () => {
    expect(extractLeadingTags("[speed=0.9] [calm] Slowly now.")).toEqual({
      tags: ["calm"],
      speedOverride: 0.9,
      text: "Slowly now.",
    });
  });
});
