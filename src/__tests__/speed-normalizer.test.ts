import {
  formatSpeedLabel,
  nativeSpeedRange,
  roundDisplaySpeed,
  toDisplaySpeed,
  toProviderSpeed,
  type SpeedClampWarning,
} from "../services/speed-normalizer.js";

const quiet = { onClamp: () => undefined };

describe("toProviderSpeed", () => {
  it("passes ElevenLabs speeds through unchanged", () => {
    expect(toProviderSpeed(1.05, "elevenlabs", quiet)).toBe(1.05);
    expect(toProviderSpeed(0.7, "elevenlabs", quiet)).toBe(0.7);
  });

  it("maps the user scale onto Cartesia's signed control", () => {
    expect(toProviderSpeed(1.0, "cartesia", quiet)).toBe(0);
    expect(toProviderSpeed(1.05, "cartesia", quiet)).toBeCloseTo(0.1, 10);
    expect(toProviderSpeed(0.7, "cartesia", quiet)).toBeCloseTo(-0.6, 10);
    expect(toProviderSpeed(1.2, "cartesia", quiet)).toBeCloseTo(0.4, 10);
  });

  it("clamps out-of-range input and reports it instead of throwing", () => {
    const warnings: SpeedClampWarning[] = [];

    const native = toProviderSpeed(1.5, "cartesia", {
      onClamp: (warning) => warnings.push(warning),
    });

    expect(native).toBeCloseTo(0.4, 10);
    expect(warnings).toEqual([
      { provider: "cartesia", requested: 1.5, applied: 1.2, scale: "user" },
    ]);
  });

  it("clamps slow input for ElevenLabs", () => {
    const onClamp = jest.fn();

    expect(toProviderSpeed(0.5, "elevenlabs", { onClamp })).toBe(0.7);
    expect(onClamp).toHaveBeenCalledTimes(1);
  });

  it("treats a non-numeric speed as the default", () => {
    const onClamp = jest.fn();

    expect(toProviderSpeed(Number.NaN, "cartesia", { onClamp })).toBe(0);
    expect(onClamp).toHaveBeenCalledTimes(1);
  });

  it("does not report values already in range", () => {
    const onClamp = jest.fn();

    toProviderSpeed(0.95, "cartesia", { onClamp });

    expect(onClamp).not.toHaveBeenCalled();
  });
});

describe("toDisplaySpeed", () => {
  it("labels Cartesia's 0.1 as 1.05", () => {
    expect(toDisplaySpeed(toProviderSpeed(1.05, "cartesia", quiet), "cartesia")).toBeCloseTo(1.05, 12);
  });

  it.each([
    ["cartesia", 0.123456],
    ["cartesia", -0.333333],
    ["cartesia", 0.0123],
    ["elevenlabs", 0.71234567],
    ["elevenlabs", 1.0499999],
  ] as const)("round-trips %s native speed %p without rounding", (provider, native) => {
    const back = toProviderSpeed(toDisplaySpeed(native, provider), provider, quiet);
    expect(back).toBeCloseTo(native, 9);
  });

  it.each([-0.6, -0.3, 0, 0.1, 0.25, 0.4])(
    "round-trips Cartesia native speed %p",
    (native) => {
      const back = toProviderSpeed(toDisplaySpeed(native, "cartesia"), "cartesia", quiet);
      expect(back).toBeCloseTo(native, 6);
    }
  );

  it.each([0.7, 0.85, 1, 1.2])("round-trips ElevenLabs native speed %p", (native) => {
    expect(toProviderSpeed(toDisplaySpeed(native, "elevenlabs"), "elevenlabs", quiet)).toBe(native);
  });
});

describe("nativeSpeedRange", () => {
  it("covers the values reachable from the user scale", () => {
    const cartesia = nativeSpeedRange("cartesia");
    expect(cartesia.min).toBeCloseTo(-0.6, 10);
    expect(cartesia.max).toBeCloseTo(0.4, 10);
    expect(nativeSpeedRange("elevenlabs")).toEqual({ min: 0.7, max: 1.2 });
  });
});

describe("roundDisplaySpeed", () => {
  it("keeps four decimals for reports", () => {
    expect(roundDisplaySpeed(toDisplaySpeed(0.123456, "cartesia"))).toBe(1.0617);
    expect(roundDisplaySpeed(1.05 + 1e-12)).toBe(1.05);
  });
});

describe("formatSpeedLabel", () => {
  it("uses two decimals", () => {
    expect(formatSpeedLabel(1.05)).toBe("1.05");
    expect(formatSpeedLabel(1)).toBe("1.00");
    expect(formatSpeedLabel(0.9)).toBe("0.90");
  });
});
