import { describe, expect, it } from "vitest";
import type { Pulse, Pwl, Sine } from "../../src/spice/model.js";
import { pulseVoltageAt, pwlVoltageAt, sineVoltageAt, sourceValueAt } from "../../src/spice/waveforms.js";
import { unit } from "../../src/units/value.js";

const ramp: Pwl = {
  kind: "pwl",
  points: [
    { time: unit("time", 1), value: unit("voltage", 2) },
    { time: unit("time", 3), value: unit("voltage", 6) },
  ],
};

const clock: Pulse = {
  kind: "pulse",
  initial: unit("voltage", 0),
  pulsed: unit("voltage", 5),
  delay: unit("time", 1, "nano"),
  rise: unit("time", 1, "nano"),
  fall: unit("time", 1, "nano"),
  width: unit("time", 5, "nano"),
  period: unit("time", 10, "nano"),
};

const wave: Sine = {
  kind: "sin",
  offset: unit("voltage", 1),
  amplitude: unit("voltage", 2),
  frequency: unit("frequency", 1, "kilo"),
  delay: unit("time", 0),
  damping: unit("frequency", 0),
  phase: unit("number", 0),
};

describe("pwl", () => {
  it("interpolates between points", () => {
    expect(pwlVoltageAt(ramp, unit("time", 2)).toNumber()).toBeCloseTo(4);
  });

  it("holds the first value before the first point", () => {
    expect(pwlVoltageAt(ramp, unit("time", 0)).toNumber()).toBe(2);
  });

  it("holds the last value after the last point", () => {
    expect(pwlVoltageAt(ramp, unit("time", 10)).toNumber()).toBe(6);
  });
});

describe("pulse", () => {
  it("starts at the initial value", () => {
    expect(pulseVoltageAt(clock, unit("time", 0)).toNumber()).toBe(0);
  });

  it("ramps during the rise", () => {
    expect(pulseVoltageAt(clock, unit("time", 1.5, "nano")).toNumber()).toBeCloseTo(2.5);
  });

  it("holds the pulsed value", () => {
    expect(pulseVoltageAt(clock, unit("time", 4, "nano")).toNumber()).toBe(5);
  });

  it("returns to the initial value after the fall", () => {
    expect(pulseVoltageAt(clock, unit("time", 9.5, "nano")).toNumber()).toBe(0);
  });
});

describe("sine", () => {
  it("peaks a quarter period in", () => {
    expect(sineVoltageAt(wave, unit("time", 0.25, "milli")).toNumber()).toBeCloseTo(3);
  });

  it("applies the phase in degrees", () => {
    const shifted: Sine = { ...wave, phase: unit("number", 90) };
    expect(sineVoltageAt(shifted, unit("time", 0)).toNumber()).toBeCloseTo(3);
  });

  it("stays at the offset before the delay", () => {
    const delayed: Sine = { ...wave, delay: unit("time", 1) };
    expect(sineVoltageAt(delayed, unit("time", 0.5)).toNumber()).toBe(1);
  });
});

describe("sourceValueAt", () => {
  it("evaluates DC and skips AC", () => {
    expect(sourceValueAt({ kind: "dcVoltage", value: unit("voltage", 5) }, unit("time", 1))).toBe(5);
    expect(
      sourceValueAt({ kind: "acVoltage", magnitude: unit("voltage", 1), phase: unit("angle", 0) }, unit("time", 1)),
    ).toBeUndefined();
  });
});
