import { type Time, type Voltage, unit } from "../units/value.js";
import type { Pulse, Pwl, Sine, SourceValue } from "./model.js";

/** Linear interpolation between points; flat before the first and after the last. */
export function pwlVoltageAt(w: Pwl, t: Time): Voltage {
  const first = w.points[0];
  if (!first) return unit("voltage", 0);
  if (t.compare(first.time) <= 0) return first.value;

  for (let i = 0; i + 1 < w.points.length; i++) {
    const a = w.points[i];
    const b = w.points[i + 1];
    if (a.time.compare(t) <= 0 && t.compare(b.time) <= 0) {
      const span = b.time.sub(a.time);
      if (span.toNumber() === 0) return b.value;
      return a.value.add(b.value.sub(a.value).scale(t.sub(a.time).ratio(span)));
    }
  }
  return w.points[w.points.length - 1].value;
}

export function pulseVoltageAt(w: Pulse, t: Time): Voltage {
  if (t.compare(w.delay) <= 0) return w.initial;

  const period = w.period.toNumber();
  const elapsed = t.sub(w.delay).toNumber();
  const tc = period > 0 ? elapsed % period : elapsed;
  const rise = w.rise.toNumber();
  const width = w.width.toNumber();
  const fall = w.fall.toNumber();
  const swing = w.pulsed.sub(w.initial);

  if (tc < rise) return w.initial.add(swing.scale(tc / rise));
  if (tc < rise + width) return w.pulsed;
  if (tc < rise + width + fall) return w.pulsed.sub(swing.scale((tc - rise - width) / fall));
  return w.initial;
}

/** Damped sine; phase is in degrees. */
export function sineVoltageAt(w: Sine, t: Time): Voltage {
  if (t.compare(w.delay) < 0) return w.offset;
  const td = t.sub(w.delay).toNumber();
  const envelope = Math.exp(-w.damping.toNumber() * td);
  const phase = (w.phase.toNumber() * Math.PI) / 180;
  const s = Math.sin(2 * Math.PI * w.frequency.toNumber() * td + phase);
  return w.offset.add(w.amplitude.scale(envelope * s));
}

/** Time-domain value of a source, or undefined for AC small-signal sources. */
export function sourceValueAt(v: SourceValue, t: Time): number | undefined {
  switch (v.kind) {
    case "dcVoltage":
    case "dcCurrent":
      return v.value.toNumber();
    case "acVoltage":
    case "acCurrent":
      return undefined;
    case "sin":
      return sineVoltageAt(v, t).toNumber();
    case "pwl":
      return pwlVoltageAt(v, t).toNumber();
    case "pulse":
      return pulseVoltageAt(v, t).toNumber();
  }
}
