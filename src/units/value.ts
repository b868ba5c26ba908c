export type Quantity =
  | "number"
  | "voltage"
  | "current"
  | "resistance"
  | "capacitance"
  | "inductance"
  | "time"
  | "frequency"
  | "angle"
  | "length";

export type Suffix = "none" | "pico" | "nano" | "micro" | "milli" | "kilo" | "mega";

export const SUFFIX_SCALE: Record<Suffix, number> = {
  none: 1,
  pico: 1e-12,
  nano: 1e-9,
  micro: 1e-6,
  milli: 1e-3,
  kilo: 1e3,
  mega: 1e6,
};

// Tokens as written back into a netlist; "meg" keeps mega distinct from milli.
export const SUFFIX_TOKEN: Record<Suffix, string> = {
  none: "",
  pico: "p",
  nano: "n",
  micro: "u",
  milli: "m",
  kilo: "k",
  mega: "meg",
};

/** Plain decimal text for `n`, expanding exponent notation since netlists cannot read it back. */
export function formatMagnitude(n: number): string {
  const s = String(n);
  const m = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(s);
  if (!m) return s;
  const sign = m[1] ?? "";
  const digits = `${m[2] ?? ""}${m[3] ?? ""}`;
  const exp = Number(m[4]);
  if (exp < 0) return `${sign}0.${"0".repeat(-exp - 1)}${digits}`;
  return `${sign}${digits.padEnd(exp + 1, "0")}`;
}

/**
 * A magnitude with an SI-style multiplier, tagged with the physical quantity it measures.
 * The suffix is kept as written so values print back the way they were read.
 */
export class UnitValue<Q extends Quantity = Quantity> {
  constructor(
    readonly quantity: Q,
    readonly magnitude: number,
    readonly suffix: Suffix = "none",
  ) {}

  toNumber(): number {
    return this.magnitude * SUFFIX_SCALE[this.suffix];
  }

  toString(): string {
    return `${formatMagnitude(this.magnitude)}${SUFFIX_TOKEN[this.suffix]}`;
  }

  toJSON(): { magnitude: number; suffix: Suffix } {
    return { magnitude: this.magnitude, suffix: this.suffix };
  }

  as<R extends Quantity>(quantity: R): UnitValue<R> {
    return new UnitValue(quantity, this.magnitude, this.suffix);
  }

  add(other: UnitValue<Q>): UnitValue<Q> {
    return new UnitValue(this.quantity, this.toNumber() + other.toNumber());
  }

  sub(other: UnitValue<Q>): UnitValue<Q> {
    return new UnitValue(this.quantity, this.toNumber() - other.toNumber());
  }

  scale(k: number): UnitValue<Q> {
    return new UnitValue(this.quantity, this.toNumber() * k);
  }

  /** this / other, as a plain number. */
  ratio(other: UnitValue<Q>): number {
    return this.toNumber() / other.toNumber();
  }

  compare(other: UnitValue<Q>): number {
    const a = this.toNumber();
    const b = other.toNumber();
    return a < b ? -1 : a > b ? 1 : 0;
  }

  equals(other: UnitValue<Q>): boolean {
    return this.compare(other) === 0;
  }
}

export type Dimensionless = UnitValue<"number">;
export type Voltage = UnitValue<"voltage">;
export type Current = UnitValue<"current">;
export type Resistance = UnitValue<"resistance">;
export type Capacitance = UnitValue<"capacitance">;
export type Inductance = UnitValue<"inductance">;
export type Time = UnitValue<"time">;
export type Frequency = UnitValue<"frequency">;
export type Angle = UnitValue<"angle">;
export type Length = UnitValue<"length">;

export function unit<Q extends Quantity>(quantity: Q, magnitude: number, suffix: Suffix = "none"): UnitValue<Q> {
  return new UnitValue(quantity, magnitude, suffix);
}
