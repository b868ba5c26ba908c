import type {
  Angle,
  Capacitance,
  Current,
  Dimensionless,
  Frequency,
  Inductance,
  Length,
  Resistance,
  Time,
  Voltage,
} from "../units/value.js";

export type Parameters = Record<string, Dimensionless>;

export type Resistor = { kind: "resistor"; name: string; nodePos: string; nodeNeg: string; resistance: Resistance };
export type Capacitor = { kind: "capacitor"; name: string; nodePos: string; nodeNeg: string; capacitance: Capacitance };
export type Inductor = { kind: "inductor"; name: string; nodePos: string; nodeNeg: string; inductance: Inductance };
export type Diode = { kind: "diode"; name: string; nodePos: string; nodeNeg: string; modelName: string };

export type Bjt = {
  kind: "bjt";
  name: string;
  collector: string;
  base: string;
  emitter: string;
  modelName: string;
};

export type Mosfet = {
  kind: "mosfet";
  name: string;
  drain: string;
  gate: string;
  source: string;
  bulk: string;
  modelName: string;
  length: Length;
  width: Length;
  parameters: Parameters;
};

export type Component = Resistor | Capacitor | Inductor | Diode | Bjt | Mosfet;

/** The letter each component kind starts with in a netlist. */
export const COMPONENT_PREFIX: Record<Component["kind"], string> = {
  resistor: "R",
  capacitor: "C",
  inductor: "L",
  diode: "D",
  bjt: "Q",
  mosfet: "M",
};

export type PwlPoint = { time: Time; value: Voltage };

export type Sine = {
  kind: "sin";
  offset: Voltage;
  amplitude: Voltage;
  frequency: Frequency;
  delay: Time;
  damping: Frequency;
  phase: Dimensionless;
};

export type Pwl = { kind: "pwl"; points: PwlPoint[] };

export type Pulse = {
  kind: "pulse";
  initial: Voltage;
  pulsed: Voltage;
  delay: Time;
  rise: Time;
  fall: Time;
  width: Time;
  period: Time;
};

export type SourceValue =
  | { kind: "dcVoltage"; value: Voltage }
  | { kind: "dcCurrent"; value: Current }
  | { kind: "acVoltage"; magnitude: Voltage; phase: Angle }
  | { kind: "acCurrent"; magnitude: Current; phase: Angle }
  | Sine
  | Pwl
  | Pulse;

export type SourceKind = "voltage" | "current";

export type Source = {
  name: string;
  kind: SourceKind;
  nodePos: string;
  nodeNeg: string;
  value: SourceValue;
};

export type AcSweep = "lin" | "dec" | "oct";

export type DcCommand = { kind: "dc"; sourceName: string; start: Voltage; stop: Voltage; step: Voltage };
export type AcCommand = { kind: "ac"; sweep: AcSweep; points: number; fStart: Frequency; fStop: Frequency };
export type TranCommand = { kind: "tran"; step: Time; stop: Time; start?: Time; max?: Time; uic: boolean };

export type SimCommand = DcCommand | AcCommand | TranCommand;

export type AnalysisType = "tran" | "ac" | "dc";

export type OutputSuffix = "magnitude" | "decibel" | "phase" | "real" | "imag";

export type OutputVariable =
  | { kind: "voltage"; node1: string; node2?: string; suffix?: OutputSuffix }
  | { kind: "current"; elementName: string; suffix?: OutputSuffix };

export type EdgeType = "rise" | "fall";

export type TrigTargCondition = {
  variable: OutputVariable;
  value: Dimensionless;
  edge: EdgeType;
  number: number;
};

export type MeasureFunction = "avg" | "rms" | "min" | "max" | "pp" | "deriv" | "integrate";

export type MeasureRise = {
  kind: "rise";
  name: string;
  analysis: AnalysisType;
  trig: TrigTargCondition;
  targ: TrigTargCondition;
};

export type MeasureBasicStat = {
  kind: "basicStat";
  name: string;
  analysis: AnalysisType;
  stat: MeasureFunction;
  variable: OutputVariable;
  from: Time;
  to: Time;
};

export type MeasureFindWhen = {
  kind: "findWhen";
  name: string;
  analysis: AnalysisType;
  variable: OutputVariable;
  when: { variable: OutputVariable; value: Dimensionless };
};

export type MeasureCommand = MeasureRise | MeasureBasicStat | MeasureFindWhen;

export type Instance = { name: string; pins: string[]; subcktName: string };

export type Subckt = {
  name: string;
  ports: string[];
  components: Component[];
  instances: Instance[];
};

export type ModelKind = "npn" | "pnp" | "d" | "nmos" | "pmos";

export type Model = { name: string; kind: ModelKind; parameters: Parameters };

export type SpiceDocument = {
  title?: string;
  components: Component[];
  sources: Source[];
  simulation: SimCommand[];
  measures: MeasureCommand[];
  subckts: Subckt[];
  instances: Instance[];
  models: Model[];
};

export function emptyDocument(): SpiceDocument {
  return { components: [], sources: [], simulation: [], measures: [], subckts: [], instances: [], models: [] };
}
