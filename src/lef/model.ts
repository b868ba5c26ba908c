export type LefUnits = {
  time?: number;
  capacitance?: number;
  resistance?: number;
  power?: number;
  current?: number;
  voltage?: number;
  databaseMicrons?: number;
  frequency?: number;
};

export type LefBusBitChars = "[]" | "{}" | "<>";
export type LefDividerChar = "/" | "\\" | "%" | "$";

export type LefUseMinSpacing = "ON" | "OFF";

export type LefCutSpacingConstraint =
  | { kind: "layer"; name: string; stack: boolean }
  | { kind: "adjacentCuts"; cuts: number; within: number; exceptSamePgNet: boolean }
  | { kind: "parallelOverlap" }
  | { kind: "area"; area: number };

export type LefCutSpacing = {
  spacing: number;
  centerToCenter: boolean;
  sameNet: boolean;
  constraint?: LefCutSpacingConstraint;
};

export type LefEnclosureCondition =
  | { kind: "width"; minWidth: number; exceptExtraCut?: number }
  | { kind: "length"; minLength: number };

export type LefEnclosure = {
  above: boolean;
  overhang1: number;
  overhang2: number;
  condition?: LefEnclosureCondition;
};

export type LefCutLayer = {
  kind: "cut";
  name: string;
  mask?: number;
  spacings: LefCutSpacing[];
  width?: number;
  enclosures: LefEnclosure[];
};

export type LefImplantSpacing = { minSpacing: number; layer?: string };

export type LefImplantLayer = {
  kind: "implant";
  name: string;
  mask?: number;
  width?: number;
  spacings: LefImplantSpacing[];
  properties: [string, string][];
};

export type LefRoutingDirection = "HORIZONTAL" | "VERTICAL" | "DIAG45" | "DIAG135";

export type LefPitch = { kind: "uniform"; pitch: number } | { kind: "xy"; x: number; y: number };

export type LefRoutingSpacingRule =
  | { kind: "range"; minWidth: number; maxWidth: number }
  | { kind: "lengthThreshold"; maxLength: number; range?: { minWidth: number; maxWidth: number } }
  | { kind: "sameNet"; pgOnly: boolean }
  | { kind: "endOfLine"; width: number; within: number }
  | { kind: "notchLength"; length: number };

export type LefRoutingSpacing = { minSpacing: number; rule?: LefRoutingSpacingRule };

export type LefRoutingLayer = {
  kind: "routing";
  name: string;
  mask?: number;
  direction: LefRoutingDirection;
  pitch: LefPitch;
  width: number;
  area?: number;
  spacings: LefRoutingSpacing[];
  maxWidth?: number;
  minWidth?: number;
};

export type LefSpecialLayerType = "MASTERSLICE" | "OVERLAP";

export type Lef58Type =
  | "NWELL"
  | "PWELL"
  | "ABOVEDIEEDGE"
  | "BELOWDIEEDGE"
  | "DIFFUSION"
  | "TRIMPOLY"
  | "TRIMMETAL"
  | "REGION";

export type Lef58TrimmedMetal = { metalLayer: string; mask?: number };

export type LefSpecialLayer = {
  kind: "special";
  name: string;
  layerType: LefSpecialLayerType;
  mask?: number;
  lef58Type?: Lef58Type;
  lef58TrimmedMetal?: Lef58TrimmedMetal;
  properties: [string, string][];
};

export type LefLayer = LefCutLayer | LefImplantLayer | LefRoutingLayer | LefSpecialLayer;

export type LefTechLibrary = {
  version: number;
  busbitchars: LefBusBitChars;
  dividerchar: LefDividerChar;
  units: LefUnits;
  manufacturingGrid?: number;
  useMinSpacing?: LefUseMinSpacing;
  layers: LefLayer[];
};
