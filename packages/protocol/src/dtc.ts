/** Two-byte diagnostic trouble code, `(high, low)`. */
export type Dtc = readonly [high: number, low: number];

const hex2 = (value: number) => value.toString(16).toUpperCase().padStart(2, "0");

export const formatDtc = ([high, low]: Dtc) => `P${hex2(high)}${hex2(low)}`;

const DTC_PATTERN = /^P([0-9A-F]{2})([0-9A-F]{2})$/i;

export const parseDtc = (code: string): Dtc | null => {
  const match = DTC_PATTERN.exec(code.trim());
  if (!match) {
    return null;
  }
  return [parseInt(match[1], 16), parseInt(match[2], 16)];
};

export const dtcEquals = (a: Dtc, b: Dtc) => a[0] === b[0] && a[1] === b[1];

/** `(0, 0)` is padding in a read-codes response, never a stored code. */
export const isEmptyDtc = ([high, low]: Dtc) => high === 0 && low === 0;

export const DTC_POOL: readonly Dtc[] = [
  [0x01, 0x33],
  [0x01, 0x71],
  [0x01, 0x74],
  [0x03, 0x00],
  [0x03, 0x01],
  [0x04, 0x20],
  [0x04, 0x40],
  [0x05, 0x62],
];

const DTC_DESCRIPTIONS: Record<string, string> = {
  P0133: "O2 Sensor Circuit Slow Response",
  P0171: "System Too Lean (Bank 1)",
  P0174: "System Too Lean (Bank 2)",
  P0300: "Random/Multiple Cylinder Misfire",
  P0301: "Cylinder 1 Misfire Detected",
  P0420: "Catalyst System Efficiency Below Threshold",
  P0440: "EVAP System Malfunction",
  P0562: "System Voltage Low",
};

export const describeDtc = (code: string) => DTC_DESCRIPTIONS[code.toUpperCase()] ?? "Unknown DTC";
