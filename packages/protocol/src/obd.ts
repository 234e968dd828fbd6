import { createCanFrame, type CanFrame } from "./can";
import { isEmptyDtc, type Dtc } from "./dtc";

export const OBD_REQUEST_ID = 0x7df;
export const OBD_RESPONSE_ID = 0x7e8;

export const ObdService = {
  CURRENT_DATA: 0x01,
  READ_DTCS: 0x03,
  CLEAR_DTCS: 0x04,
} as const;

export const POSITIVE_RESPONSE_OFFSET = 0x40;

export const Pid = {
  SUPPORTED_PIDS: 0x00,
  ENGINE_LOAD: 0x04,
  COOLANT_TEMP: 0x05,
  INTAKE_PRESSURE: 0x0b,
  RPM: 0x0c,
  SPEED: 0x0d,
  INTAKE_AIR_TEMP: 0x0f,
  MAF_FLOW: 0x10,
  THROTTLE: 0x11,
  BAROMETRIC_PRESSURE: 0x33,
} as const;

export type PidName = keyof typeof Pid;

export const MAX_DTCS_PER_FRAME = 3;

const FRAME_DATA_LEN = 8;

const padded = (bytes: number[]) => {
  const data = bytes.slice(0, FRAME_DATA_LEN);
  while (data.length < FRAME_DATA_LEN) {
    data.push(0);
  }
  return data;
};

export const positiveResponseCode = (service: number) => (service + POSITIVE_RESPONSE_OFFSET) & 0xff;

/**
 * Functional request to every ECU. Byte 0 counts the meaningful bytes that
 * follow: service and PID for current data, the service alone otherwise.
 */
export const buildObdRequest = (service: number, pid?: number): CanFrame => {
  const body = pid === undefined ? [service] : [service, pid & 0xff];
  return createCanFrame(OBD_REQUEST_ID, padded([body.length, ...body]));
};

export const buildCurrentDataResponse = (pid: number, value: readonly number[]): CanFrame => {
  const body = [positiveResponseCode(ObdService.CURRENT_DATA), pid, ...value];
  return createCanFrame(OBD_RESPONSE_ID, [body.length, ...body]);
};

/**
 * Read-codes response carrying at most three codes. Codes beyond the third
 * are left out; there is no continuation frame.
 */
export const buildDtcReport = (codes: readonly Dtc[]): CanFrame => {
  const shown = codes.slice(0, MAX_DTCS_PER_FRAME);
  const body = [positiveResponseCode(ObdService.READ_DTCS)];
  for (const [high, low] of shown) {
    body.push(high, low);
  }
  return createCanFrame(OBD_RESPONSE_ID, padded([body.length, ...body]));
};

export const buildClearResponse = (): CanFrame =>
  createCanFrame(OBD_RESPONSE_ID, padded([0x01, positiveResponseCode(ObdService.CLEAR_DTCS)]));

export const matchesResponse = (frame: CanFrame, service: number, pid?: number) => {
  if (frame.arbitrationId !== OBD_RESPONSE_ID || frame.data.length < 2) {
    return false;
  }
  if (frame.data[1] !== positiveResponseCode(service)) {
    return false;
  }
  if (pid === undefined) {
    return true;
  }
  return frame.data.length >= 3 && frame.data[2] === pid;
};

export const parseDtcReport = (frame: CanFrame): Dtc[] => {
  const data = frame.data;
  if (data.length < 2) {
    return [];
  }
  const end = Math.min(data.length, 1 + data[0]);
  const codes: Dtc[] = [];
  for (let i = 2; i + 1 < end; i += 2) {
    const code: Dtc = [data[i], data[i + 1]];
    if (!isEmptyDtc(code)) {
      codes.push(code);
    }
  }
  return codes;
};

export type PidDecoder = {
  pid: number;
  label: string;
  unit: string;
  bytes: number;
  decode: (value: Buffer) => number;
};

export const PID_DECODERS: Record<Exclude<PidName, "SUPPORTED_PIDS">, PidDecoder> = {
  ENGINE_LOAD: {
    pid: Pid.ENGINE_LOAD,
    label: "Engine Load",
    unit: "%",
    bytes: 1,
    decode: (value) => (value[0] * 100) / 255,
  },
  COOLANT_TEMP: {
    pid: Pid.COOLANT_TEMP,
    label: "Coolant Temperature",
    unit: "°C",
    bytes: 1,
    decode: (value) => value[0] - 40,
  },
  INTAKE_PRESSURE: {
    pid: Pid.INTAKE_PRESSURE,
    label: "Intake Manifold Pressure",
    unit: "kPa",
    bytes: 1,
    decode: (value) => value[0],
  },
  RPM: {
    pid: Pid.RPM,
    label: "Engine RPM",
    unit: "RPM",
    bytes: 2,
    decode: (value) => (value[0] * 256 + value[1]) / 4,
  },
  SPEED: {
    pid: Pid.SPEED,
    label: "Vehicle Speed",
    unit: "km/h",
    bytes: 1,
    decode: (value) => value[0],
  },
  INTAKE_AIR_TEMP: {
    pid: Pid.INTAKE_AIR_TEMP,
    label: "Intake Air Temperature",
    unit: "°C",
    bytes: 1,
    decode: (value) => value[0] - 40,
  },
  MAF_FLOW: {
    pid: Pid.MAF_FLOW,
    label: "MAF Air Flow",
    unit: "g/s",
    bytes: 2,
    decode: (value) => (value[0] * 256 + value[1]) / 100,
  },
  THROTTLE: {
    pid: Pid.THROTTLE,
    label: "Throttle Position",
    unit: "%",
    bytes: 1,
    decode: (value) => (value[0] * 100) / 255,
  },
  BAROMETRIC_PRESSURE: {
    pid: Pid.BAROMETRIC_PRESSURE,
    label: "Barometric Pressure",
    unit: "kPa",
    bytes: 1,
    decode: (value) => value[0],
  },
};

/** Value bytes of a current-data response, or null when the frame is short. */
export const pidValueBytes = (frame: CanFrame, bytes: number) => {
  if (frame.data.length < 3 + bytes) {
    return null;
  }
  return frame.data.subarray(3, 3 + bytes);
};

export const decodePidResponse = (frame: CanFrame, decoder: PidDecoder) => {
  if (!matchesResponse(frame, ObdService.CURRENT_DATA, decoder.pid)) {
    return null;
  }
  const value = pidValueBytes(frame, decoder.bytes);
  return value ? decoder.decode(value) : null;
};

/** PIDs 0x01 to 0x20 flagged in a PID 0x00 bitmap, most significant bit first. */
export const decodeSupportedPids = (bitmap: Buffer) => {
  const pids: number[] = [];
  for (let byteIdx = 0; byteIdx < 4 && byteIdx < bitmap.length; byteIdx += 1) {
    for (let bit = 0; bit < 8; bit += 1) {
      if (bitmap[byteIdx] & (0x80 >> bit)) {
        pids.push(byteIdx * 8 + bit + 1);
      }
    }
  }
  return pids;
};
