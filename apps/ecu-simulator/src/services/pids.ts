import { Pid } from "@ecu-sim/protocol";
import { randomInt, type RandomSource } from "../random";

export type PidResponder = {
  pid: number;
  label: string;
  generate: (random: RandomSource) => number[];
};

const fixed =
  (...value: number[]) =>
  () =>
    value;

const uniform = (min: number, max: number) => (random: RandomSource) => [randomInt(min, max, random)];

const responders: PidResponder[] = [
  { pid: Pid.SUPPORTED_PIDS, label: "Caps", generate: fixed(0xbf, 0xdf, 0xb9, 0x91) },
  { pid: Pid.ENGINE_LOAD, label: "Calculated engine load", generate: fixed(0x20) },
  // Raw value is degrees C + 40, so 88-95 C.
  { pid: Pid.COOLANT_TEMP, label: "Engine coolant temperature", generate: uniform(128, 135) },
  { pid: Pid.INTAKE_PRESSURE, label: "Intake manifold absolute pressure", generate: uniform(10, 40) },
  {
    pid: Pid.RPM,
    label: "RPM",
    generate: (random) => [randomInt(18, 70, random), randomInt(0, 255, random)],
  },
  { pid: Pid.SPEED, label: "Speed", generate: uniform(40, 60) },
  { pid: Pid.INTAKE_AIR_TEMP, label: "Intake air temperature", generate: uniform(60, 64) },
  { pid: Pid.MAF_FLOW, label: "MAF air flow rate", generate: fixed(0x00, 0xfa) },
  { pid: Pid.THROTTLE, label: "Throttle position", generate: uniform(20, 60) },
  { pid: Pid.BAROMETRIC_PRESSURE, label: "Absolute barometric pressure", generate: uniform(20, 60) },
];

export const PID_RESPONDERS: ReadonlyMap<number, PidResponder> = new Map(
  responders.map((responder) => [responder.pid, responder])
);
