import inquirer from "inquirer";
import { describeDtc } from "@ecu-sim/protocol";
import { runDashboard, type DashboardSource } from "./dashboard";
import type { ObdReader } from "./reader";

export type MenuChoice<T extends string> = {
  name: string;
  value: T;
};

/** Terminal interaction behind the menu. */
export type MenuIo = {
  choose: <T extends string>(message: string, choices: MenuChoice<T>[]) => Promise<T>;
  confirm: (message: string) => Promise<boolean>;
  print: (line: string) => void;
};

export const inquirerIo: MenuIo = {
  choose: async <T extends string>(message: string, choices: MenuChoice<T>[]) => {
    const answer = await inquirer.prompt<{ choice: T }>([
      { type: "list", name: "choice", message, choices },
    ]);
    return answer.choice;
  },
  confirm: async (message) => {
    const answer = await inquirer.prompt<{ ok: boolean }>([
      { type: "confirm", name: "ok", message, default: false },
    ]);
    return answer.ok;
  },
  print: (line) => console.log(line),
};

type ParameterKey = "rpm" | "speed" | "coolant" | "throttle" | "load" | "intake" | "maf" | "map" | "baro";

type Parameter = {
  label: string;
  unit: string;
  digits: number;
  read: (reader: ObdReader) => Promise<number | null>;
};

export const PARAMETERS: Record<ParameterKey, Parameter> = {
  rpm: { label: "Engine RPM", unit: " RPM", digits: 0, read: (r) => r.readRpm() },
  speed: { label: "Vehicle Speed", unit: " km/h", digits: 0, read: (r) => r.readSpeed() },
  coolant: { label: "Coolant Temperature", unit: "°C", digits: 0, read: (r) => r.readCoolantTemp() },
  throttle: { label: "Throttle Position", unit: "%", digits: 1, read: (r) => r.readThrottle() },
  load: { label: "Engine Load", unit: "%", digits: 1, read: (r) => r.readEngineLoad() },
  intake: { label: "Intake Air Temperature", unit: "°C", digits: 0, read: (r) => r.readIntakeTemp() },
  maf: { label: "MAF Air Flow", unit: " g/s", digits: 2, read: (r) => r.readMaf() },
  map: { label: "Intake Manifold Pressure", unit: " kPa", digits: 0, read: (r) => r.readIntakePressure() },
  baro: { label: "Barometric Pressure", unit: " kPa", digits: 0, read: (r) => r.readBarometricPressure() },
};

const PARAMETER_KEYS: ParameterKey[] = ["rpm", "speed", "coolant", "throttle", "load", "intake", "maf", "map", "baro"];

const NO_RESPONSE = "No response from ECU";
const RULE = "=".repeat(60);

export const readParameter = async (reader: ObdReader, key: ParameterKey) => {
  const param = PARAMETERS[key];
  const value = await param.read(reader);
  return value === null ? NO_RESPONSE : `${param.label}: ${value.toFixed(param.digits)}${param.unit}`;
};

export const checkErrors = async (
  reader: Pick<ObdReader, "readDtcs" | "clearDtcs">,
  io: MenuIo
) => {
  io.print(RULE);
  io.print("DIAGNOSTIC TROUBLE CODES (DTCs)");
  io.print(RULE);

  const codes = await reader.readDtcs();
  if (codes === null) {
    io.print(NO_RESPONSE);
  } else if (codes.length === 0) {
    io.print("No error codes found - system OK");
  } else {
    io.print(`Found ${codes.length} error code(s):`);
    codes.forEach((code) => io.print(`  ${code} - ${describeDtc(code)}`));
    if (await io.confirm("Clear error codes?")) {
      io.print((await reader.clearDtcs()) ? "Error codes cleared" : "Failed to clear error codes");
    }
  }
  io.print(RULE);
};

/** Live view until Ctrl+C; the SIGINT handler only stops the dashboard. */
export const showDashboard = async (source: DashboardSource, io: MenuIo) => {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);
  io.print("LIVE DASHBOARD - press Ctrl+C to stop");
  try {
    await runDashboard(source, { signal: controller.signal, write: io.print });
  } finally {
    process.off("SIGINT", onSigint);
  }
  io.print("Dashboard stopped");
};

type MainChoice = "dashboard" | "errors" | "parameter" | "exit";

export const runMenu = async (reader: ObdReader, io: MenuIo = inquirerIo) => {
  for (;;) {
    const choice = await io.choose<MainChoice>("Select option:", [
      { name: "Live Dashboard (real-time sensor data)", value: "dashboard" },
      { name: "Check Error Codes (DTCs)", value: "errors" },
      { name: "Read Single Parameter", value: "parameter" },
      { name: "Exit", value: "exit" },
    ]);

    if (choice === "exit") {
      return;
    }
    if (choice === "dashboard") {
      await showDashboard(reader, io);
    } else if (choice === "errors") {
      await checkErrors(reader, io);
    } else {
      const key = await io.choose<ParameterKey>(
        "Select parameter:",
        PARAMETER_KEYS.map((value) => ({
          name: PARAMETERS[value].label,
          value,
        }))
      );
      io.print(await readParameter(reader, key));
    }
  }
};
