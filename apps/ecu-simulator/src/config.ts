import { parseNumber, readEnvNumber, readEnvString } from "@ecu-sim/shared";

export type EcuConfig = {
  host: string;
  port: number;
  pollIntervalMs: number;
  dtcMinIntervalMs: number;
  dtcMaxIntervalMs: number;
};

export const DEFAULT_BRIDGE_HOST = "127.0.0.1";
export const DEFAULT_BRIDGE_PORT = 55555;

/** Environment first, explicit overrides on top. Port 0 asks the OS for one. */
export const loadEcuConfig = (overrides: Partial<EcuConfig> = {}): EcuConfig => {
  const dtcMinIntervalMs = parseNumber(readEnvNumber("ECU_DTC_MIN_INTERVAL_MS"), 5000);
  return {
    host: overrides.host ?? readEnvString("ECU_BRIDGE_HOST", DEFAULT_BRIDGE_HOST),
    port: overrides.port ?? parseNumber(readEnvNumber("ECU_BRIDGE_PORT"), DEFAULT_BRIDGE_PORT),
    pollIntervalMs:
      overrides.pollIntervalMs ?? parseNumber(readEnvNumber("ECU_POLL_INTERVAL_MS"), 10),
    dtcMinIntervalMs: overrides.dtcMinIntervalMs ?? dtcMinIntervalMs,
    dtcMaxIntervalMs:
      overrides.dtcMaxIntervalMs ??
      Math.max(dtcMinIntervalMs, parseNumber(readEnvNumber("ECU_DTC_MAX_INTERVAL_MS"), 10000)),
  };
};
