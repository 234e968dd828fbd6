import { parseNumber, readEnvNumber, readEnvString } from "@ecu-sim/shared";
import { DEFAULT_MAX_PENDING, DEFAULT_QUERY_TIMEOUT_MS } from "./reader";

export type ReaderConfig = {
  host: string;
  port: number;
  timeoutMs: number;
  maxPending: number;
};

export const loadReaderConfig = (overrides: Partial<ReaderConfig> = {}): ReaderConfig => ({
  host: overrides.host ?? readEnvString("ECU_BRIDGE_HOST", "127.0.0.1"),
  port: overrides.port ?? parseNumber(readEnvNumber("ECU_BRIDGE_PORT"), 55555),
  timeoutMs:
    overrides.timeoutMs ?? parseNumber(readEnvNumber("OBD_READER_TIMEOUT_MS"), DEFAULT_QUERY_TIMEOUT_MS),
  maxPending:
    overrides.maxPending ?? parseNumber(readEnvNumber("OBD_READER_MAX_PENDING"), DEFAULT_MAX_PENDING),
});
