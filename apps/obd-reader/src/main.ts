import { Command } from "commander";
import { connectBridge } from "@ecu-sim/protocol";
import { createLogger, loadEnvFiles } from "@ecu-sim/shared";
import { loadReaderConfig } from "./config";
import { runMenu } from "./menu";
import { ObdReader } from "./reader";

type CliOptions = {
  host?: string;
  port?: number;
  timeout?: number;
};

const log = createLogger("obd-reader");

const parsePositive = (value: string) => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got ${value}`);
  }
  return parsed;
};

const run = async () => {
  loadEnvFiles(__dirname);

  const program = new Command()
    .name("obd-reader")
    .description("Interactive OBD-II diagnostic reader")
    .option("--host <host>", "bridge host")
    .option("--port <port>", "bridge port", parsePositive)
    .option("--timeout <ms>", "per-query timeout in milliseconds", parsePositive)
    .parse(process.argv);

  const opts = program.opts<CliOptions>();
  const config = loadReaderConfig({ host: opts.host, port: opts.port, timeoutMs: opts.timeout });

  const link = await connectBridge({ host: config.host, port: config.port }).catch((error) => {
    log.error(`could not reach the ECU simulator at ${config.host}:${config.port}`, error);
    log.info("make sure the simulator is running first");
    throw error;
  });
  log.info(`connected to ECU simulator at ${config.host}:${config.port}`);
  link.onClose((error) => {
    if (error) {
      log.warn(`bridge closed: ${error.message}`);
    }
  });

  const reader = new ObdReader({
    link,
    timeoutMs: config.timeoutMs,
    maxPending: config.maxPending,
  });

  try {
    await runMenu(reader);
  } finally {
    reader.close();
    log.info("connection closed");
  }
};

run().catch((error) => {
  log.error("fatal", error);
  process.exit(1);
});
