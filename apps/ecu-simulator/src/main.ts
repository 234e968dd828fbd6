import { Command, Option } from "commander";
import { createLogger, isLogLevel, loadEnvFiles, setLogLevel } from "@ecu-sim/shared";
import { createEcuSimulator } from "./simulator";

type CliOptions = {
  verbose?: boolean;
  logLevel?: string;
  host?: string;
  port?: number;
};

const log = createLogger("ecu");

const parsePort = (value: string) => {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
};

const run = async () => {
  loadEnvFiles(__dirname);

  const program = new Command()
    .name("ecu-simulator")
    .description("Simulated OBD-II ECU with a TCP CAN bridge")
    .option("-v, --verbose", "log every frame (same as --log-level debug)")
    .addOption(
      new Option("-l, --log-level <level>", "log threshold").choices(["debug", "info", "warn", "error"])
    )
    .option("--host <host>", "bridge listen address")
    .option("--port <port>", "bridge listen port", parsePort)
    .parse(process.argv);

  const opts = program.opts<CliOptions>();
  if (opts.verbose) {
    setLogLevel("debug");
  } else if (isLogLevel(opts.logLevel)) {
    setLogLevel(opts.logLevel);
  }

  const simulator = createEcuSimulator({ host: opts.host, port: opts.port });
  const address = await simulator.start();
  log.info(`bridge ready at ${address.address}:${address.port}`);

  const shutdown = async (signal: string) => {
    log.info(`received ${signal}, shutting down`);
    await simulator.stop();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      log.error("shutdown failed", error);
      process.exit(1);
    });
  };

  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
};

run().catch((error) => {
  log.error("fatal", error);
  process.exit(1);
});
