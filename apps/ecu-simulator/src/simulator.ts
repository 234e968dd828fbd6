import { EventEmitter } from "events";
import type { AddressInfo } from "net";
import { VirtualBus, type BusEndpoint, type CanFrame } from "@ecu-sim/protocol";
import { AsyncQueue, createLogger, type Logger } from "@ecu-sim/shared";
import { createBridgeServer } from "./bridge/server";
import { loadEcuConfig, type EcuConfig } from "./config";
import { createDtcGenerator, type DtcTick } from "./dtc/generator";
import { DtcStore } from "./dtc/store";
import type { RandomSource } from "./random";
import { createServiceDispatcher } from "./services/dispatcher";
import { createServiceLoop } from "./services/service-loop";

export type EcuSimulatorOptions = Partial<EcuConfig> & {
  bus?: VirtualBus;
  store?: DtcStore;
  random?: RandomSource;
  /** Leave the background generator off; codes then change only through the store. */
  generator?: boolean;
  logger?: Logger;
};

export type EcuSimulator = EventEmitter & {
  readonly bus: VirtualBus;
  readonly endpoint: BusEndpoint;
  readonly store: DtcStore;
  readonly config: EcuConfig;
  start: () => Promise<AddressInfo>;
  stop: () => Promise<void>;
  address: () => AddressInfo | null;
  clientCount: () => number;
};

export const createEcuSimulator = (options: EcuSimulatorOptions = {}): EcuSimulator => {
  const config = loadEcuConfig(options);
  const log = options.logger ?? createLogger("ecu");
  const random = options.random ?? Math.random;
  const bus = options.bus ?? new VirtualBus();
  const endpoint = bus.attach("ecu");
  const store = options.store ?? new DtcStore();
  const requests = new AsyncQueue<CanFrame>();
  const emitter = new EventEmitter();
  let address: AddressInfo | null = null;

  const bridge = createBridgeServer({
    host: config.host,
    port: config.port,
    onFrame: (frame) => requests.push(frame),
    logger: log.child("bridge"),
  });

  const dispatcher = createServiceDispatcher({
    store,
    random,
    logger: log.child("dispatcher"),
  });

  const loop = createServiceLoop({
    bus: endpoint,
    requests,
    dispatcher,
    broadcast: (frame) => {
      bridge.broadcast(frame);
      emitter.emit("response", frame);
    },
    pollIntervalMs: config.pollIntervalMs,
    logger: log.child("service-loop"),
  });

  const generator = createDtcGenerator({
    store,
    random,
    minIntervalMs: config.dtcMinIntervalMs,
    maxIntervalMs: config.dtcMaxIntervalMs,
    onChange: (tick: DtcTick) => emitter.emit("dtc", tick),
    logger: log.child("dtc"),
  });

  const start = async () => {
    if (address) {
      return address;
    }
    address = await bridge.listen();
    log.info(`ECU simulator running on ${bus.channel}`);
    loop.start();
    if (options.generator !== false) {
      generator.start();
    }
    return address;
  };

  const stop = async () => {
    generator.stop();
    await loop.stop();
    await bridge.close();
    requests.close();
    endpoint.close();
    address = null;
    log.info("ECU simulator stopped");
  };

  return Object.assign(emitter, {
    bus,
    endpoint,
    store,
    config,
    start,
    stop,
    address: () => address,
    clientCount: () => bridge.clientCount(),
  });
};
