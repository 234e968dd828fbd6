import { formatCanFrame, type BusEndpoint, type CanFrame } from "@ecu-sim/protocol";
import { createLogger, type AsyncQueue, type Logger } from "@ecu-sim/shared";
import type { ServiceDispatcher } from "./dispatcher";

export type RequestSource = "bus" | "bridge";

export type ServiceLoopOptions = {
  bus: BusEndpoint;
  requests: AsyncQueue<CanFrame>;
  dispatcher: ServiceDispatcher;
  broadcast: (frame: CanFrame) => void;
  pollIntervalMs?: number;
  logger?: Logger;
};

export type ServiceLoop = {
  start: () => void;
  stop: () => Promise<void>;
  isRunning: () => boolean;
};

/**
 * Serves the local bus and the bridge request queue in turn. Each pass waits
 * at most `pollIntervalMs` for a bus frame, then takes one queued bridge
 * request, so neither source can hold the other off indefinitely.
 */
export const createServiceLoop = (opts: ServiceLoopOptions): ServiceLoop => {
  const pollIntervalMs = opts.pollIntervalMs ?? 10;
  const log = opts.logger ?? createLogger("service-loop");
  let running = false;
  let done: Promise<void> | null = null;

  const respond = async (request: CanFrame, source: RequestSource) => {
    log.debug(`${source} request ${formatCanFrame(request)}`);
    const response = opts.dispatcher.handle(request);
    if (!response) {
      return;
    }
    try {
      await opts.bus.send(response);
    } catch (error) {
      log.warn(`local bus send failed: ${(error as Error).message}`);
    }
    opts.broadcast(response);
  };

  const run = async () => {
    while (running) {
      const wait = opts.requests.size > 0 ? 0 : pollIntervalMs;
      const local = await opts.bus.receive(wait);
      if (local) {
        await respond(local, "bus");
      }
      const queued = opts.requests.shift();
      if (queued) {
        await respond(queued, "bridge");
      }
    }
  };

  const start = () => {
    if (running) {
      return;
    }
    running = true;
    done = run().catch((error) => {
      running = false;
      log.error("service loop stopped", error);
    });
  };

  const stop = async () => {
    running = false;
    if (done) {
      await done;
      done = null;
    }
  };

  return {
    start,
    stop,
    isRunning: () => running,
  };
};
