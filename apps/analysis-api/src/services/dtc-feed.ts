import {
  ObdService,
  connectBridge,
  formatDtc,
  matchesResponse,
  parseDtcReport,
  type BridgeClient,
  type BridgeClientOptions,
  type CanFrame,
} from "@ecu-sim/protocol";
import { AsyncQueue, createLogger, type DtcFeedMessage, type Logger } from "@ecu-sim/shared";

export type DtcFeedListener = (message: DtcFeedMessage) => void;

export type DtcFeedOptions = {
  host: string;
  port: number;
  maxQueued?: number;
  connect?: (opts: BridgeClientOptions) => Promise<BridgeClient>;
  logger?: Logger;
};

export type DtcFeed = {
  start: () => void;
  stop: () => void;
  isConnected: () => boolean;
  /** Oldest code not yet handed out, or null. */
  next: () => string | null;
  pending: () => number;
  subscribe: (listener: DtcFeedListener) => () => void;
  handleFrame: (frame: CanFrame) => string[];
};

/** Codes carried by a read-codes response seen on the bridge. */
export const extractReportedCodes = (frame: CanFrame) =>
  matchesResponse(frame, ObdService.READ_DTCS) ? parseDtcReport(frame).map(formatDtc) : [];

/**
 * Listens on the bridge for read-codes responses, whoever asked for them,
 * and queues every reported code. Reconnects with backoff while started.
 */
export const createDtcFeed = (opts: DtcFeedOptions): DtcFeed => {
  const log = opts.logger ?? createLogger("dtc-feed");
  const connect = opts.connect ?? connectBridge;
  const queue = new AsyncQueue<string>({
    maxSize: opts.maxQueued ?? 256,
    onDrop: (code) => log.warn(`feed queue full, dropped ${code}`),
  });
  const listeners = new Set<DtcFeedListener>();
  let client: BridgeClient | null = null;
  let reconnectTimer: NodeJS.Timeout | null = null;
  let reconnectDelayMs = 1000;
  let stopped = true;

  const handleFrame = (frame: CanFrame) => {
    const codes = extractReportedCodes(frame);
    for (const code of codes) {
      queue.push(code);
      log.info(`received DTC ${code}`);
      const message: DtcFeedMessage = { type: "dtc", code, ts: new Date().toISOString() };
      listeners.forEach((listener) => listener(message));
    }
    return codes;
  };

  const clearReconnect = () => {
    if (reconnectTimer) {
      clearTimeout(reconnectTimer);
      reconnectTimer = null;
    }
  };

  const scheduleReconnect = () => {
    if (stopped) {
      return;
    }
    clearReconnect();
    const jitter = Math.floor(Math.random() * 250);
    const delay = Math.min(reconnectDelayMs, 30000) + jitter;
    reconnectDelayMs = Math.min(reconnectDelayMs * 2, 30000);
    reconnectTimer = setTimeout(open, delay);
  };

  const open = () => {
    reconnectTimer = null;
    if (stopped || client) {
      return;
    }
    connect({ host: opts.host, port: opts.port, logger: log.child("bridge") })
      .then((connected) => {
        if (stopped) {
          connected.close();
          return;
        }
        client = connected;
        reconnectDelayMs = 1000;
        log.info(`listening for DTCs on ${opts.host}:${opts.port}`);
        connected.onFrame(handleFrame);
        connected.onClose((error) => {
          client = null;
          log.warn(`bridge connection lost${error ? `: ${error.message}` : ""}`);
          scheduleReconnect();
        });
      })
      .catch((error) => {
        log.warn(`bridge unavailable at ${opts.host}:${opts.port}: ${(error as Error).message}`);
        scheduleReconnect();
      });
  };

  const start = () => {
    if (!stopped) {
      return;
    }
    stopped = false;
    open();
  };

  const stop = () => {
    stopped = true;
    clearReconnect();
    client?.close();
    client = null;
  };

  const subscribe = (listener: DtcFeedListener) => {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  };

  return {
    start,
    stop,
    isConnected: () => Boolean(client?.isOpen()),
    next: () => queue.shift() ?? null,
    pending: () => queue.size,
    subscribe,
    handleFrame,
  };
};
