import net from "net";
import { createLogger, type Logger } from "@ecu-sim/shared";
import { encodeCanFrame, formatCanFrame, type CanFrame } from "../can";
import { FrameStream } from "../stream";
import type { FrameHandler, FrameLink } from "./types";

export type BridgeTarget = {
  host: string;
  port: number;
};

export type BridgeClient = FrameLink & {
  readonly target: BridgeTarget;
  isOpen: () => boolean;
  onClose: (handler: (error?: Error) => void) => () => void;
};

export type BridgeClientOptions = BridgeTarget & {
  connectTimeoutMs?: number;
  logger?: Logger;
};

const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

export const connectBridge = (opts: BridgeClientOptions): Promise<BridgeClient> => {
  const log = opts.logger ?? createLogger("bridge-client");
  const target: BridgeTarget = { host: opts.host, port: opts.port };
  const listeners: FrameHandler[] = [];
  const closeListeners = new Set<(error?: Error) => void>();
  const stream = new FrameStream();
  const socket = new net.Socket();
  let open = false;
  let closeError: Error | undefined;

  const notifyClosed = () => {
    open = false;
    closeListeners.forEach((handler) => handler(closeError));
    closeListeners.clear();
    listeners.length = 0;
  };

  socket.on("data", (chunk: Buffer) => {
    let frames: CanFrame[];
    try {
      frames = stream.push(chunk);
    } catch (error) {
      closeError = error instanceof Error ? error : new Error(String(error));
      log.warn(`malformed frame from ${target.host}:${target.port}, closing: ${closeError.message}`);
      socket.destroy();
      return;
    }
    for (const frame of frames) {
      log.debug(`rx ${formatCanFrame(frame)}`);
      listeners.forEach((handler) => handler(frame));
    }
  });

  socket.on("end", () => {
    const dropped = stream.end();
    if (dropped > 0) {
      log.warn(`discarded ${dropped} trailing bytes of a partial frame`);
    }
  });

  socket.on("close", () => {
    log.debug(`connection to ${target.host}:${target.port} closed`);
    notifyClosed();
  });

  const send = (frame: CanFrame) => {
    if (!open) {
      return Promise.reject(new Error("Bridge connection is closed."));
    }
    const payload = encodeCanFrame(frame);
    return new Promise<void>((resolve, reject) => {
      socket.write(payload, (err) => {
        if (err) {
          reject(err);
          return;
        }
        log.debug(`tx ${formatCanFrame(frame)}`);
        resolve();
      });
    });
  };

  const onFrame = (handler: FrameHandler) => {
    listeners.push(handler);
    return () => {
      const idx = listeners.indexOf(handler);
      if (idx >= 0) {
        listeners.splice(idx, 1);
      }
    };
  };

  const onClose = (handler: (error?: Error) => void) => {
    closeListeners.add(handler);
    return () => {
      closeListeners.delete(handler);
    };
  };

  const close = () => {
    socket.destroy();
  };

  const client: BridgeClient = {
    target,
    send,
    onFrame,
    onClose,
    close,
    isOpen: () => open,
  };

  return new Promise<BridgeClient>((resolve, reject) => {
    const timeout = setTimeout(() => {
      socket.destroy();
      reject(new Error(`Timed out connecting to bridge at ${target.host}:${target.port}.`));
    }, opts.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);

    const onError = (error: Error) => {
      clearTimeout(timeout);
      reject(error);
    };

    socket.once("error", onError);
    socket.connect(target.port, target.host, () => {
      clearTimeout(timeout);
      socket.off("error", onError);
      socket.on("error", (error) => {
        closeError = error;
        log.warn(`bridge socket error: ${error.message}`);
      });
      socket.setNoDelay(true);
      open = true;
      log.debug(`connected to ${target.host}:${target.port}`);
      resolve(client);
    });
  });
};
