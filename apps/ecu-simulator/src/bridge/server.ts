import net from "net";
import type { AddressInfo } from "net";
import {
  FrameStream,
  encodeCanFrame,
  formatCanFrame,
  type CanFrame,
  type CanFrameDecoded,
} from "@ecu-sim/protocol";
import { createLogger, type Logger } from "@ecu-sim/shared";

export type BridgeServerOptions = {
  host: string;
  port: number;
  onFrame: (frame: CanFrameDecoded, clientId: string) => void;
  /** Unsent bytes a peer may accumulate before it is dropped. */
  maxBufferedBytes?: number;
  logger?: Logger;
};

export type BridgeServer = {
  listen: () => Promise<AddressInfo>;
  broadcast: (frame: CanFrame) => number;
  clientCount: () => number;
  clientIds: () => string[];
  close: () => Promise<void>;
};

export const DEFAULT_MAX_BUFFERED_BYTES = 64 * 1024;

type BridgeConnection = {
  id: string;
  socket: net.Socket;
  stream: FrameStream;
};

/**
 * TCP stand-in for the physical bus. Every accepted peer may send requests
 * and receives every broadcast response.
 */
export const createBridgeServer = (opts: BridgeServerOptions): BridgeServer => {
  const log = opts.logger ?? createLogger("bridge");
  const maxBufferedBytes = opts.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
  const clients = new Map<string, BridgeConnection>();
  const server = net.createServer();
  let seq = 0;

  const removeClient = (id: string, reason: string) => {
    const client = clients.get(id);
    if (!client) {
      return;
    }
    clients.delete(id);
    client.socket.destroy();
    log.info(`client ${id} removed (${reason}), ${clients.size} connected`);
  };

  const attachHandlers = (client: BridgeConnection) => {
    const { id, socket, stream } = client;

    socket.on("data", (chunk: Buffer) => {
      let frames: CanFrameDecoded[];
      try {
        frames = stream.push(chunk);
      } catch (error) {
        removeClient(id, `malformed frame: ${(error as Error).message}`);
        return;
      }
      for (const frame of frames) {
        log.debug(`rx ${id} ${formatCanFrame(frame)}`);
        opts.onFrame(frame, id);
      }
    });

    socket.on("end", () => {
      const dropped = stream.end();
      if (dropped > 0) {
        log.warn(`client ${id} ended mid-frame, discarded ${dropped} bytes`);
      }
      removeClient(id, "disconnected");
    });

    socket.on("error", (error) => {
      removeClient(id, `socket error: ${error.message}`);
    });

    socket.on("close", () => {
      removeClient(id, "closed");
    });
  };

  server.on("connection", (socket) => {
    seq += 1;
    const id = `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}#${seq}`;
    socket.setNoDelay(true);
    const client: BridgeConnection = { id, socket, stream: new FrameStream() };
    clients.set(id, client);
    attachHandlers(client);
    log.info(`client connected from ${id}, ${clients.size} connected`);
  });

  const listen = () =>
    new Promise<AddressInfo>((resolve, reject) => {
      const onError = (error: Error) => {
        server.off("listening", onListening);
        reject(error);
      };
      const onListening = () => {
        server.off("error", onError);
        server.on("error", (error) => log.error("server error", error));
        const address = server.address();
        if (!address || typeof address === "string") {
          reject(new Error("Bridge server has no TCP address."));
          return;
        }
        log.info(`TCP bridge listening on ${address.address}:${address.port}`);
        resolve(address);
      };
      server.once("error", onError);
      server.once("listening", onListening);
      server.listen(opts.port, opts.host);
    });

  /**
   * Encodes once and writes to every peer registered at call time. A peer
   * whose write fails, or whose unsent backlog is past `maxBufferedBytes`,
   * is removed; the others still receive the frame.
   */
  const broadcast = (frame: CanFrame) => {
    const payload = encodeCanFrame(frame);
    let delivered = 0;
    for (const client of Array.from(clients.values())) {
      const { id, socket } = client;
      if (socket.destroyed || !socket.writable) {
        removeClient(id, "not writable");
        continue;
      }
      if (socket.writableLength > maxBufferedBytes) {
        removeClient(id, "slow consumer");
        continue;
      }
      try {
        socket.write(payload, (error) => {
          if (error) {
            removeClient(id, `write failed: ${error.message}`);
          }
        });
        delivered += 1;
      } catch (error) {
        removeClient(id, `write failed: ${(error as Error).message}`);
      }
    }
    log.debug(`tx ${formatCanFrame(frame)} to ${delivered} client(s)`);
    return delivered;
  };

  const close = async () => {
    for (const id of Array.from(clients.keys())) {
      removeClient(id, "server closing");
    }
    if (!server.listening) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  };

  return {
    listen,
    broadcast,
    clientCount: () => clients.size,
    clientIds: () => Array.from(clients.keys()),
    close,
  };
};
