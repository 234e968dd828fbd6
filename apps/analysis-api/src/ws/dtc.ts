import type { Server } from "http";
import WebSocket, { WebSocketServer } from "ws";
import { createLogger } from "@ecu-sim/shared";
import type { DtcFeed } from "../services/dtc-feed";

export const DTC_WS_PATH = "/ws/dtc";

const log = createLogger("ws-dtc");

/** Pushes every code the feed sees to each connected websocket. */
export const attachDtcWs = (server: Server, feed: DtcFeed | null) => {
  const wss = new WebSocketServer({ noServer: true });

  server.on("upgrade", (request, socket, head) => {
    const url = new URL(request.url || "", "http://localhost");
    if (url.pathname !== DTC_WS_PATH) {
      socket.write("HTTP/1.1 404 Not Found\r\n\r\n");
      socket.destroy();
      return;
    }
    if (!feed) {
      socket.write("HTTP/1.1 503 Service Unavailable\r\n\r\n");
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit("connection", ws, request);
    });
  });

  wss.on("connection", (socket: WebSocket) => {
    if (!feed) {
      socket.close(1011, "DTC feed disabled");
      return;
    }
    log.debug(`subscriber connected, ${wss.clients.size} total`);
    const unsubscribe = feed.subscribe((message) => {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(JSON.stringify(message));
      }
    });

    socket.on("close", () => {
      unsubscribe();
      log.debug(`subscriber left, ${wss.clients.size} total`);
    });

    socket.on("error", (error) => {
      log.warn(`subscriber error: ${error.message}`);
      unsubscribe();
    });
  });

  return wss;
};
