import http from "http";
import { createLogger, loadEnvFiles } from "@ecu-sim/shared";
import { createApp } from "./app";
import { parseEnv, portCandidates } from "./config/env";
import { createDtcFeed } from "./services/dtc-feed";
import { createExplainer, createOpenAiModel } from "./services/explainer";
import { loadKnowledgeBase } from "./services/knowledge";
import { attachDtcWs } from "./ws/dtc";

const log = createLogger("analysis-api");

const run = () => {
  loadEnvFiles(__dirname);
  const env = parseEnv();

  const knowledge = loadKnowledgeBase(env.ANALYSIS_KNOWLEDGE_FILE);
  const model = env.OPENAI_API_KEY
    ? createOpenAiModel({ apiKey: env.OPENAI_API_KEY, model: env.OPENAI_MODEL })
    : null;
  if (!model) {
    log.warn("OPENAI_API_KEY is not set, /analyze will answer 503");
  }
  const explainer = createExplainer({ knowledge, model });

  const feed = env.ANALYSIS_DTC_FEED
    ? createDtcFeed({ host: env.ECU_BRIDGE_HOST, port: env.ECU_BRIDGE_PORT })
    : null;
  feed?.start();

  const server = http.createServer(createApp({ explainer, feed }));
  const wss = attachDtcWs(server, feed);
  const ports = portCandidates(env);

  const listenWithFallback = (index = 0) => {
    const port = ports[index];
    server.removeAllListeners("error");
    server.removeAllListeners("listening");

    server.once("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE" && index + 1 < ports.length) {
        log.warn(`port ${port} in use, trying ${ports[index + 1]}`);
        listenWithFallback(index + 1);
        return;
      }
      log.error("server failed to start", error);
      process.exit(1);
    });

    server.once("listening", () => {
      log.info(`listening on http://localhost:${port}`);
    });
    server.listen(port);
  };

  listenWithFallback();

  const shutdown = (signal: string) => {
    log.info(`received ${signal}, shutting down`);
    feed?.stop();
    wss.clients.forEach((client) => client.terminate());
    server.close(() => process.exit(0));
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
};

try {
  run();
} catch (error) {
  log.error("fatal", error);
  process.exit(1);
}
