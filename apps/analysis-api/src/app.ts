import express from "express";
import { ErrorCodes } from "@ecu-sim/shared";
import { errorHandler } from "./middleware/error-handler";
import { requestId } from "./middleware/request-id";
import { requestLogger } from "./middleware/request-logger";
import { createApiRouter, type ApiRouterDeps } from "./routes";
import { createReadyHandler, healthHandler } from "./routes/health";

export const createApp = (deps: ApiRouterDeps) => {
  const app = express();

  app.set("trust proxy", 1);

  app.use(requestId);
  app.use(requestLogger);
  app.use(express.json({ limit: "16kb" }));

  app.get("/healthz", healthHandler);
  app.get("/readyz", createReadyHandler(deps));

  app.use(createApiRouter(deps));

  app.use((req, res) => {
    res.status(404).json({
      code: ErrorCodes.NOT_FOUND,
      message: "Route not found.",
      details: { request_id: req.requestId },
    });
  });

  app.use(errorHandler);

  return app;
};
