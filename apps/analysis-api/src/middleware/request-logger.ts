import type { Request, Response, NextFunction } from "express";
import { createLogger } from "@ecu-sim/shared";

const log = createLogger("request");

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on("finish", () => {
    const durationMs = Date.now() - start;
    const requestId = req.requestId ?? "unknown";
    log.info(`${req.method} ${req.originalUrl} ${res.statusCode} ${durationMs}ms request_id=${requestId}`);
  });

  next();
};
