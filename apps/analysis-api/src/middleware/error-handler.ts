import type { Request, Response, NextFunction } from "express";
import { ErrorCodes, createLogger, type ErrorPayload } from "@ecu-sim/shared";
import { AppError } from "../errors/app-error";

const log = createLogger("error");

const isBodyParseError = (err: Error) =>
  err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";

export const errorHandler = (
  err: Error | AppError,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const requestId = req.requestId ?? "unknown";

  if (err instanceof AppError) {
    res.status(err.status).json(err.toPayload(requestId));
    return;
  }

  if (isBodyParseError(err)) {
    const body: ErrorPayload = {
      code: ErrorCodes.VALIDATION_ERROR,
      message: "Request body is not valid JSON.",
      details: { request_id: requestId },
    };
    res.status(400).json(body);
    return;
  }

  log.error(`request_id=${requestId}`, err);
  const body: ErrorPayload = {
    code: ErrorCodes.INTERNAL_ERROR,
    message: "Unexpected error.",
    details: { request_id: requestId },
  };
  res.status(500).json(body);
};
