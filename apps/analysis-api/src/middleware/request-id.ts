import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "crypto";

export const requestId = (req: Request, res: Response, next: NextFunction) => {
  const incoming = req.header("x-request-id")?.trim();
  req.requestId = incoming && incoming.length <= 128 ? incoming : randomUUID();
  res.setHeader("x-request-id", req.requestId);
  next();
};
