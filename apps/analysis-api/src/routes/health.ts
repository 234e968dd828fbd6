import type { Request, Response } from "express";
import type { Explainer } from "../services/explainer";
import type { DtcFeed } from "../services/dtc-feed";

const ok = { status: "ok", service: "analysis-api" };

export const healthHandler = (_req: Request, res: Response) => {
  res.json(ok);
};

/** Ready when the DTC feed, if enabled, holds a bridge connection. */
export const createReadyHandler =
  (deps: { explainer: Explainer; feed: DtcFeed | null }) => (_req: Request, res: Response) => {
    const result: Record<string, string> = {
      service: "analysis-api",
      model: deps.explainer.modelName ?? "unconfigured",
    };
    let hasError = false;

    if (!deps.feed) {
      result.dtc_feed = "disabled";
    } else if (deps.feed.isConnected()) {
      result.dtc_feed = "ok";
    } else {
      hasError = true;
      result.dtc_feed = "disconnected";
    }

    if (hasError) {
      res.status(503).json(result);
      return;
    }

    res.json(result);
  };
