import { Router } from "express";
import type { DtcFeed } from "../services/dtc-feed";
import type { Explainer } from "../services/explainer";
import { createAnalyzeRouter, type AnalyzeRouterOptions } from "./analyze";
import { createDtcRouter } from "./dtc";

export type ApiRouterDeps = {
  explainer: Explainer;
  feed: DtcFeed | null;
  rateLimit?: AnalyzeRouterOptions["rateLimit"];
};

export const createApiRouter = (deps: ApiRouterDeps) => {
  const router = Router();

  router.use(createAnalyzeRouter({ explainer: deps.explainer, rateLimit: deps.rateLimit }));
  router.use(createDtcRouter(deps.feed));

  return router;
};
