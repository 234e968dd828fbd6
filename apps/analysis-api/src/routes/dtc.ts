import { Router } from "express";
import type { LatestDtcResponse } from "@ecu-sim/shared";
import type { DtcFeed } from "../services/dtc-feed";

export const createDtcRouter = (feed: DtcFeed | null) => {
  const router = Router();

  router.get("/latest_dtc", (_req, res) => {
    const body: LatestDtcResponse = { code: feed ? feed.next() : null };
    res.json(body);
  });

  return router;
};
