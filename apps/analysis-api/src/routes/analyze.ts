import { Router } from "express";
import { ErrorCodes } from "@ecu-sim/shared";
import { AppError } from "../errors/app-error";
import { createRateLimiter } from "../middleware/rate-limit";
import { analyzeRequestSchema } from "../schemas/explanation.schema";
import type { Explainer } from "../services/explainer";
import { asyncHandler } from "./async-handler";

export type AnalyzeRouterOptions = {
  explainer: Explainer;
  rateLimit?: { windowMs: number; max: number };
};

export const createAnalyzeRouter = (opts: AnalyzeRouterOptions) => {
  const router = Router();

  const analyzeLimiter = createRateLimiter({
    windowMs: opts.rateLimit?.windowMs ?? 60 * 1000,
    max: opts.rateLimit?.max ?? 20,
    message: "Too many analysis requests. Try again later.",
  });

  router.post(
    "/analyze",
    analyzeLimiter,
    asyncHandler(async (req, res) => {
      const parsed = analyzeRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new AppError(ErrorCodes.VALIDATION_ERROR, "Invalid analyze payload.", {
          details: { issues: parsed.error.issues.map((issue) => issue.message) },
        });
      }
      const explanation = await opts.explainer.explain(parsed.data.code);
      res.json(explanation);
    })
  );

  return router;
};
