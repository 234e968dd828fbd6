import { z } from "zod";

const flag = z
  .string()
  .optional()
  .transform((value) => value === undefined || !["0", "false", "off", "no"].includes(value.trim().toLowerCase()));

const port = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === "" ? fallback : Number(value)))
    .pipe(z.number().int().min(0).max(65535));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: port(8000),
  OPENAI_API_KEY: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() !== "" ? value.trim() : null)),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  ECU_BRIDGE_HOST: z.string().min(1).default("127.0.0.1"),
  ECU_BRIDGE_PORT: port(55555),
  ANALYSIS_DTC_FEED: flag,
  ANALYSIS_KNOWLEDGE_FILE: z.string().min(1).optional(),
});

export type AnalysisEnv = z.infer<typeof envSchema>;

export class EnvError extends Error {
  constructor(readonly fieldErrors: Record<string, string[] | undefined>) {
    super(
      `Invalid environment variables: ${Object.entries(fieldErrors)
        .map(([key, errors]) => `${key} (${(errors ?? []).join(", ")})`)
        .join("; ")}`
    );
    this.name = "EnvError";
  }
}

export const parseEnv = (source: NodeJS.ProcessEnv = process.env): AnalysisEnv => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new EnvError(parsed.error.flatten().fieldErrors);
  }
  return parsed.data;
};

/** Port fallback applies whenever PORT is unset, and outside production otherwise. */
export const portCandidates = (env: AnalysisEnv, source: NodeJS.ProcessEnv = process.env) => {
  const allowFallback = !source.PORT || env.NODE_ENV !== "production";
  return allowFallback ? Array.from({ length: 10 }, (_, idx) => env.PORT + idx) : [env.PORT];
};
