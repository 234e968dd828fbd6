import fs from "fs";
import path from "path";
import { config as loadEnv } from "dotenv";

export const parseNumber = (value: number | undefined, fallback: number) => {
  if (value === undefined || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return value;
};

export const readEnvNumber = (name: string): number | undefined => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
};

export const readEnvString = (name: string, fallback: string) => {
  const raw = process.env[name]?.trim();
  return raw ? raw : fallback;
};

/**
 * Loads `.env.local` then `.env` from `dir` and each of its parents up to
 * `depth` levels. Earlier files win because dotenv never overrides a set key.
 */
export const loadEnvFiles = (dir: string, depth = 3) => {
  const loaded: string[] = [];
  let current = dir;
  for (let level = 0; level <= depth; level += 1) {
    for (const name of [".env.local", ".env"]) {
      const candidate = path.resolve(current, name);
      if (fs.existsSync(candidate)) {
        loadEnv({ path: candidate });
        loaded.push(candidate);
      }
    }
    current = path.resolve(current, "..");
  }
  return loaded;
};
