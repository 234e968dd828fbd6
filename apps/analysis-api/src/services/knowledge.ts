import fs from "fs";
import path from "path";
import { createLogger, type Logger } from "@ecu-sim/shared";
import { knowledgeFileSchema, type KnowledgeChunk } from "../schemas/explanation.schema";

export const DEFAULT_KNOWLEDGE_FILE = path.resolve(__dirname, "..", "..", "data", "dtc-knowledge.json");

export type KnowledgeBase = {
  readonly size: number;
  /** Chunk texts mentioning `code`, case-insensitively, in file order. */
  find: (code: string) => string[];
};

export const createKnowledgeBase = (chunks: readonly KnowledgeChunk[]): KnowledgeBase => ({
  size: chunks.length,
  find: (code) => {
    const needle = code.trim().toLowerCase();
    if (!needle) {
      return [];
    }
    return chunks.filter((chunk) => chunk.content.toLowerCase().includes(needle)).map((chunk) => chunk.content);
  },
});

export const loadKnowledgeBase = (file = DEFAULT_KNOWLEDGE_FILE, logger?: Logger): KnowledgeBase => {
  const log = logger ?? createLogger("knowledge");
  const raw = fs.readFileSync(file, "utf8");
  const chunks = knowledgeFileSchema.parse(JSON.parse(raw));
  log.info(`loaded ${chunks.length} reference chunks from ${file}`);
  return createKnowledgeBase(chunks);
};
