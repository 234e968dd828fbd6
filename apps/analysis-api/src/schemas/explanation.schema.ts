import { z } from "zod";

export const dtcExplanationSchema = z.object({
  title: z.string(),
  severity: z.string(),
  description: z.string(),
  causes: z.array(z.string()),
  fixes: z.array(z.string()),
});

export const analyzeRequestSchema = z.object({
  code: z
    .string()
    .trim()
    .transform((value) => value.toUpperCase())
    .pipe(z.string().regex(/^[PCBU][0-9A-F]{4}$/, "Expected a code such as P0300.")),
});

export const knowledgeChunkSchema = z.object({
  id: z.string().optional(),
  content: z.string(),
});

export const knowledgeFileSchema = z.array(knowledgeChunkSchema);

export type KnowledgeChunk = z.infer<typeof knowledgeChunkSchema>;
