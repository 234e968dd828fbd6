import OpenAI from "openai";
import { ErrorCodes, createLogger, type DtcExplanation, type Logger } from "@ecu-sim/shared";
import { AppError } from "../errors/app-error";
import { dtcExplanationSchema } from "../schemas/explanation.schema";
import type { KnowledgeBase } from "./knowledge";

/** Text generator behind the explainer. */
export type ExplanationModel = {
  readonly name: string;
  generate: (prompt: string) => Promise<string>;
};

const SYSTEM_PROMPT =
  "You are an assistant that explains car OBD-II error codes clearly for non-mechanics. " +
  "Return ONLY a valid JSON object, without explanations, backticks or markdown.";

export const createOpenAiModel = (opts: { apiKey: string; model: string }): ExplanationModel => {
  const client = new OpenAI({ apiKey: opts.apiKey });
  return {
    name: opts.model,
    generate: async (prompt) => {
      const response = await client.chat.completions.create({
        model: opts.model,
        temperature: 0.2,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
      });
      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error("Empty response from model");
      }
      return content.trim();
    },
  };
};

export const buildPrompt = (code: string, context: readonly string[]) => `Given the OBD error code "${code}" and the related context below:
${context.join("\n\n")}

Return your answer STRICTLY as a JSON object with the following keys:
"title": (short title of the issue),
"severity": (low/medium/high risk),
"description": (2-3 sentence explanation of what this code means),
"causes": (list of possible causes as short strings),
"fixes": (list of possible fixes as short strings)

Example format:
{
"title": "Random/Multiple Cylinder Misfire Detected",
"severity": "Medium",
"description": "The engine control unit detected random misfires across multiple cylinders.",
"causes": ["Faulty spark plugs", "Vacuum leaks"],
"fixes": ["Replace spark plugs", "Check ignition coils"]
}`;

/** Outermost `{...}` of free-form model text, with markdown debris and trailing commas removed. */
export const cleanJson = (text: string) => {
  const match = /\{[\s\S]*\}/.exec(text);
  let cleaned = match ? match[0] : text;
  cleaned = cleaned.replace(/\|/g, "").replace(/•/g, "").replace(/json/g, "").trim();
  cleaned = cleaned.replace(/,\s*([\]}])/g, "$1");
  return cleaned.replace(/[“”]/g, '"').replace(/’/g, "'");
};

export const parsingFallback = (cleaned: string): DtcExplanation => ({
  title: "Parsing Error",
  severity: "-",
  description: "AI returned unstructured text.",
  causes: [cleaned],
  fixes: [],
});

export const parseExplanation = (raw: string): DtcExplanation => {
  const cleaned = cleanJson(raw);
  let value: unknown;
  try {
    value = JSON.parse(cleaned);
  } catch {
    return parsingFallback(cleaned);
  }
  const parsed = dtcExplanationSchema.safeParse(value);
  return parsed.success ? parsed.data : parsingFallback(cleaned);
};

export type Explainer = {
  readonly modelName: string | null;
  explain: (code: string) => Promise<DtcExplanation>;
};

export const createExplainer = (opts: {
  knowledge: KnowledgeBase;
  model: ExplanationModel | null;
  logger?: Logger;
}): Explainer => {
  const log = opts.logger ?? createLogger("explainer");

  const explain = async (code: string) => {
    const model = opts.model;
    if (!model) {
      throw new AppError(ErrorCodes.MODEL_UNAVAILABLE, "No model API key configured.");
    }
    const context = opts.knowledge.find(code);
    if (context.length === 0) {
      throw new AppError(ErrorCodes.NOT_FOUND, `No reference material found for ${code}.`, {
        details: { code },
      });
    }

    let raw: string;
    try {
      raw = await model.generate(buildPrompt(code, context));
    } catch (error) {
      log.error(`model ${model.name} failed for ${code}`, error);
      throw new AppError(ErrorCodes.MODEL_UNAVAILABLE, "Model request failed.", { status: 502 });
    }
    return parseExplanation(raw);
  };

  return {
    modelName: opts.model?.name ?? null,
    explain,
  };
};
