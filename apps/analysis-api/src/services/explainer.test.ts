import { describe, expect, it, vi } from "vitest";
import { createLogger } from "@ecu-sim/shared";
import { AppError } from "../errors/app-error";
import { buildPrompt, cleanJson, createExplainer, parseExplanation } from "./explainer";
import { createKnowledgeBase } from "./knowledge";

const logger = createLogger("test");
const knowledge = createKnowledgeBase([
  { id: "a", content: "P0300 random misfire reference text" },
  { id: "b", content: "P0420 catalyst reference text" },
]);

const fakeModel = (reply: string | Error) => ({
  name: "fake-model",
  generate: vi.fn(async () => {
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }),
});

describe("cleanJson", () => {
  it("keeps the outermost object and drops trailing commas", () => {
    expect(cleanJson('Here you go: {"a": [1, 2,], "b": {"c": 3,},} thanks')).toBe('{"a": [1, 2], "b": {"c": 3}}');
  });

  it("straightens curly quotes", () => {
    expect(cleanJson("{“title”: “Sensor’s wiring”}")).toBe('{"title": "Sensor\'s wiring"}');
  });

  it("strips table pipes, bullets and markdown fences", () => {
    expect(cleanJson('```json\n{"causes": ["• Leak |"]}\n```')).toBe('{"causes": [" Leak "]}');
  });
});

describe("parseExplanation", () => {
  it("returns the structured explanation", () => {
    const raw = '{"title": "Misfire", "severity": "High", "description": "d", "causes": ["plugs",], "fixes": ["replace"]}';

    expect(parseExplanation(raw)).toEqual({
      title: "Misfire",
      severity: "High",
      description: "d",
      causes: ["plugs"],
      fixes: ["replace"],
    });
  });

  it("falls back when the text is not JSON", () => {
    expect(parseExplanation("Sorry, json unavailable")).toEqual({
      title: "Parsing Error",
      severity: "-",
      description: "AI returned unstructured text.",
      causes: ["Sorry,  unavailable"],
      fixes: [],
    });
  });

  it("falls back when fields are missing", () => {
    expect(parseExplanation('{"title": "Only a title"}').title).toBe("Parsing Error");
  });
});

describe("createExplainer", () => {
  it("prompts the model with the matching reference chunks", async () => {
    const model = fakeModel('{"title": "t", "severity": "Low", "description": "d", "causes": [], "fixes": []}');
    const explainer = createExplainer({ knowledge, model, logger });

    const result = await explainer.explain("P0300");

    expect(result.severity).toBe("Low");
    expect(model.generate).toHaveBeenCalledWith(buildPrompt("P0300", ["P0300 random misfire reference text"]));
    expect(buildPrompt("P0300", ["ctx"])).toContain('Given the OBD error code "P0300"');
  });

  it("answers 404 when nothing in the reference material mentions the code", async () => {
    const explainer = createExplainer({ knowledge, model: fakeModel("{}"), logger });

    await expect(explainer.explain("P0999")).rejects.toMatchObject({ code: "NOT_FOUND", status: 404 });
  });

  it("answers 503 without a model", async () => {
    const explainer = createExplainer({ knowledge, model: null, logger });

    await expect(explainer.explain("P0300")).rejects.toBeInstanceOf(AppError);
    await expect(explainer.explain("P0300")).rejects.toMatchObject({ code: "MODEL_UNAVAILABLE", status: 503 });
    expect(explainer.modelName).toBeNull();
  });

  it("answers 502 when the model call fails", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const explainer = createExplainer({ knowledge, model: fakeModel(new Error("quota")), logger });

    await expect(explainer.explain("P0420")).rejects.toMatchObject({ code: "MODEL_UNAVAILABLE", status: 502 });
    vi.restoreAllMocks();
  });
});
