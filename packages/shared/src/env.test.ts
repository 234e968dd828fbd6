import { afterEach, describe, expect, it } from "vitest";
import { parseNumber, readEnvNumber, readEnvString } from "./env";

describe("env helpers", () => {
  afterEach(() => {
    delete process.env.ECU_TEST_NUMBER;
    delete process.env.ECU_TEST_STRING;
  });

  it("falls back for missing or non-positive numbers", () => {
    expect(parseNumber(undefined, 10)).toBe(10);
    expect(parseNumber(0, 10)).toBe(10);
    expect(parseNumber(-5, 10)).toBe(10);
    expect(parseNumber(Number.NaN, 10)).toBe(10);
    expect(parseNumber(25, 10)).toBe(25);
  });

  it("reads numeric variables", () => {
    process.env.ECU_TEST_NUMBER = "55555";
    expect(readEnvNumber("ECU_TEST_NUMBER")).toBe(55555);
    process.env.ECU_TEST_NUMBER = "abc";
    expect(readEnvNumber("ECU_TEST_NUMBER")).toBeUndefined();
    expect(readEnvNumber("ECU_TEST_MISSING")).toBeUndefined();
  });

  it("trims string variables and falls back when blank", () => {
    process.env.ECU_TEST_STRING = "  0.0.0.0 ";
    expect(readEnvString("ECU_TEST_STRING", "127.0.0.1")).toBe("0.0.0.0");
    process.env.ECU_TEST_STRING = "   ";
    expect(readEnvString("ECU_TEST_STRING", "127.0.0.1")).toBe("127.0.0.1");
  });
});
