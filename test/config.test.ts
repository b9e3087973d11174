import { expect, test } from "vitest";
import { parseLogLevel, parseString } from "../src/config";

test("log level parsing normalizes case and falls back on unknown values", () => {
  expect(parseLogLevel("DEBUG", "info")).toBe("debug");
  expect(parseLogLevel(" warn ", "info")).toBe("warn");
  expect(parseLogLevel("loud", "info")).toBe("info");
  expect(parseLogLevel(undefined, "error")).toBe("error");
});

test("string parsing trims and falls back on blanks", () => {
  expect(parseString("  evaluator ", "fallback")).toBe("evaluator");
  expect(parseString("   ", "fallback")).toBe("fallback");
  expect(parseString(undefined, "fallback")).toBe("fallback");
});
