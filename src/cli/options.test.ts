import { InvalidArgumentError } from "commander";
import { describe, expect, test } from "vitest";
import { parseContextLines, parseKind } from "./options.js";

describe("parseKind", () => {
  test("accepts the three diff kinds", () => {
    expect(parseKind("staged")).toBe("staged");
    expect(parseKind("unstaged")).toBe("unstaged");
    expect(parseKind("all")).toBe("all");
  });

  test("rejects anything else", () => {
    expect(() => parseKind("HEAD")).toThrow(InvalidArgumentError);
  });
});

describe("parseContextLines", () => {
  test("parses non-negative integers", () => {
    expect(parseContextLines("0")).toBe(0);
    expect(parseContextLines("25")).toBe(25);
  });

  test("rejects negatives and non-numbers", () => {
    expect(() => parseContextLines("-1")).toThrow("Must be a non-negative integer.");
    expect(() => parseContextLines("3.5")).toThrow(InvalidArgumentError);
    expect(() => parseContextLines("many")).toThrow(InvalidArgumentError);
  });
});
