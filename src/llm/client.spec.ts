import { describe, it, expect } from "vitest";
import { safeParseJson } from "./client.js";

describe("safeParseJson", () => {
  it("parses plain and fenced JSON", () => {
    expect(safeParseJson('{"a":1}')).toEqual({ a: 1 });
    expect(safeParseJson('```json\n{"a":1}\n```')).toEqual({ a: 1 });
  });

  it("cuts the outermost object out of surrounding prose", () => {
    expect(safeParseJson('Here you go: {"revisedText": "x"} Hope that helps.')).toEqual({ revisedText: "x" });
  });

  it("throws SyntaxError when there is no object", () => {
    expect(() => safeParseJson("nothing to see")).toThrow(SyntaxError);
  });
});
