import { describe, expect, it } from "vitest";
import { ResponseFormatError } from "../server/lib/errors";
import { extractJsonBlock, parseModelJson } from "../server/lib/json";

describe("extractJsonBlock", () => {
  it("strips markdown fences", () => {
    expect(extractJsonBlock('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it("drops prose around the object", () => {
    expect(extractJsonBlock('Here you go: {"a":{"b":2}} hope this helps')).toBe('{"a":{"b":2}}');
  });
});

describe("parseModelJson", () => {
  it("parses clean JSON", () => {
    expect(parseModelJson('{"causes":[]}')).toEqual({ causes: [] });
  });

  it("repairs trailing commas and bare keys", () => {
    expect(parseModelJson('{"a":1,}')).toEqual({ a: 1 });
    expect(parseModelJson("{a: 1}")).toEqual({ a: 1 });
  });

  it("rejects an empty response", () => {
    expect(() => parseModelJson("   ")).toThrow("Empty response from model.");
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseModelJson("Sorry, I cannot help with that.")).toThrow(ResponseFormatError);
  });
});
