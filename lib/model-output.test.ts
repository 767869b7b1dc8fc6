import { describe, expect, it } from "vitest";
import { z } from "zod";
import { MalformedModelOutputError } from "./errors";
import { CompetitorListSchema, cleanJson, parseModelJson } from "./model-output";

describe("cleanJson", () => {
  it("strips code fences and surrounding prose", () => {
    expect(cleanJson('Here you go:\n```json\n{"a": 1}\n```\nHope it helps!')).toBe('{"a": 1}');
  });

  it("leaves text without braces alone", () => {
    expect(cleanJson("  no json here ")).toBe("no json here");
  });
});

describe("parseModelJson", () => {
  const schema = z.object({ items: z.array(z.string()) });

  it("returns the validated value", () => {
    expect(parseModelJson('```json\n{"items": ["x"]}\n```', schema)).toEqual({ items: ["x"] });
  });

  it("rejects text that is not JSON", () => {
    const parse = () => parseModelJson("I could not find any competitors.", schema);

    expect(parse).toThrow(MalformedModelOutputError);
    expect(parse).toThrow("Model response is not valid JSON.");
  });

  it("names the offending path when the structure is wrong", () => {
    expect(() => parseModelJson('{"items": [1]}', schema)).toThrow(
      "Model response does not match the expected structure at items.0: Expected string, received number"
    );
  });

  it("keeps the raw reply on the error", () => {
    try {
      parseModelJson("nope", schema);
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedModelOutputError);
      if (error instanceof MalformedModelOutputError) expect(error.rawOutput).toBe("nope");
      return;
    }
    throw new Error("expected parseModelJson to throw");
  });
});

describe("CompetitorListSchema", () => {
  it("trims values and defaults optional lists", () => {
    expect(CompetitorListSchema.parse({ competitors: [{ name: "  Acme  " }] })).toEqual({
      competitors: [{ name: "Acme", description: "", notableFeatures: [], sourceUrls: [] }],
    });
  });
});
