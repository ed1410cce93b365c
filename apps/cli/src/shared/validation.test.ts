// apps/cli/src/shared/validation.test.ts
import { describe, expect, it } from "vitest";

import { ResolutionError } from "./errors";
import {
  findPotentialMatches,
  invalidNameMessage,
  levenshtein,
  parseBoolean,
  parseCsvList,
  parseEnum,
  validateName
} from "./validation";

const ANIMALS = ["ocelot", "toucan", "wendigo", "tiger", "octopus"];

describe("levenshtein", () => {
  it("counts single-character edits", () => {
    expect(levenshtein("kitten", "sitting")).toBe(3);
    expect(levenshtein("", "abc")).toBe(3);
    expect(levenshtein("same", "same")).toBe(0);
  });
});

describe("findPotentialMatches", () => {
  it("keeps names containing the value", () => {
    expect(findPotentialMatches("to", ANIMALS)).toEqual(["toucan", "octopus"]);
  });

  it("keeps names with the same first letter within three edits", () => {
    expect(findPotentialMatches("osselot", ANIMALS)).toEqual(["ocelot"]);
  });
});

describe("validateName", () => {
  it("suggests a misspelled name", () => {
    expect(() => validateName("pokemon", "osselot", ANIMALS)).toThrow(
      "Pokémon 'osselot' not found. Potential matches: ocelot."
    );
  });

  it("suggests a shorter name contained in the input's neighbourhood", () => {
    try {
      validateName("pokemon", "toucannon", ANIMALS);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ResolutionError);
      if (err instanceof ResolutionError) {
        expect(err.code).toBe("NotFound");
        expect(err.message).toBe("Pokémon 'toucannon' not found. Potential matches: toucan.");
        expect(err.details).toEqual({ kind: "pokemon", name: "toucannon", matches: ["toucan"] });
      }
    }
  });

  it("accepts any casing of an exact name", () => {
    expect(validateName("pokemon", "Wendigo", ANIMALS)).toBe("wendigo");
  });
});

describe("invalidNameMessage", () => {
  it("stops listing past twenty matches", () => {
    const many = Array.from({ length: 21 }, (_, i) => `name-${i}`);
    expect(invalidNameMessage("Move", "name", many)).toBe(
      "Move 'name' not found. Potential matches found; too many to display."
    );
  });

  it("lists up to twenty matches", () => {
    expect(invalidNameMessage("Type", "fir", ["fire"])).toBe(
      "Type 'fir' not found. Potential matches: fire."
    );
  });
});

describe("parsers", () => {
  it("parses booleans", () => {
    expect(parseBoolean("YES")).toBe(true);
    expect(parseBoolean("0")).toBe(false);
    expect(parseBoolean(undefined)).toBe(false);
  });

  it("parses enums", () => {
    expect(parseEnum("b", ["a", "b"] as const)).toBe("b");
    expect(parseEnum("c", ["a", "b"] as const, { defaultValue: "a" })).toBe("a");
  });

  it("splits comma lists", () => {
    expect(parseCsvList(" rock, ground,,")).toEqual(["rock", "ground"]);
    expect(parseCsvList(null)).toEqual([]);
  });
});
