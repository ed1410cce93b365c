// apps/cli/src/modules/history/history.matcher.test.ts
import { describe, expect, it } from "vitest";

import { pastValue, resolveOverride, type PastValue } from "./history.matcher";

const pasts = [pastValue(5, "gen-5"), pastValue(3, "gen-3"), pastValue(6, "gen-6")];

describe("resolveOverride", () => {
  it("picks the closest override at or after the target", () => {
    expect(resolveOverride(2, pasts)).toBe("gen-3");
    expect(resolveOverride(4, pasts)).toBe("gen-5");
  });

  it("treats the boundary as inclusive", () => {
    expect(resolveOverride(6, pasts)).toBe("gen-6");
    expect(resolveOverride(3, pasts)).toBe("gen-3");
  });

  it("returns undefined past the last override", () => {
    expect(resolveOverride(7, pasts)).toBeUndefined();
  });

  it("returns undefined for no records", () => {
    expect(resolveOverride(1, [])).toBeUndefined();
    expect(resolveOverride(9, [])).toBeUndefined();
  });

  it("does not depend on input order", () => {
    const reversed = [...pasts].reverse();
    for (const target of [1, 2, 3, 4, 5, 6, 7]) {
      expect(resolveOverride(target, reversed)).toBe(resolveOverride(target, pasts));
    }
  });

  it("accepts any iterable of records", () => {
    function* generate(): Generator<PastValue<number>> {
      yield pastValue(8, 80);
      yield pastValue(4, 40);
    }
    expect(resolveOverride(1, generate())).toBe(40);
  });

  it("only reads the value of the selected record", () => {
    let reads = 0;
    const counted = (generation: number, value: string): PastValue<string> => ({
      generation: () => generation,
      value: () => {
        reads += 1;
        return value;
      }
    });

    expect(resolveOverride(4, [counted(5, "a"), counted(9, "b"), counted(2, "c")])).toBe("a");
    expect(reads).toBe(1);
  });
});
