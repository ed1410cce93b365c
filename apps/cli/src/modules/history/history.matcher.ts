// apps/cli/src/modules/history/history.matcher.ts
import type { Generation } from "../../shared/types";

/**
 * A historical override. Its value applies to queries at `generation()` and earlier.
 */
export interface PastValue<V> {
  generation(): Generation;
  value(): V;
}

/**
 * Picks the override with the smallest generation that is still >= target.
 * Input order does not matter. `undefined` means the base value applies.
 */
export function resolveOverride<V>(
  target: Generation,
  records: Iterable<PastValue<V>>
): V | undefined {
  let oldest: PastValue<V> | undefined;
  let oldestGeneration = Number.POSITIVE_INFINITY;

  for (const record of records) {
    const generation = record.generation();
    if (generation >= target && generation < oldestGeneration) {
      oldest = record;
      oldestGeneration = generation;
    }
  }

  return oldest?.value();
}

export function pastValue<V>(generation: Generation, value: V): PastValue<V> {
  return {
    generation: () => generation,
    value: () => value
  };
}
