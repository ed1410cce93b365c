// apps/cli/src/shared/validation.ts
import { createResolutionError, ENTITY_LABELS, type EntityKind } from "./errors";

/**
 * Trim and normalise a string; returns undefined if empty.
 */
export function parseOptionalString(raw: unknown): string | undefined {
  if (typeof raw !== "string") return undefined;
  const trimmed = raw.trim();
  return trimmed.length ? trimmed : undefined;
}

/**
 * "true" / "1" / "yes" are truthy; anything else is false.
 */
export function parseBoolean(raw: unknown): boolean {
  if (typeof raw === "boolean") return raw;
  if (typeof raw !== "string") return false;
  return ["true", "1", "yes"].includes(raw.trim().toLowerCase());
}

/**
 * Ensure a value is one of the allowed string literals.
 */
export function parseEnum<T extends string>(
  raw: unknown,
  allowed: readonly T[],
  options: { defaultValue?: T } = {}
): T | undefined {
  if (typeof raw !== "string") return options.defaultValue;
  const match = allowed.find((value) => value === raw);
  return match ?? options.defaultValue;
}

export function parseCsvList(v: string | undefined | null): string[] {
  if (!v) return [];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

// ───────────────────────────
// Name validation
// ───────────────────────────

const MAX_DISPLAYED_MATCHES = 20;

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + cost
      );
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Names containing the value, or sharing its first character within edit distance 3.
 */
export function findPotentialMatches(value: string, names: readonly string[]): string[] {
  return names.filter((name) => {
    if (name.includes(value)) return true;
    if (!name.length || !value.length) return false;
    // spellcheck only when the first character agrees
    return name[0] === value[0] && levenshtein(name, value) < 4;
  });
}

export function invalidNameMessage(
  label: string,
  value: string,
  matches: readonly string[]
): string {
  let message = `${label} '${value}' not found.`;
  if (matches.length > MAX_DISPLAYED_MATCHES) {
    message += " Potential matches found; too many to display.";
  } else if (matches.length > 0) {
    message += ` Potential matches: ${matches.join(" ")}.`;
  }
  return message;
}

/**
 * Lowercases the input and checks it against the stored names of a resource.
 * Returns the normalised name, or throws NotFound listing close matches.
 */
export function validateName(
  kind: EntityKind,
  value: string,
  names: readonly string[]
): string {
  const normalised = value.trim().toLowerCase();
  const matches = findPotentialMatches(normalised, names);
  if (matches.includes(normalised)) return normalised;

  throw createResolutionError(
    "NotFound",
    invalidNameMessage(ENTITY_LABELS[kind], normalised, matches),
    { kind, name: normalised, matches }
  );
}
