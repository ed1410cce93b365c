// apps/cli/src/shared/types.ts

/**
 * Every type a move or a Pokémon can carry. Charts are always dense over this list.
 */
export const TYPES = [
  "normal",
  "fighting",
  "flying",
  "poison",
  "ground",
  "rock",
  "bug",
  "ghost",
  "steel",
  "fire",
  "water",
  "grass",
  "electric",
  "psychic",
  "ice",
  "dragon",
  "dark",
  "fairy"
] as const;

export type TypeName = (typeof TYPES)[number];

/** Ruleset epoch, 1-based. */
export type Generation = number;

export function isTypeName(value: string): value is TypeName {
  return (TYPES as readonly string[]).includes(value);
}

/** Largest team the analysis commands accept. */
export const MAX_ROSTER = 6;

export type ResourceKind = "pokemon" | "moves" | "abilities" | "types" | "games";

export const RESOURCE_KINDS: readonly ResourceKind[] = [
  "pokemon",
  "moves",
  "abilities",
  "types",
  "games"
];
