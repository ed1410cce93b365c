// apps/cli/src/modules/custom/custom.schemas.ts

/**
 * A user-defined Pokémon: a stored base Pokémon under a nickname, optionally with its own
 * typing and move list.
 */
export type CustomPokemon = {
  nickname: string;
  base: string;
  moves?: string[];
  types?: { primary: string; secondary: string | null };
};

export type CustomCollection = {
  pokemon: CustomPokemon[];
};
