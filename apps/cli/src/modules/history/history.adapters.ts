// apps/cli/src/modules/history/history.adapters.ts
import type { AbilityChangeRow } from "../abilities/abilities.schemas";
import type { MoveChangeRow, MoveOverride } from "../moves/moves.schemas";
import type { PokemonTypeChangeRow, TypePair } from "../pokemon/pokemon.schemas";
import type { TypeChangeRow } from "../types/types.schemas";
import type { PastValue } from "./history.matcher";

// One adapter per stored change kind. Generations are used as stored; the setup
// converters already shifted move and ability records onto the last generation they cover.

export function pastMove(row: MoveChangeRow): PastValue<MoveOverride> {
  return {
    generation: () => row.generation,
    value: () => ({
      power: row.power,
      accuracy: row.accuracy,
      pp: row.pp,
      effectChance: row.effect_chance,
      effect: row.effect,
      type: row.type
    })
  };
}

export function pastTypeRelations(row: TypeChangeRow): PastValue<TypeChangeRow> {
  return {
    generation: () => row.generation,
    value: () => row
  };
}

export function pastPokemonTypes(row: PokemonTypeChangeRow): PastValue<TypePair> {
  return {
    generation: () => row.generation,
    value: () => ({ primary: row.primary_type, secondary: row.secondary_type })
  };
}

export function pastAbilityEffect(row: AbilityChangeRow): PastValue<string> {
  return {
    generation: () => row.generation,
    value: () => row.effect
  };
}
