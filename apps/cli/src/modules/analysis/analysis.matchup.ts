// apps/cli/src/modules/analysis/analysis.matchup.ts
import type { PokemonSnapshot, ResolvedPokemon } from "../pokemon/pokemon.schemas";
import { groupByTier, multiplierOf, type TierGroups } from "../types/types.chart";
import { displayName, typesOf } from "./analysis.coverage";
import type {
  MatchupDirection,
  MatchupOptions,
  MatchupReport,
  MoveMatch
} from "./analysis.schemas";

export const DEFAULT_MATCHUP_OPTIONS: MatchupOptions = { verbose: false, stabOnly: false };

export function isStab(moveType: string, pokemon: PokemonSnapshot): boolean {
  return typesOf(pokemon).includes(moveType);
}

/**
 * The attacker's damaging moves grouped by how hard they hit the defender.
 * Without `verbose` only super-effective moves are kept.
 */
export function moveWeaknesses(
  attacker: ResolvedPokemon,
  defender: ResolvedPokemon,
  options: MatchupOptions = DEFAULT_MATCHUP_OPTIONS
): TierGroups<MoveMatch> {
  const moves = [...attacker.moves].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  return groupByTier(moves, (move): [MoveMatch, number] | undefined => {
    if (move.damageClass === "status") return undefined;

    const stab = isStab(move.type, attacker.data);
    if (options.stabOnly && !stab) return undefined;

    const multiplier = multiplierOf(defender.defenseChart, move.type);
    if (!options.verbose && multiplier < 2) return undefined;

    return [
      { name: move.name, type: move.type, damageClass: move.damageClass, stab, multiplier },
      multiplier
    ];
  });
}

function direction(
  attacker: ResolvedPokemon,
  defender: ResolvedPokemon,
  options: MatchupOptions
): MatchupDirection {
  return {
    attacker: displayName(attacker.data),
    defender: displayName(defender.data),
    moves: moveWeaknesses(attacker, defender, options)
  };
}

export function matchupReport(
  attacker: ResolvedPokemon,
  defender: ResolvedPokemon,
  options: MatchupOptions = DEFAULT_MATCHUP_OPTIONS
): MatchupReport {
  return {
    offense: direction(attacker, defender, options),
    defense: direction(defender, attacker, options)
  };
}
