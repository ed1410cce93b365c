// apps/cli/src/modules/analysis/analysis.coverage.ts
import { TYPES, type Generation, type TypeName } from "../../shared/types";
import type { PokemonSnapshot, ResolvedPokemon } from "../pokemon/pokemon.schemas";
import type { TypeChart } from "../types/types.chart";
import type {
  CoverageReport,
  DefenseCoverageEntry,
  OffenseCoverageEntry
} from "./analysis.schemas";

export const COVERAGE_ORDER: readonly TypeName[] = [...TYPES].sort();

export type OffenseChartLookup = (typeName: string, generation: Generation) => TypeChart;

export function displayName(data: PokemonSnapshot): string {
  return data.nickname ?? data.name;
}

export function typesOf(data: PokemonSnapshot): string[] {
  return data.types.secondary ? [data.types.primary, data.types.secondary] : [data.types.primary];
}

function emptyBuckets<T>(): Record<TypeName, T[]> {
  return Object.fromEntries<T[]>(COVERAGE_ORDER.map((t) => [t, []])) as Record<TypeName, T[]>;
}

// Nicknames keep their case; order ignores it.
const byPokemon = (a: { pokemon: string }, b: { pokemon: string }) =>
  a.pokemon.localeCompare(b.pokemon, "en", { sensitivity: "base" });

/**
 * For every type: who hits it super-effectively, and who takes reduced damage from it.
 * A chart lookup failure for any member aborts the whole report.
 */
export function coverageReport(
  roster: readonly ResolvedPokemon[],
  offenseChartOf: OffenseChartLookup
): CoverageReport {
  const offense = emptyBuckets<OffenseCoverageEntry>();
  const defense = emptyBuckets<DefenseCoverageEntry>();

  for (const member of roster) {
    const name = displayName(member.data);

    for (const ownType of typesOf(member.data)) {
      const chart = offenseChartOf(ownType, member.data.generation);
      for (const t of COVERAGE_ORDER) {
        if (chart.multipliers[t] <= 1) continue;

        const existing = offense[t].find((entry) => entry.pokemon === name);
        if (!existing) {
          offense[t].push({ pokemon: name, via: [ownType] });
        } else if (!existing.via.includes(ownType)) {
          existing.via.push(ownType);
        }
      }
    }

    for (const t of COVERAGE_ORDER) {
      const multiplier = member.defenseChart.multipliers[t];
      if (multiplier >= 1) continue;
      if (defense[t].some((entry) => entry.pokemon === name)) continue;
      defense[t].push({ pokemon: name, multiplier });
    }
  }

  for (const t of COVERAGE_ORDER) {
    offense[t].sort(byPokemon);
    defense[t].sort(byPokemon);
  }

  return { offense, defense };
}
