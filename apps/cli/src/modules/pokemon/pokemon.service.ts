// apps/cli/src/modules/pokemon/pokemon.service.ts
import {
  malformedOverride,
  notFound,
  notPresentInGeneration
} from "../../shared/errors";
import type { Generation } from "../../shared/types";
import { findCustomPokemon } from "../custom/custom.repo";
import type { CustomCollection } from "../custom/custom.schemas";
import { pastPokemonTypes } from "../history/history.adapters";
import { resolveOverride } from "../history/history.matcher";
import { parseEvolution } from "./pokemon.evolution";
import type { LearnMoveRow, PokemonRepo } from "./pokemon.repo";
import type {
  EvolutionStep,
  LearnMove,
  PokemonGroup,
  PokemonRow,
  PokemonSnapshot,
  SpeciesRow
} from "./pokemon.schemas";

export function groupOf(species: SpeciesRow): PokemonGroup {
  if (species.is_mythical) return "mythical";
  if (species.is_legendary) return "legendary";
  if (species.is_baby) return "baby";
  return "regular";
}

/**
 * Rows arrive sorted by name, latest generation first. Keeps every distinct
 * (method, level) pair from each move's latest generation.
 */
function dedupeLearnMoves(rows: LearnMoveRow[]): LearnMove[] {
  const latest = new Map<string, Generation>();
  const seen = new Set<string>();
  const moves: LearnMove[] = [];
  for (const row of rows) {
    const generation = latest.get(row.name) ?? row.generation;
    latest.set(row.name, generation);
    if (row.generation !== generation) continue;

    const key = `${row.name}|${row.method}|${row.level}`;
    if (seen.has(key)) continue;
    seen.add(key);
    moves.push({ name: row.name, method: row.method, level: row.level });
  }
  return moves;
}

export function createPokemonService(
  pokemonRepo: PokemonRepo,
  custom: CustomCollection = { pokemon: [] }
) {
  function speciesOf(row: PokemonRow): SpeciesRow {
    const species = pokemonRepo.getSpeciesById(row.species_id);
    if (!species) {
      throw malformedOverride(
        `Pokémon '${row.name}' points at missing species #${row.species_id}.`,
        { pokemon: row.name, speciesId: row.species_id }
      );
    }
    return species;
  }

  function resolveStored(name: string, generation: Generation): PokemonSnapshot {
    const row = pokemonRepo.getPokemonByName(name);
    if (!row) {
      throw notFound("pokemon", name);
    }

    const species = speciesOf(row);
    if (generation < species.generation) {
      throw notPresentInGeneration("pokemon", name, generation);
    }

    // Species metadata is unreliable for forms; an empty learnset means absent.
    const learnMoves = dedupeLearnMoves(pokemonRepo.listLearnMoves(row.id, generation));
    if (learnMoves.length === 0) {
      throw notPresentInGeneration("pokemon", name, generation);
    }

    const changes = pokemonRepo.listTypeChanges(row.id, generation);
    const types = resolveOverride(generation, changes.map(pastPokemonTypes)) ?? {
      primary: row.primary_type,
      secondary: row.secondary_type
    };

    return {
      name: row.name,
      nickname: null,
      species: species.name,
      generation,
      types,
      stats: {
        hp: row.hp,
        attack: row.attack,
        defense: row.defense,
        specialAttack: row.special_attack,
        specialDefense: row.special_defense,
        speed: row.speed
      },
      group: groupOf(species),
      learnMoves,
      abilities: pokemonRepo.listAbilities(row.id),
      customMoves: null
    };
  }

  return {
    /**
     * Custom nicknames are checked first; their base Pokémon is resolved normally.
     */
    resolvePokemon(name: string, generation: Generation): PokemonSnapshot {
      const customEntry = findCustomPokemon(custom, name);
      if (!customEntry) {
        return resolveStored(name, generation);
      }

      const base = resolveStored(customEntry.base, generation);
      return {
        ...base,
        nickname: customEntry.nickname,
        types: customEntry.types ?? base.types,
        customMoves: customEntry.moves && customEntry.moves.length ? customEntry.moves : null
      };
    },

    evolutionTreeOf(speciesName: string): EvolutionStep {
      const species = pokemonRepo.getSpeciesByName(speciesName);
      if (!species) {
        throw notFound("pokemon", speciesName);
      }
      if (species.evolution_id === null) {
        return { name: species.name, methods: [], evolvesTo: [] };
      }

      const row = pokemonRepo.getEvolutionById(species.evolution_id);
      if (!row) {
        throw malformedOverride(
          `Species '${species.name}' points at missing evolution chain #${species.evolution_id}.`,
          { species: species.name, chainId: species.evolution_id }
        );
      }
      return parseEvolution(row.evolution_json, row.id);
    },

    listPokemonNames(): string[] {
      return pokemonRepo.listPokemonNames();
    },

    customNicknames(): string[] {
      return custom.pokemon.map((p) => p.nickname.toLowerCase());
    }
  };
}

export type PokemonService = ReturnType<typeof createPokemonService>;
