// apps/cli/src/modules/setup/setup.converters.ts
import type { Game } from "../games/games.schemas";
import {
  generationOfReference,
  idOfReference,
  type GenerationResolver
} from "../games/games.service";
import { serializeEvolution } from "../pokemon/pokemon.evolution";
import type { EvolutionMethod, EvolutionStep } from "../pokemon/pokemon.schemas";
import type {
  ApiAbility,
  ApiChainLink,
  ApiEffect,
  ApiEvolutionChain,
  ApiEvolutionDetail,
  ApiMove,
  ApiPokemon,
  ApiPokemonType,
  ApiSpecies,
  ApiType,
  ApiTypeRelations,
  ApiVersionGroup,
  NamedResource
} from "./setup.schemas";
import type { InsertRow } from "./setup.rows";

const ENGLISH = "en";

function englishEntry<E extends ApiEffect>(entries: readonly E[]): E | undefined {
  return entries.find((e) => e.language.name === ENGLISH);
}

function joinNames(resources: readonly NamedResource[]): string {
  return resources.map((r) => r.name).join(",");
}

function relationColumns(relations: ApiTypeRelations) {
  return {
    no_damage_to: joinNames(relations.no_damage_to),
    half_damage_to: joinNames(relations.half_damage_to),
    double_damage_to: joinNames(relations.double_damage_to),
    no_damage_from: joinNames(relations.no_damage_from),
    half_damage_from: joinNames(relations.half_damage_from),
    double_damage_from: joinNames(relations.double_damage_from)
  };
}

function typeInSlot(types: readonly ApiPokemonType[], slot: number): string | null {
  return types.find((t) => t.slot === slot)?.type.name ?? null;
}

/**
 * PokéAPI files past move values and past ability effects under the version group in
 * which they stopped applying. Stored change records carry the last generation they cover.
 */
function lastGenerationBefore(games: GenerationResolver, versionGroup: string): number {
  return games.generationOfGame(versionGroup) - 1;
}

// ───────────────────────────
// Games
// ───────────────────────────

export function convertGame(versionGroup: ApiVersionGroup): Game {
  return {
    id: versionGroup.id,
    name: versionGroup.name,
    order: versionGroup.order,
    generation: generationOfReference(versionGroup.generation.url)
  };
}

// ───────────────────────────
// Moves
// ───────────────────────────

export function convertMove(move: ApiMove, games: GenerationResolver): InsertRow[] {
  const entry = englishEntry(move.effect_entries);
  const rows: InsertRow[] = [
    {
      kind: "move",
      row: {
        id: move.id,
        name: move.name,
        power: move.power,
        accuracy: move.accuracy,
        pp: move.pp,
        effect_chance: move.effect_chance,
        effect: entry?.effect ?? "",
        short_effect: entry?.short_effect ?? "",
        type: move.type.name,
        damage_class: move.damage_class?.name ?? "status",
        generation: generationOfReference(move.generation.url)
      }
    }
  ];

  for (const past of move.past_values) {
    rows.push({
      kind: "moveChange",
      row: {
        power: past.power,
        accuracy: past.accuracy,
        pp: past.pp,
        effect_chance: past.effect_chance,
        effect: englishEntry(past.effect_entries)?.effect ?? null,
        type: past.type?.name ?? null,
        generation: lastGenerationBefore(games, past.version_group.name),
        move_id: move.id
      }
    });
  }

  return rows;
}

// ───────────────────────────
// Types
// ───────────────────────────

export function convertType(type: ApiType): InsertRow[] {
  const rows: InsertRow[] = [
    {
      kind: "type",
      row: {
        id: type.id,
        name: type.name,
        ...relationColumns(type.damage_relations),
        generation: generationOfReference(type.generation.url)
      }
    }
  ];

  for (const past of type.past_damage_relations) {
    rows.push({
      kind: "typeChange",
      row: {
        ...relationColumns(past.damage_relations),
        generation: generationOfReference(past.generation.url),
        type_id: type.id
      }
    });
  }

  return rows;
}

// ───────────────────────────
// Abilities
// ───────────────────────────

export function convertAbility(ability: ApiAbility, games: GenerationResolver): InsertRow[] {
  const entry = englishEntry(ability.effect_entries);
  const rows: InsertRow[] = [
    {
      kind: "ability",
      row: {
        id: ability.id,
        name: ability.name,
        effect: entry?.effect ?? "",
        short_effect: entry?.short_effect ?? "",
        generation: generationOfReference(ability.generation.url)
      }
    }
  ];

  for (const change of ability.effect_changes) {
    const effect = englishEntry(change.effect_entries)?.effect;
    if (effect === undefined) continue;
    rows.push({
      kind: "abilityChange",
      row: {
        effect,
        generation: lastGenerationBefore(games, change.version_group.name),
        ability_id: ability.id
      }
    });
  }

  return rows;
}

// ───────────────────────────
// Species & evolutions
// ───────────────────────────

export function convertSpecies(species: ApiSpecies): InsertRow {
  return {
    kind: "species",
    row: {
      id: species.id,
      name: species.name,
      generation: generationOfReference(species.generation.url),
      is_baby: species.is_baby ? 1 : 0,
      is_legendary: species.is_legendary ? 1 : 0,
      is_mythical: species.is_mythical ? 1 : 0,
      evolution_id: species.evolution_chain ? idOfReference(species.evolution_chain.url) : null
    }
  };
}

export function toEvolutionMethod(detail: ApiEvolutionDetail): EvolutionMethod {
  const method: EvolutionMethod = { trigger: detail.trigger.name };

  if (detail.item) method.item = detail.item.name;
  if (detail.gender !== null) method.gender = detail.gender;
  if (detail.held_item) method.heldItem = detail.held_item.name;
  if (detail.known_move) method.knownMove = detail.known_move.name;
  if (detail.known_move_type) method.knownMoveType = detail.known_move_type.name;
  if (detail.location) method.location = detail.location.name;
  if (detail.min_level !== null) method.minLevel = detail.min_level;
  if (detail.min_happiness !== null) method.minHappiness = detail.min_happiness;
  if (detail.min_beauty !== null) method.minBeauty = detail.min_beauty;
  if (detail.min_affection !== null) method.minAffection = detail.min_affection;
  if (detail.needs_overworld_rain) method.needsOverworldRain = true;
  if (detail.party_species) method.partySpecies = detail.party_species.name;
  if (detail.party_type) method.partyType = detail.party_type.name;
  if (detail.relative_physical_stats !== null) {
    method.relativePhysicalStats = detail.relative_physical_stats;
  }
  if (detail.time_of_day) method.timeOfDay = detail.time_of_day;
  if (detail.trade_species) method.tradeSpecies = detail.trade_species.name;
  if (detail.turn_upside_down) method.turnUpsideDown = true;

  return method;
}

export function toEvolutionStep(link: ApiChainLink): EvolutionStep {
  return {
    name: link.species.name,
    methods: link.evolution_details.map(toEvolutionMethod),
    evolvesTo: link.evolves_to.map(toEvolutionStep)
  };
}

export function convertEvolutionChain(chain: ApiEvolutionChain): InsertRow {
  return {
    kind: "evolution",
    row: { id: chain.id, evolution_json: serializeEvolution(toEvolutionStep(chain.chain)) }
  };
}

// ───────────────────────────
// Pokémon
// ───────────────────────────

function baseStat(pokemon: ApiPokemon, stat: string): number {
  return pokemon.stats.find((s) => s.stat.name === stat)?.base_stat ?? 0;
}

export function convertPokemon(pokemon: ApiPokemon, games: GenerationResolver): InsertRow[] {
  const primary = typeInSlot(pokemon.types, 1);
  if (!primary) {
    throw new Error(`Pokémon '${pokemon.name}' has no primary type`);
  }

  const rows: InsertRow[] = [
    {
      kind: "pokemon",
      row: {
        id: pokemon.id,
        name: pokemon.name,
        primary_type: primary,
        secondary_type: typeInSlot(pokemon.types, 2),
        hp: baseStat(pokemon, "hp"),
        attack: baseStat(pokemon, "attack"),
        defense: baseStat(pokemon, "defense"),
        special_attack: baseStat(pokemon, "special-attack"),
        special_defense: baseStat(pokemon, "special-defense"),
        speed: baseStat(pokemon, "speed"),
        species_id: idOfReference(pokemon.species.url)
      }
    }
  ];

  for (const entry of pokemon.abilities) {
    if (!entry.ability) continue;
    rows.push({
      kind: "pokemonAbility",
      row: {
        ability_id: idOfReference(entry.ability.url),
        is_hidden: entry.is_hidden ? 1 : 0,
        slot: entry.slot,
        pokemon_id: pokemon.id
      }
    });
  }

  for (const entry of pokemon.moves) {
    const moveId = idOfReference(entry.move.url);
    for (const detail of entry.version_group_details) {
      rows.push({
        kind: "pokemonMove",
        row: {
          move_id: moveId,
          learn_method: detail.move_learn_method.name,
          learn_level: detail.level_learned_at,
          generation: games.generationOfGame(detail.version_group.name),
          pokemon_id: pokemon.id
        }
      });
    }
  }

  for (const past of pokemon.past_types) {
    const pastPrimary = typeInSlot(past.types, 1);
    if (!pastPrimary) continue;
    rows.push({
      kind: "pokemonTypeChange",
      row: {
        primary_type: pastPrimary,
        secondary_type: typeInSlot(past.types, 2),
        generation: generationOfReference(past.generation.url),
        pokemon_id: pokemon.id
      }
    });
  }

  return rows;
}
