// apps/cli/src/modules/setup/setup.schemas.ts

/**
 * The subset of PokéAPI v2 payloads that setup reads.
 * Field names follow the API (snake_case).
 */

export type NamedResource = {
  name: string;
  url: string;
};

export type ResourceList = {
  count: number;
  next: string | null;
  results: NamedResource[];
};

export type ApiEffect = {
  effect: string;
  language: NamedResource;
};

export type ApiVerboseEffect = ApiEffect & {
  short_effect: string;
};

export type ApiVersionGroup = {
  id: number;
  name: string;
  order: number;
  generation: NamedResource;
};

export type ApiPastMoveValues = {
  accuracy: number | null;
  effect_chance: number | null;
  power: number | null;
  pp: number | null;
  effect_entries: ApiVerboseEffect[];
  type: NamedResource | null;
  version_group: NamedResource;
};

export type ApiMove = {
  id: number;
  name: string;
  accuracy: number | null;
  power: number | null;
  pp: number | null;
  effect_chance: number | null;
  damage_class: NamedResource | null;
  type: NamedResource;
  effect_entries: ApiVerboseEffect[];
  generation: NamedResource;
  past_values: ApiPastMoveValues[];
};

export type ApiTypeRelations = {
  no_damage_to: NamedResource[];
  half_damage_to: NamedResource[];
  double_damage_to: NamedResource[];
  no_damage_from: NamedResource[];
  half_damage_from: NamedResource[];
  double_damage_from: NamedResource[];
};

export type ApiType = {
  id: number;
  name: string;
  damage_relations: ApiTypeRelations;
  past_damage_relations: Array<{
    generation: NamedResource;
    damage_relations: ApiTypeRelations;
  }>;
  generation: NamedResource;
};

export type ApiAbility = {
  id: number;
  name: string;
  generation: NamedResource;
  effect_entries: ApiVerboseEffect[];
  effect_changes: Array<{
    effect_entries: ApiEffect[];
    version_group: NamedResource;
  }>;
};

export type ApiSpecies = {
  id: number;
  name: string;
  is_baby: boolean;
  is_legendary: boolean;
  is_mythical: boolean;
  generation: NamedResource;
  evolution_chain: { url: string } | null;
};

export type ApiEvolutionDetail = {
  trigger: NamedResource;
  item: NamedResource | null;
  gender: number | null;
  held_item: NamedResource | null;
  known_move: NamedResource | null;
  known_move_type: NamedResource | null;
  location: NamedResource | null;
  min_level: number | null;
  min_happiness: number | null;
  min_beauty: number | null;
  min_affection: number | null;
  needs_overworld_rain: boolean;
  party_species: NamedResource | null;
  party_type: NamedResource | null;
  relative_physical_stats: number | null;
  time_of_day: string;
  trade_species: NamedResource | null;
  turn_upside_down: boolean;
};

export type ApiChainLink = {
  species: NamedResource;
  evolution_details: ApiEvolutionDetail[];
  evolves_to: ApiChainLink[];
};

export type ApiEvolutionChain = {
  id: number;
  chain: ApiChainLink;
};

export type ApiPokemonType = {
  slot: number;
  type: NamedResource;
};

export type ApiPokemon = {
  id: number;
  name: string;
  species: NamedResource;
  stats: Array<{ base_stat: number; stat: NamedResource }>;
  types: ApiPokemonType[];
  past_types: Array<{ generation: NamedResource; types: ApiPokemonType[] }>;
  abilities: Array<{ is_hidden: boolean; slot: number; ability: NamedResource | null }>;
  moves: Array<{
    move: NamedResource;
    version_group_details: Array<{
      level_learned_at: number;
      move_learn_method: NamedResource;
      version_group: NamedResource;
    }>;
  }>;
};

export type SetupReport = {
  counts: Record<string, number>;
  durationMs: number;
};
