// apps/cli/src/modules/pokemon/pokemon.schemas.ts
import type { Generation } from "../../shared/types";
import type { ResolvedMove } from "../moves/moves.schemas";
import type { TypeChart } from "../types/types.chart";

// ───────────────────────────
// Stored rows
// ───────────────────────────

export type PokemonRow = {
  id: number;
  name: string;
  primary_type: string;
  secondary_type: string | null;
  hp: number;
  attack: number;
  defense: number;
  special_attack: number;
  special_defense: number;
  speed: number;
  species_id: number;
};

export type SpeciesRow = {
  id: number;
  name: string;
  generation: Generation;
  is_baby: number;
  is_legendary: number;
  is_mythical: number;
  evolution_id: number | null;
};

export type EvolutionRow = {
  id: number;
  evolution_json: string;
};

export type PokemonMoveRow = {
  move_id: number;
  learn_method: string;
  learn_level: number;
  generation: Generation;
  pokemon_id: number;
};

export type PokemonAbilityRow = {
  ability_id: number;
  is_hidden: number;
  slot: number;
  pokemon_id: number;
};

export type PokemonTypeChangeRow = {
  id: number;
  primary_type: string;
  secondary_type: string | null;
  generation: Generation;
  pokemon_id: number;
};

// ───────────────────────────
// Snapshots
// ───────────────────────────

export type PokemonGroup = "regular" | "legendary" | "mythical" | "baby";

export type Stats = {
  hp: number;
  attack: number;
  defense: number;
  specialAttack: number;
  specialDefense: number;
  speed: number;
};

export type TypePair = {
  primary: string;
  secondary: string | null;
};

export type LearnMove = {
  name: string;
  method: string; // level-up | machine | egg | tutor | ...
  level: number;
};

export type PokemonAbility = {
  name: string;
  hidden: boolean;
};

/**
 * A Pokémon as it existed in one generation.
 */
export type PokemonSnapshot = {
  name: string;
  nickname: string | null;
  species: string;
  generation: Generation;
  types: TypePair;
  stats: Stats;
  group: PokemonGroup;
  learnMoves: LearnMove[];
  abilities: PokemonAbility[];
  /** Set for custom Pokémon that declare their own move list. */
  customMoves: string[] | null;
};

/**
 * Snapshot plus what matchups need: combined defense chart and resolved moves.
 */
export type ResolvedPokemon = {
  data: PokemonSnapshot;
  defenseChart: TypeChart;
  moves: ResolvedMove[];
};

// ───────────────────────────
// Evolution
// ───────────────────────────

/**
 * One way of reaching an evolution step. Only the populated conditions apply.
 */
export type EvolutionMethod = {
  trigger: string;
  item?: string;
  gender?: number; // 1 female, 2 male
  heldItem?: string;
  knownMove?: string;
  knownMoveType?: string;
  location?: string;
  minLevel?: number;
  minHappiness?: number;
  minBeauty?: number;
  minAffection?: number;
  needsOverworldRain?: boolean;
  partySpecies?: string;
  partyType?: string;
  relativePhysicalStats?: number;
  timeOfDay?: string;
  tradeSpecies?: string;
  turnUpsideDown?: boolean;
};

export type EvolutionStep = {
  name: string;
  methods: EvolutionMethod[];
  evolvesTo: EvolutionStep[];
};
