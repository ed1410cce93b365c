// apps/cli/src/modules/moves/moves.schemas.ts
import type { Generation } from "../../shared/types";

export const DAMAGE_CLASSES = ["physical", "special", "status"] as const;

export type DamageClass = (typeof DAMAGE_CLASSES)[number];

export type MoveRow = {
  id: number;
  name: string;
  power: number | null;
  accuracy: number | null;
  pp: number | null;
  effect_chance: number | null;
  effect: string;
  short_effect: string;
  type: string;
  damage_class: string;
  generation: Generation;
};

/**
 * Values a move had up to and including `generation`. Null columns fall back to the base move.
 */
export type MoveChangeRow = {
  id: number;
  power: number | null;
  accuracy: number | null;
  pp: number | null;
  effect_chance: number | null;
  effect: string | null;
  type: string | null;
  generation: Generation;
  move_id: number;
};

export type MoveOverride = {
  power: number | null;
  accuracy: number | null;
  pp: number | null;
  effectChance: number | null;
  effect: string | null;
  type: string | null;
};

export type ResolvedMove = {
  name: string;
  generation: Generation;
  power: number | null;
  accuracy: number | null;
  pp: number | null;
  effectChance: number | null;
  damageClass: DamageClass;
  type: string;
  /** May contain the `$effect_chance` placeholder. */
  effect: string;
  shortEffect: string;
};
