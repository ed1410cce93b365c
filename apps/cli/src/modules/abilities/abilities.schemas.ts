// apps/cli/src/modules/abilities/abilities.schemas.ts
import type { Generation } from "../../shared/types";

export type AbilityRow = {
  id: number;
  name: string;
  effect: string;
  short_effect: string;
  generation: Generation;
};

export type AbilityChangeRow = {
  id: number;
  effect: string;
  generation: Generation;
  ability_id: number;
};

export type ResolvedAbility = {
  name: string;
  generation: Generation;
  effect: string;
  shortEffect: string;
};
