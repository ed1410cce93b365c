// apps/cli/src/modules/types/types.schemas.ts
import type { Generation } from "../../shared/types";
import type { DamageRelations, TypeChart } from "./types.chart";

export type RelationColumns = {
  no_damage_to: string;
  half_damage_to: string;
  double_damage_to: string;
  no_damage_from: string;
  half_damage_from: string;
  double_damage_from: string;
};

export type TypeRow = RelationColumns & {
  id: number;
  name: string;
  generation: Generation;
};

export type TypeChangeRow = RelationColumns & {
  id: number;
  generation: Generation;
  type_id: number;
};

/**
 * A type as of one generation.
 */
export type ResolvedType = {
  name: string;
  generation: Generation;
  relations: DamageRelations;
  offense: TypeChart;
  defense: TypeChart;
};
