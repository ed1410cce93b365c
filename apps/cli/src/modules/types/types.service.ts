// apps/cli/src/modules/types/types.service.ts
import { notFound, notPresentInGeneration } from "../../shared/errors";
import type { Generation } from "../../shared/types";
import { parseCsvList } from "../../shared/validation";
import { pastTypeRelations } from "../history/history.adapters";
import { resolveOverride } from "../history/history.matcher";
import { buildCharts, type DamageRelations } from "./types.chart";
import type { TypesRepo } from "./types.repo";
import type { RelationColumns, ResolvedType } from "./types.schemas";

export function relationsFromColumns(row: RelationColumns): DamageRelations {
  return {
    noDamageTo: parseCsvList(row.no_damage_to),
    halfDamageTo: parseCsvList(row.half_damage_to),
    doubleDamageTo: parseCsvList(row.double_damage_to),
    noDamageFrom: parseCsvList(row.no_damage_from),
    halfDamageFrom: parseCsvList(row.half_damage_from),
    doubleDamageFrom: parseCsvList(row.double_damage_from)
  };
}

export function createTypesService(typesRepo: TypesRepo) {
  return {
    resolveType(name: string, generation: Generation): ResolvedType {
      const row = typesRepo.getTypeByName(name);
      if (!row) {
        throw notFound("type", name);
      }
      if (generation < row.generation) {
        throw notPresentInGeneration("type", name, generation);
      }

      // A change record replaces all six relation sets at once.
      const changes = typesRepo.listTypeChanges(row.id, generation);
      const override = resolveOverride(generation, changes.map(pastTypeRelations));
      const relations = relationsFromColumns(override ?? row);
      const { offense, defense } = buildCharts(row.name, relations);

      return { name: row.name, generation, relations, offense, defense };
    },

    listTypeNames(): string[] {
      return typesRepo.listTypeNames();
    }
  };
}

export type TypesService = ReturnType<typeof createTypesService>;
