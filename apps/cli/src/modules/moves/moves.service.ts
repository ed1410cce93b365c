// apps/cli/src/modules/moves/moves.service.ts
import { malformedOverride, notFound, notPresentInGeneration } from "../../shared/errors";
import type { Generation } from "../../shared/types";
import { parseEnum } from "../../shared/validation";
import { pastMove } from "../history/history.adapters";
import { resolveOverride } from "../history/history.matcher";
import type { MovesRepo } from "./moves.repo";
import { DAMAGE_CLASSES, type MoveRow, type ResolvedMove } from "./moves.schemas";

export function createMovesService(movesRepo: MovesRepo) {
  function resolveRow(row: MoveRow, generation: Generation): ResolvedMove {
    if (generation < row.generation) {
      throw notPresentInGeneration("move", row.name, generation);
    }

    const damageClass = parseEnum(row.damage_class, DAMAGE_CLASSES);
    if (!damageClass) {
      throw malformedOverride(`Move '${row.name}' has unknown damage class '${row.damage_class}'.`, {
        move: row.name
      });
    }

    const changes = movesRepo.listMoveChanges(row.id, generation);
    const override = resolveOverride(generation, changes.map(pastMove));

    // Field by field: a change only carries the values that differed.
    return {
      name: row.name,
      generation,
      power: override?.power ?? row.power,
      accuracy: override?.accuracy ?? row.accuracy,
      pp: override?.pp ?? row.pp,
      effectChance: override?.effectChance ?? row.effect_chance,
      damageClass,
      type: override?.type ?? row.type,
      effect: override?.effect ?? row.effect,
      shortEffect: row.short_effect
    };
  }

  return {
    resolveMove(name: string, generation: Generation): ResolvedMove {
      const row = movesRepo.getMoveByName(name);
      if (!row) {
        throw notFound("move", name);
      }
      return resolveRow(row, generation);
    },

    listMoveNames(): string[] {
      return movesRepo.listMoveNames();
    }
  };
}

export type MovesService = ReturnType<typeof createMovesService>;
