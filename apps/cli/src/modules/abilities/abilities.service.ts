// apps/cli/src/modules/abilities/abilities.service.ts
import { notFound, notPresentInGeneration } from "../../shared/errors";
import type { Generation } from "../../shared/types";
import { pastAbilityEffect } from "../history/history.adapters";
import { resolveOverride } from "../history/history.matcher";
import type { AbilitiesRepo } from "./abilities.repo";
import type { ResolvedAbility } from "./abilities.schemas";

export function createAbilitiesService(abilitiesRepo: AbilitiesRepo) {
  return {
    resolveAbility(name: string, generation: Generation): ResolvedAbility {
      const row = abilitiesRepo.getAbilityByName(name);
      if (!row) {
        throw notFound("ability", name);
      }
      if (generation < row.generation) {
        throw notPresentInGeneration("ability", name, generation);
      }

      const changes = abilitiesRepo.listAbilityChanges(row.id, generation);
      const effect = resolveOverride(generation, changes.map(pastAbilityEffect));

      return {
        name: row.name,
        generation,
        effect: effect ?? row.effect,
        shortEffect: row.short_effect
      };
    },

    listAbilityNames(): string[] {
      return abilitiesRepo.listAbilityNames();
    }
  };
}

export type AbilitiesService = ReturnType<typeof createAbilitiesService>;
