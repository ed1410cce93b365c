// apps/cli/src/modules/abilities/abilities.repo.ts
import type { Db } from "../../db/index";
import type { AbilityChangeRow, AbilityRow } from "./abilities.schemas";

export function createAbilitiesRepo(db: Db) {
  const getAbilityByNameStmt = db.prepare<[string]>(`
    SELECT id, name, effect, short_effect, generation
    FROM abilities
    WHERE name = ?
  `);

  const listAbilityChangesStmt = db.prepare<[number, number]>(`
    SELECT id, effect, generation, ability_id
    FROM ability_changes
    WHERE ability_id = ? AND generation >= ?
    ORDER BY generation ASC
  `);

  const listAbilityNamesStmt = db.prepare(`
    SELECT name FROM abilities ORDER BY name ASC
  `);

  const insertAbilityStmt = db.prepare<[number, string, string, string, number]>(`
    INSERT INTO abilities (id, name, effect, short_effect, generation)
    VALUES (?, ?, ?, ?, ?)
  `);

  const insertAbilityChangeStmt = db.prepare<[string, number, number]>(`
    INSERT INTO ability_changes (effect, generation, ability_id)
    VALUES (?, ?, ?)
  `);

  return {
    getAbilityByName(name: string): AbilityRow | undefined {
      return getAbilityByNameStmt.get(name) as AbilityRow | undefined;
    },

    listAbilityChanges(abilityId: number, minGeneration: number): AbilityChangeRow[] {
      return listAbilityChangesStmt.all(abilityId, minGeneration) as AbilityChangeRow[];
    },

    listAbilityNames(): string[] {
      return (listAbilityNamesStmt.all() as Array<{ name: string }>).map((r) => r.name);
    },

    insertAbility(row: AbilityRow) {
      insertAbilityStmt.run(row.id, row.name, row.effect, row.short_effect, row.generation);
    },

    insertAbilityChange(row: Omit<AbilityChangeRow, "id">) {
      insertAbilityChangeStmt.run(row.effect, row.generation, row.ability_id);
    }
  };
}

export type AbilitiesRepo = ReturnType<typeof createAbilitiesRepo>;
