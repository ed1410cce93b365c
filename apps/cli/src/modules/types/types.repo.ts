// apps/cli/src/modules/types/types.repo.ts
import type { Db } from "../../db/index";
import type { TypeChangeRow, TypeRow } from "./types.schemas";

/**
 * types / type_changes
 *  - relation columns hold comma-joined type names ('water,grass')
 *  - type_changes replace all six relation columns for generations <= generation
 */

const RELATION_COLUMNS = `
  no_damage_to, half_damage_to, double_damage_to,
  no_damage_from, half_damage_from, double_damage_from
`;

export function createTypesRepo(db: Db) {
  const getTypeByNameStmt = db.prepare<[string]>(`
    SELECT id, name, ${RELATION_COLUMNS}, generation
    FROM types
    WHERE name = ?
  `);

  const listTypeChangesStmt = db.prepare<[number, number]>(`
    SELECT id, ${RELATION_COLUMNS}, generation, type_id
    FROM type_changes
    WHERE type_id = ? AND generation >= ?
    ORDER BY generation ASC
  `);

  const listTypeNamesStmt = db.prepare(`
    SELECT name FROM types ORDER BY name ASC
  `);

  const insertTypeStmt = db.prepare<[number, string, string, string, string, string, string, string, number]>(`
    INSERT INTO types (id, name, ${RELATION_COLUMNS}, generation)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const insertTypeChangeStmt = db.prepare<[string, string, string, string, string, string, number, number]>(`
    INSERT INTO type_changes (${RELATION_COLUMNS}, generation, type_id)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `);

  return {
    getTypeByName(name: string): TypeRow | undefined {
      return getTypeByNameStmt.get(name) as TypeRow | undefined;
    },

    listTypeChanges(typeId: number, minGeneration: number): TypeChangeRow[] {
      return listTypeChangesStmt.all(typeId, minGeneration) as TypeChangeRow[];
    },

    listTypeNames(): string[] {
      return (listTypeNamesStmt.all() as Array<{ name: string }>).map((r) => r.name);
    },

    insertType(row: TypeRow) {
      insertTypeStmt.run(
        row.id,
        row.name,
        row.no_damage_to,
        row.half_damage_to,
        row.double_damage_to,
        row.no_damage_from,
        row.half_damage_from,
        row.double_damage_from,
        row.generation
      );
    },

    insertTypeChange(row: Omit<TypeChangeRow, "id">) {
      insertTypeChangeStmt.run(
        row.no_damage_to,
        row.half_damage_to,
        row.double_damage_to,
        row.no_damage_from,
        row.half_damage_from,
        row.double_damage_from,
        row.generation,
        row.type_id
      );
    }
  };
}

export type TypesRepo = ReturnType<typeof createTypesRepo>;
