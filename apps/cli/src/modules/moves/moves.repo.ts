// apps/cli/src/modules/moves/moves.repo.ts
import type { Db } from "../../db/index";
import type { MoveChangeRow, MoveRow } from "./moves.schemas";

/**
 * moves / move_changes
 *  - move_changes.generation is the last generation the old values applied to
 */

export function createMovesRepo(db: Db) {
  const getMoveByNameStmt = db.prepare<[string]>(`
    SELECT * FROM moves WHERE name = ?
  `);

  const listMoveChangesStmt = db.prepare<[number, number]>(`
    SELECT id, power, accuracy, pp, effect_chance, effect, type, generation, move_id
    FROM move_changes
    WHERE move_id = ? AND generation >= ?
    ORDER BY generation ASC
  `);

  const listMoveNamesStmt = db.prepare(`
    SELECT name FROM moves ORDER BY name ASC
  `);

  const insertMoveStmt = db.prepare<
    [number, string, number | null, number | null, number | null, number | null, string, string, string, string, number]
  >(`
    INSERT INTO moves (
      id, name, power, accuracy, pp, effect_chance,
      effect, short_effect, type, damage_class, generation
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const insertMoveChangeStmt = db.prepare<
    [number | null, number | null, number | null, number | null, string | null, string | null, number, number]
  >(`
    INSERT INTO move_changes (
      power, accuracy, pp, effect_chance, effect, type, generation, move_id
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `);

  return {
    getMoveByName(name: string): MoveRow | undefined {
      return getMoveByNameStmt.get(name) as MoveRow | undefined;
    },

    listMoveChanges(moveId: number, minGeneration: number): MoveChangeRow[] {
      return listMoveChangesStmt.all(moveId, minGeneration) as MoveChangeRow[];
    },

    listMoveNames(): string[] {
      return (listMoveNamesStmt.all() as Array<{ name: string }>).map((r) => r.name);
    },

    insertMove(row: MoveRow) {
      insertMoveStmt.run(
        row.id,
        row.name,
        row.power,
        row.accuracy,
        row.pp,
        row.effect_chance,
        row.effect,
        row.short_effect,
        row.type,
        row.damage_class,
        row.generation
      );
    },

    insertMoveChange(row: Omit<MoveChangeRow, "id">) {
      insertMoveChangeStmt.run(
        row.power,
        row.accuracy,
        row.pp,
        row.effect_chance,
        row.effect,
        row.type,
        row.generation,
        row.move_id
      );
    }
  };
}

export type MovesRepo = ReturnType<typeof createMovesRepo>;
