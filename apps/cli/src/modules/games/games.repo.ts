// apps/cli/src/modules/games/games.repo.ts
import type { Db } from "../../db/index";
import type { Game } from "./games.schemas";

/**
 * games
 *  - id INTEGER PRIMARY KEY
 *  - name TEXT NOT NULL UNIQUE
 *  - [order] INTEGER NOT NULL       -- release order
 *  - generation INTEGER NOT NULL
 */

export function createGamesRepo(db: Db) {
  const listGamesStmt = db.prepare(`
    SELECT id, name, [order], generation
    FROM games
    ORDER BY [order] ASC, id ASC
  `);

  const insertGameStmt = db.prepare<[number, string, number, number]>(`
    INSERT INTO games (id, name, [order], generation)
    VALUES (?, ?, ?, ?)
  `);

  return {
    listGames(): Game[] {
      return listGamesStmt.all() as Game[];
    },

    insertGame(game: Game) {
      insertGameStmt.run(game.id, game.name, game.order, game.generation);
    }
  };
}

export type GamesRepo = ReturnType<typeof createGamesRepo>;
