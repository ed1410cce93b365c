// apps/cli/src/modules/setup/setup.rows.ts
import type { Db } from "../../db/index";
import { createAbilitiesRepo } from "../abilities/abilities.repo";
import type { AbilityChangeRow, AbilityRow } from "../abilities/abilities.schemas";
import { createGamesRepo } from "../games/games.repo";
import type { Game } from "../games/games.schemas";
import { createMovesRepo } from "../moves/moves.repo";
import type { MoveChangeRow, MoveRow } from "../moves/moves.schemas";
import { createPokemonRepo } from "../pokemon/pokemon.repo";
import type {
  EvolutionRow,
  PokemonAbilityRow,
  PokemonMoveRow,
  PokemonRow,
  PokemonTypeChangeRow,
  SpeciesRow
} from "../pokemon/pokemon.schemas";
import { createTypesRepo } from "../types/types.repo";
import type { TypeChangeRow, TypeRow } from "../types/types.schemas";

/**
 * Every row setup can write. Parents precede their children in any batch.
 */
export type InsertRow =
  | { kind: "game"; row: Game }
  | { kind: "move"; row: MoveRow }
  | { kind: "moveChange"; row: Omit<MoveChangeRow, "id"> }
  | { kind: "type"; row: TypeRow }
  | { kind: "typeChange"; row: Omit<TypeChangeRow, "id"> }
  | { kind: "ability"; row: AbilityRow }
  | { kind: "abilityChange"; row: Omit<AbilityChangeRow, "id"> }
  | { kind: "species"; row: SpeciesRow }
  | { kind: "evolution"; row: EvolutionRow }
  | { kind: "pokemon"; row: PokemonRow }
  | { kind: "pokemonMove"; row: PokemonMoveRow }
  | { kind: "pokemonAbility"; row: PokemonAbilityRow }
  | { kind: "pokemonTypeChange"; row: Omit<PokemonTypeChangeRow, "id"> };

export type InsertKind = InsertRow["kind"];

export function createRowWriter(db: Db) {
  const gamesRepo = createGamesRepo(db);
  const movesRepo = createMovesRepo(db);
  const typesRepo = createTypesRepo(db);
  const abilitiesRepo = createAbilitiesRepo(db);
  const pokemonRepo = createPokemonRepo(db);

  function insert(entry: InsertRow) {
    switch (entry.kind) {
      case "game":
        return gamesRepo.insertGame(entry.row);
      case "move":
        return movesRepo.insertMove(entry.row);
      case "moveChange":
        return movesRepo.insertMoveChange(entry.row);
      case "type":
        return typesRepo.insertType(entry.row);
      case "typeChange":
        return typesRepo.insertTypeChange(entry.row);
      case "ability":
        return abilitiesRepo.insertAbility(entry.row);
      case "abilityChange":
        return abilitiesRepo.insertAbilityChange(entry.row);
      case "species":
        return pokemonRepo.insertSpecies(entry.row);
      case "evolution":
        return pokemonRepo.insertEvolution(entry.row);
      case "pokemon":
        return pokemonRepo.insertPokemon(entry.row);
      case "pokemonMove":
        return pokemonRepo.insertPokemonMove(entry.row);
      case "pokemonAbility":
        return pokemonRepo.insertPokemonAbility(entry.row);
      case "pokemonTypeChange":
        return pokemonRepo.insertPokemonTypeChange(entry.row);
    }
  }

  const insertBatch = db.transaction((rows: readonly InsertRow[]) => {
    for (const row of rows) insert(row);
  });

  return {
    insert,

    /**
     * One transaction per batch; a failing row rolls back the whole batch.
     */
    insertAll(rows: readonly InsertRow[]): number {
      insertBatch(rows);
      return rows.length;
    }
  };
}

export type RowWriter = ReturnType<typeof createRowWriter>;
