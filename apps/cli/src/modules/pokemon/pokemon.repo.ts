// apps/cli/src/modules/pokemon/pokemon.repo.ts
import type { Db } from "../../db/index";
import type {
  EvolutionRow,
  LearnMove,
  PokemonAbility,
  PokemonAbilityRow,
  PokemonMoveRow,
  PokemonRow,
  PokemonTypeChangeRow,
  SpeciesRow
} from "./pokemon.schemas";

/**
 * pokemon            - one row per form; stats never change across generations
 * species            - introduction generation + group flags + evolution chain id
 * evolutions         - evolution_json is a serialised EvolutionStep tree
 * pokemon_moves      - one row per (move, method, level, generation)
 * pokemon_abilities  - slot order, is_hidden 0/1
 * pokemon_type_changes - type pair for generations <= generation
 */

export type LearnMoveRow = LearnMove & { generation: number };

export function createPokemonRepo(db: Db) {
  const getPokemonByNameStmt = db.prepare<[string]>(`
    SELECT * FROM pokemon WHERE name = ?
  `);

  const getSpeciesByIdStmt = db.prepare<[number]>(`
    SELECT * FROM species WHERE id = ?
  `);

  const getSpeciesByNameStmt = db.prepare<[string]>(`
    SELECT * FROM species WHERE name = ?
  `);

  const getEvolutionByIdStmt = db.prepare<[number]>(`
    SELECT id, evolution_json FROM evolutions WHERE id = ?
  `);

  // Latest generation first, then level-up before other methods, then lowest level.
  const listLearnMovesStmt = db.prepare<[number, number]>(`
    SELECT
      m.name AS name,
      p.learn_method AS method,
      p.learn_level AS level,
      p.generation AS generation
    FROM pokemon_moves AS p
    JOIN moves AS m ON m.id = p.move_id
    WHERE p.pokemon_id = ? AND p.generation <= ?
    ORDER BY
      m.name ASC,
      p.generation DESC,
      CASE WHEN p.learn_method = 'level-up' THEN 0 ELSE 1 END ASC,
      p.learn_level ASC,
      p.learn_method ASC
  `);

  const listAbilitiesStmt = db.prepare<[number]>(`
    SELECT a.name AS name, p.is_hidden AS is_hidden
    FROM pokemon_abilities AS p
    JOIN abilities AS a ON a.id = p.ability_id
    WHERE p.pokemon_id = ?
    ORDER BY p.slot ASC
  `);

  const listTypeChangesStmt = db.prepare<[number, number]>(`
    SELECT id, primary_type, secondary_type, generation, pokemon_id
    FROM pokemon_type_changes
    WHERE pokemon_id = ? AND generation >= ?
    ORDER BY generation ASC
  `);

  const listPokemonNamesStmt = db.prepare(`
    SELECT name FROM pokemon ORDER BY name ASC
  `);

  const insertPokemonStmt = db.prepare<
    [number, string, string, string | null, number, number, number, number, number, number, number]
  >(`
    INSERT INTO pokemon (
      id, name, primary_type, secondary_type,
      hp, attack, defense, special_attack, special_defense, speed,
      species_id
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const insertSpeciesStmt = db.prepare<[number, string, number, number, number, number, number | null]>(`
    INSERT INTO species (id, name, generation, is_baby, is_legendary, is_mythical, evolution_id)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);

  const insertEvolutionStmt = db.prepare<[number, string]>(`
    INSERT INTO evolutions (id, evolution_json) VALUES (?, ?)
  `);

  const insertPokemonMoveStmt = db.prepare<[number, string, number, number, number]>(`
    INSERT INTO pokemon_moves (move_id, learn_method, learn_level, generation, pokemon_id)
    VALUES (?, ?, ?, ?, ?)
  `);

  const insertPokemonAbilityStmt = db.prepare<[number, number, number, number]>(`
    INSERT INTO pokemon_abilities (ability_id, is_hidden, slot, pokemon_id)
    VALUES (?, ?, ?, ?)
  `);

  const insertTypeChangeStmt = db.prepare<[string, string | null, number, number]>(`
    INSERT INTO pokemon_type_changes (primary_type, secondary_type, generation, pokemon_id)
    VALUES (?, ?, ?, ?)
  `);

  return {
    getPokemonByName(name: string): PokemonRow | undefined {
      return getPokemonByNameStmt.get(name) as PokemonRow | undefined;
    },

    getSpeciesById(id: number): SpeciesRow | undefined {
      return getSpeciesByIdStmt.get(id) as SpeciesRow | undefined;
    },

    getSpeciesByName(name: string): SpeciesRow | undefined {
      return getSpeciesByNameStmt.get(name) as SpeciesRow | undefined;
    },

    getEvolutionById(id: number): EvolutionRow | undefined {
      return getEvolutionByIdStmt.get(id) as EvolutionRow | undefined;
    },

    listLearnMoves(pokemonId: number, maxGeneration: number): LearnMoveRow[] {
      return listLearnMovesStmt.all(pokemonId, maxGeneration) as LearnMoveRow[];
    },

    listAbilities(pokemonId: number): PokemonAbility[] {
      const rows = listAbilitiesStmt.all(pokemonId) as Array<{ name: string; is_hidden: number }>;
      return rows.map((r) => ({ name: r.name, hidden: !!r.is_hidden }));
    },

    listTypeChanges(pokemonId: number, minGeneration: number): PokemonTypeChangeRow[] {
      return listTypeChangesStmt.all(pokemonId, minGeneration) as PokemonTypeChangeRow[];
    },

    listPokemonNames(): string[] {
      return (listPokemonNamesStmt.all() as Array<{ name: string }>).map((r) => r.name);
    },

    insertPokemon(row: PokemonRow) {
      insertPokemonStmt.run(
        row.id,
        row.name,
        row.primary_type,
        row.secondary_type,
        row.hp,
        row.attack,
        row.defense,
        row.special_attack,
        row.special_defense,
        row.speed,
        row.species_id
      );
    },

    insertSpecies(row: SpeciesRow) {
      insertSpeciesStmt.run(
        row.id,
        row.name,
        row.generation,
        row.is_baby,
        row.is_legendary,
        row.is_mythical,
        row.evolution_id
      );
    },

    insertEvolution(row: EvolutionRow) {
      insertEvolutionStmt.run(row.id, row.evolution_json);
    },

    insertPokemonMove(row: PokemonMoveRow) {
      insertPokemonMoveStmt.run(
        row.move_id,
        row.learn_method,
        row.learn_level,
        row.generation,
        row.pokemon_id
      );
    },

    insertPokemonAbility(row: PokemonAbilityRow) {
      insertPokemonAbilityStmt.run(row.ability_id, row.is_hidden, row.slot, row.pokemon_id);
    },

    insertPokemonTypeChange(row: Omit<PokemonTypeChangeRow, "id">) {
      insertTypeChangeStmt.run(row.primary_type, row.secondary_type, row.generation, row.pokemon_id);
    }
  };
}

export type PokemonRepo = ReturnType<typeof createPokemonRepo>;
