// apps/cli/src/db/index.ts
import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

import { APP_NAME } from "../shared/config";
import { createHttpError } from "../shared/errors";

export type Db = Database.Database;

export const MEMORY_DB = ":memory:";

export function openDatabase(dbPath: string): Db {
  if (dbPath !== MEMORY_DB) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  // Enforce foreign key constraints
  db.pragma("foreign_keys = ON");
  db.pragma("journal_mode = WAL");

  return db;
}

/**
 * Opens an existing store for queries. Fails when setup has not run or was run by an
 * incompatible release.
 */
export function connectDatabase(dbPath: string, appVersion: string): Db {
  if (dbPath !== MEMORY_DB && !fs.existsSync(dbPath)) {
    throw notSetUp();
  }

  const db = openDatabase(dbPath);
  const stored = readMetaVersion(db);
  if (!stored) {
    db.close();
    throw notSetUp();
  }

  if (!isCompatibleVersion(stored, appVersion)) {
    db.close();
    throw createHttpError(
      503,
      `Database was built by version ${stored} and is incompatible with ${appVersion}. Run \`${APP_NAME} setup\` again.`,
      "DatabaseOutdated",
      { stored, current: appVersion }
    );
  }

  return db;
}

function notSetUp() {
  return createHttpError(
    503,
    `Database not set up. Run \`${APP_NAME} setup\` first.`,
    "DatabaseNotReady"
  );
}

export function removeDatabase(dbPath: string) {
  if (dbPath === MEMORY_DB) return;
  for (const suffix of ["", "-wal", "-shm"]) {
    fs.rmSync(`${dbPath}${suffix}`, { force: true });
  }
}

export function initializeSchema(db: Db) {
  //
  // Games
  //
  db.exec(`
    CREATE TABLE IF NOT EXISTS games (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      [order] INTEGER NOT NULL,
      generation INTEGER NOT NULL
    );
  `);

  //
  // Moves
  //
  db.exec(`
    CREATE TABLE IF NOT EXISTS moves (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      power INTEGER,
      accuracy INTEGER,
      pp INTEGER,
      effect_chance INTEGER,
      effect TEXT NOT NULL,
      short_effect TEXT NOT NULL,
      type TEXT NOT NULL,
      damage_class TEXT NOT NULL,    -- physical | special | status
      generation INTEGER NOT NULL
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS move_changes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      power INTEGER,
      accuracy INTEGER,
      pp INTEGER,
      effect_chance INTEGER,
      effect TEXT,
      type TEXT,
      generation INTEGER NOT NULL,   -- last generation these values applied to
      move_id INTEGER NOT NULL,
      FOREIGN KEY (move_id) REFERENCES moves(id) ON DELETE CASCADE
    );
  `);

  //
  // Types
  //
  // Relation columns hold comma-joined type names.
  db.exec(`
    CREATE TABLE IF NOT EXISTS types (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      no_damage_to TEXT NOT NULL DEFAULT '',
      half_damage_to TEXT NOT NULL DEFAULT '',
      double_damage_to TEXT NOT NULL DEFAULT '',
      no_damage_from TEXT NOT NULL DEFAULT '',
      half_damage_from TEXT NOT NULL DEFAULT '',
      double_damage_from TEXT NOT NULL DEFAULT '',
      generation INTEGER NOT NULL
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS type_changes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      no_damage_to TEXT NOT NULL DEFAULT '',
      half_damage_to TEXT NOT NULL DEFAULT '',
      double_damage_to TEXT NOT NULL DEFAULT '',
      no_damage_from TEXT NOT NULL DEFAULT '',
      half_damage_from TEXT NOT NULL DEFAULT '',
      double_damage_from TEXT NOT NULL DEFAULT '',
      generation INTEGER NOT NULL,
      type_id INTEGER NOT NULL,
      FOREIGN KEY (type_id) REFERENCES types(id) ON DELETE CASCADE
    );
  `);

  //
  // Abilities
  //
  db.exec(`
    CREATE TABLE IF NOT EXISTS abilities (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      effect TEXT NOT NULL,
      short_effect TEXT NOT NULL,
      generation INTEGER NOT NULL
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS ability_changes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      effect TEXT NOT NULL,
      generation INTEGER NOT NULL,   -- last generation this effect applied to
      ability_id INTEGER NOT NULL,
      FOREIGN KEY (ability_id) REFERENCES abilities(id) ON DELETE CASCADE
    );
  `);

  //
  // Species & evolutions
  //
  db.exec(`
    CREATE TABLE IF NOT EXISTS evolutions (
      id INTEGER PRIMARY KEY,
      evolution_json TEXT NOT NULL
    );
  `);

  // evolution_id is not a foreign key: species are fetched before the chains they point at.
  db.exec(`
    CREATE TABLE IF NOT EXISTS species (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      generation INTEGER NOT NULL,
      is_baby INTEGER NOT NULL DEFAULT 0,
      is_legendary INTEGER NOT NULL DEFAULT 0,
      is_mythical INTEGER NOT NULL DEFAULT 0,
      evolution_id INTEGER
    );
  `);

  //
  // Pokémon
  //
  db.exec(`
    CREATE TABLE IF NOT EXISTS pokemon (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      primary_type TEXT NOT NULL,
      secondary_type TEXT,
      hp INTEGER NOT NULL,
      attack INTEGER NOT NULL,
      defense INTEGER NOT NULL,
      special_attack INTEGER NOT NULL,
      special_defense INTEGER NOT NULL,
      speed INTEGER NOT NULL,
      species_id INTEGER NOT NULL,
      FOREIGN KEY (species_id) REFERENCES species(id) ON DELETE CASCADE
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS pokemon_moves (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      move_id INTEGER NOT NULL,
      learn_method TEXT NOT NULL,    -- level-up | machine | egg | tutor | ...
      learn_level INTEGER NOT NULL,
      generation INTEGER NOT NULL,
      pokemon_id INTEGER NOT NULL,
      FOREIGN KEY (move_id) REFERENCES moves(id) ON DELETE CASCADE,
      FOREIGN KEY (pokemon_id) REFERENCES pokemon(id) ON DELETE CASCADE
    );
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_pokemon_moves_pokemon_generation
      ON pokemon_moves(pokemon_id, generation);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS pokemon_abilities (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      ability_id INTEGER NOT NULL,
      is_hidden INTEGER NOT NULL DEFAULT 0,
      slot INTEGER NOT NULL,
      pokemon_id INTEGER NOT NULL,
      FOREIGN KEY (ability_id) REFERENCES abilities(id) ON DELETE CASCADE,
      FOREIGN KEY (pokemon_id) REFERENCES pokemon(id) ON DELETE CASCADE
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS pokemon_type_changes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      primary_type TEXT NOT NULL,
      secondary_type TEXT,
      generation INTEGER NOT NULL,
      pokemon_id INTEGER NOT NULL,
      FOREIGN KEY (pokemon_id) REFERENCES pokemon(id) ON DELETE CASCADE
    );
  `);

  //
  // Meta
  //
  db.exec(`
    CREATE TABLE IF NOT EXISTS meta (
      name TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);
}

// ───────────────────────────
// Version meta
// ───────────────────────────

export function readMetaVersion(db: Db): string | undefined {
  const table = db
    .prepare<[string]>(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`)
    .get("meta");
  if (!table) return undefined;

  const row = db
    .prepare<[string]>(`SELECT value FROM meta WHERE name = ?`)
    .get("version") as { value: string } | undefined;
  return row?.value;
}

export function writeMetaVersion(db: Db, version: string) {
  db.prepare<[string, string]>(
    `INSERT INTO meta (name, value) VALUES (?, ?)
     ON CONFLICT(name) DO UPDATE SET value = excluded.value`
  ).run("version", version);
}

type SemVer = { major: number; minor: number; patch: number };

export function parseVersion(raw: string): SemVer {
  const parts = raw.trim().split(".");
  const numbers = parts.map((p) => (/^\d+$/.test(p) ? Number(p) : NaN));
  if (numbers.length !== 3 || numbers.some((n) => Number.isNaN(n))) {
    throw new Error(`Invalid version string '${raw}'`);
  }
  const [major, minor, patch] = numbers;
  return { major, minor, patch };
}

/**
 * Stores are compatible across patch releases only.
 */
export function isCompatibleVersion(stored: string, current: string): boolean {
  const a = parseVersion(stored);
  const b = parseVersion(current);
  return a.major === b.major && a.minor === b.minor;
}
