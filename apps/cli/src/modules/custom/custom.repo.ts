// apps/cli/src/modules/custom/custom.repo.ts
import fs from "node:fs";

import { createHttpError } from "../../shared/errors";
import type { CustomCollection, CustomPokemon } from "./custom.schemas";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function parseEntry(value: unknown, index: number, filePath: string): CustomPokemon {
  const invalid = (reason: string) =>
    createHttpError(400, `Custom Pokémon #${index + 1} in ${filePath} ${reason}.`, "InvalidCustomFile");

  if (!isRecord(value)) throw invalid("is not an object");
  const { nickname, base, moves, types } = value;
  if (typeof nickname !== "string" || !nickname.trim()) throw invalid("needs a nickname");
  if (typeof base !== "string" || !base.trim()) throw invalid("needs a base Pokémon");

  const entry: CustomPokemon = { nickname: nickname.trim(), base: base.trim().toLowerCase() };

  if (moves !== undefined) {
    if (!isStringList(moves)) throw invalid("has a moves field that is not a list of names");
    entry.moves = moves.map((m) => m.trim().toLowerCase()).filter((m) => m.length > 0);
  }

  if (types !== undefined) {
    if (!isRecord(types) || typeof types.primary !== "string") {
      throw invalid("has types without a primary type");
    }
    const secondary = types.secondary;
    if (secondary !== undefined && secondary !== null && typeof secondary !== "string") {
      throw invalid("has a secondary type that is not a name");
    }
    entry.types = {
      primary: types.primary.trim().toLowerCase(),
      secondary: typeof secondary === "string" && secondary.trim() ? secondary.trim().toLowerCase() : null
    };
  }

  return entry;
}

/**
 * Reads custom.json. A missing file is an empty collection.
 */
export function loadCustomCollection(filePath: string): CustomCollection {
  if (!fs.existsSync(filePath)) {
    return { pokemon: [] };
  }

  const raw = fs.readFileSync(filePath, "utf8");
  if (!raw.trim()) {
    return { pokemon: [] };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw createHttpError(
      400,
      `Could not parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      "InvalidCustomFile"
    );
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.pokemon)) {
    throw createHttpError(400, `${filePath} must contain a "pokemon" list.`, "InvalidCustomFile");
  }

  return { pokemon: parsed.pokemon.map((entry, i) => parseEntry(entry, i, filePath)) };
}

export function findCustomPokemon(
  collection: CustomCollection,
  nickname: string
): CustomPokemon | undefined {
  const wanted = nickname.toLowerCase();
  return collection.pokemon.find((p) => p.nickname.toLowerCase() === wanted);
}
