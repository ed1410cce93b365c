// apps/cli/src/modules/setup/setup.service.ts
import { initializeSchema, writeMetaVersion, type Db } from "../../db/index";
import type { Logger } from "../../shared/logger";
import { createGenerationResolver, type GenerationResolver } from "../games/games.service";
import type { PokeApiClient } from "./setup.client";
import {
  convertAbility,
  convertEvolutionChain,
  convertGame,
  convertMove,
  convertPokemon,
  convertSpecies,
  convertType
} from "./setup.converters";
import { createRowWriter, type InsertRow } from "./setup.rows";
import type {
  ApiAbility,
  ApiEvolutionChain,
  ApiMove,
  ApiPokemon,
  ApiSpecies,
  ApiType,
  ApiVersionGroup,
  NamedResource,
  SetupReport
} from "./setup.schemas";

export const FETCH_CHUNK_SIZE = 100;

/**
 * Runs `fetchOne` over every item, at most `chunkSize` requests in flight at a time.
 * Results keep the input order.
 */
export async function fetchInChunks<I, T>(
  items: readonly I[],
  fetchOne: (item: I) => Promise<T>,
  chunkSize: number = FETCH_CHUNK_SIZE
): Promise<T[]> {
  const results: T[] = [];
  for (let start = 0; start < items.length; start += chunkSize) {
    const chunk = items.slice(start, start + chunkSize);
    results.push(...(await Promise.all(chunk.map(fetchOne))));
  }
  return results;
}

export type SetupDeps = {
  db: Db;
  client: PokeApiClient;
  logger: Logger;
  appVersion: string;
};

/**
 * Builds the store from scratch on an empty database. Each resource kind is written in
 * its own transaction, in an order that keeps every parent ahead of its children.
 */
export async function runSetup(deps: SetupDeps): Promise<SetupReport> {
  const { db, client, logger } = deps;
  const startedAt = Date.now();
  const counts: Record<string, number> = {};

  initializeSchema(db);
  const writer = createRowWriter(db);

  async function fetchAll<T>(resource: string): Promise<T[]> {
    const refs: NamedResource[] = await client.listAll(resource);
    logger.info({ resource, total: refs.length }, "fetching resources");
    return fetchInChunks(refs, (ref) => client.getJson<T>(ref.url));
  }

  function store(label: string, rows: InsertRow[]) {
    counts[label] = writer.insertAll(rows);
    logger.info({ resource: label, rows: counts[label] }, "stored");
  }

  //
  // Games first: every other converter needs the version-group generations
  //
  const versionGroups = await fetchAll<ApiVersionGroup>("version-group");
  const gameList = versionGroups.map(convertGame);
  store(
    "games",
    gameList.map((row): InsertRow => ({ kind: "game", row }))
  );
  const games: GenerationResolver = createGenerationResolver(gameList);

  const moves = await fetchAll<ApiMove>("move");
  store("moves", moves.flatMap((move) => convertMove(move, games)));

  const types = await fetchAll<ApiType>("type");
  store("types", types.flatMap(convertType));

  const abilities = await fetchAll<ApiAbility>("ability");
  store("abilities", abilities.flatMap((ability) => convertAbility(ability, games)));

  const species = await fetchAll<ApiSpecies>("pokemon-species");
  store("species", species.map(convertSpecies));

  const chains = await fetchAll<ApiEvolutionChain>("evolution-chain");
  store("evolutions", chains.map(convertEvolutionChain));

  const pokemon = await fetchAll<ApiPokemon>("pokemon");
  store("pokemon", pokemon.flatMap((entry) => convertPokemon(entry, games)));

  writeMetaVersion(db, deps.appVersion);

  const report: SetupReport = { counts, durationMs: Date.now() - startedAt };
  logger.info(report, "setup complete");
  return report;
}
