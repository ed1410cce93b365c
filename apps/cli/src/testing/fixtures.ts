// apps/cli/src/testing/fixtures.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { MEMORY_DB, openDatabase, type Db } from "../db/index";
import { APP_VERSION } from "../shared/config";
import { createSilentLogger } from "../shared/logger";
import { createPokeApiClient, type FetchLike } from "../modules/setup/setup.client";
import type { ResourceList } from "../modules/setup/setup.schemas";
import { runSetup } from "../modules/setup/setup.service";

/**
 * A handful of PokéAPI payloads: seven version groups, the type roster plus "shadow",
 * and five Pokémon (geodude, squirtle, clefairy, mew, pichu) with their moves and abilities.
 */
export type PokeApiFixture = {
  baseUrl: string;
  resources: Record<string, Array<{ id: number; name?: string }>>;
};

export function loadPokeApiFixture(): PokeApiFixture {
  const raw = fs.readFileSync(path.join(__dirname, "pokeapi.fixture.json"), "utf8");
  return JSON.parse(raw) as PokeApiFixture;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" }
  });
}

/**
 * In-process stand-in for the PokéAPI. Records every requested url.
 */
export function createFixtureFetch(fixture: PokeApiFixture = loadPokeApiFixture()) {
  const requested: string[] = [];
  const base = fixture.baseUrl;

  const fetchImpl: FetchLike = async (url) => {
    requested.push(url);

    const list = /^(.*)\/([a-z-]+)\?limit=\d+$/.exec(url);
    if (list && list[1] === base) {
      const items = fixture.resources[list[2]] ?? [];
      const body: ResourceList = {
        count: items.length,
        next: null,
        results: items.map((item) => ({
          name: item.name ?? String(item.id),
          url: `${base}/${list[2]}/${item.id}/`
        }))
      };
      return jsonResponse(body);
    }

    const single = /^(.*)\/([a-z-]+)\/(\d+)\/?$/.exec(url);
    if (single && single[1] === base) {
      const item = fixture.resources[single[2]]?.find((entry) => entry.id === Number(single[3]));
      if (item) return jsonResponse(item);
    }

    return jsonResponse({ detail: "Not found." }, 404);
  };

  return { fetchImpl, requested };
}

/**
 * Runs the real setup against the fixture payloads into an in-memory store.
 */
export async function seedFixtureDatabase(): Promise<Db> {
  const fixture = loadPokeApiFixture();
  const cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), "gendex-fixture-"));
  const db = openDatabase(MEMORY_DB);

  try {
    await runSetup({
      db,
      client: createPokeApiClient({
        baseUrl: fixture.baseUrl,
        cacheDir,
        logger: createSilentLogger(),
        fetchImpl: createFixtureFetch(fixture).fetchImpl
      }),
      logger: createSilentLogger(),
      appVersion: APP_VERSION
    });
  } finally {
    fs.rmSync(cacheDir, { recursive: true, force: true });
  }

  return db;
}
