// apps/cli/src/modules/setup/setup.client.test.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { HttpError } from "../../shared/errors";
import { createSilentLogger } from "../../shared/logger";
import { createFixtureFetch } from "../../testing/fixtures";
import { createPokeApiClient } from "./setup.client";
import type { ApiMove } from "./setup.schemas";

const BASE = "https://pokeapi.test/api/v2";

describe("createPokeApiClient", () => {
  let cacheDir: string;

  beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), "gendex-client-"));
  });

  afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
  });

  function makeClient() {
    const fake = createFixtureFetch();
    const client = createPokeApiClient({
      baseUrl: `${BASE}/`,
      cacheDir,
      logger: createSilentLogger(),
      fetchImpl: fake.fetchImpl
    });
    return { client, requested: fake.requested };
  }

  it("joins relative paths onto the base url", async () => {
    const { client, requested } = makeClient();
    const move = await client.getJson<ApiMove>("/move/33/");
    expect(move.name).toBe("tackle");
    expect(requested).toEqual([`${BASE}/move/33/`]);
  });

  it("serves repeated requests from the disk cache", async () => {
    const { client, requested } = makeClient();
    await client.getJson<ApiMove>(`${BASE}/move/89/`);
    const again = await client.getJson<ApiMove>(`${BASE}/move/89/`);

    expect(again.name).toBe("earthquake");
    expect(requested).toHaveLength(1);
    expect(fs.readdirSync(cacheDir)).toHaveLength(1);
  });

  it("lists every resource of a kind in one request", async () => {
    const { client, requested } = makeClient();
    const refs = await client.listAll("version-group");

    expect(refs.map((r) => r.name)).toEqual([
      "red-blue",
      "gold-silver",
      "ruby-sapphire",
      "diamond-pearl",
      "black-white",
      "x-y",
      "sun-moon"
    ]);
    expect(refs[0].url).toBe(`${BASE}/version-group/1/`);
    expect(requested).toEqual([`${BASE}/version-group?limit=100000`]);
  });

  it("fails with an upstream error on a non-2xx response and caches nothing", async () => {
    const { client } = makeClient();
    await expect(client.getJson(`${BASE}/move/9999/`)).rejects.toBeInstanceOf(HttpError);
    await expect(client.getJson(`${BASE}/move/9999/`)).rejects.toMatchObject({
      statusCode: 502,
      error: "UpstreamError"
    });
    expect(fs.readdirSync(cacheDir)).toHaveLength(0);
  });

  it("clears the cache directory", async () => {
    const { client, requested } = makeClient();
    await client.getJson(`${BASE}/move/1/`);
    client.clearCache();

    expect(fs.existsSync(cacheDir)).toBe(false);
    await client.getJson(`${BASE}/move/1/`);
    expect(requested).toHaveLength(2);
  });
});
