// apps/cli/src/modules/setup/setup.client.ts
import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { createHttpError } from "../../shared/errors";
import type { Logger } from "../../shared/logger";
import type { NamedResource, ResourceList } from "./setup.schemas";

export type FetchLike = (url: string) => Promise<Response>;

export type PokeApiClientOptions = {
  baseUrl: string;
  cacheDir: string;
  logger: Logger;
  fetchImpl?: FetchLike;
};

function cacheKey(url: string): string {
  return crypto.createHash("sha1").update(url).digest("hex");
}

/**
 * PokéAPI reader. Every successful response body is kept on disk keyed by its URL, so a
 * repeated setup reads from the cache instead of the network.
 */
export function createPokeApiClient(options: PokeApiClientOptions) {
  const { cacheDir, logger } = options;
  const baseUrl = options.baseUrl.replace(/\/+$/, "");
  const fetchImpl: FetchLike = options.fetchImpl ?? ((url) => fetch(url));

  function resolveUrl(pathOrUrl: string): string {
    if (/^https?:\/\//.test(pathOrUrl)) return pathOrUrl;
    return `${baseUrl}/${pathOrUrl.replace(/^\/+/, "")}`;
  }

  function cachePath(url: string): string {
    return path.join(cacheDir, `${cacheKey(url)}.json`);
  }

  function readCache(url: string): string | undefined {
    const file = cachePath(url);
    if (!fs.existsSync(file)) return undefined;
    return fs.readFileSync(file, "utf8");
  }

  function writeCache(url: string, body: string) {
    fs.mkdirSync(cacheDir, { recursive: true });
    fs.writeFileSync(cachePath(url), body, "utf8");
  }

  async function getJson<T>(pathOrUrl: string): Promise<T> {
    const url = resolveUrl(pathOrUrl);

    const cached = readCache(url);
    if (cached !== undefined) {
      logger.debug({ url }, "cache hit");
      return JSON.parse(cached) as T;
    }

    logger.debug({ url }, "fetching");
    const res = await fetchImpl(url);
    if (!res.ok) {
      throw createHttpError(
        502,
        `Request to ${url} failed with status ${res.status}`,
        "UpstreamError",
        { url, status: res.status }
      );
    }

    const text = await res.text();
    const body: unknown = JSON.parse(text);
    writeCache(url, text);
    return body as T;
  }

  return {
    getJson,

    async listAll(resource: string): Promise<NamedResource[]> {
      const list = await getJson<ResourceList>(`${resource}?limit=100000`);
      return list.results;
    },

    clearCache() {
      fs.rmSync(cacheDir, { recursive: true, force: true });
      logger.info({ cacheDir }, "http cache cleared");
    }
  };
}

export type PokeApiClient = ReturnType<typeof createPokeApiClient>;
