// apps/cli/src/shared/config.ts
import os from "node:os";
import path from "node:path";

export const APP_NAME = "gendex";

export const DEFAULT_API_URL = "https://pokeapi.co/api/v2";

export type AppSettings = {
  dbPath: string;
  configPath: string;
  customPath: string;
  cacheDir: string;
  apiUrl: string;
  logLevel: string | undefined;
  port: number;
  host: string;
};

function xdgDir(
  env: NodeJS.ProcessEnv,
  variable: string,
  fallback: string[]
): string {
  const fromEnv = env[variable];
  const base =
    fromEnv && fromEnv.trim().length > 0
      ? fromEnv
      : path.join(env.HOME || os.homedir(), ...fallback);
  return path.join(base, APP_NAME);
}

/**
 * Environment-derived settings. Command-line flags and config.json are layered on top by the CLI.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
  const dataDir = xdgDir(env, "XDG_DATA_HOME", [".local", "share"]);
  const configDir = xdgDir(env, "XDG_CONFIG_HOME", [".config"]);
  const cacheDir = xdgDir(env, "XDG_CACHE_HOME", [".cache"]);

  const port = Number(env.PORT);

  return {
    dbPath: env.GENDEX_DB_PATH || path.join(dataDir, "gendex.db"),
    configPath: env.GENDEX_CONFIG_PATH || path.join(configDir, "config.json"),
    customPath: env.GENDEX_CUSTOM_PATH || path.join(configDir, "custom.json"),
    cacheDir: env.GENDEX_CACHE_DIR || path.join(cacheDir, "http"),
    apiUrl: env.GENDEX_API_URL || DEFAULT_API_URL,
    logLevel: env.GENDEX_LOG_LEVEL || undefined,
    port: Number.isInteger(port) && port > 0 ? port : 3000,
    host: env.HOST || "127.0.0.1"
  };
}

/** Stored in the database meta table; a store written by another major.minor must be rebuilt. */
export const APP_VERSION = "0.1.0";
