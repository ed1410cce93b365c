// apps/cli/src/modules/config/config.repo.ts
import fs from "node:fs";
import path from "node:path";

import { createHttpError } from "../../shared/errors";
import { parseEnum } from "../../shared/validation";

export const CONFIG_KEYS = ["game", "color", "log-level"] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export type ConfigValues = Partial<Record<ConfigKey, string>>;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export function parseConfigKey(raw: string): ConfigKey {
  const key = parseEnum(raw.trim().toLowerCase(), CONFIG_KEYS);
  if (!key) {
    throw createHttpError(
      400,
      `Unknown config key '${raw}'. Valid keys: ${CONFIG_KEYS.join(", ")}.`,
      "UnknownConfigKey",
      { key: raw }
    );
  }
  return key;
}

function checkValue(key: ConfigKey, value: string): string {
  const normalised = value.trim().toLowerCase();
  const invalid = (expected: readonly string[]) =>
    createHttpError(
      400,
      `Invalid value '${value}' for '${key}'. Expected one of: ${expected.join(", ")}.`,
      "InvalidConfigValue",
      { key, value }
    );

  switch (key) {
    case "color":
      if (normalised !== "true" && normalised !== "false") throw invalid(["true", "false"]);
      return normalised;
    case "log-level":
      if (!parseEnum(normalised, LOG_LEVELS)) throw invalid(LOG_LEVELS);
      return normalised;
    case "game":
      return normalised;
  }
}

function readValues(filePath: string): ConfigValues {
  if (!fs.existsSync(filePath)) return {};

  const raw = fs.readFileSync(filePath, "utf8");
  if (!raw.trim()) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw createHttpError(
      400,
      `Could not parse ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      "InvalidConfigFile"
    );
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw createHttpError(400, `${filePath} must contain a JSON object.`, "InvalidConfigFile");
  }

  // Unknown keys from older releases are dropped on the next write.
  const values: ConfigValues = {};
  for (const [name, value] of Object.entries(parsed)) {
    const key = parseEnum(name, CONFIG_KEYS);
    if (key && typeof value === "string") values[key] = value;
  }
  return values;
}

/**
 * config.json: flat string key/value pairs. Every write rewrites the whole file.
 */
export function createConfigRepo(filePath: string) {
  let values = readValues(filePath);

  function save() {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `${JSON.stringify(values, null, 2)}\n`, "utf8");
  }

  return {
    get(key: ConfigKey): string | undefined {
      return values[key];
    },

    set(key: ConfigKey, value: string): string {
      const stored = checkValue(key, value);
      values = { ...values, [key]: stored };
      save();
      return stored;
    },

    unset(key: ConfigKey): boolean {
      if (values[key] === undefined) return false;
      const next = { ...values };
      delete next[key];
      values = next;
      save();
      return true;
    },

    /** Set keys in declaration order. */
    entries(): Array<[ConfigKey, string]> {
      const result: Array<[ConfigKey, string]> = [];
      for (const key of CONFIG_KEYS) {
        const value = values[key];
        if (value !== undefined) result.push([key, value]);
      }
      return result;
    }
  };
}

export type ConfigRepo = ReturnType<typeof createConfigRepo>;
