// apps/cli/src/modules/config/config.repo.test.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { HttpError } from "../../shared/errors";
import { createConfigRepo, parseConfigKey } from "./config.repo";

describe("config repo", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "gendex-config-"));
    file = path.join(dir, "nested", "config.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("starts empty when the file is missing", () => {
    expect(createConfigRepo(file).entries()).toEqual([]);
  });

  it("persists values across instances", () => {
    createConfigRepo(file).set("game", "  X-Y ");

    const reopened = createConfigRepo(file);
    expect(reopened.get("game")).toBe("x-y");
    expect(JSON.parse(fs.readFileSync(file, "utf8"))).toEqual({ game: "x-y" });
  });

  it("lists set keys in declaration order", () => {
    const repo = createConfigRepo(file);
    repo.set("log-level", "debug");
    repo.set("game", "sun-moon");
    repo.set("color", "FALSE");

    expect(repo.entries()).toEqual([
      ["game", "sun-moon"],
      ["color", "false"],
      ["log-level", "debug"]
    ]);
  });

  it("unsets a key and reports whether it was set", () => {
    const repo = createConfigRepo(file);
    repo.set("game", "black-white");

    expect(repo.unset("game")).toBe(true);
    expect(repo.unset("game")).toBe(false);
    expect(createConfigRepo(file).get("game")).toBeUndefined();
  });

  it("rejects values outside a key's domain", () => {
    const repo = createConfigRepo(file);
    expect(() => repo.set("color", "sometimes")).toThrow(
      "Invalid value 'sometimes' for 'color'. Expected one of: true, false."
    );
    expect(() => repo.set("log-level", "loud")).toThrow(HttpError);
  });

  it("ignores unknown keys already in the file", () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify({ game: "x-y", theme: "dark", color: true }));

    expect(createConfigRepo(file).entries()).toEqual([["game", "x-y"]]);
  });

  it("fails on a file that is not a JSON object", () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, "[1, 2]");

    expect(() => createConfigRepo(file)).toThrow(`${file} must contain a JSON object.`);
  });
});

describe("parseConfigKey", () => {
  it("accepts known keys case-insensitively", () => {
    expect(parseConfigKey("Log-Level")).toBe("log-level");
  });

  it("rejects unknown keys with a usage error", () => {
    try {
      parseConfigKey("theme");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(HttpError);
      if (err instanceof HttpError) {
        expect(err.statusCode).toBe(400);
        expect(err.message).toBe("Unknown config key 'theme'. Valid keys: game, color, log-level.");
      }
    }
  });
});
