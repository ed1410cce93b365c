// apps/cli/src/main.test.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { run, USAGE, type CliIo } from "./main";
import { createFixtureFetch, loadPokeApiFixture } from "./testing/fixtures";

describe("gendex cli", () => {
  let dir: string;
  let io: CliIo;
  let stdout: string[];
  let stderr: string[];

  async function gendex(...argv: string[]) {
    stdout = [];
    stderr = [];
    const code = await run(argv, io);
    return { code, out: stdout.join("\n"), err: stderr.join("\n") };
  }

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "gendex-cli-"));
    io = {
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
      env: {
        HOME: dir,
        GENDEX_DB_PATH: path.join(dir, "data", "gendex.db"),
        GENDEX_CONFIG_PATH: path.join(dir, "config", "config.json"),
        GENDEX_CUSTOM_PATH: path.join(dir, "config", "custom.json"),
        GENDEX_CACHE_DIR: path.join(dir, "cache"),
        GENDEX_API_URL: loadPokeApiFixture().baseUrl,
        GENDEX_LOG_LEVEL: "silent"
      },
      isTTY: false,
      fetchImpl: createFixtureFetch().fetchImpl
    };
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("prints help and version", async () => {
    expect(await gendex("--help")).toEqual({ code: 0, out: USAGE, err: "" });
    expect((await gendex("-V")).out).toBe("gendex 0.1.0");
  });

  it("prints usage and fails without a command", async () => {
    const result = await gendex();
    expect(result.code).toBe(1);
    expect(result.out).toBe(USAGE);
  });

  it("asks for setup before the store exists", async () => {
    expect(await gendex("move", "tackle")).toEqual({
      code: 1,
      out: "",
      err: "Database not set up. Run `gendex setup` first."
    });
  });

  describe("after setup", () => {
    beforeAll(async () => {
      const result = await gendex("setup");
      expect(result.code).toBe(0);
      expect(result.out).toMatch(/^Stored 90 rows in \d+\.\ds\.$/);
    });

    it("lists resource names with a delimiter", async () => {
      expect((await gendex("resource", "games", "-d", ",")).out).toBe(
        "red-blue,gold-silver,ruby-sapphire,diamond-pearl,black-white,x-y,sun-moon"
      );
      expect((await gendex("resource", "items")).err).toBe(
        "Unknown resource 'items'. Expected one of: pokemon, moves, abilities, types, games."
      );
    });

    it("resolves a move as of the selected game", async () => {
      const old = await gendex("move", "tackle", "--game", "black-white");
      expect(old.out.split("\n").slice(0, 3)).toEqual([
        "tackle",
        "normal physical",
        "power: 50   accuracy: 100  pp: 35 "
      ]);

      const latest = await gendex("move", "Tackle");
      expect(latest.out.split("\n")[2]).toBe("power: 40   accuracy: 100  pp: 35 ");
    });

    it("suggests names for a typo", async () => {
      expect((await gendex("pokemon", "squirtl")).err).toBe(
        "Pokémon 'squirtl' not found. Potential matches: squirtle."
      );
    });

    it("prints a Pokémon with its defense chart", async () => {
      const { code, out } = await gendex("pokemon", "geodude", "-g", "black-white");
      const lines = out.split("\n");

      expect(code).toBe(0);
      expect(lines.slice(0, 5)).toEqual([
        "geodude rock ground regular",
        "rock-head sturdy sand-veil(h)",
        "hp    atk   def   satk  sdef  spd   total",
        "40    80    100   30    30    20    300   ",
        "gen-5"
      ]);
      expect(lines[6]).toBe("rock ground defense");
      expect(lines[7]).toBe("quad: grass water");
    });

    it("prints the combined defense chart of a type pair", async () => {
      const lines = (await gendex("type", "rock", "ground", "-g", "black-white")).out.split("\n");
      expect(lines[0]).toBe("rock offense");
      expect(lines).toContain("rock ground defense");
    });

    it("checks roster sizes", async () => {
      expect((await gendex("match", "geodude")).err).toBe("match needs at least 2 Pokémon.");
      expect((await gendex("coverage")).err).toBe("coverage needs at least 1 Pokémon.");
      expect(
        (await gendex("coverage", "geodude", "geodude", "geodude", "geodude", "geodude", "geodude", "mew"))
          .err
      ).toBe("coverage takes at most 6 Pokémon.");
    });

    it("prints both directions of a matchup", async () => {
      const lines = (await gendex("match", "squirtle", "geodude", "-g", "black-white")).out.split("\n");
      expect(lines.slice(-4)).toEqual([
        "geodude's moves vs squirtle",
        "None",
        "squirtle's moves vs geodude",
        "quad: scald(s) water-gun(s)"
      ]);
    });

    it("reads and writes the config file", async () => {
      expect((await gendex("config", "game", "X-Y")).code).toBe(0);
      expect((await gendex("config", "game")).out).toBe("x-y");
      expect((await gendex("config")).out).toBe("game: x-y");
      expect((await gendex("move", "tackle")).out.split("\n")[2]).toBe(
        "power: 40   accuracy: 100  pp: 35 "
      );

      expect((await gendex("config", "color", "purple")).err).toBe(
        "Invalid value 'purple' for 'color'. Expected one of: true, false."
      );
      expect((await gendex("config", "theme")).err).toBe(
        "Unknown config key 'theme'. Valid keys: game, color, log-level."
      );

      expect((await gendex("config", "game", "--unset")).code).toBe(0);
      expect((await gendex("config")).out).toBe("");
    });

    it("rejects an unknown game from the config", async () => {
      await gendex("config", "game", "x-z");
      expect((await gendex("move", "tackle")).err).toBe(
        "Game 'x-z' not found. Potential matches: x-y."
      );
      await gendex("config", "game", "--unset");
    });
  });

  it("rejects unknown commands", async () => {
    expect((await gendex("frobnicate")).err).toBe("Unknown command 'frobnicate'. See --help.");
  });
});
