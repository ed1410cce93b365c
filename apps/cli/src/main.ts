#!/usr/bin/env node
// apps/cli/src/main.ts
import { parseArgs } from "node:util";

import { connectDatabase, type Db } from "./db/index";
import { APP_NAME, APP_VERSION, loadSettings } from "./shared/config";
import { createHttpError } from "./shared/errors";
import { createLogger } from "./shared/logger";
import { createConfigRepo } from "./modules/config/config.repo";
import { loadCustomCollection } from "./modules/custom/custom.repo";
import { createDexService, type DexService } from "./modules/dex/dex.service";
import type { FetchLike } from "./modules/setup/setup.client";
import { buildServer } from "./server";
import { createPainter, resolveColorEnabled } from "./cli/colors";
import {
  abilityCommand,
  configCommand,
  coverageCommand,
  matchCommand,
  moveCommand,
  pokemonCommand,
  resourceCommand,
  setupCommand,
  typeCommand,
  type CommandContext
} from "./cli/commands";

export const USAGE = `Usage: ${APP_NAME} [--game <name>] [--color|--no-color] <command>

Commands:
  setup [--refresh]                          Download PokéAPI data into the local store
  pokemon <name> [--moves] [--evolution]     Pokémon snapshot and defense chart
  type <primary> [secondary]                 Offense and defense charts
  move <name>                                Move details
  ability <name>                             Ability effect
  match <defender...> <attacker>             Move matchups [--stab-only] [--verbose]
  coverage <pokemon...>                      Team offense and defense coverage
  resource <kind> [--delimiter <s>]          List pokemon, moves, abilities, types or games
  config [key] [value] [--unset]             Read or change settings
  serve [--port <n>] [--host <h>]            JSON HTTP server

Options:
  -g, --game <name>    Resolve data as of this game
  -V, --version        Print the version
  -h, --help           Print this help`;

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  isTTY: boolean;
  fetchImpl?: FetchLike;
};

const ARG_OPTIONS = {
  game: { type: "string", short: "g" },
  color: { type: "boolean" },
  "no-color": { type: "boolean" },
  refresh: { type: "boolean" },
  moves: { type: "boolean" },
  evolution: { type: "boolean" },
  verbose: { type: "boolean", short: "v" },
  "stab-only": { type: "boolean" },
  delimiter: { type: "string", short: "d", default: "\n" },
  unset: { type: "boolean" },
  port: { type: "string" },
  host: { type: "string" },
  version: { type: "boolean", short: "V" },
  help: { type: "boolean", short: "h" }
} as const;

function usageError(message: string) {
  return createHttpError(400, message, "UsageError");
}

function colorFlag(values: { color?: boolean; "no-color"?: boolean }): boolean | undefined {
  if (values["no-color"]) return false;
  if (values.color) return true;
  return undefined;
}

function requireArg(value: string | undefined, label: string): string {
  if (!value) throw usageError(`Missing ${label}. See --help.`);
  return value;
}

/**
 * Parses argv, runs one command and returns the exit code.
 */
export async function run(argv: readonly string[], io: CliIo): Promise<number> {
  let db: Db | undefined;
  let keepOpen = false;

  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      options: ARG_OPTIONS,
      allowPositionals: true
    });

    if (values.help) {
      io.stdout(USAGE);
      return 0;
    }
    if (values.version) {
      io.stdout(`${APP_NAME} ${APP_VERSION}`);
      return 0;
    }

    const [command, ...args] = positionals;
    if (!command) {
      io.stdout(USAGE);
      return 1;
    }

    const settings = loadSettings(io.env);
    const config = createConfigRepo(settings.configPath);
    const logger = createLogger({ level: config.get("log-level") ?? settings.logLevel });
    const painter = createPainter(
      resolveColorEnabled({
        flag: colorFlag(values),
        configValue: config.get("color"),
        env: io.env,
        isTTY: io.isTTY
      })
    );

    let dex: DexService | undefined;
    const ctx: CommandContext = {
      settings,
      config,
      logger,
      painter,
      game: values.game,
      out: io.stdout,
      dex: () => {
        if (!dex) {
          db = connectDatabase(settings.dbPath, APP_VERSION);
          dex = createDexService(db, loadCustomCollection(settings.customPath));
        }
        return dex;
      }
    };

    switch (command) {
      case "setup":
        await setupCommand(ctx, { refresh: values.refresh ?? false, fetchImpl: io.fetchImpl });
        break;
      case "pokemon":
        pokemonCommand(ctx, requireArg(args[0], "Pokémon name"), {
          moves: values.moves ?? false,
          evolution: values.evolution ?? false
        });
        break;
      case "type":
        typeCommand(ctx, requireArg(args[0], "type name"), args[1]);
        break;
      case "move":
        moveCommand(ctx, requireArg(args[0], "move name"));
        break;
      case "ability":
        abilityCommand(ctx, requireArg(args[0], "ability name"));
        break;
      case "match":
        matchCommand(ctx, args, {
          verbose: values.verbose ?? false,
          stabOnly: values["stab-only"] ?? false
        });
        break;
      case "coverage":
        coverageCommand(ctx, args);
        break;
      case "resource":
        resourceCommand(ctx, requireArg(args[0], "resource kind"), values.delimiter ?? "\n");
        break;
      case "config":
        configCommand(ctx, args[0], args[1], { unset: values.unset ?? false });
        break;
      case "serve": {
        const port = values.port === undefined ? settings.port : Number(values.port);
        if (!Number.isInteger(port) || port <= 0) {
          throw usageError(`Invalid port '${values.port}'.`);
        }
        const app = await buildServer({ dex: ctx.dex(), logLevel: logger.level });
        await app.listen({ port, host: values.host ?? settings.host });
        keepOpen = true;
        break;
      }
      default:
        throw usageError(`Unknown command '${command}'. See --help.`);
    }

    return 0;
  } catch (err) {
    io.stderr(err instanceof Error ? err.message : String(err));
    return 1;
  } finally {
    if (db && !keepOpen) {
      db.close();
    }
  }
}

if (require.main === module) {
  run(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    env: process.env,
    isTTY: Boolean(process.stdout.isTTY)
  })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = 1;
    });
}
