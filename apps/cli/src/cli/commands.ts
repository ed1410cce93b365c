// apps/cli/src/cli/commands.ts
import { openDatabase, removeDatabase } from "../db/index";
import { APP_VERSION, type AppSettings } from "../shared/config";
import { createHttpError } from "../shared/errors";
import type { Logger } from "../shared/logger";
import { MAX_ROSTER, RESOURCE_KINDS, type Generation, type ResourceKind } from "../shared/types";
import { parseEnum } from "../shared/validation";
import { parseConfigKey, type ConfigRepo } from "../modules/config/config.repo";
import type { DexService } from "../modules/dex/dex.service";
import { createPokeApiClient, type FetchLike } from "../modules/setup/setup.client";
import { runSetup } from "../modules/setup/setup.service";
import { combineAll } from "../modules/types/types.chart";
import type { Painter } from "./colors";
import {
  formatAbility,
  formatCoverage,
  formatEvolution,
  formatMatch,
  formatMove,
  formatMoveList,
  formatPokemon,
  formatTypeChart
} from "./display";

export type CommandContext = {
  settings: AppSettings;
  config: ConfigRepo;
  logger: Logger;
  painter: Painter;
  /** `--game` flag, if given. */
  game: string | undefined;
  out: (text: string) => void;
  /** Opens the store on first use. */
  dex: () => DexService;
};

function usage(message: string) {
  return createHttpError(400, message, "UsageError");
}

/**
 * `--game`, else the `game` config key, else the latest stored game.
 */
export function generationOf(ctx: CommandContext): Generation {
  const dex = ctx.dex();
  const game = ctx.game ?? ctx.config.get("game");
  return dex.generationFor(game ? dex.validateName("games", game) : undefined);
}

function requireRoster(names: readonly string[], min: number, label: string) {
  if (names.length < min) {
    throw usage(`${label} needs at least ${min} Pokémon.`);
  }
}

// ───────────────────────────
// Setup
// ───────────────────────────

export async function setupCommand(
  ctx: CommandContext,
  options: { refresh: boolean; fetchImpl?: FetchLike }
) {
  const { settings, logger } = ctx;
  const client = createPokeApiClient({
    baseUrl: settings.apiUrl,
    cacheDir: settings.cacheDir,
    logger,
    fetchImpl: options.fetchImpl
  });
  if (options.refresh) {
    client.clearCache();
  }

  removeDatabase(settings.dbPath);
  const db = openDatabase(settings.dbPath);
  try {
    const report = await runSetup({ db, client, logger, appVersion: APP_VERSION });
    const rows = Object.values(report.counts).reduce((sum, n) => sum + n, 0);
    ctx.out(`Stored ${rows} rows in ${(report.durationMs / 1000).toFixed(1)}s.`);
  } finally {
    db.close();
  }
}

// ───────────────────────────
// Lookups
// ───────────────────────────

export function pokemonCommand(
  ctx: CommandContext,
  name: string,
  options: { moves: boolean; evolution: boolean }
) {
  const dex = ctx.dex();
  const generation = generationOf(ctx);
  const pokemon = dex.loadPokemon(dex.validateName("pokemon", name), generation);

  const sections = [
    formatPokemon(pokemon.data, ctx.painter),
    formatTypeChart(pokemon.defenseChart, ctx.painter)
  ];
  if (options.evolution) {
    sections.push(formatEvolution(dex.evolutionTreeOf(pokemon.data.species), ctx.painter));
  }
  if (options.moves) {
    sections.push(formatMoveList(pokemon.data, pokemon.moves, ctx.painter));
  }
  ctx.out(sections.join("\n\n"));
}

export function typeCommand(ctx: CommandContext, primary: string, secondary: string | undefined) {
  const dex = ctx.dex();
  const generation = generationOf(ctx);

  const types = [primary, ...(secondary ? [secondary] : [])].map((name) =>
    dex.resolveType(dex.validateName("types", name), generation)
  );
  const [first, ...rest] = types;
  const defense = combineAll(first.defense, ...rest.map((t) => t.defense));

  const sections = types.map((t) => formatTypeChart(t.offense, ctx.painter));
  sections.push(formatTypeChart(defense, ctx.painter));
  ctx.out(sections.join("\n\n"));
}

export function moveCommand(ctx: CommandContext, name: string) {
  const dex = ctx.dex();
  const move = dex.resolveMove(dex.validateName("moves", name), generationOf(ctx));
  ctx.out(formatMove(move, ctx.painter));
}

export function abilityCommand(ctx: CommandContext, name: string) {
  const dex = ctx.dex();
  const ability = dex.resolveAbility(dex.validateName("abilities", name), generationOf(ctx));
  ctx.out(formatAbility(ability, ctx.painter));
}

// ───────────────────────────
// Analysis
// ───────────────────────────

/**
 * The last name is the attacker; every name before it is a defender.
 */
export function matchCommand(
  ctx: CommandContext,
  names: readonly string[],
  options: { verbose: boolean; stabOnly: boolean }
) {
  requireRoster(names, 2, "match");
  const defenders = names.slice(0, -1);
  if (defenders.length > MAX_ROSTER) {
    throw usage(`match takes at most ${MAX_ROSTER} defenders.`);
  }

  const dex = ctx.dex();
  const generation = generationOf(ctx);
  const load = (name: string) => dex.loadPokemon(dex.validateName("pokemon", name), generation);

  const attacker = load(names[names.length - 1]);
  const blocks = defenders.map((name) => {
    const defender = load(name);
    const report = dex.matchupReport(attacker, defender, options);
    return formatMatch(report, attacker.data, defender.data, ctx.painter);
  });
  ctx.out(blocks.join("\n\n"));
}

export function coverageCommand(ctx: CommandContext, names: readonly string[]) {
  requireRoster(names, 1, "coverage");
  if (names.length > MAX_ROSTER) {
    throw usage(`coverage takes at most ${MAX_ROSTER} Pokémon.`);
  }

  const dex = ctx.dex();
  const generation = generationOf(ctx);
  const roster = names.map((name) => dex.loadPokemon(dex.validateName("pokemon", name), generation));
  ctx.out(formatCoverage(dex.coverageReport(roster), ctx.painter));
}

// ───────────────────────────
// Listings & config
// ───────────────────────────

export function resourceCommand(ctx: CommandContext, kind: string, delimiter: string) {
  const resource = parseEnum<ResourceKind>(kind, RESOURCE_KINDS);
  if (!resource) {
    throw usage(`Unknown resource '${kind}'. Expected one of: ${RESOURCE_KINDS.join(", ")}.`);
  }
  ctx.out(ctx.dex().listNames(resource).join(delimiter));
}

export function configCommand(
  ctx: CommandContext,
  key: string | undefined,
  value: string | undefined,
  options: { unset: boolean }
) {
  const { config } = ctx;

  if (key === undefined) {
    ctx.out(config.entries().map(([k, v]) => `${k}: ${v}`).join("\n"));
    return;
  }

  const configKey = parseConfigKey(key);
  if (options.unset) {
    config.unset(configKey);
    return;
  }
  if (value === undefined) {
    ctx.out(config.get(configKey) ?? "");
    return;
  }
  config.set(configKey, value);
}
