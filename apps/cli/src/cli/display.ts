// apps/cli/src/cli/display.ts
import type { ResolvedAbility } from "../modules/abilities/abilities.schemas";
import { COVERAGE_ORDER, typesOf } from "../modules/analysis/analysis.coverage";
import type {
  CoverageReport,
  MatchupDirection,
  MatchupReport
} from "../modules/analysis/analysis.schemas";
import type { DamageClass, ResolvedMove } from "../modules/moves/moves.schemas";
import { walkEvolution } from "../modules/pokemon/pokemon.evolution";
import type {
  EvolutionMethod,
  EvolutionStep,
  LearnMove,
  PokemonSnapshot,
  Stats
} from "../modules/pokemon/pokemon.schemas";
import {
  classifyMultiplier,
  groupChart,
  TIERS,
  type Tier,
  type TierGroups,
  type TypeChart
} from "../modules/types/types.chart";
import { rate, type Color, type Painter } from "./colors";

// Plain functions from resolved values to printable text. Nothing here touches stdout.

const TIER_COLORS: Record<Tier, Color> = {
  quad: "red",
  double: "orange",
  neutral: "green",
  half: "cyan",
  quarter: "blue",
  zero: "violet",
  other: "yellow"
};

const DAMAGE_CLASS_TAGS: Record<DamageClass, string> = {
  physical: "p",
  special: "s",
  status: "?"
};

const STATS_HEADER = "hp    atk   def   satk  sdef  spd   total";
const STAT_CEILING = 200;
const TOTAL_CEILING = 720;

function orNA(value: number | null): string {
  return value === null ? "N/A" : String(value);
}

function padVisible(painted: string, visibleLength: number, width: number): string {
  return painted + " ".repeat(Math.max(0, width - visibleLength));
}

export function substituteEffectChance(effect: string, chance: number | null): string {
  if (chance === null) return effect;
  return effect.split("$effect_chance").join(String(chance));
}

// ───────────────────────────
// Tier groups & charts
// ───────────────────────────

/**
 * `\n<tier>: <items>` per non-empty tier, strongest first; `\nNone` when every tier is empty.
 */
export function formatTierGroups<T>(
  groups: TierGroups<T>,
  formatGroup: (items: T[], color: Color) => string
): string {
  const output = TIERS.filter((tier) => groups[tier].length > 0)
    .map((tier) => `\n${tier}: ${formatGroup(groups[tier], TIER_COLORS[tier])}`)
    .join("");
  return output || "\nNone";
}

export function formatTypeChart(chart: TypeChart, painter: Painter): string {
  const groups = formatTierGroups(groupChart(chart), (types, color) =>
    painter.paint([...types].sort().join(" "), color)
  );
  return `${painter.header(`${chart.label} ${chart.kind}`)}${groups}`;
}

// ───────────────────────────
// Pokémon
// ───────────────────────────

export function formatStats(stats: Stats, painter: Painter): string {
  const values = [
    stats.hp,
    stats.attack,
    stats.defense,
    stats.specialAttack,
    stats.specialDefense,
    stats.speed
  ];
  const total = values.reduce((sum, v) => sum + v, 0);

  const cells = values.map((v) => painter.paint(String(v).padEnd(6), rate(v, STAT_CEILING)));
  cells.push(painter.paint(String(total).padEnd(6), rate(total, TOTAL_CEILING), { bold: true }));

  return `${STATS_HEADER}\n${cells.join("")}`;
}

export function formatPokemon(data: PokemonSnapshot, painter: Painter): string {
  const name = data.nickname
    ? `${painter.header(data.nickname)} (${data.name})`
    : painter.header(data.name);
  const secondary = data.types.secondary ? ` ${data.types.secondary} ` : " ";
  const abilities = data.abilities.map((a) => (a.hidden ? `${a.name}(h)` : a.name)).join(" ");

  return [
    `${name} ${data.types.primary}${secondary}${painter.paint(data.group, "yellow")}`,
    abilities,
    formatStats(data.stats, painter),
    `gen-${data.generation}`
  ].join("\n");
}

function learnLevel(entry: LearnMove): string {
  if (entry.method !== "level-up") return "";
  return entry.level === 0 ? "evolve" : String(entry.level);
}

/**
 * Learnset table sorted by method, then level, then name. Custom move lists are shown as is.
 */
export function formatMoveList(
  data: PokemonSnapshot,
  moves: readonly ResolvedMove[],
  painter: Painter
): string {
  const entries: LearnMove[] = data.customMoves
    ? data.customMoves.map((name) => ({ name, method: "custom", level: 0 }))
    : [...data.learnMoves].sort(
        (a, b) =>
          a.method.localeCompare(b.method) || a.level - b.level || a.name.localeCompare(b.name)
      );

  if (entries.length === 0) {
    return `${painter.header("moves")}\nThere are no moves to display.`;
  }

  const byName = new Map(moves.map((m) => [m.name, m]));
  const ownTypes = typesOf(data);
  const lines = [painter.header("moves")];

  for (const entry of entries) {
    const move = byName.get(entry.name);
    if (!move) continue;

    const stab = ownTypes.includes(move.type) ? "(s)" : "";
    const nameCell = padVisible(
      `${painter.paint(move.name, "green")}${stab}`,
      move.name.length + stab.length,
      21
    );
    const typeCell = `${move.type} ${move.damageClass}`.padEnd(20);

    const power = orNA(move.power).padEnd(3);
    const accuracy = orNA(move.accuracy).padEnd(3);
    const pp = orNA(move.pp).padEnd(2);
    const statsCell = padVisible(
      `power: ${painter.paint(power, "red")}  accuracy: ${painter.paint(accuracy, "green")}  pp: ${painter.paint(pp, "blue")}`,
      `power: ${power}  accuracy: ${accuracy}  pp: ${pp}`.length,
      37
    );

    const learned = [entry.method, learnLevel(entry)].filter((part) => part.length > 0).join(" ");
    lines.push(`${nameCell}${typeCell}${statsCell}${learned}`);
  }

  return lines.join("\n");
}

// ───────────────────────────
// Moves & abilities
// ───────────────────────────

export function formatMove(move: ResolvedMove, painter: Painter): string {
  const stats = [
    `power: ${painter.paint(orNA(move.power).padEnd(3), "red")}`,
    `accuracy: ${painter.paint(orNA(move.accuracy).padEnd(3), "green")}`,
    `pp: ${painter.paint(orNA(move.pp).padEnd(3), "blue")}`
  ].join("  ");

  return [
    painter.header(move.name),
    `${move.type} ${move.damageClass}`,
    stats,
    substituteEffectChance(move.effect, move.effectChance)
  ].join("\n");
}

export function formatAbility(ability: ResolvedAbility, painter: Painter): string {
  return `${painter.header(ability.name)}\n${ability.effect}`;
}

// ───────────────────────────
// Evolution
// ───────────────────────────

function genderLabel(gender: number): string {
  if (gender === 1) return "female";
  if (gender === 2) return "male";
  return "other";
}

export function formatEvolutionMethod(method: EvolutionMethod, painter: Painter): string {
  let output = painter.paint(method.trigger, "blue");

  if (method.item) output += ` ${method.item}`;
  if (method.gender !== undefined) output += ` gender-${genderLabel(method.gender)}`;
  if (method.heldItem) output += ` ${method.heldItem}`;
  if (method.knownMove) output += ` ${method.knownMove}`;
  if (method.knownMoveType) output += ` ${method.knownMoveType}`;
  if (method.location) output += ` ${method.location}`;
  if (method.minLevel !== undefined) output += ` level-${method.minLevel}`;
  if (method.minHappiness !== undefined) output += ` happiness-${method.minHappiness}`;
  if (method.minBeauty !== undefined) output += ` beauty-${method.minBeauty}`;
  if (method.minAffection !== undefined) output += ` affection-${method.minAffection}`;
  if (method.needsOverworldRain) output += " rain";
  if (method.partySpecies) output += ` ${method.partySpecies}`;
  if (method.partyType) output += ` ${method.partyType}`;
  if (method.relativePhysicalStats !== undefined) {
    output += ` physical-${method.relativePhysicalStats}`;
  }
  if (method.timeOfDay) output += ` ${method.timeOfDay}`;
  if (method.tradeSpecies) output += ` ${method.tradeSpecies}`;
  if (method.turnUpsideDown) output += " upside-down";

  return output;
}

export function formatEvolution(tree: EvolutionStep, painter: Painter): string {
  const lines = [painter.header("evolution")];
  walkEvolution(tree, (step, depth) => {
    const methods = step.methods.map((m) => formatEvolutionMethod(m, painter)).join(" / ");
    const species = painter.paint(step.name, "green");
    lines.push(`${"  ".repeat(depth)}${species}${methods ? ` ${methods}` : ""}`);
  });
  return lines.join("\n");
}

// ───────────────────────────
// Matchups & coverage
// ───────────────────────────

export function formatMoveWeaknesses(direction: MatchupDirection, painter: Painter): string {
  return formatTierGroups(direction.moves, (moves, color) =>
    moves
      .map((m) =>
        painter.paint(`${m.name}(${DAMAGE_CLASS_TAGS[m.damageClass]})`, color, {
          underline: m.stab
        })
      )
      .join(" ")
  );
}

function matchHeader(data: PokemonSnapshot, painter: Painter): string {
  const name = data.nickname ?? data.name;
  return [painter.header(name), ...typesOf(data)].join(" ");
}

export function formatMatch(
  report: MatchupReport,
  attacker: PokemonSnapshot,
  defender: PokemonSnapshot,
  painter: Painter
): string {
  const { offense, defense } = report;
  return [
    matchHeader(defender, painter),
    formatStats(defender.stats, painter),
    matchHeader(attacker, painter),
    formatStats(attacker.stats, painter),
    `${painter.header(`${offense.attacker}'s moves vs ${offense.defender}`)}${formatMoveWeaknesses(offense, painter)}`,
    `${painter.header(`${defense.attacker}'s moves vs ${defense.defender}`)}${formatMoveWeaknesses(defense, painter)}`
  ].join("\n");
}

/**
 * One line per type; uncovered types print `none`.
 */
export function formatCoverage(report: CoverageReport, painter: Painter): string {
  const none = painter.paint("none", "red");

  const offense = COVERAGE_ORDER.map((t) => {
    const entries = report.offense[t].map((e) =>
      painter.paint(`${e.pokemon}(${e.via.join(" ")})`, "green")
    );
    return `${t}: ${entries.length ? entries.join(" ") : none}`;
  });

  const defense = COVERAGE_ORDER.map((t) => {
    const entries = report.defense[t].map((e) =>
      painter.paint(`${e.pokemon}(${e.multiplier})`, TIER_COLORS[classifyMultiplier(e.multiplier)])
    );
    return `${t}: ${entries.length ? entries.join(" ") : none}`;
  });

  return [
    painter.header("offense coverage"),
    ...offense,
    "",
    painter.header("defense coverage"),
    ...defense
  ].join("\n");
}
