// apps/cli/src/modules/types/types.chart.ts
import { notFound } from "../../shared/errors";
import { TYPES, isTypeName, type TypeName } from "../../shared/types";

export type ChartKind = "offense" | "defense";

/**
 * Dense multiplier table: every entry of TYPES is present.
 * Offense: damage this type deals to each type. Defense: damage taken from each type.
 */
export type TypeChart = {
  kind: ChartKind;
  label: string;
  multipliers: Record<TypeName, number>;
};

export type DamageRelations = {
  noDamageTo: string[];
  halfDamageTo: string[];
  doubleDamageTo: string[];
  noDamageFrom: string[];
  halfDamageFrom: string[];
  doubleDamageFrom: string[];
};

export const TIERS = ["quad", "double", "neutral", "half", "quarter", "zero", "other"] as const;

export type Tier = (typeof TIERS)[number];

export type TierGroups<T> = Record<Tier, T[]>;

const TIER_VALUES: Array<[Tier, number]> = [
  ["quad", 4],
  ["double", 2],
  ["neutral", 1],
  ["half", 0.5],
  ["quarter", 0.25],
  ["zero", 0]
];

function neutralMultipliers(): Record<TypeName, number> {
  return Object.fromEntries(TYPES.map((t) => [t, 1])) as Record<TypeName, number>;
}

// Names outside TYPES cannot be the type of a move or a Pokémon, so they have no column.
function assign(multipliers: Record<TypeName, number>, names: readonly string[], value: number) {
  for (const name of names) {
    if (isTypeName(name)) multipliers[name] = value;
  }
}

export function buildCharts(
  label: string,
  relations: DamageRelations
): { offense: TypeChart; defense: TypeChart } {
  const offense = neutralMultipliers();
  assign(offense, relations.noDamageTo, 0);
  assign(offense, relations.halfDamageTo, 0.5);
  assign(offense, relations.doubleDamageTo, 2);

  const defense = neutralMultipliers();
  assign(defense, relations.noDamageFrom, 0);
  assign(defense, relations.halfDamageFrom, 0.5);
  assign(defense, relations.doubleDamageFrom, 2);

  return {
    offense: { kind: "offense", label, multipliers: offense },
    defense: { kind: "defense", label, multipliers: defense }
  };
}

/**
 * Type-by-type product, used for dual typing.
 */
export function combineCharts(a: TypeChart, b: TypeChart): TypeChart {
  const multipliers = neutralMultipliers();
  for (const t of TYPES) {
    multipliers[t] = a.multipliers[t] * b.multipliers[t];
  }
  return { kind: a.kind, label: `${a.label} ${b.label}`, multipliers };
}

export function combineAll(first: TypeChart, ...rest: TypeChart[]): TypeChart {
  return rest.reduce(combineCharts, first);
}

export function multiplierOf(chart: TypeChart, typeName: string): number {
  if (!isTypeName(typeName)) {
    throw notFound("type", typeName);
  }
  return chart.multipliers[typeName];
}

/**
 * Exact comparison; products of 0 / 0.5 / 1 / 2 are exact in binary floating point.
 */
export function classifyMultiplier(multiplier: number): Tier {
  const match = TIER_VALUES.find(([, value]) => value === multiplier);
  return match ? match[0] : "other";
}

export function emptyTierGroups<T>(): TierGroups<T> {
  return {
    quad: [],
    double: [],
    neutral: [],
    half: [],
    quarter: [],
    zero: [],
    other: []
  };
}

/**
 * Buckets items by the multiplier the extractor reports. Returning undefined skips the item.
 */
export function groupByTier<I, T>(
  items: Iterable<I>,
  extractor: (item: I) => [T, number] | undefined
): TierGroups<T> {
  const groups = emptyTierGroups<T>();
  for (const item of items) {
    const extracted = extractor(item);
    if (!extracted) continue;
    const [value, multiplier] = extracted;
    groups[classifyMultiplier(multiplier)].push(value);
  }
  return groups;
}

export function isEmptyGroups<T>(groups: TierGroups<T>): boolean {
  return TIERS.every((tier) => groups[tier].length === 0);
}

/**
 * Chart entries grouped by tier, each group in TYPES order.
 */
export function groupChart(chart: TypeChart): TierGroups<TypeName> {
  return groupByTier(TYPES, (t) => [t, chart.multipliers[t]]);
}
