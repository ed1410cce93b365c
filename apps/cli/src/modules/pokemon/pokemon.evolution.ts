// apps/cli/src/modules/pokemon/pokemon.evolution.ts
import { malformedOverride } from "../../shared/errors";
import type { EvolutionMethod, EvolutionStep } from "./pokemon.schemas";

const STRING_FIELDS = [
  "item",
  "heldItem",
  "knownMove",
  "knownMoveType",
  "location",
  "partySpecies",
  "partyType",
  "timeOfDay",
  "tradeSpecies"
] as const;

const NUMBER_FIELDS = [
  "gender",
  "minLevel",
  "minHappiness",
  "minBeauty",
  "minAffection",
  "relativePhysicalStats"
] as const;

const BOOLEAN_FIELDS = ["needsOverworldRain", "turnUpsideDown"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseMethod(value: unknown): EvolutionMethod | undefined {
  if (!isRecord(value) || typeof value.trigger !== "string") return undefined;

  const method: EvolutionMethod = { trigger: value.trigger };
  for (const key of STRING_FIELDS) {
    const field = value[key];
    if (typeof field === "string") method[key] = field;
  }
  for (const key of NUMBER_FIELDS) {
    const field = value[key];
    if (typeof field === "number") method[key] = field;
  }
  for (const key of BOOLEAN_FIELDS) {
    const field = value[key];
    if (typeof field === "boolean") method[key] = field;
  }
  return method;
}

function parseStep(value: unknown): EvolutionStep | undefined {
  if (!isRecord(value) || typeof value.name !== "string") return undefined;
  if (!Array.isArray(value.methods) || !Array.isArray(value.evolvesTo)) return undefined;

  const methods: EvolutionMethod[] = [];
  for (const raw of value.methods) {
    const method = parseMethod(raw);
    if (!method) return undefined;
    methods.push(method);
  }

  const evolvesTo: EvolutionStep[] = [];
  for (const raw of value.evolvesTo) {
    const child = parseStep(raw);
    if (!child) return undefined;
    evolvesTo.push(child);
  }

  return { name: value.name, methods, evolvesTo };
}

export function serializeEvolution(step: EvolutionStep): string {
  return JSON.stringify(step);
}

/**
 * Parses a stored evolution tree. A blob that does not match the tree shape is a
 * store inconsistency.
 */
export function parseEvolution(raw: string, chainId: number): EvolutionStep {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw malformedOverride(`Evolution chain #${chainId} is not valid JSON.`, {
      chainId,
      cause: err instanceof Error ? err.message : String(err)
    });
  }

  const step = parseStep(parsed);
  if (!step) {
    throw malformedOverride(`Evolution chain #${chainId} has an unexpected shape.`, { chainId });
  }
  return step;
}

/**
 * Depth-first walk; `visit` sees each step with its depth from the root.
 */
export function walkEvolution(
  step: EvolutionStep,
  visit: (step: EvolutionStep, depth: number) => void,
  depth = 0
) {
  visit(step, depth);
  for (const child of step.evolvesTo) {
    walkEvolution(child, visit, depth + 1);
  }
}
