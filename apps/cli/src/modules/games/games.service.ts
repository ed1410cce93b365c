// apps/cli/src/modules/games/games.service.ts
import { notFound } from "../../shared/errors";
import type { Generation } from "../../shared/types";
import type { Game } from "./games.schemas";

const GENERATION_URL = /generation\/(\d+)\/?$/;
const RESOURCE_ID_URL = /\/(\d+)\/?$/;

/**
 * Generation number embedded in a resource reference such as
 * `https://pokeapi.co/api/v2/generation/4/`.
 */
export function generationOfReference(ref: string): Generation {
  const match = GENERATION_URL.exec(ref);
  if (!match) {
    throw notFound("game", ref);
  }
  return Number(match[1]);
}

/**
 * Trailing numeric id of a resource url.
 */
export function idOfReference(ref: string): number {
  const match = RESOURCE_ID_URL.exec(ref);
  if (!match) {
    throw new Error(`ID not found in resource url '${ref}'`);
  }
  return Number(match[1]);
}

export type GenerationResolver = ReturnType<typeof createGenerationResolver>;

/**
 * Lookup over a preloaded list of games.
 */
export function createGenerationResolver(games: readonly Game[]) {
  const ordered = [...games].sort((a, b) => a.order - b.order || a.id - b.id);
  const byName = new Map(ordered.map((game) => [game.name, game]));

  return {
    generationOfGame(gameName: string): Generation {
      const game = byName.get(gameName);
      if (!game) {
        throw notFound("game", gameName);
      }
      return game.generation;
    },

    generationOfReference,

    /** Names in release order. */
    gameNames(): string[] {
      return ordered.map((game) => game.name);
    },

    latestGame(): Game | undefined {
      return ordered[ordered.length - 1];
    }
  };
}
