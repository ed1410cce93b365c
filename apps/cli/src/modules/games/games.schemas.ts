// apps/cli/src/modules/games/games.schemas.ts
import type { Generation } from "../../shared/types";

/**
 * A game release (PokéAPI "version group"), e.g. "red-blue" or "scarlet-violet".
 */
export type Game = {
  id: number;
  name: string;
  order: number;
  generation: Generation;
};
