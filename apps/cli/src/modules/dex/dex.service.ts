// apps/cli/src/modules/dex/dex.service.ts
import type { Db } from "../../db/index";
import { createHttpError, type EntityKind } from "../../shared/errors";
import type { Generation, ResourceKind } from "../../shared/types";
import { validateName } from "../../shared/validation";
import { createAbilitiesRepo } from "../abilities/abilities.repo";
import { createAbilitiesService } from "../abilities/abilities.service";
import { coverageReport } from "../analysis/analysis.coverage";
import { matchupReport, DEFAULT_MATCHUP_OPTIONS } from "../analysis/analysis.matchup";
import type { CoverageReport, MatchupOptions, MatchupReport } from "../analysis/analysis.schemas";
import type { CustomCollection } from "../custom/custom.schemas";
import { createGamesRepo } from "../games/games.repo";
import { createGenerationResolver } from "../games/games.service";
import type { ResolvedMove } from "../moves/moves.schemas";
import { createMovesRepo } from "../moves/moves.repo";
import { createMovesService } from "../moves/moves.service";
import { createPokemonRepo } from "../pokemon/pokemon.repo";
import type { PokemonSnapshot, ResolvedPokemon } from "../pokemon/pokemon.schemas";
import { createPokemonService } from "../pokemon/pokemon.service";
import { combineAll, type TypeChart } from "../types/types.chart";
import { createTypesRepo } from "../types/types.repo";
import { createTypesService } from "../types/types.service";

const RESOURCE_ENTITY: Record<Exclude<ResourceKind, "games">, EntityKind> = {
  pokemon: "pokemon",
  moves: "move",
  abilities: "ability",
  types: "type"
};

/**
 * Everything the CLI and the HTTP routes need, wired over one database handle.
 */
export function createDexService(db: Db, custom: CustomCollection = { pokemon: [] }) {
  const games = createGenerationResolver(createGamesRepo(db).listGames());
  const types = createTypesService(createTypesRepo(db));
  const moves = createMovesService(createMovesRepo(db));
  const abilities = createAbilitiesService(createAbilitiesRepo(db));
  const pokemon = createPokemonService(createPokemonRepo(db), custom);

  function defenseChartOf(data: PokemonSnapshot): TypeChart {
    const primary = types.resolveType(data.types.primary, data.generation).defense;
    if (!data.types.secondary) return primary;
    return combineAll(primary, types.resolveType(data.types.secondary, data.generation).defense);
  }

  function movesOf(data: PokemonSnapshot): ResolvedMove[] {
    const names = data.customMoves ?? [...new Set(data.learnMoves.map((m) => m.name))];
    return names.map((name) => moves.resolveMove(name, data.generation));
  }

  function listNames(kind: ResourceKind): string[] {
    switch (kind) {
      case "pokemon":
        return pokemon.listPokemonNames();
      case "moves":
        return moves.listMoveNames();
      case "abilities":
        return abilities.listAbilityNames();
      case "types":
        return types.listTypeNames();
      case "games":
        return games.gameNames();
    }
  }

  return {
    games,

    /**
     * Generation for a game name, or the latest stored game when none is given.
     */
    generationFor(game: string | undefined): Generation {
      if (game) return games.generationOfGame(game);
      const latest = games.latestGame();
      if (!latest) {
        throw createHttpError(503, "No games are stored. Run setup first.", "DatabaseNotReady");
      }
      return latest.generation;
    },

    resolvePokemon: pokemon.resolvePokemon,
    resolveMove: moves.resolveMove,
    resolveType: types.resolveType,
    resolveAbility: abilities.resolveAbility,
    evolutionTreeOf: pokemon.evolutionTreeOf,
    defenseChartOf,

    loadPokemon(name: string, generation: Generation): ResolvedPokemon {
      const data = pokemon.resolvePokemon(name, generation);
      return { data, defenseChart: defenseChartOf(data), moves: movesOf(data) };
    },

    coverageReport(roster: readonly ResolvedPokemon[]): CoverageReport {
      return coverageReport(roster, (typeName, generation) =>
        types.resolveType(typeName, generation).offense
      );
    },

    matchupReport(
      attacker: ResolvedPokemon,
      defender: ResolvedPokemon,
      options: MatchupOptions = DEFAULT_MATCHUP_OPTIONS
    ): MatchupReport {
      return matchupReport(attacker, defender, options);
    },

    listNames,

    /**
     * Lowercases user input and checks it against stored names (plus custom nicknames for
     * Pokémon). Throws NotFound listing near matches.
     */
    validateName(kind: ResourceKind, value: string): string {
      if (kind === "games") {
        return validateName("game", value, games.gameNames());
      }
      const names =
        kind === "pokemon" ? [...listNames(kind), ...pokemon.customNicknames()] : listNames(kind);
      return validateName(RESOURCE_ENTITY[kind], value, names);
    }
  };
}

export type DexService = ReturnType<typeof createDexService>;
