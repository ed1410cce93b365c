// apps/cli/src/routes/dex.ts
import type { FastifyInstance } from "fastify";
import { createHttpError, toErrorResponse } from "../shared/errors";
import { MAX_ROSTER, type Generation } from "../shared/types";
import { parseBoolean, parseCsvList, parseOptionalString } from "../shared/validation";
import type { DexService } from "../modules/dex/dex.service";

type GameQuery = { game?: string };

export function registerDexRoutes(app: FastifyInstance, deps: { dex: DexService }) {
  const { dex } = deps;

  function generationOf(query: GameQuery | undefined): Generation {
    const game = parseOptionalString(query?.game);
    return dex.generationFor(game ? dex.validateName("games", game) : undefined);
  }

  function loadPokemon(name: string, generation: Generation) {
    return dex.loadPokemon(dex.validateName("pokemon", name), generation);
  }

  // ───────────────────────────
  // Lookups
  // ───────────────────────────

  // GET /pokemon/:name
  app.get<{ Params: { name: string }; Querystring: GameQuery }>(
    "/pokemon/:name",
    async (request, reply) => {
      try {
        const generation = generationOf(request.query);
        reply.send(loadPokemon(request.params.name, generation));
      } catch (err) {
        const { statusCode, payload } = toErrorResponse(err);
        reply.code(statusCode).send(payload);
      }
    }
  );

  // GET /pokemon/:name/evolution
  app.get<{ Params: { name: string }; Querystring: GameQuery }>(
    "/pokemon/:name/evolution",
    async (request, reply) => {
      try {
        const generation = generationOf(request.query);
        const pokemon = dex.resolvePokemon(dex.validateName("pokemon", request.params.name), generation);
        reply.send(dex.evolutionTreeOf(pokemon.species));
      } catch (err) {
        const { statusCode, payload } = toErrorResponse(err);
        reply.code(statusCode).send(payload);
      }
    }
  );

  // GET /moves/:name
  app.get<{ Params: { name: string }; Querystring: GameQuery }>(
    "/moves/:name",
    async (request, reply) => {
      try {
        const generation = generationOf(request.query);
        reply.send(dex.resolveMove(dex.validateName("moves", request.params.name), generation));
      } catch (err) {
        const { statusCode, payload } = toErrorResponse(err);
        reply.code(statusCode).send(payload);
      }
    }
  );

  // GET /types/:name
  app.get<{ Params: { name: string }; Querystring: GameQuery }>(
    "/types/:name",
    async (request, reply) => {
      try {
        const generation = generationOf(request.query);
        reply.send(dex.resolveType(dex.validateName("types", request.params.name), generation));
      } catch (err) {
        const { statusCode, payload } = toErrorResponse(err);
        reply.code(statusCode).send(payload);
      }
    }
  );

  // GET /abilities/:name
  app.get<{ Params: { name: string }; Querystring: GameQuery }>(
    "/abilities/:name",
    async (request, reply) => {
      try {
        const generation = generationOf(request.query);
        reply.send(dex.resolveAbility(dex.validateName("abilities", request.params.name), generation));
      } catch (err) {
        const { statusCode, payload } = toErrorResponse(err);
        reply.code(statusCode).send(payload);
      }
    }
  );

  // ───────────────────────────
  // Analysis
  // ───────────────────────────

  // GET /coverage?pokemon=a,b
  app.get<{ Querystring: GameQuery & { pokemon?: string } }>(
    "/coverage",
    async (request, reply) => {
      try {
        const names = parseCsvList(request.query.pokemon);
        if (names.length === 0 || names.length > MAX_ROSTER) {
          throw createHttpError(400, `pokemon must list 1 to ${MAX_ROSTER} names.`, "BadRequest");
        }
        const generation = generationOf(request.query);
        const roster = names.map((name) => loadPokemon(name, generation));
        reply.send(dex.coverageReport(roster));
      } catch (err) {
        const { statusCode, payload } = toErrorResponse(err);
        reply.code(statusCode).send(payload);
      }
    }
  );

  // GET /match?attacker=a&defender=b
  app.get<{
    Querystring: GameQuery & {
      attacker?: string;
      defender?: string;
      verbose?: string;
      stabOnly?: string;
    };
  }>("/match", async (request, reply) => {
    try {
      const { query } = request;
      const attackerName = parseOptionalString(query.attacker);
      const defenderName = parseOptionalString(query.defender);
      if (!attackerName || !defenderName) {
        throw createHttpError(400, "attacker and defender are required.", "BadRequest");
      }

      const generation = generationOf(query);
      const report = dex.matchupReport(
        loadPokemon(attackerName, generation),
        loadPokemon(defenderName, generation),
        { verbose: parseBoolean(query.verbose), stabOnly: parseBoolean(query.stabOnly) }
      );
      reply.send(report);
    } catch (err) {
      const { statusCode, payload } = toErrorResponse(err);
      reply.code(statusCode).send(payload);
    }
  });
}
