// apps/cli/src/server.test.ts
import type { FastifyInstance } from "fastify";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import type { Db } from "./db/index";
import { createDexService } from "./modules/dex/dex.service";
import { buildServer } from "./server";
import { seedFixtureDatabase } from "./testing/fixtures";

describe("http surface", () => {
  let db: Db;
  let app: FastifyInstance;

  beforeAll(async () => {
    db = await seedFixtureDatabase();
    app = await buildServer({ dex: createDexService(db), logLevel: "silent" });
  });

  afterAll(async () => {
    await app.close();
    db.close();
  });

  it("reports health", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, status: "healthy", version: "0.1.0" });
  });

  it("resolves a move for the requested game", async () => {
    const old = await app.inject({ method: "GET", url: "/moves/tackle?game=black-white" });
    expect(old.statusCode).toBe(200);
    expect(old.json()).toMatchObject({ name: "tackle", power: 50, generation: 5 });

    const latest = await app.inject({ method: "GET", url: "/moves/tackle" });
    expect(latest.json()).toMatchObject({ power: 40, generation: 7 });
  });

  it("returns a Pokémon with its defense chart and moves", async () => {
    const res = await app.inject({ method: "GET", url: "/pokemon/Geodude?game=black-white" });
    expect(res.statusCode).toBe(200);

    const body = res.json();
    expect(body.data.types).toEqual({ primary: "rock", secondary: "ground" });
    expect(body.defenseChart.multipliers.water).toBe(4);
    expect(body.moves.map((m: { name: string }) => m.name)).toEqual([
      "earthquake",
      "rock-throw",
      "tackle"
    ]);
  });

  it("returns the evolution chain", async () => {
    const res = await app.inject({ method: "GET", url: "/pokemon/cleffa/evolution" });
    expect(res.statusCode).toBe(200);
    expect(res.json().evolvesTo[0].name).toBe("clefairy");
  });

  it("serves types and abilities", async () => {
    const steel = await app.inject({ method: "GET", url: "/types/steel?game=black-white" });
    expect(steel.json().defense.multipliers.ghost).toBe(0.5);

    const sturdy = await app.inject({ method: "GET", url: "/abilities/sturdy?game=diamond-pearl" });
    expect(sturdy.json().effect).toBe("Protects against OHKO moves.");
  });

  it("maps resolution failures to 404", async () => {
    const early = await app.inject({ method: "GET", url: "/types/fairy?game=black-white" });
    expect(early.statusCode).toBe(404);
    expect(early.json()).toMatchObject({
      error: "NotPresentInGeneration",
      message: "Type 'fairy' is not present in generation 5."
    });

    const typo = await app.inject({ method: "GET", url: "/pokemon/squirtl" });
    expect(typo.statusCode).toBe(404);
    expect(typo.json().message).toBe("Pokémon 'squirtl' not found. Potential matches: squirtle.");

    const game = await app.inject({ method: "GET", url: "/moves/tackle?game=x-z" });
    expect(game.json().message).toBe("Game 'x-z' not found. Potential matches: x-y.");
  });

  it("builds coverage for a roster", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/coverage?pokemon=squirtle,geodude&game=black-white"
    });
    expect(res.statusCode).toBe(200);
    expect(res.json().defense.electric).toEqual([{ pokemon: "geodude", multiplier: 0 }]);

    const empty = await app.inject({ method: "GET", url: "/coverage" });
    expect(empty.statusCode).toBe(400);
    expect(empty.json().error).toBe("BadRequest");

    const crowded = await app.inject({
      method: "GET",
      url: "/coverage?pokemon=mew,mew,mew,mew,mew,mew,mew"
    });
    expect(crowded.statusCode).toBe(400);
    expect(crowded.json().message).toBe("pokemon must list 1 to 6 names.");
  });

  it("builds a matchup in both directions", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/match?attacker=geodude&defender=squirtle&game=black-white"
    });
    expect(res.statusCode).toBe(200);
    expect(res.json().defense.moves.quad.map((m: { name: string }) => m.name)).toEqual([
      "scald",
      "water-gun"
    ]);

    const missing = await app.inject({ method: "GET", url: "/match?attacker=geodude" });
    expect(missing.statusCode).toBe(400);
    expect(missing.json().message).toBe("attacker and defender are required.");
  });
});
