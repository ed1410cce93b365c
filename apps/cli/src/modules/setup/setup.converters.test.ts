// apps/cli/src/modules/setup/setup.converters.test.ts
import { describe, expect, it } from "vitest";

import { createGenerationResolver } from "../games/games.service";
import { parseEvolution } from "../pokemon/pokemon.evolution";
import { loadPokeApiFixture } from "../../testing/fixtures";
import {
  convertAbility,
  convertEvolutionChain,
  convertGame,
  convertMove,
  convertPokemon,
  toEvolutionMethod
} from "./setup.converters";
import type {
  ApiAbility,
  ApiEvolutionChain,
  ApiEvolutionDetail,
  ApiMove,
  ApiPokemon,
  ApiVersionGroup
} from "./setup.schemas";

const fixture = loadPokeApiFixture();

function resource<T>(kind: string, name: string): T {
  const item = fixture.resources[kind].find((entry) => entry.name === name);
  if (!item) throw new Error(`fixture has no ${kind} '${name}'`);
  return item as T;
}

const games = createGenerationResolver(
  fixture.resources["version-group"].map((vg) => convertGame(vg as ApiVersionGroup))
);

describe("convertMove", () => {
  it("shifts past values onto the generation before the listed version group", () => {
    const rows = convertMove(resource<ApiMove>("move", "bite"), games);

    expect(rows).toHaveLength(2);
    expect(rows[0].kind).toBe("move");
    expect(rows[1]).toEqual({
      kind: "moveChange",
      row: {
        power: null,
        accuracy: null,
        pp: null,
        effect_chance: null,
        effect: null,
        type: "normal",
        generation: 1,
        move_id: 44
      }
    });
  });

  it("takes the english effect text", () => {
    const [first] = convertMove(resource<ApiMove>("move", "scald"), games);
    expect(first).toEqual({
      kind: "move",
      row: {
        id: 503,
        name: "scald",
        power: 80,
        accuracy: 100,
        pp: 15,
        effect_chance: 30,
        effect: "Has a $effect_chance% chance to burn the target.",
        short_effect: "Has a $effect_chance% chance to burn the target.",
        type: "water",
        damage_class: "special",
        generation: 5
      }
    });
  });
});

describe("convertAbility", () => {
  it("keeps one english effect change per version group", () => {
    const rows = convertAbility(resource<ApiAbility>("ability", "sturdy"), games);
    expect(rows[1]).toEqual({
      kind: "abilityChange",
      row: { effect: "Protects against OHKO moves.", generation: 5, ability_id: 5 }
    });
  });
});

describe("convertPokemon", () => {
  it("reads hyphenated stat names and types by slot", () => {
    const [first] = convertPokemon(resource<ApiPokemon>("pokemon", "geodude"), games);
    expect(first).toEqual({
      kind: "pokemon",
      row: {
        id: 74,
        name: "geodude",
        primary_type: "rock",
        secondary_type: "ground",
        hp: 40,
        attack: 80,
        defense: 100,
        special_attack: 30,
        special_defense: 30,
        speed: 20,
        species_id: 74
      }
    });
  });

  it("writes the pokemon row ahead of its children", () => {
    const rows = convertPokemon(resource<ApiPokemon>("pokemon", "clefairy"), games);
    expect(rows.map((r) => r.kind)).toEqual([
      "pokemon",
      "pokemonAbility",
      "pokemonAbility",
      "pokemonMove",
      "pokemonMove",
      "pokemonTypeChange"
    ]);
    expect(rows[5]).toEqual({
      kind: "pokemonTypeChange",
      row: { primary_type: "normal", secondary_type: null, generation: 5, pokemon_id: 35 }
    });
  });

  it("dates each learn record by its version group", () => {
    const rows = convertPokemon(resource<ApiPokemon>("pokemon", "geodude"), games);
    const tackle = rows.filter((r) => r.kind === "pokemonMove" && r.row.move_id === 33);
    expect(tackle.map((r) => r.row)).toEqual([
      { move_id: 33, learn_method: "level-up", learn_level: 1, generation: 1, pokemon_id: 74 },
      { move_id: 33, learn_method: "machine", learn_level: 0, generation: 6, pokemon_id: 74 }
    ]);
  });
});

describe("evolution chains", () => {
  it("keeps only the populated conditions of a method", () => {
    const detail: ApiEvolutionDetail = {
      trigger: { name: "level-up", url: "" },
      item: null,
      gender: 1,
      held_item: null,
      known_move: null,
      known_move_type: null,
      location: null,
      min_level: 20,
      min_happiness: null,
      min_beauty: null,
      min_affection: null,
      needs_overworld_rain: true,
      party_species: null,
      party_type: null,
      relative_physical_stats: 0,
      time_of_day: "",
      trade_species: null,
      turn_upside_down: false
    };

    expect(toEvolutionMethod(detail)).toEqual({
      trigger: "level-up",
      gender: 1,
      minLevel: 20,
      needsOverworldRain: true,
      relativePhysicalStats: 0
    });
  });

  it("stores a tree that parses back", () => {
    const chain = fixture.resources["evolution-chain"].find((c) => c.id === 37);
    if (!chain) throw new Error("fixture has no chain 37");

    const converted = convertEvolutionChain(chain as ApiEvolutionChain);
    if (converted.kind !== "evolution") throw new Error("expected an evolution row");

    const tree = parseEvolution(converted.row.evolution_json, 37);
    expect(tree.name).toBe("geodude");
    expect(tree.evolvesTo[0].methods).toEqual([{ trigger: "level-up", minLevel: 25 }]);
    expect(tree.evolvesTo[0].evolvesTo[0].methods).toEqual([
      { trigger: "trade" },
      { trigger: "use-item", item: "linking-cord" }
    ]);
  });
});
