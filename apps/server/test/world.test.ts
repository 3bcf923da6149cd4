import { beforeAll, describe, expect, it } from "vitest";
import { CreatureState, PlayerState } from "@runeforge/shared-protocol";
import { silenceLogger } from "@runeforge/shared-servers";
import type { AppConfig } from "../src/app-config";
import type { GameDataCatalog } from "../src/data/game-data-catalog";
import { GameDataLoader } from "../src/data/game-data-loader";
import { ServerCreature } from "../src/world/entities/creature";
import { ServerPlayer } from "../src/world/entities/player";
import type { UnitServices } from "../src/world/entities/unit-entity";
import { bootWorld, createUnitServices, World } from "../src/world/world";
import { createTestCatalog, createTestServices, TestSpell, TestSpellFactory } from "./test-spells";

class FakeGameDataLoader extends GameDataLoader {
  loads = 0;

  async load(): Promise<GameDataCatalog> {
    this.loads += 1;
    return createTestCatalog();
  }
}

const baseConfig: AppConfig = {
  gameDataPath: "unused.json",
  disabledBaseSpellIds: [],
  disabledSpellIds: [],
  tickRate: 20,
};

const createPlayer = (services: UnitServices, id: string): ServerPlayer => {
  const state = new PlayerState();
  state.id = id;
  state.playerId = id;
  return new ServerPlayer(state, services);
};

describe("createUnitServices", () => {
  it("seeds the disable rules from the configuration", () => {
    const services = createUnitServices(createTestCatalog(), {
      ...baseConfig,
      disabledBaseSpellIds: [200],
      disabledSpellIds: [1002],
    });

    expect(services.disableRules.isDisabled("baseSpell", 200)).toBe(true);
    expect(services.disableRules.isDisabled("spell", 1002)).toBe(true);
    expect(services.disableRules.isDisabled("spell", 1001)).toBe(false);
  });
});

describe("bootWorld", () => {
  beforeAll(() => {
    silenceLogger();
  });

  it("builds a world whose units cast against the loaded data", async () => {
    const loader = new FakeGameDataLoader();
    const world = await bootWorld({ ...baseConfig, disabledSpellIds: [1001] }, loader);
    const player = createPlayer(world.services, "player-1");
    world.addUnit(player);

    expect(loader.loads).toBe(1);
    expect(player.castSpell(1001, {})).toEqual({ status: "rejected", reason: "spellDisabled" });
    expect(player.pendingSystemMessages).toEqual([
      "Unable to cast spell 1001 because it is disabled.",
    ]);

    expect(player.castSpell(2001, {}).status).toBe("registered");
    world.fixedTick(500);
    expect(player.synced.isCasting).toBe(true);

    world.fixedTick(500);
    expect(player.synced.isCasting).toBe(false);
    expect(player.pendingSpellCount).toBe(0);
  });
});

describe("World", () => {
  it("adds, finds and removes units", () => {
    const services = createTestServices();
    const world = new World(services);
    const player = createPlayer(services, "player-1");
    const creatureState = new CreatureState();
    creatureState.id = "creature-1";
    const creature = new ServerCreature(creatureState, services);

    world.addUnit(player);
    world.addUnit(creature);
    expect(world.unitCount).toBe(2);
    expect(world.getUnit("creature-1")).toBe(creature);

    world.removeUnit("creature-1");
    world.removeUnit("missing");
    expect(world.unitCount).toBe(1);
    expect(world.getUnit("creature-1")).toBeUndefined();
  });

  it("rejects a second unit with the same id", () => {
    const services = createTestServices();
    const world = new World(services);
    world.addUnit(createPlayer(services, "player-1"));

    expect(() => world.addUnit(createPlayer(services, "player-1"))).toThrow(
      "Unit player-1 is already in the world.",
    );
  });

  it("ticks every unit and disposes pending spells on removal", () => {
    const spellFactory = new TestSpellFactory();
    const services = createTestServices({ spellFactory });
    const world = new World(services);
    const player = createPlayer(services, "player-1");
    const spell = new TestSpell({ isCasting: true });
    spellFactory.nextSpell = spell;
    world.addUnit(player);

    player.castSpell(1001, {});
    world.fixedTick(50);
    world.fixedTick(50);
    expect(spell.updates).toEqual([50, 50]);
    expect(player.synced.isCasting).toBe(true);

    world.removeUnit("player-1");
    expect(spell.disposed).toBe(true);
    expect(player.synced.isCasting).toBe(false);
  });
});
