import { logger } from "@runeforge/shared-servers";
import type { UnitState } from "@runeforge/shared-protocol";
import type { AppConfig } from "../app-config";
import { DefaultSpellFactory } from "../combat/spell-factory";
import type { GameDataCatalog } from "../data/game-data-catalog";
import { DefaultGameDataLoader, type GameDataLoader } from "../data/game-data-loader";
import { DisableRules } from "../rules/disable-rules";
import type { UnitEntity, UnitServices } from "./entities/unit-entity";

export const createUnitServices = (catalog: GameDataCatalog, config: AppConfig): UnitServices => ({
  spells: catalog,
  creatureModels: catalog,
  disableRules: new DisableRules({
    baseSpellIds: config.disabledBaseSpellIds,
    spellIds: config.disabledSpellIds,
  }),
  spellFactory: new DefaultSpellFactory(),
});

/**
 * Owns the live units of a server and ticks each of them once per fixed tick.
 */
export class World {
  private readonly units = new Map<string, UnitEntity<UnitState>>();

  constructor(readonly services: UnitServices) {}

  get unitCount(): number {
    return this.units.size;
  }

  addUnit(unit: UnitEntity<UnitState>): void {
    if (this.units.has(unit.id)) {
      throw new Error(`Unit ${unit.id} is already in the world.`);
    }
    this.units.set(unit.id, unit);
  }

  getUnit(id: string): UnitEntity<UnitState> | undefined {
    return this.units.get(id);
  }

  /** Remove a unit and release its pending spells. */
  removeUnit(id: string): void {
    const unit = this.units.get(id);
    if (!unit) {
      return;
    }
    this.units.delete(id);
    unit.dispose();
  }

  fixedTick(elapsedMs: number): void {
    for (const unit of [...this.units.values()]) {
      unit.update(elapsedMs);
    }
  }

  dispose(): void {
    for (const unit of this.units.values()) {
      unit.dispose();
    }
    this.units.clear();
  }
}

/** Load game data and build a world ready to tick. */
export const bootWorld = async (
  config: AppConfig,
  loader: GameDataLoader = new DefaultGameDataLoader(config.gameDataPath),
): Promise<World> => {
  const catalog = await loader.load();
  const world = new World(createUnitServices(catalog, config));
  logger.info(
    {
      tickRate: config.tickRate,
      disabledBaseSpells: config.disabledBaseSpellIds.length,
      disabledSpells: config.disabledSpellIds.length,
    },
    "World ready",
  );
  return world;
};
