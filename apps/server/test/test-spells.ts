import type { CastMethod, CastResult } from "@runeforge/shared-protocol";
import type { Spell, SpellFactory, SpellInfo } from "../src/combat/spell-types";
import { GameDataCatalog } from "../src/data/game-data-catalog";
import type { GameDataDefinition } from "../src/data/game-data-types";
import { DisableRules } from "../src/rules/disable-rules";
import type { UnitServices } from "../src/world/entities/unit-entity";

export interface TestSpellOptions {
  castingId?: number;
  spell4Id?: number;
  castMethod?: CastMethod;
  isCasting?: boolean;
  movingInterrupted?: boolean;
}

/**
 * Spell double whose state is set directly by the test.
 */
export class TestSpell implements Spell {
  readonly castingId: number;
  readonly spell4Id: number;
  readonly castMethod: CastMethod;
  isCasting: boolean;
  isFinished = false;
  isFailed = false;
  movingInterrupted: boolean;

  castSucceeds = true;
  failOnCast = false;
  disposed = false;
  readonly updates: number[] = [];
  lateUpdates = 0;
  readonly cancelResults: CastResult[] = [];
  onUpdate?: (spell: TestSpell) => void;

  constructor(options: TestSpellOptions = {}) {
    this.castingId = options.castingId ?? 1;
    this.spell4Id = options.spell4Id ?? 1001;
    this.castMethod = options.castMethod ?? "normal";
    this.isCasting = options.isCasting ?? false;
    this.movingInterrupted = options.movingInterrupted ?? false;
  }

  cast(): boolean {
    if (this.failOnCast) {
      this.isFailed = true;
    }
    return this.castSucceeds;
  }

  update(elapsedMs: number): void {
    this.updates.push(elapsedMs);
    this.onUpdate?.(this);
  }

  lateUpdate(): void {
    this.lateUpdates += 1;
  }

  isMovingInterrupted(): boolean {
    return this.movingInterrupted;
  }

  cancelCast(result: CastResult): void {
    this.cancelResults.push(result);
  }

  dispose(): void {
    this.disposed = true;
  }
}

/**
 * Factory double returning the spell prepared by the test, recording each request.
 */
export class TestSpellFactory implements SpellFactory {
  readonly requests: { castMethod: CastMethod; spellInfo?: SpellInfo }[] = [];
  nextSpell: TestSpell = new TestSpell();

  newSpell(castMethod: CastMethod, _caster: unknown, parameters: { spellInfo?: SpellInfo }): Spell {
    this.requests.push({ castMethod, spellInfo: parameters.spellInfo });
    return this.nextSpell;
  }
}

export const TEST_GAME_DATA: GameDataDefinition = {
  spellBases: [
    { id: 100, name: "Quick Draw", castMethod: "normal" },
    { id: 200, name: "Arcane Missiles", castMethod: "channeled" },
  ],
  spellTiers: [
    { id: 1001, baseId: 100, tierIndex: 1, castTimeMs: 0, interruptedByMovement: false },
    { id: 1002, baseId: 100, tierIndex: 2, castTimeMs: 0, interruptedByMovement: false },
    { id: 2001, baseId: 200, tierIndex: 1, castTimeMs: 1000, interruptedByMovement: true },
  ],
  creatureModels: [{ id: 10, hitRadius: 0.5 }],
  creatures: [{ id: 5000, modelInfoId: 10, modelScale: 3 }],
};

export const createTestCatalog = (): GameDataCatalog => new GameDataCatalog(TEST_GAME_DATA);

export const createTestServices = (
  overrides: Partial<UnitServices> = {},
): UnitServices => {
  const catalog = createTestCatalog();
  return {
    spells: catalog,
    creatureModels: catalog,
    disableRules: new DisableRules(),
    spellFactory: new TestSpellFactory(),
    ...overrides,
  };
};
