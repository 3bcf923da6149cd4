import type { SpellInfo, SpellLookup, SpellTierDefinition, SpellBaseDefinition } from "../combat/spell-types";
import type {
  CreatureEntry,
  CreatureModelInfo,
  CreatureModelLookup,
  GameDataDefinition,
} from "./game-data-types";

/**
 * Indexed, read-only view of the static game data.
 */
export class GameDataCatalog implements SpellLookup, CreatureModelLookup {
  private readonly bases = new Map<number, SpellBaseDefinition>();
  private readonly tiers = new Map<number, SpellTierDefinition>();
  private readonly tiersByBase = new Map<number, Map<number, SpellTierDefinition>>();
  private readonly creatureModels = new Map<number, CreatureModelInfo>();
  private readonly creatures = new Map<number, CreatureEntry>();

  constructor(definition: GameDataDefinition) {
    for (const base of definition.spellBases) {
      this.bases.set(base.id, base);
    }
    for (const tier of definition.spellTiers) {
      this.tiers.set(tier.id, tier);
      let byIndex = this.tiersByBase.get(tier.baseId);
      if (!byIndex) {
        byIndex = new Map();
        this.tiersByBase.set(tier.baseId, byIndex);
      }
      byIndex.set(tier.tierIndex, tier);
    }
    for (const model of definition.creatureModels) {
      this.creatureModels.set(model.id, model);
    }
    for (const creature of definition.creatures) {
      this.creatures.set(creature.id, creature);
    }
  }

  get spellCount(): number {
    return this.tiers.size;
  }

  getSpellTier(spell4Id: number): SpellTierDefinition | undefined {
    return this.tiers.get(spell4Id);
  }

  getSpellInfo(baseId: number, tierIndex: number): SpellInfo | undefined {
    const base = this.bases.get(baseId);
    const tier = this.tiersByBase.get(baseId)?.get(tierIndex);
    if (!base || !tier) {
      return undefined;
    }
    return { base, tier };
  }

  getCreatureModelInfo(modelInfoId: number): CreatureModelInfo | undefined {
    return this.creatureModels.get(modelInfoId);
  }

  getCreature(creatureId: number): CreatureEntry | undefined {
    return this.creatures.get(creatureId);
  }
}
