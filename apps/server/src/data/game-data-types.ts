import type { SpellBaseDefinition, SpellTierDefinition } from "../combat/spell-types";

/** Creature model metadata used to size units in the world. */
export interface CreatureModelInfo {
  id: number;
  hitRadius: number;
}

/** Creature template a unit can be spawned from. */
export interface CreatureEntry {
  id: number;
  modelInfoId: number;
  modelScale: number;
}

export interface CreatureModelLookup {
  getCreatureModelInfo(modelInfoId: number): CreatureModelInfo | undefined;
}

/** Raw content of the game data file, after validation. */
export interface GameDataDefinition {
  spellBases: SpellBaseDefinition[];
  spellTiers: SpellTierDefinition[];
  creatureModels: CreatureModelInfo[];
  creatures: CreatureEntry[];
}
