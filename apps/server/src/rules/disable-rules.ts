import type { DisableType } from "@runeforge/shared-protocol";
import type { DisableRuleCheck } from "../combat/cast-orchestrator";

export interface DisableRuleSeed {
  baseSpellIds?: readonly number[];
  spellIds?: readonly number[];
}

/**
 * Server side switches that turn off whole base spells or single spell tiers.
 */
export class DisableRules implements DisableRuleCheck {
  private readonly disabled = new Map<DisableType, Set<number>>([
    ["baseSpell", new Set()],
    ["spell", new Set()],
  ]);

  constructor(seed: DisableRuleSeed = {}) {
    for (const id of seed.baseSpellIds ?? []) {
      this.disable("baseSpell", id);
    }
    for (const id of seed.spellIds ?? []) {
      this.disable("spell", id);
    }
  }

  isDisabled(type: DisableType, id: number): boolean {
    return this.disabled.get(type)?.has(id) ?? false;
  }

  disable(type: DisableType, id: number): void {
    this.disabled.get(type)?.add(id);
  }

  enable(type: DisableType, id: number): void {
    this.disabled.get(type)?.delete(id);
  }
}
