import type { Property } from "@runeforge/shared-protocol";
import type { PropertyModifierStore } from "./property-modifier-store";
import { getAlterationValue, type SpellPropertyModifier } from "./spell-modifier";

export interface LevelContext {
  level: number;
}

/**
 * Stable descending sort by priority. Equal priorities keep store order.
 */
export const orderByPriority = (
  modifiers: readonly SpellPropertyModifier[],
): SpellPropertyModifier[] => {
  return [...modifiers].sort((a, b) => b.priority - a.priority);
};

/**
 * Apply modifiers to a base value in one pass. Additive and multiplicative
 * alterations are interleaved in priority order, so the result depends on it.
 * No clamping or rounding happens here.
 */
export const applyModifiers = (
  baseValue: number,
  modifiers: readonly SpellPropertyModifier[],
  context: LevelContext,
): number => {
  let value = baseValue;
  for (const modifier of orderByPriority(modifiers)) {
    for (const alteration of modifier.alterations) {
      switch (alteration.modType) {
      case "flat":
      case "levelScaled": {
        value += getAlterationValue(alteration, context.level);
        break;
      }
      case "percentage": {
        value *= getAlterationValue(alteration);
        break;
      }
      // No default
      }
    }
  }
  return value;
};

/**
 * Combines a property's base value with the modifiers held for it.
 */
export class PropertyResolver {
  constructor(private readonly store: PropertyModifierStore) {}

  resolve(property: Property, baseValue: number, context: LevelContext): number {
    return applyModifiers(baseValue, this.store.modifiersFor(property), context);
  }
}
