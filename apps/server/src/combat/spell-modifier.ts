import type { ModType, Property } from "@runeforge/shared-protocol";

/** A fixed value, or a value computed from the caster's level. */
export type AlterationValue = number | ((level: number) => number);

/** One additive or multiplicative step within a modifier. */
export interface PropertyAlteration {
  modType: ModType;
  value: AlterationValue;
}

/**
 * A single source's contribution to a property. Alterations are applied in order.
 */
export interface SpellPropertyModifier {
  property: Property;
  /** Higher priorities are applied first. */
  priority: number;
  alterations: readonly PropertyAlteration[];
}

export const flat = (amount: number): PropertyAlteration => ({
  modType: "flat",
  value: amount,
});

export const levelScaled = (perLevel: number, base = 0): PropertyAlteration => ({
  modType: "levelScaled",
  value: (level) => base + perLevel * level,
});

export const percentage = (multiplier: number): PropertyAlteration => ({
  modType: "percentage",
  value: multiplier,
});

export const getAlterationValue = (alteration: PropertyAlteration, level = 1): number => {
  const { value } = alteration;
  return typeof value === "number" ? value : value(level);
};
