/**
 * Numeric unit attributes that spells and other sources can modify.
 */
export const PROPERTIES = [
  "strength",
  "dexterity",
  "technology",
  "magic",
  "wisdom",
  "baseHealth",
  "maxHealth",
  "shieldCapacityMax",
  "assaultRating",
  "supportRating",
  "moveSpeedMultiplier",
  "cooldownReductionModifier",
] as const;

export type Property = (typeof PROPERTIES)[number];

/** How a single alteration combines with the running property value. */
export type ModType = "flat" | "levelScaled" | "percentage";
