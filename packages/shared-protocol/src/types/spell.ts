export const CAST_METHODS = [
  "normal",
  "channeled",
  "pressHold",
  "channeledField",
  "clientSideInteraction",
  "rapidTap",
  "chargeRelease",
  "multiphase",
  "transactional",
  "aura",
] as const;

export type CastMethod = (typeof CAST_METHODS)[number];

/**
 * Reason attached to a spell that stops casting.
 */
export type CastResult =
  | "ok"
  | "spellCancelled"
  | "casterMovement"
  | "spellInterrupted"
  | "casterCannotBeAffected";

/** Scope of a disable rule. */
export type DisableType = "baseSpell" | "spell";

export const isCastMethod = (value: unknown): value is CastMethod => {
  return CAST_METHODS.some((method) => method === value);
};
