import type { CastMethod, CastResult } from "@runeforge/shared-protocol";

/** Immutable metadata shared by every tier of a spell. */
export interface SpellBaseDefinition {
  id: number;
  name: string;
  castMethod: CastMethod;
}

/** Immutable metadata for a single tier of a spell. */
export interface SpellTierDefinition {
  /** Spell id of this tier. */
  id: number;
  baseId: number;
  tierIndex: number;
  castTimeMs: number;
  interruptedByMovement: boolean;
}

/** A spell resolved down to one specific tier. */
export interface SpellInfo {
  base: SpellBaseDefinition;
  tier: SpellTierDefinition;
}

/** Data sent by the client when a cast comes from interacting with an object. */
export interface ClientSideInteraction {
  clientUniqueId: number;
  activateUnitId?: string;
}

/**
 * A cast request. `spellInfo` is filled in once the spell has been resolved.
 */
export interface SpellParameters {
  spellInfo?: SpellInfo;
  userInitiatedSpellCast?: boolean;
  clientSideInteraction?: ClientSideInteraction;
  primaryTargetId?: string;
}

/**
 * Anything able to cast spells. Player facing capabilities are optional and
 * only used when present.
 */
export interface SpellCaster {
  readonly id: string;
  readonly level: number;
  sendSystemMessage?(message: string): void;
  dismount?(): void;
}

/**
 * A spell instance in flight. Units only track its lifecycle; its internal
 * state belongs to the implementation.
 */
export interface Spell {
  readonly castingId: number;
  readonly spell4Id: number;
  readonly castMethod: CastMethod;
  readonly isCasting: boolean;
  readonly isFinished: boolean;
  /** Set when the spell failed while initialising in `cast()`. */
  readonly isFailed: boolean;

  /** Initial validation and setup. Returns false when the cast cannot start. */
  cast(): boolean;
  update(elapsedMs: number): void;
  lateUpdate(elapsedMs: number): void;
  isMovingInterrupted(): boolean;
  /** Requests termination; the spell reports finished on a later update. */
  cancelCast(result: CastResult): void;
  dispose(): void;
}

export type SpellPredicate = (spell: Spell) => boolean;

/** Resolves spell ids into immutable spell metadata. */
export interface SpellLookup {
  getSpellTier(spell4Id: number): SpellTierDefinition | undefined;
  getSpellInfo(baseId: number, tierIndex: number): SpellInfo | undefined;
}

/** Builds spell instances for a cast method. */
export interface SpellFactory {
  newSpell(castMethod: CastMethod, caster: SpellCaster, parameters: SpellParameters): Spell;
}
