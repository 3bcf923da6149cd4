import { logger } from "@runeforge/shared-servers";
import type { Spell, SpellPredicate } from "./spell-types";

/**
 * Per-unit collection of in-flight spells, kept in insertion order.
 * Spells are ticked once per update and evicted as soon as they report finished.
 */
export class PendingSpellRegistry {
  private readonly spells: Spell[] = [];

  get size(): number {
    return this.spells.length;
  }

  /** Register a spell. Callers register each successful cast exactly once. */
  add(spell: Spell): void {
    this.spells.push(spell);
  }

  /**
   * Tick every spell present when the call starts. Spells added or cancelled
   * by another spell's tick are applied to the live list, not the snapshot.
   */
  advance(elapsedMs: number): void {
    const snapshot = [...this.spells];
    for (const spell of snapshot) {
      spell.update(elapsedMs);
      spell.lateUpdate(elapsedMs);
      if (spell.isFinished) {
        this.remove(spell);
      }
    }
  }

  cancelByCastingId(castingId: number): void {
    const spell = this.spells.find((candidate) => candidate.castingId === castingId);
    if (!spell) {
      return;
    }
    logger.debug({ castingId, spell4Id: spell.spell4Id }, "Cancelling spell cast");
    spell.cancelCast("spellCancelled");
  }

  /** Cancel every spell that is still casting and is interrupted by movement. */
  cancelAllOnMovement(): void {
    for (const spell of [...this.spells]) {
      if (spell.isMovingInterrupted() && spell.isCasting) {
        spell.cancelCast("casterMovement");
      }
    }
  }

  isAnyCasting(): boolean {
    return this.spells.some((spell) => spell.isCasting);
  }

  find(predicate: SpellPredicate): Spell | undefined {
    return this.spells.find((spell) => predicate(spell));
  }

  values(): readonly Spell[] {
    return this.spells;
  }

  disposeAll(): void {
    const spells = this.spells.splice(0);
    for (const spell of spells) {
      spell.dispose();
    }
  }

  private remove(spell: Spell): void {
    const index = this.spells.indexOf(spell);
    if (index !== -1) {
      this.spells.splice(index, 1);
    }
  }
}
