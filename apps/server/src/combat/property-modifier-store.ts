import type { Property } from "@runeforge/shared-protocol";
import type { SpellPropertyModifier } from "./spell-modifier";

/**
 * Per-unit mapping of property to the modifiers each source contributes.
 * Holds at most one modifier per (property, source) pair and never recomputes
 * values itself; callers resolve properties when they need them.
 */
export class PropertyModifierStore {
  private readonly modifiers = new Map<Property, Map<number, SpellPropertyModifier>>();

  /**
   * Insert a modifier, replacing any existing one from the same source.
   * A replaced entry keeps its position.
   */
  addOrReplace(sourceId: number, modifier: SpellPropertyModifier): void {
    let bySource = this.modifiers.get(modifier.property);
    if (!bySource) {
      bySource = new Map();
      this.modifiers.set(modifier.property, bySource);
    }
    bySource.set(sourceId, modifier);
  }

  /** Returns whether an entry was removed. */
  remove(property: Property, sourceId: number): boolean {
    const bySource = this.modifiers.get(property);
    if (!bySource) {
      return false;
    }
    const removed = bySource.delete(sourceId);
    if (bySource.size === 0) {
      this.modifiers.delete(property);
    }
    return removed;
  }

  /**
   * Remove every modifier contributed by a source.
   * @returns the properties that lost a modifier.
   */
  removeAllForSource(sourceId: number): Property[] {
    const affected: Property[] = [];
    for (const [property, bySource] of this.modifiers) {
      if (bySource.has(sourceId)) {
        affected.push(property);
      }
    }
    for (const property of affected) {
      this.remove(property, sourceId);
    }
    return affected;
  }

  modifiersFor(property: Property): SpellPropertyModifier[] {
    const bySource = this.modifiers.get(property);
    return bySource ? [...bySource.values()] : [];
  }

  has(property: Property, sourceId: number): boolean {
    return this.modifiers.get(property)?.has(sourceId) ?? false;
  }
}
