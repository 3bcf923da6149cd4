import type { CastMethod } from "@runeforge/shared-protocol";
import { SpellArgumentError } from "./errors";
import type { Spell, SpellCaster, SpellFactory, SpellParameters } from "./spell-types";
import { TimedSpell, type SpellInit } from "./timed-spell";

export type SpellBuilder = (init: SpellInit) => Spell;

/**
 * Builds spells from the builder registered for their cast method, or the
 * fallback builder. Casting ids are unique per factory.
 */
export class DefaultSpellFactory implements SpellFactory {
  private readonly builders = new Map<CastMethod, SpellBuilder>();
  private nextCastingId = 1;

  constructor(private readonly fallback: SpellBuilder = (init) => new TimedSpell(init)) {}

  /** Register the builder for a cast method, replacing any previous one. */
  register(castMethod: CastMethod, builder: SpellBuilder): void {
    this.builders.set(castMethod, builder);
  }

  newSpell(castMethod: CastMethod, caster: SpellCaster, parameters: SpellParameters): Spell {
    const { spellInfo } = parameters;
    if (!spellInfo) {
      throw new SpellArgumentError("Cannot create a spell without resolved spell info.");
    }
    const builder = this.builders.get(castMethod) ?? this.fallback;
    const castingId = this.nextCastingId;
    this.nextCastingId += 1;
    return builder({ castingId, castMethod, caster, spellInfo, parameters });
  }
}
