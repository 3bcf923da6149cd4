import type { CastMethod, DisableType } from "@runeforge/shared-protocol";
import { logger } from "@runeforge/shared-servers";
import type { PendingSpellRegistry } from "./pending-spell-registry";
import { SpellArgumentError } from "./errors";
import type {
  Spell,
  SpellCaster,
  SpellFactory,
  SpellInfo,
  SpellLookup,
  SpellParameters,
} from "./spell-types";

/** External check for spells switched off by server rules. */
export interface DisableRuleCheck {
  isDisabled(type: DisableType, id: number): boolean;
}

export type CastRejectReason = "missingSpellInfo" | "baseSpellDisabled" | "spellDisabled";
export type CastFailReason = "castFailed" | "initialiseFailed";

interface CastRejected {
  status: "rejected";
  reason: CastRejectReason;
}

interface CastFailed {
  status: "failed";
  reason: CastFailReason;
  spell: Spell;
}

interface CastRegistered {
  status: "registered";
  spell: Spell;
}

export type CastOutcome = CastRejected | CastFailed | CastRegistered;

export interface CastOrchestratorOptions {
  spells: SpellLookup;
  disableRules: DisableRuleCheck;
  spellFactory: SpellFactory;
  registry: PendingSpellRegistry;
}

/**
 * Validates cast requests for one caster and registers the resulting spells.
 * Rejections and failures are outcomes, not errors; only unresolvable input throws.
 */
export class CastOrchestrator {
  private readonly spells: SpellLookup;
  private readonly disableRules: DisableRuleCheck;
  private readonly spellFactory: SpellFactory;
  private readonly registry: PendingSpellRegistry;

  constructor(
    private readonly caster: SpellCaster,
    options: CastOrchestratorOptions,
  ) {
    this.spells = options.spells;
    this.disableRules = options.disableRules;
    this.spellFactory = options.spellFactory;
    this.registry = options.registry;
  }

  /** Resolve a spell id to its base spell and tier, then cast. */
  castSpellById(spell4Id: number, parameters: SpellParameters): CastOutcome {
    assertParameters(parameters);
    const tier = this.spells.getSpellTier(spell4Id);
    if (!tier) {
      throw new SpellArgumentError(`Unknown spell ${spell4Id}.`);
    }
    return this.castSpellByTier(tier.baseId, tier.tierIndex, parameters);
  }

  /** Resolve a base spell and tier, then cast. */
  castSpellByTier(baseId: number, tierIndex: number, parameters: SpellParameters): CastOutcome {
    assertParameters(parameters);
    const spellInfo = this.spells.getSpellInfo(baseId, tierIndex);
    if (!spellInfo) {
      throw new SpellArgumentError(`Unknown tier ${tierIndex} of base spell ${baseId}.`);
    }
    return this.castSpell({ ...parameters, spellInfo });
  }

  castSpell(parameters: SpellParameters): CastOutcome {
    assertParameters(parameters);
    const { spellInfo } = parameters;
    if (!spellInfo) {
      return this.reject("missingSpellInfo");
    }

    const baseId = spellInfo.base.id;
    if (this.disableRules.isDisabled("baseSpell", baseId)) {
      this.caster.sendSystemMessage?.(
        `Unable to cast base spell ${baseId} because it is disabled.`,
      );
      return this.reject("baseSpellDisabled", spellInfo);
    }

    const spell4Id = spellInfo.tier.id;
    if (this.disableRules.isDisabled("spell", spell4Id)) {
      this.caster.sendSystemMessage?.(`Unable to cast spell ${spell4Id} because it is disabled.`);
      return this.reject("spellDisabled", spellInfo);
    }

    if (parameters.userInitiatedSpellCast) {
      this.caster.dismount?.();
    }

    const castMethod = resolveCastMethod(parameters, spellInfo);
    const spell = this.spellFactory.newSpell(castMethod, this.caster, parameters);
    if (!spell.cast()) {
      return this.fail("castFailed", spell);
    }

    // A spell that failed to initialise never enters the tick loop
    if (spell.isFailed) {
      return this.fail("initialiseFailed", spell);
    }

    this.registry.add(spell);
    return { status: "registered", spell };
  }

  private reject(reason: CastRejectReason, spellInfo?: SpellInfo): CastRejected {
    logger.debug(
      { casterId: this.caster.id, spell4Id: spellInfo?.tier.id, reason },
      "Spell cast rejected",
    );
    return { status: "rejected", reason };
  }

  private fail(reason: CastFailReason, spell: Spell): CastFailed {
    logger.debug(
      { casterId: this.caster.id, spell4Id: spell.spell4Id, reason },
      "Spell cast failed",
    );
    return { status: "failed", reason, spell };
  }
}

/** Client side interactions always use the interaction cast method. */
export const resolveCastMethod = (
  parameters: SpellParameters,
  spellInfo: SpellInfo,
): CastMethod => {
  if (parameters.clientSideInteraction) {
    return "clientSideInteraction";
  }
  return spellInfo.base.castMethod;
};

const assertParameters = (parameters: SpellParameters | null | undefined): void => {
  if (!parameters) {
    throw new SpellArgumentError("Spell parameters are required.");
  }
};
