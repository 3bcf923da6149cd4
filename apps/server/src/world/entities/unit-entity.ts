import type { CastMethod, Property, UnitState } from "@runeforge/shared-protocol";
import {
  CastOrchestrator,
  type CastOutcome,
  type DisableRuleCheck,
} from "../../combat/cast-orchestrator";
import { SpellArgumentError } from "../../combat/errors";
import { PendingSpellRegistry } from "../../combat/pending-spell-registry";
import { PropertyModifierStore } from "../../combat/property-modifier-store";
import { PropertyResolver } from "../../combat/property-resolver";
import type { SpellPropertyModifier } from "../../combat/spell-modifier";
import type {
  Spell,
  SpellCaster,
  SpellFactory,
  SpellLookup,
  SpellParameters,
  SpellPredicate,
} from "../../combat/spell-types";
import type { CreatureEntry, CreatureModelLookup } from "../../data/game-data-types";

/** Collaborators every unit needs; shared by all units of a world. */
export interface UnitServices {
  spells: SpellLookup;
  creatureModels: CreatureModelLookup;
  disableRules: DisableRuleCheck;
  spellFactory: SpellFactory;
}

/**
 * Server-only base class for any animate entity that casts spells and carries
 * spell modified properties.
 */
export abstract class UnitEntity<TState extends UnitState> implements SpellCaster {
  private readonly pendingSpells = new PendingSpellRegistry();
  private readonly modifierStore = new PropertyModifierStore();
  private readonly resolver = new PropertyResolver(this.modifierStore);
  private readonly castOrchestrator: CastOrchestrator;

  private readonly baseProperties = new Map<Property, number>();
  private readonly resolvedProperties = new Map<Property, number>();
  private readonly dirtyProperties = new Set<Property>();
  private resolvedLevel: number;

  constructor(
    readonly synced: TState,
    services: UnitServices,
    creature?: CreatureEntry,
  ) {
    this.castOrchestrator = new CastOrchestrator(this, {
      spells: services.spells,
      disableRules: services.disableRules,
      spellFactory: services.spellFactory,
      registry: this.pendingSpells,
    });
    this.resolvedLevel = synced.level;
    this.initialiseHitRadius(services.creatureModels, creature);
  }

  get id(): string {
    return this.synced.id;
  }

  get level(): number {
    return this.synced.level;
  }

  get hitRadius(): number {
    return this.synced.hitRadius;
  }

  get pendingSpellCount(): number {
    return this.pendingSpells.size;
  }

  /** Level changes rescale every level based modifier. */
  setLevel(level: number): void {
    this.synced.level = level;
    this.syncLevel();
  }

  /**
   * Advance pending spells and publish changed property values.
   * Must be called once per simulation tick.
   */
  update(elapsedMs: number): void {
    this.pendingSpells.advance(elapsedMs);
    this.refreshCasting();
    this.flushProperties();
  }

  dispose(): void {
    this.pendingSpells.disposeAll();
    this.synced.isCasting = false;
  }

  castSpell(parameters: SpellParameters): CastOutcome;
  castSpell(spell4Id: number, parameters: SpellParameters): CastOutcome;
  castSpell(baseId: number, tierIndex: number, parameters: SpellParameters): CastOutcome;
  castSpell(
    first: number | SpellParameters,
    second?: number | SpellParameters,
    third?: SpellParameters,
  ): CastOutcome {
    const outcome = this.dispatchCast(first, second, third);
    this.refreshCasting();
    return outcome;
  }

  /** Cancel any casting spells that are interrupted by movement. */
  cancelSpellsOnMove(): void {
    this.pendingSpells.cancelAllOnMovement();
    this.refreshCasting();
  }

  cancelSpellCast(castingId: number): void {
    this.pendingSpells.cancelByCastingId(castingId);
    this.refreshCasting();
  }

  isCasting(): boolean {
    return this.pendingSpells.isAnyCasting();
  }

  /** An unfinished spell with the given id whose casting state matches `isCasting`. */
  getSpell(spell4Id: number, isCasting = false): Spell | undefined {
    return this.pendingSpells.find(
      (spell) => spell.isCasting === isCasting && !spell.isFinished && spell.spell4Id === spell4Id,
    );
  }

  /** An unfinished spell with the given cast method that is no longer casting. */
  getSpellByCastMethod(castMethod: CastMethod): Spell | undefined {
    return this.pendingSpells.find(
      (spell) => !spell.isCasting && !spell.isFinished && spell.castMethod === castMethod,
    );
  }

  hasSpell(predicate: SpellPredicate): boolean {
    return this.pendingSpells.find(predicate) !== undefined;
  }

  getActiveSpell(predicate: SpellPredicate): Spell | undefined {
    return this.pendingSpells.find(predicate);
  }

  /**
   * Add or replace the modifier a spell contributes to a property.
   * Modifiers stay until removed, even after the spell finishes.
   */
  addSpellModifierProperty(modifier: SpellPropertyModifier, spell4Id: number): void {
    this.modifierStore.addOrReplace(spell4Id, modifier);
    this.dirtyProperties.add(modifier.property);
  }

  removeSpellProperty(property: Property, spell4Id: number): void {
    if (this.modifierStore.remove(property, spell4Id)) {
      this.dirtyProperties.add(property);
    }
  }

  /** Remove every property modifier contributed by a spell. */
  removeSpellProperties(spell4Id: number): void {
    for (const property of this.modifierStore.removeAllForSource(spell4Id)) {
      this.dirtyProperties.add(property);
    }
  }

  setBaseProperty(property: Property, value: number): void {
    this.baseProperties.set(property, value);
    this.dirtyProperties.add(property);
  }

  getBaseProperty(property: Property): number {
    return this.baseProperties.get(property) ?? 0;
  }

  /** Resolved value of a property, recomputed only after something changed it. */
  getPropertyValue(property: Property): number {
    this.syncLevel();
    const cached = this.resolvedProperties.get(property);
    if (cached !== undefined && !this.dirtyProperties.has(property)) {
      return cached;
    }
    return this.calculateProperty(property);
  }

  /** Recompute every dirty property and write it to the synced state. */
  flushProperties(): void {
    this.syncLevel();
    for (const property of [...this.dirtyProperties]) {
      this.calculateProperty(property);
    }
  }

  private dispatchCast(
    first: number | SpellParameters,
    second?: number | SpellParameters,
    third?: SpellParameters,
  ): CastOutcome {
    if (typeof first !== "number") {
      return this.castOrchestrator.castSpell(first);
    }
    if (typeof second === "number") {
      if (!third) {
        throw new SpellArgumentError("Spell parameters are required.");
      }
      return this.castOrchestrator.castSpellByTier(first, second, third);
    }
    if (!second) {
      throw new SpellArgumentError("Spell parameters are required.");
    }
    return this.castOrchestrator.castSpellById(first, second);
  }

  private refreshCasting(): void {
    this.synced.isCasting = this.pendingSpells.isAnyCasting();
  }

  // Cached values are only valid for the level they were resolved at
  private syncLevel(): void {
    if (this.synced.level === this.resolvedLevel) {
      return;
    }
    this.resolvedLevel = this.synced.level;
    for (const property of this.resolvedProperties.keys()) {
      this.dirtyProperties.add(property);
    }
  }

  private calculateProperty(property: Property): number {
    const value = this.resolver.resolve(property, this.getBaseProperty(property), {
      level: this.level,
    });
    this.resolvedProperties.set(property, value);
    this.dirtyProperties.delete(property);
    this.synced.properties.set(property, value);
    return value;
  }

  private initialiseHitRadius(lookup: CreatureModelLookup, creature?: CreatureEntry): void {
    if (!creature) {
      return;
    }
    const modelInfo = lookup.getCreatureModelInfo(creature.modelInfoId);
    if (modelInfo) {
      this.synced.hitRadius = modelInfo.hitRadius * creature.modelScale;
    }
  }
}
