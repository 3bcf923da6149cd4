export { CastOrchestrator, resolveCastMethod } from "./cast-orchestrator";
export type {
  CastFailReason,
  CastOrchestratorOptions,
  CastOutcome,
  CastRejectReason,
  DisableRuleCheck,
} from "./cast-orchestrator";
export { SpellArgumentError } from "./errors";
export { PendingSpellRegistry } from "./pending-spell-registry";
export { PropertyModifierStore } from "./property-modifier-store";
export { PropertyResolver, applyModifiers, orderByPriority, type LevelContext } from "./property-resolver";
export { DefaultSpellFactory, type SpellBuilder } from "./spell-factory";
export {
  flat,
  getAlterationValue,
  levelScaled,
  percentage,
  type AlterationValue,
  type PropertyAlteration,
  type SpellPropertyModifier,
} from "./spell-modifier";
export type * from "./spell-types";
export { TimedSpell, type SpellInit, type TimedSpellOptions } from "./timed-spell";
