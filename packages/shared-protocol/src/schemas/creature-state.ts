import { type } from "@colyseus/schema";
import { UnitState } from "./unit-state.js";

/**
 * Synced creature state schema.
 */
export class CreatureState extends UnitState {
  /** Creature template identifier. */
  @type("uint32") creatureId = 0;
}
