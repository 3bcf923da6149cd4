import type { CreatureState } from "@runeforge/shared-protocol";
import type { CreatureEntry } from "../../data/game-data-types";
import { UnitEntity, type UnitServices } from "./unit-entity";

/**
 * Server-only creature spawned from a creature template.
 */
export class ServerCreature extends UnitEntity<CreatureState> {
  constructor(synced: CreatureState, services: UnitServices, creature?: CreatureEntry) {
    super(synced, services, creature);
    if (creature) {
      this.synced.creatureId = creature.id;
    }
  }
}
