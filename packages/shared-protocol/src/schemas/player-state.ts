import { type } from "@colyseus/schema";
import { UnitState } from "./unit-state.js";

/**
 * Shared player schema synced to clients.
 */
export class PlayerState extends UnitState {
  /** Unique player identifier. */
  @type("string") playerId = "";

  /** Whether the player is riding a mount. */
  @type("boolean") isMounted = false;
}
