import { MapSchema, Schema, type } from "@colyseus/schema";
import { DEFAULT_HIT_RADIUS } from "../constants/index.js";

/**
 * Shared unit state schema synced to clients.
 * Represents common state for any animate entity able to cast spells.
 */
export class UnitState extends Schema {
  /** Unique entity instance identifier. */
  @type("string") id = "";

  /** Display name. */
  @type("string") name = "";

  /** Unit level, used when scaling level based modifiers. */
  @type("uint8") level = 1;

  /** Radius used for melee reach and targeting. */
  @type("float32") hitRadius = DEFAULT_HIT_RADIUS;

  /** Whether any pending spell is still casting. */
  @type("boolean") isCasting = false;

  /**
   * Resolved property values keyed by property name.
   */
  @type({ map: "float64" }) properties = new MapSchema<number>();
}
