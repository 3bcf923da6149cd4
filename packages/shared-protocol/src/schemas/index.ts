// Shared Colyseus schemas
// These schemas are used by both server and client for state synchronization

export { UnitState } from "./unit-state.js";
export { PlayerState } from "./player-state.js";
export { CreatureState } from "./creature-state.js";
