// Shared game constants
// Configuration values used by both server and client

// Timing
export const TICK_RATE = 20; // Server updates per second
export const TICK_MS = 1000 / TICK_RATE; // Milliseconds per tick (50ms)

// Units
export const DEFAULT_HIT_RADIUS = 1;
