import { TICK_RATE } from "@runeforge/shared-protocol";
import { readIdListEnv, readNumberEnv, readStringEnv, type Env } from "@runeforge/shared-servers";
import { DEFAULT_GAME_DATA_PATH } from "./data/game-data-loader";

export interface AppConfig {
  gameDataPath: string;
  disabledBaseSpellIds: number[];
  disabledSpellIds: number[];
  tickRate: number;
}

/**
 * Reads server settings from the environment. Invalid values fall back to defaults.
 */
export const loadAppConfig = (env: Env = process.env): AppConfig => {
  const tickRate = readNumberEnv(env, "TICK_RATE", TICK_RATE);
  return {
    gameDataPath: readStringEnv(env, "GAME_DATA_PATH") ?? DEFAULT_GAME_DATA_PATH,
    disabledBaseSpellIds: readIdListEnv(env, "DISABLED_BASE_SPELLS"),
    disabledSpellIds: readIdListEnv(env, "DISABLED_SPELLS"),
    tickRate: tickRate > 0 ? tickRate : TICK_RATE,
  };
};
