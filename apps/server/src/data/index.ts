export { GameDataCatalog } from "./game-data-catalog";
export { DEFAULT_GAME_DATA_PATH, DefaultGameDataLoader, GameDataLoader } from "./game-data-loader";
export {
  GameDataValidationError,
  parseGameData,
  type GameDataValidationIssue,
} from "./game-data-parser";
export type * from "./game-data-types";
