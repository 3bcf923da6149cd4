import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { logger } from "@runeforge/shared-servers";
import { GameDataCatalog } from "./game-data-catalog";
import { parseGameData } from "./game-data-parser";

export const DEFAULT_GAME_DATA_PATH = fileURLToPath(
  new URL("../../data/game-data.json", import.meta.url),
);

export abstract class GameDataLoader {
  abstract load(): Promise<GameDataCatalog>;
}

export class DefaultGameDataLoader extends GameDataLoader {
  constructor(private readonly filePath: string = DEFAULT_GAME_DATA_PATH) {
    super();
  }

  async load(): Promise<GameDataCatalog> {
    const json = await readFile(this.filePath, "utf8");
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      throw new Error(`Game data file ${this.filePath} is not valid JSON.`, { cause: error });
    }
    const catalog = new GameDataCatalog(parseGameData(raw));
    logger.info({ filePath: this.filePath, spells: catalog.spellCount }, "Game data loaded");
    return catalog;
  }
}
