import { logger } from "../logger";

export const silenceLogger = (): void => {
  logger.level = "silent";
};
