import { logger } from "@runeforge/shared-servers";
import { loadAppConfig } from "./app-config";
import { bootWorld } from "./world/world";

const bootServer = async () => {
  const config = loadAppConfig();
  const world = await bootWorld(config);

  const tickMs = 1000 / config.tickRate;
  let lastTick = performance.now();
  const timer = setInterval(() => {
    const now = performance.now();
    world.fixedTick(now - lastTick);
    lastTick = now;
  }, tickMs);

  const shutdown = () => {
    clearInterval(timer);
    world.dispose();
    logger.info("World stopped");
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

bootServer().catch((error: unknown) => {
  logger.error({ err: error }, "Failed to boot server");
  process.exitCode = 1;
});
