import { createApp } from "./app.js";
import { appConfig } from "./config.js";
import { ensureIndexLoaded } from "./runtime/qaRuntime.js";
import { logger } from "./utils/logger.js";

async function main(): Promise<void> {
  await ensureIndexLoaded();

  const app = createApp();
  app.listen(appConfig.PORT, () => {
    logger.info(`Site QA backend is running on http://localhost:${appConfig.PORT}`);
  });
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Server failed to start");
  process.exitCode = 1;
});
