/**
 * Main module for the alert triage assistant
 */

import "dotenv/config";
import { fileURLToPath } from "url";
import { createBot } from "./bot.js";
import { SystemError, SystemErrorSubType } from "./errors/index.js";
import { createServices } from "./services.js";
import { loadConfig, logger } from "./utils.js";

async function main(): Promise<void> {
  logger.info("Starting alert triage assistant...");

  try {
    const config = loadConfig();
    if (config.telegramToken === undefined) {
      throw new SystemError(
        "TELEGRAM_BOT_TOKEN is required to start the bot",
        SystemErrorSubType.CONFIG
      );
    }

    const services = createServices(config);

    const loaded = await services.store.load();
    logger.info(`Knowledge base ready: ${loaded} chunks in "${services.store.collection}"`);

    const availability = await services.inference.checkAvailability();
    if (!availability.available) {
      logger.warn(
        `Model endpoint not available, analyses will use rule-based fallback: ${availability.error ?? "unknown error"}`
      );
    }

    const bot = createBot(config.telegramToken, services);

    const shutdown = (signal: string): void => {
      logger.info(`${signal} received, stopping bot...`);
      bot
        .stop()
        .then(() => services.store.flush())
        .catch((error: unknown) => logger.error("Shutdown error:", error));
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));

    logger.info("Alert triage assistant is ready!");
    await bot.start();
  } catch (error) {
    logger.error("Startup error:", error);
    process.exit(1);
  }
}

if (process.argv[1] !== undefined && fileURLToPath(import.meta.url) === process.argv[1]) {
  main().catch((error) => {
    logger.error("Fatal error:", error);
    process.exit(1);
  });
}

export { main };
