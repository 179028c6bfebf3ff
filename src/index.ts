/**
 * SOC alert relay entry point
 *
 * Runs the ingest HTTP server and the Telegram command poller side by side.
 * Both share one registry store and one dispatcher.
 */

import { createAlertCoordinator } from "./alerting/coordinator";
import { createDispatcher } from "./alerting/dispatcher";
import { createSubscriptionGate } from "./alerting/gate";
import { TelegramBotClient } from "./alerting/providers/telegram";
import { createCommandRouter } from "./bot/commands";
import { CommandPoller } from "./bot/poller";
import { validateConfig } from "./lib/config";
import { logger } from "./lib/logger";
import { RegistryStore } from "./registry/store";
import { createApp, type FastifyApp } from "./server/app";

let app: FastifyApp | null = null;
let poller: CommandPoller | null = null;

async function main() {
  try {
    const config = validateConfig();

    const store = new RegistryStore({ filePath: config.registryFile });
    const telegram = new TelegramBotClient(config.botToken);
    const dispatcher = createDispatcher({
      sender: telegram,
      timeoutMs: config.deliveryTimeoutMs,
    });
    const coordinator = createAlertCoordinator({
      gate: createSubscriptionGate(store),
      dispatcher,
    });

    const me = await telegram.getMe();
    logger.info(
      { bot: me.username, recipients: (await store.list()).length },
      "Telegram bot authenticated",
    );

    app = await createApp({ apiKey: config.apiKey, coordinator });
    await app.listen({ host: config.host, port: config.port });

    poller = new CommandPoller({
      client: telegram,
      router: createCommandRouter({
        store,
        dispatcher,
        superAdminIds: config.superAdminIds,
      }),
      pollTimeoutSeconds: config.pollTimeoutSeconds,
    });
    await poller.start();

    logger.info(
      { host: config.host, port: config.port, env: config.env },
      "SOC alert relay started",
    );
  } catch (error) {
    logger.error(error, "Fatal error during startup");
    process.exit(1);
  }
}

// Handle graceful shutdown
const gracefulShutdown = async () => {
  logger.info("Shutting down gracefully...");

  if (poller) {
    await poller.stop();
  }

  if (app) {
    await app.close();
  }

  logger.info("Shutdown complete");
  process.exit(0);
};

const onSignal = () => {
  gracefulShutdown().catch((error) => {
    logger.error(error, "Error during shutdown");
    process.exit(1);
  });
};

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

// Start the app
main().catch((error) => {
  logger.error(error, "Unhandled error");
  process.exit(1);
});
