import { CONFIG } from "./config";
import { setLogLevel, logger, errorMessage } from "./logger";
import { FileStore } from "./storage/fileStore";
import { buildServices } from "./services";
import { Scheduler } from "./scheduler";
import { registerEconomyJobs } from "./jobs";
import { SlackMessageSender, SlackPresenceProvider } from "./messaging";
import { buildSlackApp, registerOnboarding } from "./slackApp";

async function init() {
  setLogLevel(CONFIG.logLevel);
  const store = new FileStore({ dataDir: CONFIG.dataDir, stateFile: CONFIG.stateFile });
  await store.init();

  logger.info("Initial config", {
    dataDir: CONFIG.dataDir,
    stateFile: CONFIG.stateFile,
    rooms: CONFIG.rooms,
    maintenance: CONFIG.economy.maintenance.mode,
  });

  const services = buildServices({ store, config: CONFIG.economy });

  const app = buildSlackApp();
  const messages = new SlackMessageSender(app.client);
  registerOnboarding(app, services.economy, messages);
  await app.start({ port: CONFIG.slack.port });
  logger.info("Slack app running (socket)", { port: CONFIG.slack.port });

  const scheduler = new Scheduler();
  registerEconomyJobs(scheduler, {
    rooms: CONFIG.rooms,
    config: CONFIG.economy,
    economy: services.economy,
    challenges: services.challenges,
    heists: services.heists,
    presence: new SlackPresenceProvider(app.client, CONFIG.economy.ignoredUsers),
    messages,
  });
  scheduler.start();

  const shutdown = async (signal: string) => {
    logger.info("Shutting down", { signal });
    const errors = await scheduler.stop();
    for (const e of errors) logger.warn("Task drain error", { error: errorMessage(e) });
    await app.stop();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((e) => {
        logger.error("Shutdown error", { error: errorMessage(e) });
        process.exit(1);
      });
    });
  }
}

init().catch((e) => {
  logger.error("Fatal init error", { error: errorMessage(e) });
  process.exit(1);
});
