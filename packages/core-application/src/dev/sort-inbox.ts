import { ConsoleLogger, parseLogLevel } from "../adapters/console-logger";
import { createInboxSorter } from "../application/create-inbox-sorter";

async function main() {
  const logger = new ConsoleLogger({
    level: parseLogLevel(process.env.INBOX_SORTER_LOG_LEVEL),
    scope: "inbox-sorter",
  });

  const { dispatcher, paths } = createInboxSorter({
    baseDir: process.cwd(),
    logger,
  });

  const requestStop = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, stopping after the current cycle`);
    dispatcher.stop();
  };
  process.once("SIGINT", requestStop);
  process.once("SIGTERM", requestStop);

  logger.info("Starting", { baseDir: paths.baseDir, settings: paths.settingsFile });
  await dispatcher.run();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
