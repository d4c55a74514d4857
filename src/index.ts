import cron from "node-cron";
import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import { logger } from "./logger";
import { PageClient } from "./pageClient";
import { runCycle } from "./scheduleJob";
import { ScheduleParser } from "./scheduleParser";
import { SnapshotStore } from "./snapshotStore";

const config = loadConfig();

const client = new PageClient(config);
const parser = new ScheduleParser(config.timezone);
const store = new SnapshotStore(config.outputDir, config.regionFileName);

let running = false;

async function tick(): Promise<void> {
  if (running) {
    logger.warn("Previous cycle still running, skipping this tick");
    return;
  }

  running = true;
  logger.info("Starting fetch → parse → diff → save cycle");
  try {
    const result = await runCycle({
      source: client,
      parser,
      store,
      regionId: config.regionId,
      timezone: config.timezone,
    });

    if (result.updated) {
      logger.info(
        `Cycle complete: ${result.grids.length} grid plan(s), worse=${result.worse}, better=${result.better}`
      );
    } else {
      logger.info(`Cycle finished without update (${result.reason})`);
    }
  } catch (error) {
    logger.error(`Failed to complete cycle: ${errorMessage(error)}`, error);
  } finally {
    running = false;
  }
}

function bootstrap(): void {
  const task = cron.schedule(config.cronPattern, () => void tick(), {
    timezone: config.timezone,
  });

  logger.info(`Scheduler ready with pattern "${config.cronPattern}"`);
  logger.info(`Results will be stored under ${config.outputDir}`);

  void tick();

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}. Shutting down scheduler...`);
    task.stop();
    client
      .close()
      .catch((error: unknown) => {
        logger.error(`Failed to close browser: ${errorMessage(error)}`, error);
      })
      .finally(() => process.exit(0));
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap();
