import { Command } from "commander";
import { logger } from "../core/logger";
import { parseIntOption, withService } from "./context";

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

export function registerWatchCommand(program: Command): void {
  program
    .command("watch")
    .description("Keep every registered project in sync until interrupted")
    .option("--interval <seconds>", "Seconds between the end of one pass and the next (overrides settings.json)")
    .option("--no-initial", "Wait one interval before the first pass")
    .action(async (options: { interval?: string; initial: boolean }) => {
      const intervalSeconds = parseIntOption(options.interval, "--interval", 1);
      await withService(async (service, settings) => {
        const scheduler = service.startScheduler({
          intervalSeconds: intervalSeconds ?? settings.sync.intervalSeconds,
          runOnStart: options.initial
        });
        logger.info(
          `Watching ${scheduler.projectIds().length} project(s) every ${intervalSeconds ?? settings.sync.intervalSeconds}s`
        );
        const signal = await waitForShutdownSignal();
        logger.info(`Received ${signal}; waiting for running passes`);
      });
    });
}
