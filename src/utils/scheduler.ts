import nodeCron from 'node-cron';

import { logger } from './logger.js';

export type CronTask = () => Promise<unknown>;

/**
 * Daemon mode for hosts without an external scheduler. A failing run is logged and the
 * next tick still fires.
 */
export const scheduleAnnouncements = (task: CronTask, expression: string, timezone: string) => {
  if (!nodeCron.validate(expression)) {
    throw new Error(`Invalid cron expression: ${expression}`);
  }

  return nodeCron.schedule(
    expression,
    async () => {
      try {
        await task();
      } catch (error) {
        logger.error('Scheduled announcement failed', {
          error: error instanceof Error ? error.stack : String(error)
        });
      }
    },
    { timezone }
  );
};
