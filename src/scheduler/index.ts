import cron from 'node-cron';
import { createLogger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import type { ImportJob } from './ImportJob.js';

export function scheduleImport(job: ImportJob, cronExpression: string, timezone: string): cron.ScheduledTask {
  const logger = createLogger({ component: 'scheduler' });
  if (!cron.validate(cronExpression)) {
    throw new ConfigError(`Invalid IMPORT_SCHEDULE expression: ${cronExpression}`);
  }

  logger.info({ cronExpression, timezone }, 'Scheduling export import job');

  return cron.schedule(
    cronExpression,
    () => {
      job.run().catch((error) => {
        logger.error({ error }, 'Scheduled import failed');
      });
    },
    { timezone }
  );
}
