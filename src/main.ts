import { getEnv, type Env } from './utils/env.js';
import { logger } from './utils/logger.js';
import { scheduleAnnouncements } from './utils/scheduler.js';
import { MetrixClient } from './services/metrixClient.js';
import { FacebookPublisher } from './services/facebookClient.js';
import { createTomorrowAnnouncer } from './tasks/announceTomorrow.js';

const buildAnnouncer = (env: Env) =>
  createTomorrowAnnouncer({
    source: new MetrixClient({ baseUrl: env.METRIX_BASE_URL }),
    publisher: new FacebookPublisher({
      pageId: env.FB_PAGE_ID,
      accessToken: env.FB_PAGE_TOKEN,
      graphApiVersion: env.GRAPH_API_VERSION,
      baseUrl: env.GRAPH_API_BASE_URL
    }),
    seriesUrl: env.METRIX_SERIES_URL,
    seriesName: env.SERIES_NAME,
    timeZone: env.TIMEZONE,
    dryRun: env.DRY_RUN
  });

const bootstrap = async () => {
  const env = getEnv();
  logger.setLevel(env.LOG_LEVEL);

  const announce = buildAnnouncer(env);

  if (env.ANNOUNCE_CRON) {
    scheduleAnnouncements(announce, env.ANNOUNCE_CRON, env.TIMEZONE);
    logger.info('Announcer scheduled', { cron: env.ANNOUNCE_CRON, timezone: env.TIMEZONE });
    return;
  }

  const outcome = await announce();
  logger.debug('Announcer finished', { status: outcome.status });
};

bootstrap().catch((error) => {
  logger.error('Fatal error', {
    error: error instanceof Error ? error.stack : String(error)
  });
  process.exit(1);
});
