import { getEnv } from '../src/utils/env.js';
import { MetrixClient } from '../src/services/metrixClient.js';
import { findSessionForTomorrow } from '../src/features/announcement/selectSession.js';
import { formatNorwegianDateTime, formatSessionPost } from '../src/features/announcement/formatPost.js';

// Prints what the announcer would see for a series without posting anything.
// Usage: npm run debug:series -- [seriesUrl]
const run = async () => {
  const env = getEnv();
  const seriesUrl = process.argv[2] ?? env.METRIX_SERIES_URL;
  const client = new MetrixClient({ baseUrl: env.METRIX_BASE_URL });

  const sessions = await client.fetchSeriesSessions(seriesUrl);
  for (const session of sessions) {
    console.log(`${formatNorwegianDateTime(session.startTime)}  ${session.title}  ${session.detailUrl}`);
  }

  const next = findSessionForTomorrow(sessions, { now: new Date(), timeZone: env.TIMEZONE });
  if (!next) {
    console.log('\nNo round tomorrow.');
    return;
  }

  const detail = await client.fetchSessionDetail(next);
  console.log(`\n${formatSessionPost(detail, { seriesName: env.SERIES_NAME })}`);
};

run().catch((error) => {
  console.error(error);
  process.exit(1);
});
