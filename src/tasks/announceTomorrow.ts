import type { AnnouncementPublisher, PublishResult, SessionDetail, SessionSource } from '../types.js';
import { logger } from '../utils/logger.js';
import { findSessionForTomorrow } from '../features/announcement/selectSession.js';
import { formatSessionPost } from '../features/announcement/formatPost.js';

interface TomorrowAnnouncerOptions {
  source: SessionSource;
  publisher: AnnouncementPublisher;
  seriesUrl: string;
  seriesName: string;
  timeZone: string;
  dryRun?: boolean;
  clock?: () => Date;
}

export type AnnouncementOutcome =
  | { status: 'no-session' }
  | { status: 'dry-run'; session: SessionDetail; message: string }
  | { status: 'published'; session: SessionDetail; message: string; result: PublishResult };

export const NO_SESSION_MESSAGE = '📭 Ingen runde i morgen.';

export const createTomorrowAnnouncer = ({
  source,
  publisher,
  seriesUrl,
  seriesName,
  timeZone,
  dryRun = false,
  clock = () => new Date()
}: TomorrowAnnouncerOptions) => {
  return async (): Promise<AnnouncementOutcome> => {
    logger.debug('Running tomorrow announcer', { seriesUrl, timeZone });

    const sessions = await source.fetchSeriesSessions(seriesUrl);
    const next = findSessionForTomorrow(sessions, { now: clock(), timeZone });

    if (!next) {
      console.log(NO_SESSION_MESSAGE);
      return { status: 'no-session' };
    }

    const session = await source.fetchSessionDetail(next);
    const message = formatSessionPost(session, { seriesName });

    if (dryRun) {
      logger.info('Dry run, skipping publish', { title: session.title, url: session.detailUrl });
      console.log(message);
      return { status: 'dry-run', session, message };
    }

    const result = await publisher.publish(message);
    return { status: 'published', session, message, result };
  };
};
