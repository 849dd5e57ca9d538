export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

/** Wall-clock time as printed by the series page, in the series' own zone. */
export interface LocalDateTime extends CalendarDate {
  hour: number;
  minute: number;
}

export interface SessionSummary {
  readonly title: string;
  readonly startTime: LocalDateTime;
  readonly detailUrl: string;
}

export interface SessionDetail extends SessionSummary {
  venueId?: number;
  venueName: string;
  layoutName: string;
  venueAndLayout: string;
  description: string;
}

export interface SessionSource {
  fetchSeriesSessions(seriesUrl: string): Promise<SessionSummary[]>;
  fetchSessionDetail(summary: SessionSummary): Promise<SessionDetail>;
}

export type PublishResult = Record<string, unknown>;

export interface AnnouncementPublisher {
  publish(message: string): Promise<PublishResult>;
}
