import axios, { type AxiosInstance } from 'axios';
import { load, type CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';

import type { SessionDetail, SessionSource, SessionSummary } from '../types.js';
import { parseMetrixDateTime } from '../utils/dates.js';
import { logger } from '../utils/logger.js';
import { toNetworkError } from './errors.js';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const UNKNOWN_TITLE = 'Ukjent tittel';
export const UNKNOWN_VENUE = 'Ukjent bane';

const SESSION_LINK_SELECTOR = "nav.competition-selector-large ul li a[href^='/']";
const VENUE_LINK_SELECTOR = "a[href^='/course/']";
const INFO_TAB_SELECTOR = 'div.info-tab-content';

const NON_CONTENT_TAGS = new Set(['script', 'style', 'template']);

interface MetrixClientOptions {
  baseUrl: string;
  http?: AxiosInstance;
}

/** Visible text fragments below `node`, each trimmed, blanks dropped. */
const collectText = (node: AnyNode): string[] => {
  if (isText(node)) {
    const value = node.data.trim();
    return value ? [value] : [];
  }
  if (isTag(node) && NON_CONTENT_TAGS.has(node.name)) {
    return [];
  }
  if (hasChildren(node)) {
    return node.children.flatMap(collectText);
  }
  return [];
};

const joinedText = ($: CheerioAPI, selector: string, separator: string): string | null => {
  const node = $(selector).get(0);
  return node ? collectText(node).join(separator) : null;
};

export const parseSeriesPage = (html: string, baseUrl: string): SessionSummary[] => {
  const $ = load(html);
  const sessions: SessionSummary[] = [];

  for (const element of $(SESSION_LINK_SELECTOR).toArray()) {
    const link = $(element);
    const bold = link.find('b').first();
    if (!bold.length) {
      continue;
    }

    const title = bold.text().trim();
    const remaining = link.text().replaceAll(title, '').trim();
    const startTime = parseMetrixDateTime(remaining);
    if (!startTime) {
      logger.debug('Skipping series link without a start time', { title, text: remaining });
      continue;
    }

    const href = link.attr('href') ?? '';
    sessions.push({ title, startTime, detailUrl: new URL(href, baseUrl).toString() });
  }

  return sessions;
};

interface VenueFields {
  venueId?: number;
  venueName: string;
  layoutName: string;
  venueAndLayout: string;
}

export const parseVenueLink = (href: string, text: string): VenueFields => {
  const idSegment = href.split('/course/').pop() ?? '';
  const venueId = /^\d+$/.test(idSegment) ? Number(idSegment) : undefined;

  const cleaned = text.replaceAll('->', '').trim();
  if (!cleaned) {
    return { venueId, venueName: UNKNOWN_VENUE, layoutName: UNKNOWN_VENUE, venueAndLayout: UNKNOWN_VENUE };
  }

  const parts = cleaned.includes('→')
    ? cleaned
        .split('→')
        .map((part) => part.replace(/^[\s-]+|[\s-]+$/g, ''))
        .filter(Boolean)
    : [];

  if (parts.length >= 2) {
    const [venueName, layoutName] = parts;
    return { venueId, venueName, layoutName, venueAndLayout: `${venueName} – ${layoutName}` };
  }

  return { venueId, venueName: cleaned, layoutName: UNKNOWN_VENUE, venueAndLayout: cleaned };
};

export const parseSessionPage = (html: string, summary: SessionSummary): SessionDetail => {
  const $ = load(html);

  const heading = $('h1').first();
  const title = heading.length ? heading.text().trim() : UNKNOWN_TITLE;

  const venueLink = $(VENUE_LINK_SELECTOR).first();
  const venue: VenueFields = venueLink.length
    ? parseVenueLink(venueLink.attr('href') ?? '', joinedText($, VENUE_LINK_SELECTOR, ' ') ?? '')
    : { venueName: UNKNOWN_VENUE, layoutName: UNKNOWN_VENUE, venueAndLayout: UNKNOWN_VENUE };

  if (!venueLink.length) {
    logger.warn('Session page has no course link, using placeholders', { url: summary.detailUrl });
  }

  return {
    title,
    startTime: summary.startTime,
    detailUrl: summary.detailUrl,
    ...venue,
    description: joinedText($, INFO_TAB_SELECTOR, '\n') ?? ''
  };
};

export class MetrixClient implements SessionSource {
  private readonly baseUrl: string;
  private readonly http: AxiosInstance;

  constructor({ baseUrl, http }: MetrixClientOptions) {
    this.baseUrl = baseUrl;
    this.http = http ?? axios.create();
  }

  async fetchSeriesSessions(seriesUrl: string): Promise<SessionSummary[]> {
    const html = await this.fetchHtml(seriesUrl);
    const sessions = parseSeriesPage(html, this.baseUrl);
    logger.debug('Metrix: parsed series rounds', { count: sessions.length, url: seriesUrl });
    return sessions;
  }

  async fetchSessionDetail(summary: SessionSummary): Promise<SessionDetail> {
    const html = await this.fetchHtml(summary.detailUrl);
    return parseSessionPage(html, summary);
  }

  private async fetchHtml(url: string): Promise<string> {
    try {
      const { data } = await this.http.get<string>(url, {
        headers: { 'User-Agent': BROWSER_USER_AGENT },
        responseType: 'text'
      });
      return data;
    } catch (error) {
      throw toNetworkError(url, error);
    }
  }
}
