import type { LocalDateTime, SessionDetail } from '../../types.js';
import { weekdayOf } from '../../utils/dates.js';

// nb-NO locale data is not assumed on the host, so no Intl here.
const NORWEGIAN_WEEKDAYS = ['søndag', 'mandag', 'tirsdag', 'onsdag', 'torsdag', 'fredag', 'lørdag'] as const;

const NORWEGIAN_MONTHS = [
  'januar',
  'februar',
  'mars',
  'april',
  'mai',
  'juni',
  'juli',
  'august',
  'september',
  'oktober',
  'november',
  'desember'
] as const;

export const DESCRIPTION_LIMIT = 200;

const pad = (value: number) => String(value).padStart(2, '0');

const capitalize = (value: string) => value.charAt(0).toUpperCase() + value.slice(1);

/** e.g. `Lørdag 15. mars 2025 kl. 10:00` */
export const formatNorwegianDateTime = (value: LocalDateTime): string => {
  const weekday = capitalize(NORWEGIAN_WEEKDAYS[weekdayOf(value)]);
  const month = NORWEGIAN_MONTHS[value.month - 1];
  return `${weekday} ${pad(value.day)}. ${month} ${value.year} kl. ${pad(value.hour)}:${pad(value.minute)}`;
};

export const truncateDescription = (description: string, limit = DESCRIPTION_LIMIT): string => {
  const codePoints = Array.from(description);
  return codePoints.length > limit ? `${codePoints.slice(0, limit).join('')}...` : description;
};

export interface FormatOptions {
  seriesName: string;
}

export const formatSessionPost = (session: SessionDetail, { seriesName }: FormatOptions): string =>
  [
    `📣 Neste runde i ${seriesName} nærmer seg!`,
    '',
    `🏆 ${session.title}`,
    `📅 ${formatNorwegianDateTime(session.startTime)}`,
    `⛳ ${session.venueName}`,
    `🗺️ Layout: ${session.layoutName}`,
    '',
    `ℹ️ ${truncateDescription(session.description)}`,
    '',
    `🔗 Mer info og påmelding: ${session.detailUrl}`
  ].join('\n');
