import { createLogger, describeError, type Logger } from '../utils/logger';

export const UNKNOWN_DATE = 'Unknown';

export interface PublicationDateParts {
  year?: string;
  month?: string;
  day?: string;
  medlineDate?: string;
}

export type DateParseResult =
  | { kind: 'parsed'; value: string; source: 'structured' | 'medline' }
  | { kind: 'unknown'; reason: string };

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const defaultLogger = createLogger('Dates');

// Only full English month names are recognised; anything else maps to January.
function monthNumber(month: string): string {
  if (/^\d+$/.test(month)) {
    return month.padStart(2, '0');
  }
  const index = MONTH_NAMES.indexOf(month.toLowerCase());
  return index >= 0 ? String(index + 1).padStart(2, '0') : '01';
}

function dayNumber(day: string): string {
  return /^\d+$/.test(day) ? day.padStart(2, '0') : '01';
}

export function parsePublicationDate(
  parts: PublicationDateParts,
  logger: Logger = defaultLogger
): DateParseResult {
  try {
    const year = parts.year?.trim();
    if (year) {
      const month = monthNumber(parts.month?.trim() || '01');
      const day = dayNumber(parts.day?.trim() || '01');
      return { kind: 'parsed', value: `${year}-${month}-${day}`, source: 'structured' };
    }

    const medline = parts.medlineDate?.trim();
    if (medline) {
      const match = medline.match(/(?<!\d)(\d{4})(?!\d)/);
      if (match) {
        return { kind: 'parsed', value: `${match[1]}-01-01`, source: 'medline' };
      }
      return { kind: 'unknown', reason: `no year in medline date "${medline}"` };
    }

    return { kind: 'unknown', reason: 'no year or medline date' };
  } catch (error) {
    logger.warn('Error parsing publication date', { error: describeError(error) });
    return { kind: 'unknown', reason: describeError(error) };
  }
}

export function publicationDateToString(result: DateParseResult): string {
  return result.kind === 'parsed' ? result.value : UNKNOWN_DATE;
}

export function normalizePublicationDate(
  parts: PublicationDateParts,
  logger: Logger = defaultLogger
): string {
  return publicationDateToString(parsePublicationDate(parts, logger));
}
