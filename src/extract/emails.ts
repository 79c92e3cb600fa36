import { createLogger, describeError, type Logger } from '../utils/logger';

// Letters and digits from any script, so a local part like "müller" is kept whole.
const ADDRESS = String.raw`[\p{L}\p{N}_.-]+@[\p{L}\p{N}_.-]+\.[\p{L}\p{N}_]+`;

// Patterns overlap; matches are unioned into one set.
const EMAIL_PATTERNS: RegExp[] = [
  new RegExp(ADDRESS, 'gu'),
  new RegExp(String.raw`[Ee]mail:\s*(${ADDRESS})`, 'gu'),
  new RegExp(String.raw`[Ee]-mail:\s*(${ADDRESS})`, 'gu'),
  new RegExp(String.raw`\[(${ADDRESS})\]`, 'gu'),
  new RegExp(String.raw`\((${ADDRESS})\)`, 'gu'),
  new RegExp(String.raw`<(${ADDRESS})>`, 'gu'),
];

const VALID_EMAIL = new RegExp(`^${ADDRESS}$`, 'u');

const EDGE_PUNCTUATION = /^[.,()<>[\]{}]+|[.,()<>[\]{}]+$/g;

const defaultLogger = createLogger('Emails');

export function normalizeEmail(candidate: string): string | null {
  const email = candidate.replace(EDGE_PUNCTUATION, '').toLowerCase();
  return VALID_EMAIL.test(email) ? email : null;
}

export function harvestEmails(text: string, logger: Logger = defaultLogger): ReadonlySet<string> {
  const emails = new Set<string>();
  if (!text) return emails;

  for (const pattern of EMAIL_PATTERNS) {
    try {
      for (const match of text.matchAll(pattern)) {
        const email = normalizeEmail(match[1] ?? match[0]);
        if (email) emails.add(email);
      }
    } catch (error) {
      logger.debug(`Error matching email pattern ${pattern.source}`, {
        error: describeError(error),
      });
    }
  }

  return emails;
}
