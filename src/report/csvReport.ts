import { writeFile } from 'fs/promises';
import { createLogger, describeError, type Logger } from '../utils/logger';
import { UNKNOWN_DATE } from '../extract/dates';
import type { ExtractedArticle } from '../extract/article';

export const REPORT_COLUMNS = [
  'PubmedID',
  'Title',
  'Publication Date',
  'Non-academic Authors',
  'Company Affiliations',
  'Corresponding Author Email',
] as const;

export type ReportColumn = (typeof REPORT_COLUMNS)[number];

export type ReportRow = Record<ReportColumn, string>;

export type ReportWriteResult =
  | { status: 'written'; filePath: string; rows: number }
  | { status: 'empty'; reason: 'no_articles' | 'no_complete_rows' }
  | { status: 'failed'; filePath: string; error: string };

export const EMAIL_NOT_AVAILABLE = 'Not available';

const REQUIRED_COLUMNS: readonly ReportColumn[] = REPORT_COLUMNS.filter(
  (column) => column !== 'Corresponding Author Email'
);

const PLACEHOLDER_VALUES = new Set(['', UNKNOWN_DATE, 'None']);

const JOINER = '; ';

const defaultLogger = createLogger('Report');

export function toReportRow(article: ExtractedArticle): ReportRow {
  return {
    PubmedID: article.pmid,
    Title: article.title,
    'Publication Date': article.publicationDate,
    'Non-academic Authors': article.nonAcademicAuthors.join(JOINER),
    'Company Affiliations': [...article.companyAffiliations].join(JOINER),
    'Corresponding Author Email':
      article.emails.size > 0 ? [...article.emails].join(JOINER) : EMAIL_NOT_AVAILABLE,
  };
}

export function isCompleteRow(row: ReportRow): boolean {
  return REQUIRED_COLUMNS.every((column) => !PLACEHOLDER_VALUES.has(row[column].trim()));
}

export function buildReportRows(articles: readonly ExtractedArticle[]): ReportRow[] {
  return articles.map(toReportRow).filter(isCompleteRow);
}

function escapeCsv(val: string): string {
  if (val.includes(',') || val.includes('"') || val.includes('\n') || val.includes('\r')) {
    return '"' + val.replace(/"/g, '""') + '"';
  }
  return val;
}

export function renderCsv(rows: readonly ReportRow[]): string {
  const lines = [REPORT_COLUMNS.map(escapeCsv).join(',')];
  for (const row of rows) {
    lines.push(REPORT_COLUMNS.map((column) => escapeCsv(row[column])).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}

export async function writeReport(
  articles: readonly ExtractedArticle[],
  filePath: string,
  logger: Logger = defaultLogger
): Promise<ReportWriteResult> {
  if (articles.length === 0) {
    logger.warn('No data to save.');
    return { status: 'empty', reason: 'no_articles' };
  }

  const rows = buildReportRows(articles);
  if (rows.length === 0) {
    logger.warn('No valid entries found after filtering.');
    return { status: 'empty', reason: 'no_complete_rows' };
  }

  try {
    await writeFile(filePath, renderCsv(rows), 'utf-8');
  } catch (error) {
    logger.error('Error saving to CSV', { filePath, error: describeError(error) });
    return { status: 'failed', filePath, error: describeError(error) };
  }

  logger.info(`Results saved to ${filePath} with ${rows.length} valid entries`);
  return { status: 'written', filePath, rows: rows.length };
}
