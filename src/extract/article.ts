import { createLogger, describeError, type Logger } from '../utils/logger';
import {
  PubmedArticleSchema,
  pmidOf,
  type PubmedAuthor,
  type RawArticleRecord,
} from '../ingest/pubmed/schemas';
import { isCompanyAffiliation } from './affiliations';
import { parsePublicationDate } from './dates';
import { harvestEmails } from './emails';
import { stripInlineMarkup } from './markup';

export interface ExtractedArticle {
  readonly pmid: string;
  readonly title: string;
  readonly publicationDate: string;
  /** Author order; an author listed twice in the record appears twice. */
  readonly nonAcademicAuthors: readonly string[];
  readonly companyAffiliations: ReadonlySet<string>;
  readonly emails: ReadonlySet<string>;
}

export type SkipReason = 'missing_pmid' | 'missing_title' | 'unknown_date' | 'no_company_authors';

export type ExtractionResult =
  | { status: 'extracted'; article: ExtractedArticle }
  | { status: 'skipped'; pmid?: string; reason: SkipReason }
  | { status: 'failed'; pmid?: string; error: string };

const defaultLogger = createLogger('Extract');

function authorName(author: PubmedAuthor): string | null {
  const foreName = author.ForeName?.trim();
  const lastName = author.LastName?.trim();
  if (!foreName || !lastName) return null;
  return `${foreName} ${lastName}`;
}

function extract(raw: RawArticleRecord, logger: Logger): ExtractionResult {
  const parsed = PubmedArticleSchema.safeParse(raw);
  if (!parsed.success) {
    const pmid = pmidOf(raw);
    const error = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    logger.error(`Malformed record for PMID ${pmid ?? 'unknown'}`, { error });
    return { status: 'failed', pmid, error };
  }

  const article = parsed.data.MedlineCitation.Article;
  const pmid = parsed.data.MedlineCitation.PMID?.trim();
  if (!pmid) {
    return { status: 'skipped', reason: 'missing_pmid' };
  }

  const title = stripInlineMarkup(article.ArticleTitle ?? '');
  if (!title) {
    return { status: 'skipped', pmid, reason: 'missing_title' };
  }

  const pubDate = article.Journal?.JournalIssue?.PubDate;
  const date = parsePublicationDate(
    {
      year: pubDate?.Year,
      month: pubDate?.Month,
      day: pubDate?.Day,
      medlineDate: pubDate?.MedlineDate,
    },
    logger
  );
  if (date.kind === 'unknown') {
    logger.debug(`Skipping PMID ${pmid}: ${date.reason}`);
    return { status: 'skipped', pmid, reason: 'unknown_date' };
  }

  const nonAcademicAuthors: string[] = [];
  const companyAffiliations = new Set<string>();
  const emails = new Set<string>();

  if (article.ElectronicMailAddress) {
    for (const email of harvestEmails(article.ElectronicMailAddress, logger)) emails.add(email);
  }

  for (const author of article.AuthorList?.Author ?? []) {
    const name = authorName(author);
    if (!name) continue;

    let hasCompany = false;
    for (const info of author.AffiliationInfo ?? []) {
      const affiliation = stripInlineMarkup(info.Affiliation ?? '');
      if (!affiliation) continue;

      for (const email of harvestEmails(affiliation, logger)) emails.add(email);
      if (isCompanyAffiliation(affiliation)) {
        hasCompany = true;
        companyAffiliations.add(affiliation);
      }
    }

    if (hasCompany) nonAcademicAuthors.push(name);
  }

  if (nonAcademicAuthors.length === 0 || companyAffiliations.size === 0) {
    return { status: 'skipped', pmid, reason: 'no_company_authors' };
  }

  return {
    status: 'extracted',
    article: {
      pmid,
      title,
      publicationDate: date.value,
      nonAcademicAuthors,
      companyAffiliations,
      emails,
    },
  };
}

/**
 * Turns one raw PubMed record into an {@link ExtractedArticle} when at least one
 * author has a company affiliation. Never throws; anything unexpected comes back
 * as a `failed` result.
 */
export function extractArticleInfo(
  raw: RawArticleRecord,
  logger: Logger = defaultLogger
): ExtractionResult {
  try {
    return extract(raw, logger);
  } catch (error) {
    const pmid = pmidOf(raw);
    logger.error(`Error extracting info for PMID ${pmid ?? 'unknown'}`, {
      error: describeError(error),
    });
    return { status: 'failed', pmid, error: describeError(error) };
  }
}
