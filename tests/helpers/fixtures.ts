import type { RawArticleRecord } from '../../src/ingest/pubmed/schemas';
import type { ExtractedArticle } from '../../src/extract/article';

export interface AuthorFixture {
  foreName?: string;
  lastName?: string;
  affiliations?: string[];
}

export interface ArticleFixture {
  pmid?: string;
  title?: string;
  pubDate?: Record<string, string>;
  authors?: AuthorFixture[];
  email?: string;
}

/** Builds a record shaped like a parsed efetch `PubmedArticle` node. */
export function rawArticle(fixture: ArticleFixture = {}): RawArticleRecord {
  const article: Record<string, unknown> = {
    Journal: {
      JournalIssue: {
        PubDate: fixture.pubDate ?? { Year: '2022', Month: 'June', Day: '3' },
      },
    },
    ArticleTitle: fixture.title ?? 'A study of kinase inhibitors',
    AuthorList: {
      Author: (fixture.authors ?? []).map((a) => ({
        ...(a.lastName !== undefined ? { LastName: a.lastName } : {}),
        ...(a.foreName !== undefined ? { ForeName: a.foreName } : {}),
        AffiliationInfo: (a.affiliations ?? []).map((affiliation) => ({ Affiliation: affiliation })),
      })),
    },
  };
  if (fixture.email !== undefined) {
    article.ElectronicMailAddress = fixture.email;
  }
  return {
    MedlineCitation: {
      PMID: fixture.pmid ?? '1000',
      Article: article,
    },
  };
}

export function extractedArticle(overrides: Partial<ExtractedArticle> = {}): ExtractedArticle {
  return {
    pmid: '1000',
    title: 'A study of kinase inhibitors',
    publicationDate: '2022-06-03',
    nonAcademicAuthors: ['Jane Doe'],
    companyAffiliations: new Set(['Acme Therapeutics Inc., Boston, MA']),
    emails: new Set<string>(),
    ...overrides,
  };
}
