import type { RawArticleRecord } from '../ingest/pubmed/schemas';
import type { ReportWriteResult } from '../report/csvReport';

export interface ArticleFetcher {
  fetchArticles(query: string, maxResults: number): Promise<RawArticleRecord[]>;
}

export interface SearchOptions {
  query: string;
  outputFile: string;
  maxResults: number;
}

export interface SearchRunResult {
  query: string;
  stats: {
    fetched: number;
    extracted: number;
    skipped: number;
    failed: number;
    processingTimeMs: number;
  };
  /** Absent when no article qualified and nothing was handed to the report writer. */
  report?: ReportWriteResult;
}
