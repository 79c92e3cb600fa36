import { limit } from '../utils/limiter';
import { createLogger, type Logger } from '../utils/logger';
import { extractArticleInfo, type ExtractedArticle } from '../extract/article';
import { writeReport } from '../report/csvReport';
import type { ArticleFetcher, SearchOptions, SearchRunResult } from './types';

export interface SearchDeps {
  fetcher: ArticleFetcher;
  logger?: Logger;
}

const defaultLogger = createLogger('Pipeline');

export async function runSearch(
  options: SearchOptions,
  deps: SearchDeps
): Promise<SearchRunResult> {
  const logger = deps.logger ?? defaultLogger;
  const startTime = Date.now();

  logger.info(`Starting PubMed search with query: ${options.query}`);
  const records = await deps.fetcher.fetchArticles(options.query, options.maxResults);

  // Fan out one task per record; each pushes on completion, so order follows completion.
  const extracted: ExtractedArticle[] = [];
  let skipped = 0;
  let failed = 0;

  await Promise.all(
    records.map((record) =>
      limit('article_extract', async () => extractArticleInfo(record, logger)).then((result) => {
        switch (result.status) {
          case 'extracted':
            extracted.push(result.article);
            break;
          case 'skipped':
            skipped++;
            break;
          case 'failed':
            failed++;
            break;
        }
      })
    )
  );

  logger.debug('Extraction finished', {
    fetched: records.length,
    extracted: extracted.length,
    skipped,
    failed,
  });

  let report: SearchRunResult['report'];
  if (extracted.length > 0) {
    report = await writeReport(extracted, options.outputFile, logger);
    logger.info(`Processed ${extracted.length} articles successfully`);
  } else {
    logger.warn('No valid articles found to process');
  }

  return {
    query: options.query,
    stats: {
      fetched: records.length,
      extracted: extracted.length,
      skipped,
      failed,
      processingTimeMs: Date.now() - startTime,
    },
    report,
  };
}
