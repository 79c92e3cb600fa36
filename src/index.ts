#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig, type AppConfig } from './config';
import { parseCliArgs, USAGE, type CliOptions } from './cli/args';
import { UsageError } from './errors';
import { configureLogging, describeError } from './utils/logger';
import { PubMedClient } from './ingest/pubmed/client';
import { runSearch } from './pipeline/runSearch';

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let config: AppConfig;
  let options: CliOptions;
  try {
    config = loadConfig();
    options = parseCliArgs(argv, {
      file: config.outputFile,
      email: config.ncbiEmail,
      maxResults: config.maxResults,
    });
  } catch (error) {
    console.error(describeError(error));
    if (error instanceof UsageError) console.error(USAGE);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  configureLogging({
    level: options.debug ? 'debug' : config.logLevel,
    pretty: config.logPretty,
  });

  const client = new PubMedClient({
    email: options.email,
    tool: config.ncbiTool,
    apiKey: config.ncbiApiKey,
  });

  await runSearch(
    { query: options.query, outputFile: options.file, maxResults: options.maxResults },
    { fetcher: client }
  );
  return 0;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    }
  );
}

export { runSearch } from './pipeline/runSearch';
export { PubMedClient } from './ingest/pubmed/client';
export { extractArticleInfo } from './extract/article';
export { isCompanyAffiliation, classifyAffiliation } from './extract/affiliations';
export { harvestEmails } from './extract/emails';
export { parsePublicationDate, normalizePublicationDate, UNKNOWN_DATE } from './extract/dates';
export { writeReport, buildReportRows, renderCsv, REPORT_COLUMNS } from './report/csvReport';
export type { ExtractedArticle, ExtractionResult } from './extract/article';
export type { RawArticleRecord } from './ingest/pubmed/schemas';
export * from './pipeline/types';
