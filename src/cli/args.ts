import { parseArgs } from 'util';
import { UsageError } from '../errors';
import { describeError } from '../utils/logger';

export interface CliOptions {
  query: string;
  file: string;
  email: string;
  maxResults: number;
  debug: boolean;
  help: boolean;
}

export type CliDefaults = Pick<CliOptions, 'file' | 'email' | 'maxResults'>;

export const USAGE = `Usage: get-papers-list <query> [options]

Find PubMed articles with at least one author affiliated with a pharmaceutical or
biotech company and write them to a CSV file.

Options:
  -f, --file <path>         CSV file to write (default: pubmed_results.csv)
  -e, --email <address>     Contact address sent to NCBI with every request
  -m, --max-results <n>     Maximum number of search results to fetch (default: 100)
  -d, --debug               Enable debug logging
  -h, --help                Show this help`;

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      file: { type: 'string', short: 'f' },
      email: { type: 'string', short: 'e' },
      'max-results': { type: 'string', short: 'm' },
      debug: { type: 'boolean', short: 'd' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

export function parseCliArgs(argv: string[], defaults: CliDefaults): CliOptions {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (error) {
    throw new UsageError(describeError(error));
  }

  const { values, positionals } = parsed;
  const help = values.help ?? false;
  const query = positionals.join(' ').trim();
  if (!query && !help) {
    throw new UsageError('Missing search query');
  }

  let maxResults = defaults.maxResults;
  if (values['max-results'] !== undefined) {
    maxResults = Number(values['max-results']);
    if (!Number.isInteger(maxResults) || maxResults <= 0) {
      throw new UsageError(`--max-results must be a positive integer, got "${values['max-results']}"`);
    }
  }

  return {
    query,
    file: values.file || defaults.file,
    email: values.email || defaults.email,
    maxResults,
    debug: values.debug ?? false,
    help,
  };
}
