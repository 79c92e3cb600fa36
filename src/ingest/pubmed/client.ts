import fetch from 'node-fetch';
import { XMLParser } from 'fast-xml-parser';
import { limit } from '../../utils/limiter';
import { createLogger, describeError, type Logger } from '../../utils/logger';
import { PubMedRequestError, PubMedResponseError } from '../../errors';
import {
  EfetchResponseSchema,
  EsearchResponseSchema,
  type RawArticleRecord,
} from './schemas';

export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type HttpFetch = (url: string) => Promise<HttpResponse>;

export interface PubMedClientOptions {
  email: string;
  tool: string;
  apiKey?: string;
  baseUrl?: string;
  http?: HttpFetch;
  logger?: Logger;
}

type Endpoint = 'esearch' | 'efetch';

const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

const ARRAY_TAGS = new Set(['PubmedArticle', 'Author', 'AffiliationInfo']);

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (name) => ARRAY_TAGS.has(name),
  // Kept as raw inner XML so inline markup like <i> does not split the text.
  stopNodes: ['*.ArticleTitle', '*.Affiliation'],
});

export class PubMedClient {
  private baseUrl: string;
  private http: HttpFetch;
  private logger: Logger;

  constructor(private options: PubMedClientOptions) {
    this.baseUrl = options.baseUrl ?? EUTILS_BASE;
    this.http = options.http ?? ((url) => fetch(url));
    this.logger = options.logger ?? createLogger('PubMed');
  }

  async search(query: string, maxResults: number): Promise<string[]> {
    const body = await this.get('esearch', {
      db: 'pubmed',
      term: query,
      retmax: String(maxResults),
      retmode: 'json',
    });
    const parsed = EsearchResponseSchema.safeParse(JSON.parse(body));
    if (!parsed.success) {
      throw new PubMedResponseError('esearch', parsed.error.issues);
    }
    return parsed.data.esearchresult.idlist;
  }

  async fetch(ids: string[]): Promise<RawArticleRecord[]> {
    if (ids.length === 0) return [];
    const xml = await this.get('efetch', {
      db: 'pubmed',
      id: ids.join(','),
      rettype: 'xml',
      retmode: 'xml',
    });
    const parsed = EfetchResponseSchema.safeParse(parser.parse(xml));
    if (!parsed.success) {
      throw new PubMedResponseError('efetch', parsed.error.issues);
    }
    return parsed.data.PubmedArticleSet?.PubmedArticle ?? [];
  }

  /** Search then fetch. Failures are logged and yield an empty list. */
  async fetchArticles(query: string, maxResults: number): Promise<RawArticleRecord[]> {
    try {
      const ids = await this.search(query, maxResults);
      if (ids.length === 0) {
        this.logger.info('No results found for the query.');
        return [];
      }
      this.logger.info(`Found ${ids.length} articles. Fetching details...`);
      return await this.fetch(ids);
    } catch (error) {
      this.logger.error('Error fetching PubMed articles', { error: describeError(error) });
      return [];
    }
  }

  private async get(endpoint: Endpoint, params: Record<string, string>): Promise<string> {
    return limit('ncbi_eutils', async () => {
      const search = new URLSearchParams({
        ...params,
        tool: this.options.tool,
        email: this.options.email,
      });
      if (this.options.apiKey) search.set('api_key', this.options.apiKey);

      const url = `${this.baseUrl}/${endpoint}.fcgi?${search.toString()}`;
      this.logger.debug(`GET ${endpoint}`, { params });
      const res = await this.http(url);
      if (!res.ok) {
        throw new PubMedRequestError(endpoint, res.status, await res.text());
      }
      return res.text();
    });
  }
}
