import { describe, it, expect } from '@jest/globals';
import { PubMedClient, type HttpFetch, type HttpResponse } from '../src/ingest/pubmed/client';
import { PubMedRequestError } from '../src/errors';
import { extractArticleInfo } from '../src/extract/article';
import { createMemoryLogger } from './helpers/memoryLogger';

const EFETCH_XML = `<?xml version="1.0" ?>
<PubmedArticleSet>
  <PubmedArticle>
    <MedlineCitation Status="MEDLINE" Owner="NLM">
      <PMID Version="1">111</PMID>
      <Article PubModel="Print">
        <Journal>
          <JournalIssue CitedMedium="Internet">
            <PubDate><Year>2023</Year><Month>Mar</Month><Day>7</Day></PubDate>
          </JournalIssue>
        </Journal>
        <ArticleTitle>Kinase inhibitors <i>in vivo</i></ArticleTitle>
        <AuthorList CompleteYN="Y">
          <Author ValidYN="Y">
            <LastName>Doe</LastName>
            <ForeName>Jane</ForeName>
            <AffiliationInfo>
              <Affiliation>Acme Therapeutics Inc., Boston, MA, USA. jane.doe@acme-tx.com.</Affiliation>
            </AffiliationInfo>
          </Author>
        </AuthorList>
      </Article>
    </MedlineCitation>
  </PubmedArticle>
  <PubmedArticle>
    <MedlineCitation Status="MEDLINE" Owner="NLM">
      <PMID Version="1">222</PMID>
      <Article PubModel="Print">
        <Journal>
          <JournalIssue CitedMedium="Print">
            <PubDate><MedlineDate>2021 Nov-Dec</MedlineDate></PubDate>
          </JournalIssue>
        </Journal>
        <ArticleTitle>Outcomes after surgery</ArticleTitle>
        <AuthorList CompleteYN="Y">
          <Author ValidYN="Y">
            <LastName>Roe</LastName>
            <ForeName>Rick</ForeName>
            <AffiliationInfo>
              <Affiliation>Department of Surgery, Example University, Leeds, UK.</Affiliation>
            </AffiliationInfo>
          </Author>
        </AuthorList>
      </Article>
    </MedlineCitation>
  </PubmedArticle>
</PubmedArticleSet>`;

function response(body: string, status = 200): HttpResponse {
  return { ok: status >= 200 && status < 300, status, text: async () => body };
}

function fakeHttp(routes: { esearch?: HttpResponse; efetch?: HttpResponse }) {
  const urls: URL[] = [];
  const http: HttpFetch = async (url) => {
    const parsed = new URL(url);
    urls.push(parsed);
    const route = parsed.pathname.endsWith('/esearch.fcgi') ? routes.esearch : routes.efetch;
    if (!route) throw new Error(`unexpected request ${url}`);
    return route;
  };
  return { http, urls };
}

const esearchBody = (ids: string[]) =>
  JSON.stringify({ esearchresult: { count: String(ids.length), idlist: ids } });

describe('PubMedClient', () => {
  it('searches with the NCBI identity parameters', async () => {
    const { http, urls } = fakeHttp({ esearch: response(esearchBody(['111', '222'])) });
    const client = new PubMedClient({
      email: 'dev@example.com',
      tool: 'test-tool',
      apiKey: 'test-key',
      http,
      logger: createMemoryLogger(),
    });

    await expect(client.search('cancer immunotherapy', 25)).resolves.toEqual(['111', '222']);
    const params = urls[0]?.searchParams;
    expect(params?.get('db')).toBe('pubmed');
    expect(params?.get('term')).toBe('cancer immunotherapy');
    expect(params?.get('retmax')).toBe('25');
    expect(params?.get('email')).toBe('dev@example.com');
    expect(params?.get('tool')).toBe('test-tool');
    expect(params?.get('api_key')).toBe('test-key');
  });

  it('parses efetch XML into records the extractor understands', async () => {
    const { http, urls } = fakeHttp({ efetch: response(EFETCH_XML) });
    const client = new PubMedClient({ email: 'dev@example.com', tool: 'test-tool', http });

    const records = await client.fetch(['111', '222']);
    expect(records).toHaveLength(2);
    expect(urls[0]?.searchParams.get('id')).toBe('111,222');
    expect(urls[0]?.searchParams.has('api_key')).toBe(false);

    const logger = createMemoryLogger();
    const [first, second] = records.map((r) => extractArticleInfo(r, logger));
    expect(first).toEqual({
      status: 'extracted',
      article: {
        pmid: '111',
        title: 'Kinase inhibitors in vivo',
        publicationDate: '2023-01-07',
        nonAcademicAuthors: ['Jane Doe'],
        companyAffiliations: new Set(['Acme Therapeutics Inc., Boston, MA, USA. jane.doe@acme-tx.com.']),
        emails: new Set(['jane.doe@acme-tx.com']),
      },
    });
    expect(second).toEqual({ status: 'skipped', pmid: '222', reason: 'no_company_authors' });
  });

  it('skips the fetch when the search finds nothing', async () => {
    const { http, urls } = fakeHttp({ esearch: response(esearchBody([])) });
    const logger = createMemoryLogger();
    const client = new PubMedClient({ email: 'dev@example.com', tool: 'test-tool', http, logger });

    await expect(client.fetchArticles('nothing matches', 10)).resolves.toEqual([]);
    expect(urls).toHaveLength(1);
    expect(logger.messages('info')).toEqual(['No results found for the query.']);
  });

  it('returns search and fetch results together', async () => {
    const { http } = fakeHttp({
      esearch: response(esearchBody(['111', '222'])),
      efetch: response(EFETCH_XML),
    });
    const logger = createMemoryLogger();
    const client = new PubMedClient({ email: 'dev@example.com', tool: 'test-tool', http, logger });

    const records = await client.fetchArticles('kinase', 10);
    expect(records).toHaveLength(2);
    expect(logger.messages('info')).toEqual(['Found 2 articles. Fetching details...']);
  });

  it('raises request errors from search', async () => {
    const { http } = fakeHttp({ esearch: response('Service Unavailable', 503) });
    const client = new PubMedClient({ email: 'dev@example.com', tool: 'test-tool', http });

    await expect(client.search('kinase', 10)).rejects.toBeInstanceOf(PubMedRequestError);
  });

  it('degrades to an empty list when the service fails', async () => {
    const { http } = fakeHttp({ esearch: response('Service Unavailable', 503) });
    const logger = createMemoryLogger();
    const client = new PubMedClient({ email: 'dev@example.com', tool: 'test-tool', http, logger });

    await expect(client.fetchArticles('kinase', 10)).resolves.toEqual([]);
    expect(logger.messages('error')).toEqual(['Error fetching PubMed articles']);
  });

  it('degrades to an empty list on an unexpected payload', async () => {
    const { http } = fakeHttp({ esearch: response(JSON.stringify({ error: 'bad query' })) });
    const logger = createMemoryLogger();
    const client = new PubMedClient({ email: 'dev@example.com', tool: 'test-tool', http, logger });

    await expect(client.fetchArticles('kinase', 10)).resolves.toEqual([]);
    expect(logger.messages('error')).toEqual(['Error fetching PubMed articles']);
  });

  it('returns no records for an empty article set', async () => {
    const { http } = fakeHttp({ efetch: response('<PubmedArticleSet></PubmedArticleSet>') });
    const client = new PubMedClient({ email: 'dev@example.com', tool: 'test-tool', http });

    await expect(client.fetch(['999'])).resolves.toEqual([]);
  });
});
