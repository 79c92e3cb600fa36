import { z } from 'zod';

/** One `PubmedArticle` node as fast-xml-parser hands it over. */
export type RawArticleRecord = Record<string, unknown>;

// Empty XML elements parse to '' rather than being absent.
function emptyAsMissing<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (v === '' || v === null ? undefined : v), schema.optional());
}

const Text = z.union([z.string(), z.number()]).transform((v) => String(v));
const OptionalText = emptyAsMissing(Text);

export const PubDateSchema = z.object({
  Year: OptionalText,
  Month: OptionalText,
  Day: OptionalText,
  MedlineDate: OptionalText,
});

export const AuthorSchema = z.object({
  LastName: OptionalText,
  ForeName: OptionalText,
  AffiliationInfo: emptyAsMissing(z.array(z.object({ Affiliation: OptionalText }))),
});

export const PubmedArticleSchema = z.object({
  MedlineCitation: z.object({
    PMID: OptionalText,
    Article: z.object({
      ArticleTitle: OptionalText,
      ElectronicMailAddress: OptionalText,
      Journal: emptyAsMissing(
        z.object({
          JournalIssue: emptyAsMissing(z.object({ PubDate: emptyAsMissing(PubDateSchema) })),
        })
      ),
      AuthorList: emptyAsMissing(z.object({ Author: emptyAsMissing(z.array(AuthorSchema)) })),
    }),
  }),
});

export type PubmedArticle = z.infer<typeof PubmedArticleSchema>;
export type PubmedAuthor = z.infer<typeof AuthorSchema>;

export const EsearchResponseSchema = z.object({
  esearchresult: z.object({
    count: z.string().optional(),
    idlist: z.array(z.string()),
  }),
});

export const EfetchResponseSchema = z.object({
  PubmedArticleSet: emptyAsMissing(
    z.object({
      PubmedArticle: emptyAsMissing(z.array(z.record(z.unknown()))),
    })
  ),
});

/** Best-effort PMID lookup on a record that may not pass validation. */
export function pmidOf(raw: RawArticleRecord): string | undefined {
  const citation = raw.MedlineCitation;
  if (typeof citation !== 'object' || citation === null || !('PMID' in citation)) {
    return undefined;
  }
  const pmid = citation.PMID;
  return typeof pmid === 'string' || typeof pmid === 'number' ? String(pmid) : undefined;
}
