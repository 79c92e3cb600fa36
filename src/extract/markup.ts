const XML_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

const MAX_CODE_POINT = 0x10ffff;

function fromCodePoint(entity: string, code: number): string {
  return Number.isNaN(code) || code > MAX_CODE_POINT ? entity : String.fromCodePoint(code);
}

function decodeEntity(entity: string, body: string): string {
  if (body.startsWith('#x') || body.startsWith('#X')) {
    return fromCodePoint(entity, parseInt(body.slice(2), 16));
  }
  if (body.startsWith('#')) {
    return fromCodePoint(entity, parseInt(body.slice(1), 10));
  }
  return XML_ENTITIES[body] ?? entity;
}

/**
 * Flattens raw inner XML (titles and affiliations are read unparsed) into plain text:
 * tags dropped, entities decoded, whitespace collapsed.
 */
export function stripInlineMarkup(raw: string): string {
  return raw
    .replace(/<[^>]*>/g, '')
    .replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => decodeEntity(entity, body))
    .replace(/\s+/g, ' ')
    .trim();
}
