export type AffiliationClass = 'academic' | 'company';

/**
 * Checked first. Any hit makes the affiliation academic even when it also names a
 * company ("Pfizer Inc., Drug Discovery Division" is academic because of "division").
 */
export const ACADEMIC_INDICATORS: readonly RegExp[] = [
  /\b(?:university|college|institut\w*|academy|school)\b/i,
  /\b(?:hospital|medical center|clinic)\b/i,
  /\b(?:research center|laboratory|department)\b/i,
  /\b(?:faculty|division)\b/i,
];

/**
 * Only consulted when no academic indicator matched. The generic "research" and
 * "development" terms make e.g. "XYZ Research Group" a company.
 */
export const COMPANY_INDICATORS: readonly RegExp[] = [
  /\b(?:pharma|pharmaceutical|biotech|biotechnology)\b/i,
  /\b(?:therapeutics|biosciences|biologics)\b/i,
  /\b(?:inc|corp|ltd|gmbh|s\.a\.|llc|co\.|company|plc)\b/i,
  /\b(?:drug discovery|r&d)\b/i,
  /\b(?:labs|laboratories)\b/i,
  /\b(?:research|development)\b/i,
];

export function normalizeAffiliation(affiliation: string): string {
  return affiliation.toLowerCase().split(/\s+/).filter(Boolean).join(' ');
}

export function classifyAffiliation(affiliation: string): AffiliationClass {
  const clean = normalizeAffiliation(affiliation);

  for (const indicator of ACADEMIC_INDICATORS) {
    if (indicator.test(clean)) return 'academic';
  }

  return COMPANY_INDICATORS.some((indicator) => indicator.test(clean)) ? 'company' : 'academic';
}

export function isCompanyAffiliation(affiliation: string): boolean {
  return classifyAffiliation(affiliation) === 'company';
}
