const ENTITY_SUFFIXES = [
  'ltd',
  'limited',
  'inc',
  'corp',
  'corporation',
  'co',
  'company',
  'plc',
  'nv',
  'sa',
  'ag',
  'se',
  'holdings',
  'group',
  'international',
  'intl',
];

// Longest first so "Corporation" is tried before "Corp" and "Company" before "Co".
const SUFFIX_PATTERNS = [...ENTITY_SUFFIXES]
  .sort((a, b) => b.length - a.length)
  .map((suffix) => new RegExp(`[\\s,]+${suffix}\\.?$`, 'i'));

function collapseWhitespace(input: string) {
  return input.replace(/\s+/g, ' ').trim();
}

function stripOneSuffix(name: string) {
  for (const pattern of SUFFIX_PATTERNS) {
    const match = pattern.exec(name);
    if (match) return name.slice(0, match.index).replace(/[\s,]+$/, '');
  }
  return null;
}

/**
 * Drops trailing corporate-entity suffixes ("Ltd.", "Limited", "Inc", ...) and
 * collapses whitespace. A name that is nothing but a suffix is left alone.
 *
 * Stripping repeats until the name is stable, so the result is a fixed point:
 * `normalizeCompanyName(normalizeCompanyName(x)) === normalizeCompanyName(x)`.
 */
export function normalizeCompanyName(name: string) {
  let normalized = collapseWhitespace(name);
  let stripped = stripOneSuffix(normalized);
  while (stripped !== null) {
    normalized = collapseWhitespace(stripped);
    stripped = stripOneSuffix(normalized);
  }
  return normalized;
}

export function companyKey(name: string) {
  return normalizeCompanyName(name).toLowerCase();
}
