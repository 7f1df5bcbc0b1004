/**
 * Typographic punctuation that display fonts commonly lack, mapped to ASCII
 */
const REPLACEMENTS: ReadonlyArray<readonly [RegExp, string]> = [
  [/[‘’‚‛]/g, "'"],
  [/[“”„‟]/g, '"'],
  [/‹/g, '<'],
  [/›/g, '>'],
];

export function sanitizeText(text: string): string {
  return REPLACEMENTS.reduce((result, [pattern, replacement]) => result.replace(pattern, replacement), text);
}
