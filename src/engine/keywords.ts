/**
 * First template (in table order) with a keyword occurring anywhere in the
 * text, compared case-insensitively. No ranking by match length.
 */
export function matchKeywords(table: Record<string, readonly string[]>, text: string): string | undefined {
  const haystack = text.toLowerCase();
  for (const [template, keywords] of Object.entries(table)) {
    if (keywords.some(keyword => haystack.includes(keyword.toLowerCase()))) {
      return template;
    }
  }
  return undefined;
}
