/** Collapses whitespace runs to a single space and trims both ends. */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
