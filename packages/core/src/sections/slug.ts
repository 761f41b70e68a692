/**
 * Slugs: URL-safe lowercase aliases derived from headers.
 * Diacritics are folded and punctuation dropped; runs of spaces, `_` and `-` become one dash.
 */

export function slugify(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9\s_-]/g, '')
    .replace(/[\s_-]+/g, '-')
    .replace(/^-+|-+$/g, '')
}

