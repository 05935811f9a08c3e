/**
 * Lowercase, ASCII-only, hyphen-separated slug. Empty input gives an empty string.
 */
export function slugify(text: string, maxLength = 100): string {
  const slug = text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, '')
    .trim()
    .replace(/[\s-]+/g, '-')
    .replace(/^-+|-+$/g, '');

  if (slug.length <= maxLength) return slug;
  return slug.slice(0, maxLength).replace(/-+$/, '');
}

/**
 * Append -1, -2, ... until `exists` reports the slug as free.
 */
export async function uniqueSlug(
  text: string,
  exists: (slug: string) => Promise<boolean>,
  fallback = 'item'
): Promise<string> {
  const base = slugify(text) || fallback;
  let candidate = base;
  let counter = 1;
  while (await exists(candidate)) {
    candidate = `${base}-${counter}`;
    counter++;
  }
  return candidate;
}
