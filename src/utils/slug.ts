/**
 * Slug Generation Utility
 *
 * Single source of truth for turning free text into filesystem- and URL-safe
 * identifiers. The pipeline uses it to derive the run identifier (the cache
 * namespace) from the article title.
 */

/**
 * Generate a URL-safe slug from a string.
 *
 * Transformations:
 * 1. Lowercase the string
 * 2. Normalize Unicode and remove diacritics (é → e, ñ → n)
 * 3. Replace non-alphanumeric characters with hyphens
 * 4. Remove leading/trailing hyphens
 *
 * @param value - The string to slugify (e.g., an article title)
 * @returns URL-safe slug (e.g., "AI in Supply Chain" → "ai-in-supply-chain")
 *
 * @example
 * slugify("Día de los Muertos")
 * // → "dia-de-los-muertos"
 */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '') // Remove diacritics
    .replace(/[^a-z0-9]+/g, '-')     // Replace non-alphanumeric with hyphens
    .replace(/^-|-$/g, '');          // Remove leading/trailing hyphens
}
