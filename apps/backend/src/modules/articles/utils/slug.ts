/**
 * @file slug.ts
 * @description Title to URL slug conversion for articles.
 */

/**
 * Derive a URL-safe slug from an article title.
 *
 * Lower-cases the title, folds accented letters to their base letter, turns
 * every run of other characters into a single hyphen, and trims hyphens from
 * both ends. The result matches `^[a-z0-9]+(-[a-z0-9]+)*$`, or is empty when
 * the title has no letters or digits.
 *
 * @param title - Article title
 * @returns Slug for use in article URLs
 *
 * @example
 * sanitizeTitle('Écrire en français, 2e édition!'); // 'ecrire-en-francais-2e-edition'
 */
export function sanitizeTitle(title: string): string {
    let slug = title.normalize('NFD').toLowerCase();

    // Drop combining marks left behind by NFD (é -> e + U+0301)
    slug = slug.replace(/[\u0300-\u036f]/g, '');

    // Collapse everything outside a-z0-9 into single hyphens
    slug = slug.replace(/[^a-z0-9]+/g, '-');

    // Remove leading/trailing hyphens
    slug = slug.replace(/^-+|-+$/g, '');

    return slug;
}
