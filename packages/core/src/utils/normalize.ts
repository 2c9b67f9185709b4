/**
 * Description normalization for rule matching.
 */

/**
 * Normalize a register description for consistent pattern matching.
 *
 * Transformations:
 * - Convert to uppercase
 * - Replace * and # with space (common bank separators)
 * - Collapse multiple whitespace to single space
 * - Trim leading/trailing whitespace
 */
export function normalizeDescription(raw: string): string {
    return raw
        .toUpperCase()
        .replace(/[*#]/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}
