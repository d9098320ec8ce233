/**
 * @fileoverview Keyword matching
 *
 * Keywords match case-insensitively as whole terms: a keyword must not be
 * preceded or followed by a letter or digit, so "nta" does not match
 * inside "documentation". Internal whitespace matches any run of whitespace.
 *
 * @module domain/utils/keywords
 */

const patternCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compiled whole-term pattern for a keyword (cached).
 */
export function keywordPattern(keyword: string): RegExp {
    const key = keyword.trim().toLowerCase();
    const cached = patternCache.get(key);
    if (cached) {
        return cached;
    }

    const body = key.split(/\s+/).map(escapeRegExp).join("\\s+");
    const pattern = new RegExp(`(?<![a-z0-9])${body}(?![a-z0-9])`);
    patternCache.set(key, pattern);
    return pattern;
}

/**
 * Whether the keyword occurs in text already lowercased by the caller.
 */
export function containsKeyword(lowerText: string, keyword: string): boolean {
    return keyword.trim().length > 0 && keywordPattern(keyword).test(lowerText);
}

/**
 * Number of distinct keywords that occur at least once.
 */
export function countKeywordMatches(lowerText: string, keywords: readonly string[]): number {
    return keywords.filter(keyword => containsKeyword(lowerText, keyword)).length;
}
