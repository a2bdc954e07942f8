/**
 * Guardrail applied to generated posts before they are returned or stored.
 */

export const BANNED_TERMS: readonly string[] = ['fuck', 'shit', 'hate', 'kill'];
export const REMOVED_PLACEHOLDER = '[removed]';

// Letters and digits in any script, so "kill" inside "killé" is left alone.
// Combining marks are not word characters.
const WORD_CHAR = '[\\p{L}\\p{N}_]';

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const BANNED_PATTERNS: readonly RegExp[] = BANNED_TERMS.map(
    (term) => new RegExp(`(?<!${WORD_CHAR})${escapeRegExp(term)}(?!${WORD_CHAR})`, 'giu')
);

/**
 * Replaces every whole-word, case-insensitive occurrence of a banned term
 * with the placeholder.
 */
export function cleanText(text: string): string {
    return BANNED_PATTERNS.reduce(
        (cleaned, pattern) => cleaned.replace(pattern, REMOVED_PLACEHOLDER),
        text
    );
}
