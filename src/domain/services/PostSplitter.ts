import { countCharacters } from '../entities/PostGeneration';

/** Fragments at or below this length are headers, stray numbering or noise. */
export const MIN_POST_CHARS = 30;

// Newline, optional indentation, digits in any script, then "." or ")"
const NUMBERED_MARKER = /\n\s*\p{Nd}+[.)]/u;

/**
 * Splits a numbered list of generated posts into individual posts.
 *
 * Returns fewer than maxCount posts when the model produced fewer usable
 * fragments; callers treat a short result as normal.
 */
export function splitPosts(raw: string, maxCount: number): string[] {
    const limit = Math.max(0, Math.floor(maxCount));

    return raw
        .split(NUMBERED_MARKER)
        .map((fragment) => fragment.trim())
        .filter((fragment) => countCharacters(fragment) > MIN_POST_CHARS)
        .slice(0, limit);
}
