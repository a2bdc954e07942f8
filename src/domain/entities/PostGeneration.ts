/**
 * PostGeneration Entity
 *
 * Request and result types for one post generation run, plus the
 * validation that guards a run and the display helpers for its posts.
 */

export const TONES = ['Professional', 'Casual', 'Inspirational', 'Thought Leadership', 'Humorous'] as const;
export const POST_LENGTHS = ['Short', 'Medium', 'Long'] as const;
export const LANGUAGES = ['English', 'Hindi', 'Spanish', 'French'] as const;

export type Tone = typeof TONES[number];
export type PostLength = typeof POST_LENGTHS[number];
export type Language = typeof LANGUAGES[number];

export const MIN_POST_COUNT = 3;
export const MAX_POST_COUNT = 5;
export const PREVIEW_LENGTH = 80;

/**
 * A validated request for one pipeline run.
 */
export interface GenerationRequest {
    /** What the posts are about, never empty */
    topic: string;
    tone: Tone;
    /** Target readers; the prompt substitutes a default when absent */
    audience?: string;
    length: PostLength;
    language: Language;
    wantHashtags: boolean;
    wantCTA: boolean;
    /** Between MIN_POST_COUNT and MAX_POST_COUNT */
    postCount: number;
}

/**
 * Output of one successful pipeline run. Frozen once produced.
 */
export interface GenerationResult {
    /** At most postCount posts, already passed through the text filter */
    readonly posts: readonly string[];
    /** Hashtags and/or call-to-action; absent when neither was requested */
    readonly extras?: string;
    readonly latencySeconds: number;
}

export const REQUEST_DEFAULTS = {
    tone: 'Professional',
    length: 'Short',
    language: 'English',
    wantHashtags: true,
    wantCTA: true,
    postCount: MIN_POST_COUNT,
} as const satisfies Omit<GenerationRequest, 'topic' | 'audience'>;

/**
 * Raised when a request breaks its invariants. No external call is made.
 */
export class ValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
    return typeof value === 'string' && (values as readonly string[]).includes(value);
}

function readEnum<T extends string>(
    body: Record<string, unknown>,
    field: string,
    values: readonly T[],
    fallback: T
): T {
    const value = body[field];
    if (value === undefined || value === null) return fallback;
    if (!isOneOf(values, value)) {
        throw new ValidationError(`${field} must be one of: ${values.join(', ')}`);
    }
    return value;
}

function readBoolean(body: Record<string, unknown>, field: string, fallback: boolean): boolean {
    const value = body[field];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'boolean') {
        throw new ValidationError(`${field} must be a boolean`);
    }
    return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Builds a GenerationRequest from untrusted input, applying form defaults.
 * @throws ValidationError when a field is missing or out of range
 */
export function parseGenerationRequest(input: unknown): GenerationRequest {
    if (!isRecord(input)) {
        throw new ValidationError('Request body must be a JSON object');
    }

    // null is treated as an omitted field throughout
    const topic = input.topic ?? undefined;
    const audience = input.audience ?? undefined;
    const postCount = input.postCount ?? undefined;

    if (topic !== undefined && typeof topic !== 'string') {
        throw new ValidationError('topic must be a string');
    }
    if (audience !== undefined && typeof audience !== 'string') {
        throw new ValidationError('audience must be a string');
    }
    if (postCount !== undefined && typeof postCount !== 'number') {
        throw new ValidationError('postCount must be a number');
    }

    const request: GenerationRequest = {
        topic: (topic ?? '').trim(),
        tone: readEnum(input, 'tone', TONES, REQUEST_DEFAULTS.tone),
        length: readEnum(input, 'length', POST_LENGTHS, REQUEST_DEFAULTS.length),
        language: readEnum(input, 'language', LANGUAGES, REQUEST_DEFAULTS.language),
        wantHashtags: readBoolean(input, 'wantHashtags', REQUEST_DEFAULTS.wantHashtags),
        wantCTA: readBoolean(input, 'wantCTA', REQUEST_DEFAULTS.wantCTA),
        postCount: postCount ?? REQUEST_DEFAULTS.postCount,
    };

    const trimmedAudience = typeof audience === 'string' ? audience.trim() : '';
    if (trimmedAudience) {
        request.audience = trimmedAudience;
    }

    assertValidRequest(request);
    return request;
}

/**
 * Checks the invariants a pipeline run depends on.
 * @throws ValidationError
 */
export function assertValidRequest(request: GenerationRequest): void {
    if (!request.topic.trim()) {
        throw new ValidationError('Please enter a topic');
    }
    if (
        !Number.isInteger(request.postCount) ||
        request.postCount < MIN_POST_COUNT ||
        request.postCount > MAX_POST_COUNT
    ) {
        throw new ValidationError(
            `postCount must be an integer between ${MIN_POST_COUNT} and ${MAX_POST_COUNT}`
        );
    }
}

/**
 * Counts Unicode code points rather than UTF-16 units.
 */
export function countCharacters(text: string): number {
    return [...text].length;
}

export interface PostStats {
    words: number;
    characters: number;
}

export function getPostStats(post: string): PostStats {
    return {
        words: post.split(/\s+/).filter((word) => word.length > 0).length,
        characters: countCharacters(post),
    };
}

/**
 * Short preview used when listing earlier runs.
 */
export function createPostPreview(post: string, maxChars: number = PREVIEW_LENGTH): string {
    return `${[...post].slice(0, maxChars).join('')}...`;
}

/**
 * File name offered for downloading the post at a 1-based position.
 */
export function postFileName(position: number): string {
    return `linkedin_post_${position}.txt`;
}
