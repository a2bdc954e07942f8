import { GenerationRequest, Language, PostLength, Tone } from '../../domain/entities/PostGeneration';

export const DEFAULT_AUDIENCE = 'a general professional audience';

export const PLAN_POSTS_PROMPT = `You are an expert LinkedIn strategist.
First, outline a brief plan for {{postCount}} {{tone}} posts in {{language}},
about "{{topic}}", targeting {{audience}}.
Each plan should describe style, structure, and key points.`;

export const WRITE_POSTS_PROMPT = `Based on this plan:
{{plan}}

Write {{postCount}} LinkedIn posts in {{language}}.
Keep them {{length}} and {{tone}}.
Each post should be natural, engaging, and professional.
Do not repeat wording.`;

export const EXTRAS_PROMPT = `For the topic "{{topic}}", suggest:
{{requests}}
Output clearly.`;

const TONE_PHRASES: Record<Tone, string> = {
    Professional: 'professional',
    Casual: 'casual',
    Inspirational: 'inspirational',
    'Thought Leadership': 'thought leadership',
    Humorous: 'humorous',
};

const LENGTH_PHRASES: Record<PostLength, string> = {
    Short: 'short',
    Medium: 'medium',
    Long: 'long',
};

const LANGUAGE_NAMES: Record<Language, string> = {
    English: 'English',
    Hindi: 'Hindi',
    Spanish: 'Spanish',
    French: 'French',
};

/**
 * Which extras a run asks for. "None" is not a kind: the step is skipped.
 */
export type ExtrasKind = 'hashtags' | 'cta' | 'hashtags-and-cta';

export function resolveExtrasKind(wantHashtags: boolean, wantCTA: boolean): ExtrasKind | undefined {
    if (wantHashtags && wantCTA) return 'hashtags-and-cta';
    if (wantHashtags) return 'hashtags';
    if (wantCTA) return 'cta';
    return undefined;
}

function fillTemplate(template: string, values: Record<string, string | number>): string {
    return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) => {
        const value = values[key];
        return value === undefined ? placeholder : String(value);
    });
}

export function buildPlanPrompt(request: GenerationRequest): string {
    return fillTemplate(PLAN_POSTS_PROMPT, {
        postCount: request.postCount,
        tone: TONE_PHRASES[request.tone],
        language: LANGUAGE_NAMES[request.language],
        topic: request.topic,
        audience: request.audience?.trim() || DEFAULT_AUDIENCE,
    });
}

/**
 * The plan is embedded verbatim so the draft follows it.
 */
export function buildDraftPrompt(request: GenerationRequest, plan: string): string {
    return fillTemplate(WRITE_POSTS_PROMPT, {
        plan,
        postCount: request.postCount,
        language: LANGUAGE_NAMES[request.language],
        length: LENGTH_PHRASES[request.length],
        tone: TONE_PHRASES[request.tone],
    });
}

export function buildExtrasPrompt(topic: string, kind: ExtrasKind): string {
    let requests: string[];
    switch (kind) {
        case 'hashtags':
            requests = ['- Relevant hashtags'];
            break;
        case 'cta':
            requests = ['- A short call-to-action line'];
            break;
        case 'hashtags-and-cta':
            requests = ['- Relevant hashtags', '- A short call-to-action line'];
            break;
        default: {
            const unhandled: never = kind;
            throw new Error(`Unhandled extras kind: ${String(unhandled)}`);
        }
    }

    return fillTemplate(EXTRAS_PROMPT, { topic, requests: requests.join('\n') });
}
