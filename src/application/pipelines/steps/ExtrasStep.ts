import { PipelineStep, GenerationContext } from '../PipelineInfrastructure';
import { ITextGenerationClient } from '../../../domain/ports/ITextGenerationClient';
import { buildExtrasPrompt, resolveExtrasKind } from '../../prompts/PostPrompts';

/**
 * Hashtags and/or a call-to-action line. A failure here aborts the run
 * like any other step.
 */
export class ExtrasStep implements PipelineStep {
    readonly name = 'Extras';

    constructor(private readonly textClient: ITextGenerationClient) { }

    shouldSkip(context: GenerationContext): boolean {
        return resolveExtrasKind(context.request.wantHashtags, context.request.wantCTA) === undefined;
    }

    async execute(context: GenerationContext): Promise<GenerationContext> {
        const { request } = context;
        const kind = resolveExtrasKind(request.wantHashtags, request.wantCTA);
        if (!kind) return context;

        const extras = await this.textClient.complete(context.modelId, buildExtrasPrompt(request.topic, kind));
        return { ...context, extras };
    }
}
