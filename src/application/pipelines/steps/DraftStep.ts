import { PipelineStep, GenerationContext } from '../PipelineInfrastructure';
import { ITextGenerationClient } from '../../../domain/ports/ITextGenerationClient';
import { buildDraftPrompt } from '../../prompts/PostPrompts';

export class DraftStep implements PipelineStep {
    readonly name = 'Draft';

    constructor(private readonly textClient: ITextGenerationClient) { }

    async execute(context: GenerationContext): Promise<GenerationContext> {
        const { request, plan } = context;
        if (plan === undefined) throw new Error('Plan required for drafting posts');

        const rawDraft = await this.textClient.complete(context.modelId, buildDraftPrompt(request, plan));
        if (!rawDraft.trim()) {
            throw new Error('Draft step returned empty content');
        }

        return { ...context, rawDraft };
    }
}
