import { PipelineStep, GenerationContext } from '../PipelineInfrastructure';
import { ITextGenerationClient } from '../../../domain/ports/ITextGenerationClient';
import { buildPlanPrompt } from '../../prompts/PostPrompts';

export class PlanStep implements PipelineStep {
    readonly name = 'Plan';

    constructor(private readonly textClient: ITextGenerationClient) { }

    async execute(context: GenerationContext): Promise<GenerationContext> {
        const prompt = buildPlanPrompt(context.request);
        const plan = await this.textClient.complete(context.modelId, prompt);

        // The draft prompt embeds the plan, so an empty one is unusable
        if (!plan.trim()) {
            throw new Error('Plan step returned empty content');
        }

        console.log(`[Pipeline] Plan ready (${plan.length} chars)`);
        return { ...context, plan };
    }
}
