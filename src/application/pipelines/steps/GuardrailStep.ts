import { PipelineStep, GenerationContext } from '../PipelineInfrastructure';
import { cleanText } from '../../../domain/services/TextFilter';

export class GuardrailStep implements PipelineStep {
    readonly name = 'Guardrail';

    async execute(context: GenerationContext): Promise<GenerationContext> {
        if (!context.posts) throw new Error('Posts required for guardrail');

        return { ...context, posts: context.posts.map(cleanText) };
    }
}
