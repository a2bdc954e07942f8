import { PipelineStep, GenerationContext } from '../PipelineInfrastructure';
import { splitPosts } from '../../../domain/services/PostSplitter';

export class SplitStep implements PipelineStep {
    readonly name = 'Split';

    async execute(context: GenerationContext): Promise<GenerationContext> {
        const { request, rawDraft } = context;
        if (rawDraft === undefined) throw new Error('Draft required for splitting posts');

        const posts = splitPosts(rawDraft, request.postCount);
        if (posts.length < request.postCount) {
            console.warn(`[Pipeline] Requested ${request.postCount} posts, draft yielded ${posts.length}`);
        }

        return { ...context, posts };
    }
}
