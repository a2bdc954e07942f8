import {
    GenerationRequest,
    GenerationResult,
    assertValidRequest,
} from '../domain/entities/PostGeneration';
import { ITextGenerationClient } from '../domain/ports/ITextGenerationClient';
import {
    GenerationContext,
    PipelineStep,
    PipelineStepError,
    createGenerationContext,
    createPostPipeline,
    executePipeline,
} from './pipelines';

/**
 * Raised when a run fails at any step. The message is the underlying
 * failure's, unchanged, so it can be shown to the user as-is.
 */
export class GenerationError extends Error {
    constructor(
        message: string,
        public readonly step: string,
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'GenerationError';
    }
}

/**
 * Runs the plan → draft → split → extras → guardrail pipeline and times it.
 */
export class PostGenerator {
    private readonly steps: PipelineStep[];

    constructor(
        textClient: ITextGenerationClient,
        private readonly modelId: string
    ) {
        this.steps = createPostPipeline({ textClient });
    }

    /**
     * @throws ValidationError before any external call when the request is invalid
     * @throws GenerationError when a step fails
     */
    async generate(request: GenerationRequest): Promise<GenerationResult> {
        assertValidRequest(request);

        const startTime = Date.now();
        let context: GenerationContext;
        try {
            context = await executePipeline(
                createGenerationContext(request, this.modelId),
                this.steps,
                (step) => console.log(`[Pipeline] ${step} complete`)
            );
        } catch (error) {
            if (error instanceof PipelineStepError) {
                throw new GenerationError(error.message, error.stepName, error.cause);
            }
            throw error;
        }
        const latencySeconds = Math.round((Date.now() - startTime) / 10) / 100;

        console.log(`[Pipeline] Generated ${context.posts?.length ?? 0} posts in ${latencySeconds}s`);

        const result: GenerationResult = {
            posts: Object.freeze([...(context.posts ?? [])]),
            ...(context.extras !== undefined && { extras: context.extras }),
            latencySeconds,
        };
        return Object.freeze(result);
    }
}
