/**
 * Pipeline infrastructure for post generation.
 * Each step has a single responsibility and runs strictly after the previous one.
 */

import { GenerationRequest } from '../../domain/entities/PostGeneration';

/**
 * GenerationContext carries all state through the pipeline.
 * Immutable pattern: each step returns a new context.
 */
export interface GenerationContext {
    readonly request: GenerationRequest;
    readonly modelId: string;

    // Plan
    readonly plan?: string;

    // Draft
    readonly rawDraft?: string;

    // Split + guardrail
    readonly posts?: readonly string[];

    // Extras
    readonly extras?: string;
}

/**
 * Pipeline step interface.
 * Each step has exactly one responsibility.
 */
export interface PipelineStep {
    readonly name: string;
    execute(context: GenerationContext): Promise<GenerationContext>;
    shouldSkip?(context: GenerationContext): boolean;
}

/**
 * Wraps any failure inside a step with the step's name.
 */
export class PipelineStepError extends Error {
    constructor(
        public readonly stepName: string,
        public readonly cause: unknown
    ) {
        super(cause instanceof Error ? cause.message : String(cause));
        this.name = 'PipelineStepError';
    }
}

export function createGenerationContext(request: GenerationRequest, modelId: string): GenerationContext {
    return { request, modelId };
}

/**
 * Executes a pipeline of steps sequentially. The first failure aborts the
 * remaining steps.
 */
export async function executePipeline(
    context: GenerationContext,
    steps: PipelineStep[],
    onStepComplete?: (step: string, context: GenerationContext) => void
): Promise<GenerationContext> {
    let currentContext = context;

    for (const step of steps) {
        if (step.shouldSkip?.(currentContext)) {
            console.log(`[Pipeline] Skipping ${step.name}`);
            continue;
        }

        console.log(`[Pipeline] Executing ${step.name}...`);
        try {
            currentContext = await step.execute(currentContext);
        } catch (error) {
            throw new PipelineStepError(step.name, error);
        }

        onStepComplete?.(step.name, currentContext);
    }

    return currentContext;
}
