import { PipelineStep } from './PipelineInfrastructure';
import { ITextGenerationClient } from '../../domain/ports/ITextGenerationClient';
import { PlanStep } from './steps/PlanStep';
import { DraftStep } from './steps/DraftStep';
import { SplitStep } from './steps/SplitStep';
import { ExtrasStep } from './steps/ExtrasStep';
import { GuardrailStep } from './steps/GuardrailStep';

export interface PipelineDependencies {
    textClient: ITextGenerationClient;
}

/**
 * Ordered steps for one run. Each step's output feeds the next, so they
 * cannot be issued in parallel.
 */
export function createPostPipeline(deps: PipelineDependencies): PipelineStep[] {
    return [
        // 1. Plan
        new PlanStep(deps.textClient),
        // 2. Draft (embeds the plan)
        new DraftStep(deps.textClient),
        // 3. Split the numbered draft into posts
        new SplitStep(),
        // 4. Hashtags / call-to-action, only when requested
        new ExtrasStep(deps.textClient),
        // 5. Guardrail before anything is returned or stored
        new GuardrailStep(),
    ];
}
