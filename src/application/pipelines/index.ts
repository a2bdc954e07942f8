export { PipelineStep, GenerationContext, PipelineStepError, createGenerationContext, executePipeline } from './PipelineInfrastructure';
export { createPostPipeline, PipelineDependencies } from './PostGenerationPipeline';
export { PlanStep } from './steps/PlanStep';
export { DraftStep } from './steps/DraftStep';
export { SplitStep } from './steps/SplitStep';
export { ExtrasStep } from './steps/ExtrasStep';
export { GuardrailStep } from './steps/GuardrailStep';
