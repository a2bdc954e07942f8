/**
 * ITextGenerationClient Port
 *
 * Single-call contract for an external text-generation service. Any
 * provider that turns one prompt into one completion can stand behind it.
 */

/**
 * Raised by adapters on authentication, quota, network or malformed
 * response failures.
 */
export class TextGenerationError extends Error {
    constructor(
        message: string,
        public readonly statusCode?: number
    ) {
        super(message);
        this.name = 'TextGenerationError';
    }
}

export interface ITextGenerationClient {
    /**
     * Sends a prompt as the sole input and returns the generated text.
     * @throws TextGenerationError
     */
    complete(modelId: string, prompt: string): Promise<string>;
}
