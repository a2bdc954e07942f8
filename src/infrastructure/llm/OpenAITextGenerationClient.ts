import axios from 'axios';
import { ITextGenerationClient, TextGenerationError } from '../../domain/ports/ITextGenerationClient';

interface ChatCompletionResponse {
    choices?: Array<{
        message?: {
            content?: string | null;
        };
    }>;
}

interface OpenAIErrorBody {
    error?: {
        message?: string;
    };
}

/**
 * OpenAI chat completions adapter. One request per call, no retries.
 */
export class OpenAITextGenerationClient implements ITextGenerationClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;

    constructor(apiKey: string, baseUrl: string = 'https://api.openai.com') {
        if (!apiKey) {
            throw new Error('OpenAI API key is required');
        }
        this.apiKey = apiKey;
        this.baseUrl = baseUrl;
    }

    async complete(modelId: string, prompt: string): Promise<string> {
        let data: ChatCompletionResponse;
        try {
            const response = await axios.post<ChatCompletionResponse>(
                `${this.baseUrl}/v1/chat/completions`,
                {
                    model: modelId,
                    messages: [{ role: 'user', content: prompt }],
                },
                {
                    headers: {
                        Authorization: `Bearer ${this.apiKey}`,
                        'Content-Type': 'application/json',
                    },
                }
            );
            data = response.data;
        } catch (error) {
            throw this.toTextGenerationError(error);
        }

        const content = data.choices?.[0]?.message?.content;
        if (typeof content !== 'string') {
            throw new TextGenerationError('OpenAI response did not contain any message content');
        }
        return content;
    }

    private toTextGenerationError(error: unknown): TextGenerationError {
        if (axios.isAxiosError<OpenAIErrorBody>(error)) {
            const status = error.response?.status;
            const message = error.response?.data?.error?.message || error.message;
            console.error(`[OpenAI] Request failed${status ? ` (${status})` : ''}: ${message}`);
            return new TextGenerationError(`OpenAI call failed: ${message}`, status);
        }
        const message = error instanceof Error ? error.message : String(error);
        return new TextGenerationError(`OpenAI call failed: ${message}`);
    }
}
