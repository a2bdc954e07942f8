import {
    GenerationRequest,
    GenerationResult,
    createPostPreview,
    postFileName,
} from '../domain/entities/PostGeneration';
import { PostGenerator } from './PostGenerator';
import { SessionHistory } from './SessionHistory';

/**
 * Raised when a run is requested while another run of the same session is
 * still in flight.
 */
export class SessionBusyError extends Error {
    constructor(sessionId: string) {
        super(`Session ${sessionId} is already generating posts`);
        this.name = 'SessionBusyError';
    }
}

export interface PostDownload {
    fileName: string;
    content: string;
}

export interface PastRunPreview {
    /** 1-based run number */
    run: number;
    options: Array<{ option: number; preview: string }>;
}

/**
 * Session-scoped context: owns the history and the latest result of one
 * interactive session.
 */
export class PostSession {
    readonly history = new SessionHistory();
    readonly createdAt = new Date();
    private currentResult: GenerationResult | null = null;
    private running = false;

    constructor(
        readonly id: string,
        private readonly generator: PostGenerator
    ) { }

    get lastResult(): GenerationResult | null {
        return this.currentResult;
    }

    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Runs the pipeline and records the posts. A failed run records nothing.
     */
    async run(request: GenerationRequest): Promise<GenerationResult> {
        if (this.running) {
            throw new SessionBusyError(this.id);
        }

        this.running = true;
        try {
            const result = await this.generator.generate(request);
            this.history.record(result.posts);
            this.currentResult = result;
            console.log(`[${this.id}] Run ${this.history.size} recorded (${result.posts.length} posts)`);
            return result;
        } finally {
            this.running = false;
        }
    }

    /**
     * Post of the latest run at a 1-based position, as a text file.
     */
    downloadPost(position: number): PostDownload | null {
        const posts = this.currentResult?.posts ?? [];
        if (!Number.isInteger(position) || position < 1 || position > posts.length) {
            return null;
        }
        return {
            fileName: postFileName(position),
            content: posts[position - 1],
        };
    }

    pastRunPreviews(): PastRunPreview[] {
        return this.history.listPast().map((posts, index) => ({
            run: index + 1,
            options: posts.map((post, postIndex) => ({
                option: postIndex + 1,
                preview: createPostPreview(post),
            })),
        }));
    }
}
