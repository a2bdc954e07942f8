import { Router, Request, Response } from 'express';
import {
    LANGUAGES,
    MAX_POST_COUNT,
    MIN_POST_COUNT,
    POST_LENGTHS,
    REQUEST_DEFAULTS,
    TONES,
    getPostStats,
    parseGenerationRequest,
    postFileName,
} from '../../domain/entities/PostGeneration';
import { SessionManager } from '../../application/SessionManager';
import { PostSession } from '../../application/PostSession';
import { asyncHandler, NotFoundError } from '../middleware/errorHandler';

function requireSession(sessionManager: SessionManager, sessionId: string): PostSession {
    const session = sessionManager.getSession(sessionId);
    if (!session) {
        throw new NotFoundError(`Session not found: ${sessionId}`);
    }
    return session;
}

/**
 * Creates session and post generation routes with dependency injection.
 */
export function createSessionRoutes(sessionManager: SessionManager): Router {
    const router = Router();

    /**
     * GET /options
     *
     * Choices and defaults for the generation form.
     */
    router.get('/options', (req: Request, res: Response) => {
        res.json({
            tones: TONES,
            lengths: POST_LENGTHS,
            languages: LANGUAGES,
            postCount: { min: MIN_POST_COUNT, max: MAX_POST_COUNT },
            defaults: REQUEST_DEFAULTS,
        });
    });

    /**
     * POST /sessions
     *
     * Starts a new session with an empty history.
     */
    router.post('/sessions', (req: Request, res: Response) => {
        const session = sessionManager.createSession();
        res.status(201).json({
            sessionId: session.id,
            createdAt: session.createdAt.toISOString(),
        });
    });

    /**
     * POST /sessions/:sessionId/generate
     *
     * Runs the pipeline for the request body and waits for the posts.
     * The topic is validated before any external call is made.
     */
    router.post(
        '/sessions/:sessionId/generate',
        asyncHandler(async (req: Request, res: Response) => {
            const session = requireSession(sessionManager, req.params.sessionId);
            const request = parseGenerationRequest(req.body);

            console.log(`[${session.id}] Generating ${request.postCount} ${request.tone} posts about "${request.topic}"`);
            const result = await session.run(request);

            res.json({
                sessionId: session.id,
                posts: result.posts.map((content, index) => ({
                    option: index + 1,
                    content,
                    ...getPostStats(content),
                    fileName: postFileName(index + 1),
                })),
                ...(result.extras !== undefined && { extras: result.extras }),
                latencySeconds: result.latencySeconds,
            });
        })
    );

    /**
     * GET /sessions/:sessionId/history
     *
     * Previews of earlier runs; the latest run is excluded.
     */
    router.get('/sessions/:sessionId/history', (req: Request, res: Response) => {
        const session = requireSession(sessionManager, req.params.sessionId);
        res.json({ runs: session.pastRunPreviews() });
    });

    /**
     * GET /sessions/:sessionId/posts/:option/download
     *
     * One post of the latest run as a text file.
     */
    router.get('/sessions/:sessionId/posts/:option/download', (req: Request, res: Response) => {
        const session = requireSession(sessionManager, req.params.sessionId);
        const position = Number(req.params.option);
        const download = session.downloadPost(position);

        if (!download) {
            throw new NotFoundError(`No post at option ${req.params.option}`);
        }

        res.attachment(download.fileName);
        res.type('text/plain');
        res.send(download.content);
    });

    /**
     * DELETE /sessions/:sessionId
     *
     * Ends the session and discards its history.
     */
    router.delete('/sessions/:sessionId', (req: Request, res: Response) => {
        if (!sessionManager.endSession(req.params.sessionId)) {
            throw new NotFoundError(`Session not found: ${req.params.sessionId}`);
        }
        res.status(204).send();
    });

    return router;
}
