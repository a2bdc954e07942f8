import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { PostGenerator } from '../application/PostGenerator';
import { SessionManager } from '../application/SessionManager';
import { ITextGenerationClient } from '../domain/ports/ITextGenerationClient';
import { OpenAITextGenerationClient } from '../infrastructure/llm/OpenAITextGenerationClient';

// Route imports
import { createSessionRoutes } from './routes/sessionRoutes';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

export interface AppDependencies {
    sessionManager: SessionManager;
}

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, deps: AppDependencies = createDependencies(config)): Application {
    const app = express();

    // Middleware
    app.use(cors({
        origin: config.corsOrigins,
        credentials: true,
    }));
    app.use(express.json());

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
        });
    });

    // Routes
    app.use('/api', createSessionRoutes(deps.sessionManager));

    app.use((req: Request) => {
        throw new NotFoundError(`Route not found: ${req.method} ${req.path}`);
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring. The text-generation client is
 * created once and shared for the life of the process.
 */
export function createDependencies(
    config: Config,
    textClient: ITextGenerationClient = new OpenAITextGenerationClient(config.openaiApiKey, config.openaiBaseUrl)
): AppDependencies {
    const generator = new PostGenerator(textClient, config.openaiModel);
    return {
        sessionManager: new SessionManager(generator),
    };
}
