import { v4 as uuidv4 } from 'uuid';
import { PostGenerator } from './PostGenerator';
import { PostSession } from './PostSession';

/**
 * In-memory registry of interactive sessions. Nothing survives a restart.
 */
export class SessionManager {
    private sessions: Map<string, PostSession> = new Map();

    constructor(private readonly generator: PostGenerator) { }

    /**
     * Creates a new session with an empty history.
     */
    createSession(): PostSession {
        const id = `session_${uuidv4().substring(0, 8)}`;
        const session = new PostSession(id, this.generator);
        this.sessions.set(id, session);
        console.log(`[${id}] Session started`);
        return session;
    }

    /**
     * Gets a session by ID.
     */
    getSession(id: string): PostSession | null {
        return this.sessions.get(id) || null;
    }

    /**
     * Ends a session and drops its history. Returns false if it did not exist.
     */
    endSession(id: string): boolean {
        const removed = this.sessions.delete(id);
        if (removed) {
            console.log(`[${id}] Session ended`);
        }
        return removed;
    }

    get sessionCount(): number {
        return this.sessions.size;
    }
}
