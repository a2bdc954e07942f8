import { PostGenerator } from '../../../src/application/PostGenerator';
import { SessionManager } from '../../../src/application/SessionManager';

describe('SessionManager', () => {
    let manager: SessionManager;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        manager = new SessionManager(new PostGenerator({ complete: jest.fn() }, 'gpt-4o-mini'));
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should create sessions with unique prefixed ids', () => {
        const first = manager.createSession();
        const second = manager.createSession();

        expect(first.id).toMatch(/^session_[0-9a-f]{8}$/);
        expect(second.id).not.toBe(first.id);
        expect(manager.sessionCount).toBe(2);
    });

    it('should start each session with its own empty history', () => {
        const first = manager.createSession();
        first.history.record(['a post from the first session']);

        const second = manager.createSession();

        expect(second.history.size).toBe(0);
    });

    it('should look sessions up by id', () => {
        const session = manager.createSession();

        expect(manager.getSession(session.id)).toBe(session);
        expect(manager.getSession('session_missing')).toBeNull();
    });

    it('should end sessions and drop them', () => {
        const session = manager.createSession();

        expect(manager.endSession(session.id)).toBe(true);
        expect(manager.getSession(session.id)).toBeNull();
        expect(manager.endSession(session.id)).toBe(false);
        expect(manager.sessionCount).toBe(0);
    });
});
