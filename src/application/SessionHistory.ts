/**
 * Posts of one past run, copied at record time.
 */
export type HistoryEntry = readonly string[];

/**
 * Append-only record of successful runs for one session.
 * Lives in memory only and ends with the session.
 */
export class SessionHistory {
    private readonly entries: HistoryEntry[] = [];

    /**
     * Appends a copy of the posts, so later changes to the caller's array
     * never reach stored entries.
     */
    record(posts: readonly string[]): void {
        this.entries.push(Object.freeze([...posts]));
    }

    /**
     * Every entry except the most recent one, oldest first. The latest run
     * is shown on its own by the caller.
     */
    listPast(): HistoryEntry[] {
        return this.entries.slice(0, -1);
    }

    latest(): HistoryEntry | undefined {
        return this.entries[this.entries.length - 1];
    }

    get size(): number {
        return this.entries.length;
    }
}
