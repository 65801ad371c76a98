/**
 * Owns every periodic task started by the store and the
 * federation layer so that shutdown can cancel all of them at once.
 */
export class TimerRegistry {
    private intervals: Map<string, NodeJS.Timeout> = new Map();
    private idCounter = 0;

    private generateId(prefix: string): string {
        return `${prefix}-${++this.idCounter}`;
    }

    /**
     * Schedule a repeating callback. Re-using an id replaces the earlier interval.
     * @returns The id of the interval
     */
    setInterval(callback: () => void, intervalMs: number, id?: string): string {
        const timerId = id ?? this.generateId('interval');
        this.clearInterval(timerId);

        const handle = setInterval(callback, intervalMs);
        // Periodic housekeeping must not keep the process alive on its own
        handle.unref();
        this.intervals.set(timerId, handle);
        return timerId;
    }

    clearInterval(id: string): boolean {
        const handle = this.intervals.get(id);
        if (handle === undefined) {
            return false;
        }
        clearInterval(handle);
        this.intervals.delete(id);
        return true;
    }

    has(id: string): boolean {
        return this.intervals.has(id);
    }

    /**
     * Cancel everything (shutdown).
     */
    clear(): { intervalsCleared: number } {
        const intervalsCleared = this.intervals.size;

        for (const handle of this.intervals.values()) {
            clearInterval(handle);
        }
        this.intervals.clear();

        return { intervalsCleared };
    }

    getActiveCount(): number {
        return this.intervals.size;
    }
}
