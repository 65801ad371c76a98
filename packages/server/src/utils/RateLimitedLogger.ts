import { logger } from './logger';

export interface BaseLogger {
    warn(obj: object, msg: string): void;
    error(obj: object, msg: string): void;
}

export interface RateLimitConfig {
    /** Time window in milliseconds (default: 10000) */
    windowMs: number;
    /** Maximum logs per window per key (default: 5) */
    maxPerWindow: number;
    baseLogger?: BaseLogger;
    /** Time source (default: Date.now) */
    clock?: () => number;
}

interface WindowState {
    count: number;
    suppressedCount: number;
    windowStart: number;
}

const DEFAULT_CONFIG: RateLimitConfig = {
    windowMs: 10000,
    maxPerWindow: 5,
};

/**
 * Throttles log lines per key. Once a key exceeds `maxPerWindow` lines in a
 * window the rest are counted instead of written, and a single summary line
 * is emitted when the next window opens.
 *
 * Peers are keyed by server id (`parse-failure:${serverId}`), so one noisy
 * peer cannot drown the log.
 */
export class RateLimitedLogger {
    private states: Map<string, WindowState> = new Map();
    private config: RateLimitConfig;
    private baseLogger: BaseLogger;
    private clock: () => number;

    constructor(config: Partial<RateLimitConfig> = {}) {
        this.config = { ...DEFAULT_CONFIG, ...config };
        this.baseLogger = config.baseLogger ?? logger;
        this.clock = config.clock ?? Date.now;
    }

    warn(key: string, obj: object, msg: string): void {
        if (this.shouldLog(key)) {
            this.baseLogger.warn(obj, msg);
        }
    }

    error(key: string, obj: object, msg: string): void {
        if (this.shouldLog(key)) {
            this.baseLogger.error(obj, msg);
        }
    }

    private shouldLog(key: string): boolean {
        const now = this.clock();
        let state = this.states.get(key);

        if (!state || now - state.windowStart >= this.config.windowMs) {
            if (state && state.suppressedCount > 0) {
                this.emitSummary(key, state.suppressedCount);
            }
            state = { count: 0, suppressedCount: 0, windowStart: now };
            this.states.set(key, state);
        }

        if (state.count < this.config.maxPerWindow) {
            state.count++;
            return true;
        }

        state.suppressedCount++;
        return false;
    }

    /**
     * Drop keys whose window opened more than `maxAgeMs` ago (default 5 windows),
     * writing their pending suppression summaries first.
     */
    cleanup(maxAgeMs?: number): void {
        const now = this.clock();
        const threshold = maxAgeMs ?? this.config.windowMs * 5;

        for (const [key, state] of this.states) {
            if (now - state.windowStart >= threshold) {
                if (state.suppressedCount > 0) {
                    this.emitSummary(key, state.suppressedCount);
                }
                this.states.delete(key);
            }
        }
    }

    /**
     * Forget a key without a summary (e.g. a peer that was removed).
     */
    forget(key: string): void {
        this.states.delete(key);
    }

    getTrackedKeyCount(): number {
        return this.states.size;
    }

    private emitSummary(key: string, suppressedCount: number): void {
        this.baseLogger.warn(
            { key, suppressedCount, windowMs: this.config.windowMs },
            `Suppressed ${suppressedCount} log lines for "${key}"`
        );
    }
}
