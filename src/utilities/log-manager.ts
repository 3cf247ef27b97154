export enum LogType {
    Error,
    Debug,
    Warn,
    Info
}

export interface ILogMessage {
    type: LogType;
    source: string;
    msg: unknown;
    exception?: Error;
    index?: number;
}

export type LogMessageCallback = ((msg: ILogMessage) => void);

/** Minimum interval between identical log messages (in ms) */
const LOG_THROTTLE_MS = 1000;

/** Number of messages kept for late listeners */
const LOG_HISTORY = 100;

/**
 * Frames where Node hands control back to its scheduler. Everything below
 * them is event-loop plumbing.
 */
const ASYNC_BOUNDARY_PATTERNS = [
    /processTicksAndRejections/,
    /process\.processImmediate/,
    /listOnTimeout/,
    /node:internal\/timers/,
    /node:internal\/process\/task_queues/,
];

/**
 * Truncate a stack trace at the first async boundary, keeping that frame
 * for context.
 */
export function cleanStackTrace(stack: string): string {
    const lines = stack.split('\n');
    const result: string[] = [];

    for (const line of lines) {
        if (ASYNC_BOUNDARY_PATTERNS.some(p => p.test(line.trim()))) {
            result.push(line);
            result.push('    ... (async stack truncated)');
            break;
        }
        result.push(line);
    }

    return result.join('\n');
}

export class LogManager {
    public log: ILogMessage[] = [];
    private logMsgCount = 0;
    private listener: LogMessageCallback | null = null;

    /** Throttle state: source+msg -> { lastTime, suppressedCount } */
    private throttleState = new Map<string, { lastTime: number; suppressedCount: number }>();

    public onLogMessage(callback: LogMessageCallback | null): void {
        this.listener = callback;

        if (!callback) {
            return;
        }

        // send old messages
        for (const msg of this.log) {
            callback(msg);
        }
    }

    /** Drop the history and throttle state */
    public clear(): void {
        this.log = [];
        this.throttleState.clear();
    }

    /** Number of distinct lines currently remembered for throttling */
    public get throttledLineCount(): number {
        return this.throttleState.size;
    }

    /** Drop expired lines, keeping those with a suppressed count still to report. */
    private pruneThrottleState(now: number): void {
        for (const [key, entry] of this.throttleState) {
            if (now - entry.lastTime < LOG_THROTTLE_MS) break;
            if (entry.suppressedCount === 0) this.throttleState.delete(key);
        }
    }

    public push(msg: ILogMessage): void {
        msg.index = this.logMsgCount++;

        this.log.push(msg);
        if (this.log.length > LOG_HISTORY) {
            this.log.shift();
        }

        if (this.listener) {
            this.listener(msg);
        }

        const msgStr = typeof msg.msg === 'string' ? msg.msg : JSON.stringify(msg.msg);
        const throttleKey = `${msg.source}:${msg.type}:${msgStr}`;
        const now = performance.now();
        const state = this.throttleState.get(throttleKey);

        if (state && now - state.lastTime < LOG_THROTTLE_MS) {
            state.suppressedCount++;
            return;
        }

        const suppressedNote = state && state.suppressedCount > 0
            ? ` (${state.suppressedCount} similar suppressed)`
            : '';

        // Re-insert so the map stays ordered by lastTime
        this.throttleState.delete(throttleKey);
        this.pruneThrottleState(now);
        this.throttleState.set(throttleKey, { lastTime: now, suppressedCount: 0 });

        if (typeof msg.msg !== 'string') {
            console.dir(msg.msg);
            return;
        }

        let formatted = msg.source + '\t' + msg.msg + suppressedNote;
        if (msg.exception) {
            formatted += '\n' + msg.exception.message;
            if (msg.exception.stack) {
                formatted += '\n' + cleanStackTrace(msg.exception.stack);
            }
        }

        switch (msg.type) {
        case LogType.Error:
            console.error(formatted);
            break;
        case LogType.Warn:
            console.warn(formatted);
            break;
        case LogType.Info:
            console.info(formatted);
            break;
        case LogType.Debug:
            console.log(formatted);
            break;
        }
    }
}
