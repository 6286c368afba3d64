export type LogEventType = 'journey' | 'batch' | 'report' | 'error' | 'system';

export interface LogEvent {
    id: string;
    timestamp: number;
    type: LogEventType;
    summary: string;
    details?: unknown;
}

/**
 * Persistent destination for error events (the store's error_logs table).
 */
export interface ErrorLogSink {
    logError(message: string, details: unknown): Promise<void>;
}

const ICONS: Record<LogEventType, string> = {
    journey: '🧭',
    batch: '📦',
    report: '📊',
    error: '❌',
    system: '⚙️',
};

export class EventLogger {
    private events: LogEvent[] = [];
    private readonly MAX_EVENTS = 200;
    private sink?: ErrorLogSink;
    private pending = new Set<Promise<void>>();
    private sequence = 0;

    attachSink(sink: ErrorLogSink | undefined) {
        this.sink = sink;
    }

    log(type: LogEventType, summary: string, details?: unknown) {
        const event: LogEvent = {
            id: `${Date.now().toString(36)}-${(this.sequence++).toString(36)}`,
            timestamp: Date.now(),
            type,
            summary,
            details,
        };

        this.events.unshift(event);

        if (this.events.length > this.MAX_EVENTS) {
            this.events = this.events.slice(0, this.MAX_EVENTS);
        }

        if (type === 'error') {
            console.error(`${ICONS[type]} [${type.toUpperCase()}] ${summary}`, details ?? '');
            this.persistError(summary, details);
        } else {
            console.log(`${ICONS[type]} [${type.toUpperCase()}] ${summary}`);
        }
    }

    private persistError(summary: string, details: unknown) {
        if (!this.sink) return;

        const write = this.sink.logError(summary, details).catch((err: unknown) => {
            console.error('Failed to log error to DB:', err);
        });
        this.pending.add(write);
        void write.finally(() => this.pending.delete(write));
    }

    /**
     * Wait for outstanding error-log writes.
     */
    async flush(): Promise<void> {
        await Promise.all([...this.pending]);
    }

    getEvents(since?: number): LogEvent[] {
        if (!since) {
            return this.events;
        }
        return this.events.filter(e => e.timestamp > since);
    }

    clear() {
        this.events = [];
    }
}

export const eventLogger = new EventLogger();
