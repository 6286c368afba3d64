import { AttributionStore, RawRow } from '../../src/repositories/attributionStore';
import { AttributionResult, ChannelReport, DateRange, ErrorLogEntry } from '../../src/types';

/**
 * Postgres stand-in: returns every input row regardless of the range, so the
 * pipeline's own filtering is what the tests observe.
 */
export class InMemoryStore implements AttributionStore {
    conversions: RawRow[] = [];
    sessions: RawRow[] = [];
    costs: RawRow[] = [];
    results = new Map<string, AttributionResult>();
    reports: ChannelReport[] = [];
    errorLogs: ErrorLogEntry[] = [];
    failWrites = false;

    constructor(seed: { conversions?: RawRow[]; sessions?: RawRow[]; costs?: RawRow[] } = {}) {
        this.conversions = seed.conversions ?? [];
        this.sessions = seed.sessions ?? [];
        this.costs = seed.costs ?? [];
    }

    async fetchConversions(_range: DateRange): Promise<RawRow[]> {
        return this.conversions;
    }

    async fetchSessionsForConversions(_range: DateRange): Promise<RawRow[]> {
        return this.sessions;
    }

    async fetchSessionCosts(_range: DateRange): Promise<RawRow[]> {
        return this.costs;
    }

    async replaceAttributionResults(convIds: readonly string[], rows: readonly AttributionResult[]): Promise<number> {
        if (this.failWrites) {
            throw new Error('connection refused');
        }
        const replaced = new Set(convIds);
        for (const [key, row] of this.results) {
            if (replaced.has(row.conv_id)) {
                this.results.delete(key);
            }
        }
        for (const row of rows) {
            this.results.set(`${row.conv_id}|${row.session_id}`, { ...row });
        }
        return rows.length;
    }

    async fetchAttributionResults(convIds: readonly string[]): Promise<RawRow[]> {
        const wanted = new Set(convIds);
        return [...this.results.values()].filter((row) => wanted.has(row.conv_id)).map((row) => ({ ...row }));
    }

    async replaceChannelReports(rows: readonly ChannelReport[]): Promise<void> {
        this.reports = [...rows];
    }

    async fetchChannelReports(): Promise<ChannelReport[]> {
        return this.reports;
    }

    async fetchAttributionsForConversion(convId: string): Promise<AttributionResult[]> {
        return [...this.results.values()].filter((row) => row.conv_id === convId);
    }

    async fetchErrorLogs(limit: number): Promise<ErrorLogEntry[]> {
        return this.errorLogs.slice(0, limit);
    }

    async logError(message: string, details: unknown): Promise<void> {
        this.errorLogs.unshift({
            id: this.errorLogs.length + 1,
            type: 'pipeline',
            message,
            stack: null,
            metadata: JSON.stringify(details ?? {}),
            created_at: new Date(0),
        });
    }
}

export const session = (overrides: Partial<Record<string, unknown>> & { session_id: string }): RawRow => ({
    user_id: 'u1',
    channel_name: 'Paid Search',
    event_date: '2024-01-01',
    event_time: '10:00:00',
    holder_engagement: 0,
    closer_engagement: 0,
    impression_interaction: 0,
    ...overrides,
});

export const conversion = (overrides: Partial<Record<string, unknown>> & { conv_id: string }): RawRow => ({
    user_id: 'u1',
    conv_date: '2024-01-05',
    conv_time: '12:00:00',
    revenue: '100',
    ...overrides,
});
