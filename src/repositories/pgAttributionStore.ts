import { QueryResultRow } from 'pg';
import { query, withTransaction } from '../config/database';
import { chunk } from '../utils/helpers';
import { AttributionResult, ChannelReport, DateRange, ErrorLogEntry } from '../types';
import { StoreAccessError } from '../utils/errors';
import { AttributionStore, RawRow } from './attributionStore';

// Dates and times as text so they are never shifted by the client's timezone
const CONVERSION_COLUMNS = `
    c.conv_id::text AS conv_id,
    c.user_id::text AS user_id,
    c.conv_date::text AS conv_date,
    c.conv_time::text AS conv_time,
    c.revenue::text AS revenue`;

const CONVERSION_RANGE = `
    ($1::date IS NULL OR c.conv_date >= $1::date)
    AND ($2::date IS NULL OR c.conv_date <= $2::date)`;

const rangeParams = (range: DateRange) => [range.start_date ?? null, range.end_date ?? null];

const UPSERT_CHUNK = 500;

interface ChannelReportRow extends QueryResultRow {
    channel_name: string;
    date: string;
    cost: number;
    ihc: number;
    ihc_revenue: number;
    CPO: number | null;
    ROAS: number | null;
}

export class PgAttributionStore implements AttributionStore {
    private async run<R extends QueryResultRow>(operation: string, text: string, params?: unknown[]): Promise<R[]> {
        try {
            const result = await query<R>(text, params);
            return result.rows;
        } catch (error) {
            throw new StoreAccessError(operation, error);
        }
    }

    async fetchConversions(range: DateRange): Promise<RawRow[]> {
        return this.run<RawRow>(
            'fetchConversions',
            `SELECT ${CONVERSION_COLUMNS}
             FROM conversions c
             WHERE ${CONVERSION_RANGE}
             ORDER BY c.conv_date, c.conv_time, c.conv_id`,
            rangeParams(range)
        );
    }

    async fetchSessionsForConversions(range: DateRange): Promise<RawRow[]> {
        return this.run<RawRow>(
            'fetchSessionsForConversions',
            `SELECT
                s.session_id::text AS session_id,
                s.user_id::text AS user_id,
                s.channel_name,
                s.event_date::text AS event_date,
                s.event_time::text AS event_time,
                s.holder_engagement,
                s.closer_engagement,
                s.impression_interaction
             FROM session_sources s
             WHERE s.user_id IN (
                SELECT DISTINCT c.user_id FROM conversions c WHERE ${CONVERSION_RANGE}
             )
             ORDER BY s.user_id, s.event_date, s.event_time, s.session_id`,
            rangeParams(range)
        );
    }

    async fetchSessionCosts(range: DateRange): Promise<RawRow[]> {
        return this.run<RawRow>(
            'fetchSessionCosts',
            `SELECT sc.session_id::text AS session_id, sc.cost::text AS cost
             FROM session_costs sc
             JOIN session_sources s ON s.session_id = sc.session_id
             WHERE s.user_id IN (
                SELECT DISTINCT c.user_id FROM conversions c WHERE ${CONVERSION_RANGE}
             )`,
            rangeParams(range)
        );
    }

    async replaceAttributionResults(convIds: readonly string[], rows: readonly AttributionResult[]): Promise<number> {
        if (convIds.length === 0 && rows.length === 0) return 0;

        try {
            return await withTransaction(async (client) => {
                // Pairs from an earlier run that this response no longer credits must not survive
                await client.query('DELETE FROM attribution_customer_journey WHERE conv_id = ANY($1)', [convIds]);

                let written = 0;
                for (const slice of chunk(rows, UPSERT_CHUNK)) {
                    const values: unknown[] = [];
                    const tuples = slice.map((row, i) => {
                        values.push(row.conv_id, row.session_id, row.ihc);
                        return `($${i * 3 + 1}, $${i * 3 + 2}, $${i * 3 + 3})`;
                    });
                    const result = await client.query(
                        `INSERT INTO attribution_customer_journey (conv_id, session_id, ihc)
                         VALUES ${tuples.join(', ')}
                         ON CONFLICT (conv_id, session_id)
                         DO UPDATE SET ihc = EXCLUDED.ihc, updated_at = CURRENT_TIMESTAMP`,
                        values
                    );
                    written += result.rowCount ?? 0;
                }
                return written;
            });
        } catch (error) {
            throw new StoreAccessError('replaceAttributionResults', error);
        }
    }

    async fetchAttributionResults(convIds: readonly string[]): Promise<RawRow[]> {
        if (convIds.length === 0) return [];
        return this.run<RawRow>(
            'fetchAttributionResults',
            `SELECT conv_id, session_id, ihc
             FROM attribution_customer_journey
             WHERE conv_id = ANY($1)`,
            [convIds]
        );
    }

    async replaceChannelReports(rows: readonly ChannelReport[]): Promise<void> {
        try {
            await withTransaction(async (client) => {
                await client.query('DELETE FROM channel_reporting');
                for (const row of rows) {
                    await client.query(
                        `INSERT INTO channel_reporting (channel_name, date, cost, ihc, ihc_revenue, "CPO", "ROAS")
                         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
                        [row.channel_name, row.date, row.cost, row.ihc, row.ihc_revenue, row.CPO, row.ROAS]
                    );
                }
            });
        } catch (error) {
            throw new StoreAccessError('replaceChannelReports', error);
        }
    }

    async fetchChannelReports(): Promise<ChannelReport[]> {
        const rows = await this.run<ChannelReportRow>(
            'fetchChannelReports',
            `SELECT channel_name, date::text AS date, cost, ihc, ihc_revenue, "CPO", "ROAS"
             FROM channel_reporting
             ORDER BY date, channel_name`
        );
        return rows.map(({ channel_name, date, cost, ihc, ihc_revenue, CPO, ROAS }) => ({
            channel_name, date, cost, ihc, ihc_revenue, CPO, ROAS,
        }));
    }

    async fetchAttributionsForConversion(convId: string): Promise<AttributionResult[]> {
        return this.run<AttributionResult & QueryResultRow>(
            'fetchAttributionsForConversion',
            `SELECT conv_id, session_id, ihc
             FROM attribution_customer_journey
             WHERE conv_id = $1
             ORDER BY session_id`,
            [convId]
        );
    }

    async fetchErrorLogs(limit: number): Promise<ErrorLogEntry[]> {
        return this.run<ErrorLogEntry & QueryResultRow>(
            'fetchErrorLogs',
            `SELECT id, type, message, stack, metadata, created_at
             FROM error_logs
             ORDER BY created_at DESC
             LIMIT $1`,
            [limit]
        );
    }

    async logError(message: string, details: unknown): Promise<void> {
        const stack = details instanceof Error ? details.stack ?? '' : '';
        await this.run(
            'logError',
            `INSERT INTO error_logs (type, message, stack, metadata)
             VALUES ($1, $2, $3, $4)`,
            ['pipeline', message, stack, JSON.stringify(details ?? {})]
        );
    }
}
