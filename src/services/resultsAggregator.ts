import { writeFile } from 'fs/promises';
import { ReportStore } from '../repositories/attributionStore';
import { AttributionResult, ChannelReport, DataQualityIssue, Journey } from '../types';
import { CsvColumn, toCsv } from '../utils/csv';
import { eventLogger } from '../utils/eventLogger';
import { attributionResultRowSchema, parseRow } from './rowSchemas';

export const REPORT_COLUMNS: CsvColumn<ChannelReport>[] = [
    { name: 'channel_name', value: (row) => row.channel_name },
    { name: 'date', value: (row) => row.date },
    { name: 'cost', value: (row) => row.cost },
    { name: 'ihc', value: (row) => row.ihc },
    { name: 'ihc_revenue', value: (row) => row.ihc_revenue },
    { name: 'CPO', value: (row) => row.CPO },
    { name: 'ROAS', value: (row) => row.ROAS },
];

interface Group {
    channel_name: string;
    date: string;
    cost: number;
    ihc: number;
    ihc_revenue: number;
}

/**
 * Cost per order: cost over summed credit. Undefined without credit.
 */
export const costPerOrder = (cost: number, ihc: number): number | null => (ihc > 0 ? cost / ihc : null);

/**
 * Return on ad spend: attributed revenue over cost. Undefined without cost.
 */
export const returnOnAdSpend = (ihcRevenue: number, cost: number): number | null =>
    cost > 0 ? ihcRevenue / cost : null;

/**
 * Group credit and cost by (channel, session date).
 *
 * Cost covers every session that appears in any journey, attributed or not,
 * counted once even when several journeys share it. Credit rows whose
 * conversion or session is not part of `journeys` are ignored.
 */
export function aggregateChannelReport(
    journeys: readonly Journey[],
    results: readonly AttributionResult[]
): ChannelReport[] {
    const groups = new Map<string, Group>();
    const groupOf = (channel: string, date: string): Group => {
        const key = `${channel}\u0000${date}`;
        let group = groups.get(key);
        if (!group) {
            group = { channel_name: channel, date, cost: 0, ihc: 0, ihc_revenue: 0 };
            groups.set(key, group);
        }
        return group;
    };

    const sessions = new Map<string, { channel_name: string; event_date: string }>();
    const revenueByConversion = new Map<string, number>();
    for (const journey of journeys) {
        revenueByConversion.set(journey.conv_id, journey.revenue);
        for (const touchpoint of journey.touchpoints) {
            if (sessions.has(touchpoint.session_id)) continue;
            sessions.set(touchpoint.session_id, touchpoint);
            groupOf(touchpoint.channel_name, touchpoint.event_date).cost += touchpoint.cost;
        }
    }

    for (const result of results) {
        const session = sessions.get(result.session_id);
        const revenue = revenueByConversion.get(result.conv_id);
        if (!session || revenue === undefined) continue;

        const group = groupOf(session.channel_name, session.event_date);
        group.ihc += result.ihc;
        group.ihc_revenue += result.ihc * revenue;
    }

    return [...groups.values()]
        .sort((a, b) => (a.date === b.date ? a.channel_name.localeCompare(b.channel_name) : a.date < b.date ? -1 : 1))
        .map((group) => ({
            ...group,
            CPO: costPerOrder(group.cost, group.ihc),
            ROAS: returnOnAdSpend(group.ihc_revenue, group.cost),
        }));
}

export interface AggregationSummary {
    rows: ChannelReport[];
    dataQualityIssues: DataQualityIssue[];
}

export class ResultsAggregator {
    constructor(private readonly store: ReportStore) {}

    async run(journeys: readonly Journey[], reportPath?: string): Promise<AggregationSummary> {
        const convIds = journeys.map((journey) => journey.conv_id);
        const rawResults = await this.store.fetchAttributionResults(convIds);

        const dataQualityIssues: DataQualityIssue[] = [];
        const results: AttributionResult[] = [];
        for (const raw of rawResults) {
            const parsed = parseRow(attributionResultRowSchema, raw, 'conv_id');
            if (parsed.ok) {
                results.push(parsed.value);
            } else {
                dataQualityIssues.push({ table: 'attribution_customer_journey', key: parsed.key, reason: parsed.reason });
            }
        }

        const rows = aggregateChannelReport(journeys, results);
        await this.store.replaceChannelReports(rows);
        eventLogger.log('report', `Channel reporting updated with ${rows.length} rows`);

        if (reportPath) {
            await writeChannelReportCsv(rows, reportPath);
            eventLogger.log('report', `Channel report exported to ${reportPath}`);
        }

        return { rows, dataQualityIssues };
    }
}

export async function writeChannelReportCsv(rows: readonly ChannelReport[], path: string): Promise<void> {
    await writeFile(path, toCsv(rows, REPORT_COLUMNS), 'utf8');
}
