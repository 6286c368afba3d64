import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import {
    aggregateChannelReport,
    costPerOrder,
    ResultsAggregator,
    returnOnAdSpend,
    writeChannelReportCsv,
} from '../src/services/resultsAggregator';
import { Journey, Touchpoint } from '../src/types';
import { eventLogger } from '../src/utils/eventLogger';
import { InMemoryStore } from './support/inMemoryStore';

const touchpoint = (session_id: string, channel_name: string, cost: number, event_date = '2024-01-01'): Touchpoint => ({
    session_id,
    channel_name,
    event_date,
    timestamp: `${event_date}T10:00:00.000Z`,
    holder_engagement: false,
    closer_engagement: false,
    impression_interaction: false,
    cost,
    hours_to_conversion: 1,
});

const journey = (conv_id: string, revenue: number, touchpoints: Touchpoint[]): Journey => ({
    conv_id,
    user_id: 'u1',
    conv_timestamp: '2024-01-02T00:00:00.000Z',
    revenue,
    touchpoints,
});

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    eventLogger.clear();
});

describe('ratio guards', () => {
    it('leaves CPO undefined without credit and ROAS undefined without cost', () => {
        expect(costPerOrder(10, 0)).toBeNull();
        expect(returnOnAdSpend(40, 0)).toBeNull();
        expect(costPerOrder(10, 0.4)).toBeCloseTo(25);
        expect(returnOnAdSpend(40, 10)).toBeCloseTo(4);
    });
});

describe('aggregateChannelReport', () => {
    it('computes channel totals and ratios for a two-touch journey', () => {
        const journeys = [journey('c1', 100, [touchpoint('sA', 'A', 10), touchpoint('sB', 'B', 5)])];

        const [a, b] = aggregateChannelReport(journeys, [
            { conv_id: 'c1', session_id: 'sA', ihc: 0.4 },
            { conv_id: 'c1', session_id: 'sB', ihc: 0.6 },
        ]);

        expect(a.channel_name).toBe('A');
        expect(a.cost).toBe(10);
        expect(a.ihc).toBeCloseTo(0.4);
        expect(a.ihc_revenue).toBeCloseTo(40);
        expect(a.CPO).toBeCloseTo(25);
        expect(a.ROAS).toBeCloseTo(4);

        expect(b.channel_name).toBe('B');
        expect(b.cost).toBe(5);
        expect(b.ihc).toBeCloseTo(0.6);
        expect(b.ihc_revenue).toBeCloseTo(60);
        expect(b.CPO).toBeCloseTo(8.33, 2);
        expect(b.ROAS).toBeCloseTo(12);
    });

    it('counts cost of unattributed sessions and a shared session once', () => {
        const shared = touchpoint('s1', 'Display', 8);
        const journeys = [
            journey('c1', 50, [shared]),
            journey('c2', 70, [shared, touchpoint('s2', 'Display', 2)]),
        ];

        const rows = aggregateChannelReport(journeys, [{ conv_id: 'c1', session_id: 's1', ihc: 1 }]);

        expect(rows).toEqual([
            { channel_name: 'Display', date: '2024-01-01', cost: 10, ihc: 1, ihc_revenue: 50, CPO: 10, ROAS: 5 },
        ]);
    });

    it('reports null ratios for groups without credit or cost', () => {
        const journeys = [journey('c1', 100, [touchpoint('s1', 'Paid', 20), touchpoint('s2', 'Organic', 0)])];

        const rows = aggregateChannelReport(journeys, [{ conv_id: 'c1', session_id: 's2', ihc: 1 }]);

        expect(rows).toEqual([
            { channel_name: 'Organic', date: '2024-01-01', cost: 0, ihc: 1, ihc_revenue: 100, CPO: 0, ROAS: null },
            { channel_name: 'Paid', date: '2024-01-01', cost: 20, ihc: 0, ihc_revenue: 0, CPO: null, ROAS: 0 },
        ]);
    });

    it('groups by session date and sorts by date then channel', () => {
        const journeys = [journey('c1', 10, [
            touchpoint('s1', 'B', 1, '2024-01-02'),
            touchpoint('s2', 'A', 1, '2024-01-02'),
            touchpoint('s3', 'C', 1, '2024-01-01'),
        ])];

        const rows = aggregateChannelReport(journeys, []);

        expect(rows.map((row) => `${row.date}/${row.channel_name}`)).toEqual(['2024-01-01/C', '2024-01-02/A', '2024-01-02/B']);
    });

    it('ignores credit for conversions or sessions outside the journeys', () => {
        const journeys = [journey('c1', 100, [touchpoint('s1', 'A', 4)])];

        const rows = aggregateChannelReport(journeys, [
            { conv_id: 'other', session_id: 's1', ihc: 1 },
            { conv_id: 'c1', session_id: 'unknown', ihc: 1 },
        ]);

        expect(rows).toEqual([
            { channel_name: 'A', date: '2024-01-01', cost: 4, ihc: 0, ihc_revenue: 0, CPO: null, ROAS: 0 },
        ]);
    });
});

describe('channel report file', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(tmpdir(), 'channel-report-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('writes the header, rounded numbers and empty cells for undefined ratios', async () => {
        const file = path.join(dir, 'report.csv');

        await writeChannelReportCsv([
            { channel_name: 'B', date: '2024-01-01', cost: 5, ihc: 0.6, ihc_revenue: 60, CPO: 5 / 0.6, ROAS: 12 },
            { channel_name: 'Email, Newsletter', date: '2024-01-01', cost: 0, ihc: 0, ihc_revenue: 0, CPO: null, ROAS: null },
        ], file);

        expect(await readFile(file, 'utf8')).toBe(
            'channel_name,date,cost,ihc,ihc_revenue,CPO,ROAS\n' +
            'B,2024-01-01,5,0.6,60,8.333333,12\n' +
            '"Email, Newsletter",2024-01-01,0,0,0,,\n'
        );
    });

    it('overwrites the report and the stored table on each run', async () => {
        const file = path.join(dir, 'report.csv');
        const store = new InMemoryStore();
        await store.replaceAttributionResults(['c1'], [{ conv_id: 'c1', session_id: 's1', ihc: 1 }]);
        const aggregator = new ResultsAggregator(store);

        await aggregator.run([journey('c1', 100, [touchpoint('s1', 'A', 10)])], file);
        const summary = await aggregator.run([journey('c1', 100, [touchpoint('s1', 'A', 10)])], file);

        expect(summary.rows).toHaveLength(1);
        expect(store.reports).toEqual(summary.rows);
        expect(await readFile(file, 'utf8')).toBe(
            'channel_name,date,cost,ihc,ihc_revenue,CPO,ROAS\n' +
            'A,2024-01-01,10,1,100,10,10\n'
        );
    });

    it('skips malformed stored credit rows', async () => {
        const store = new InMemoryStore();
        store.fetchAttributionResults = async () => [
            { conv_id: 'c1', session_id: 's1', ihc: 'lots' },
            { conv_id: 'c1', session_id: 's1', ihc: 1 },
        ];

        const summary = await new ResultsAggregator(store).run([journey('c1', 100, [touchpoint('s1', 'A', 10)])]);

        expect(summary.dataQualityIssues).toHaveLength(1);
        expect(summary.rows[0].ihc).toBe(1);
    });
});
