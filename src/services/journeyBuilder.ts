import { JourneySource, RawRow } from '../repositories/attributionStore';
import { Conversion, DataQualityIssue, DateRange, Journey, Session, Touchpoint } from '../types';
import { eventLogger } from '../utils/eventLogger';
import { hoursBetween, isWithinRange, toEpochMs } from '../utils/helpers';
import { conversionRowSchema, parseRow, sessionCostRowSchema, sessionRowSchema } from './rowSchemas';

interface TimedSession extends Session {
    epochMs: number;
}

export interface JourneyInputs {
    conversions: readonly RawRow[];
    sessions: readonly RawRow[];
    costs: readonly RawRow[];
}

export interface JourneyStats {
    total_conversions: number;
    conversions_with_touchpoints: number;
    conversions_without_touchpoints: number;
    total_touchpoints: number;
    unique_users: number;
    avg_touchpoints_per_journey: number;
    channels: string[];
    date_range: { from: string; to: string } | null;
    total_revenue: number;
    avg_revenue_per_conversion: number;
}

const compareSessions = (a: TimedSession, b: TimedSession): number => {
    if (a.epochMs !== b.epochMs) return a.epochMs - b.epochMs;
    if (a.session_id < b.session_id) return -1;
    if (a.session_id > b.session_id) return 1;
    return 0;
};

/**
 * Turns raw session, conversion and cost rows into one journey per
 * conversion. Sessions qualify when they belong to the conversion's user and
 * happened no later than the conversion; there is no lower time bound.
 * Malformed rows are reported through `issues` and skipped.
 */
export class JourneyBuilder {
    private readonly issues: DataQualityIssue[] = [];

    constructor(private readonly source: JourneySource) {}

    get dataQualityIssues(): readonly DataQualityIssue[] {
        return this.issues;
    }

    async *build(range: DateRange = {}): AsyncGenerator<Journey> {
        const [conversions, sessions, costs] = await Promise.all([
            this.source.fetchConversions(range),
            this.source.fetchSessionsForConversions(range),
            this.source.fetchSessionCosts(range),
        ]);

        eventLogger.log(
            'journey',
            `Loaded ${conversions.length} conversions, ${sessions.length} sessions, ${costs.length} cost rows`
        );

        yield* this.assemble({ conversions, sessions, costs }, range);
    }

    *assemble(inputs: JourneyInputs, range: DateRange = {}): Generator<Journey> {
        const costBySession = this.indexCosts(inputs.costs);
        const sessionsByUser = this.indexSessions(inputs.sessions);
        const seenConversions = new Set<string>();

        for (const raw of inputs.conversions) {
            const parsed = parseRow(conversionRowSchema, raw, 'conv_id');
            if (!parsed.ok) {
                this.report({ table: 'conversions', key: parsed.key, reason: parsed.reason });
                continue;
            }
            const conversion = parsed.value;

            if (seenConversions.has(conversion.conv_id)) {
                this.report({ table: 'conversions', key: conversion.conv_id, reason: 'duplicate conv_id' });
                continue;
            }
            seenConversions.add(conversion.conv_id);

            if (!isWithinRange(conversion.conv_date, range)) {
                continue;
            }

            yield this.toJourney(conversion, sessionsByUser.get(conversion.user_id) ?? [], costBySession);
        }
    }

    private toJourney(
        conversion: Conversion,
        userSessions: readonly TimedSession[],
        costBySession: ReadonlyMap<string, number>
    ): Journey {
        const convMs = toEpochMs(conversion.conv_date, conversion.conv_time);

        // userSessions is sorted, so the qualifying ones are a prefix
        const touchpoints: Touchpoint[] = [];
        for (const session of userSessions) {
            if (session.epochMs > convMs) break;
            touchpoints.push({
                session_id: session.session_id,
                channel_name: session.channel_name,
                event_date: session.event_date,
                timestamp: new Date(session.epochMs).toISOString(),
                holder_engagement: session.holder_engagement,
                closer_engagement: session.closer_engagement,
                impression_interaction: session.impression_interaction,
                cost: costBySession.get(session.session_id) ?? 0,
                hours_to_conversion: hoursBetween(session.epochMs, convMs),
            });
        }

        return {
            conv_id: conversion.conv_id,
            user_id: conversion.user_id,
            conv_timestamp: new Date(convMs).toISOString(),
            revenue: conversion.revenue,
            touchpoints,
        };
    }

    private indexSessions(rows: readonly RawRow[]): Map<string, TimedSession[]> {
        const byUser = new Map<string, TimedSession[]>();
        const seen = new Set<string>();

        for (const raw of rows) {
            const parsed = parseRow(sessionRowSchema, raw, 'session_id');
            if (!parsed.ok) {
                this.report({ table: 'session_sources', key: parsed.key, reason: parsed.reason });
                continue;
            }
            const session = parsed.value;
            if (seen.has(session.session_id)) {
                this.report({ table: 'session_sources', key: session.session_id, reason: 'duplicate session_id' });
                continue;
            }
            seen.add(session.session_id);

            const timed: TimedSession = { ...session, epochMs: toEpochMs(session.event_date, session.event_time) };
            const list = byUser.get(session.user_id);
            if (list) {
                list.push(timed);
            } else {
                byUser.set(session.user_id, [timed]);
            }
        }

        for (const list of byUser.values()) {
            list.sort(compareSessions);
        }
        return byUser;
    }

    private indexCosts(rows: readonly RawRow[]): Map<string, number> {
        const costs = new Map<string, number>();
        for (const raw of rows) {
            const parsed = parseRow(sessionCostRowSchema, raw, 'session_id');
            if (!parsed.ok) {
                this.report({ table: 'session_costs', key: parsed.key, reason: parsed.reason });
                continue;
            }
            if (costs.has(parsed.value.session_id)) {
                this.report({ table: 'session_costs', key: parsed.value.session_id, reason: 'duplicate session_id' });
                continue;
            }
            costs.set(parsed.value.session_id, parsed.value.cost);
        }
        return costs;
    }

    private report(issue: DataQualityIssue) {
        this.issues.push(issue);
        eventLogger.log('journey', `Skipped ${issue.table} row${issue.key ? ` ${issue.key}` : ''}: ${issue.reason}`);
    }
}

export function summarizeJourneys(journeys: readonly Journey[]): JourneyStats {
    const users = new Set<string>();
    const channels = new Set<string>();
    let touchpointCount = 0;
    let withTouchpoints = 0;
    let totalRevenue = 0;
    let from: string | undefined;
    let to: string | undefined;

    for (const journey of journeys) {
        users.add(journey.user_id);
        totalRevenue += journey.revenue;
        if (journey.touchpoints.length > 0) withTouchpoints++;
        touchpointCount += journey.touchpoints.length;
        for (const touchpoint of journey.touchpoints) {
            channels.add(touchpoint.channel_name);
            if (from === undefined || touchpoint.event_date < from) from = touchpoint.event_date;
            if (to === undefined || touchpoint.event_date > to) to = touchpoint.event_date;
        }
    }

    const total = journeys.length;
    return {
        total_conversions: total,
        conversions_with_touchpoints: withTouchpoints,
        conversions_without_touchpoints: total - withTouchpoints,
        total_touchpoints: touchpointCount,
        unique_users: users.size,
        avg_touchpoints_per_journey: total > 0 ? touchpointCount / total : 0,
        channels: [...channels].sort(),
        date_range: from !== undefined && to !== undefined ? { from, to } : null,
        total_revenue: totalRevenue,
        avg_revenue_per_conversion: total > 0 ? totalRevenue / total : 0,
    };
}
