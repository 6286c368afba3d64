import { AttributionResult, ChannelReport, DateRange, ErrorLogEntry } from '../types';
import { ErrorLogSink } from '../utils/eventLogger';

/**
 * Rows come back loosely typed; the pipeline validates them before use.
 */
export type RawRow = Record<string, unknown>;

export interface JourneySource {
    fetchConversions(range: DateRange): Promise<RawRow[]>;
    /** Sessions of every user that has a conversion in range */
    fetchSessionsForConversions(range: DateRange): Promise<RawRow[]>;
    fetchSessionCosts(range: DateRange): Promise<RawRow[]>;
}

export interface AttributionResultWriter {
    /**
     * Drops every stored credit row of `convIds`, then upserts `rows` keyed by
     * (conv_id, session_id), in one transaction. Returns rows written.
     */
    replaceAttributionResults(convIds: readonly string[], rows: readonly AttributionResult[]): Promise<number>;
}

export interface ReportStore {
    fetchAttributionResults(convIds: readonly string[]): Promise<RawRow[]>;
    /** Replaces the whole channel_reporting table */
    replaceChannelReports(rows: readonly ChannelReport[]): Promise<void>;
}

export interface ReportReader {
    fetchChannelReports(): Promise<ChannelReport[]>;
    fetchAttributionsForConversion(convId: string): Promise<AttributionResult[]>;
    fetchErrorLogs(limit: number): Promise<ErrorLogEntry[]>;
}

export interface AttributionStore
    extends JourneySource, AttributionResultWriter, ReportStore, ReportReader, ErrorLogSink {}
