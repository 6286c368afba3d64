// Type definitions for the attribution pipeline

export interface Session {
    session_id: string;
    user_id: string;
    channel_name: string;
    event_date: string; // YYYY-MM-DD
    event_time: string; // HH:MM:SS
    holder_engagement: boolean;
    closer_engagement: boolean;
    impression_interaction: boolean;
}

export interface Conversion {
    conv_id: string;
    user_id: string;
    conv_date: string;
    conv_time: string;
    revenue: number;
}

export interface SessionCost {
    session_id: string;
    cost: number;
}

export interface Touchpoint {
    session_id: string;
    channel_name: string;
    event_date: string;
    timestamp: string; // ISO 8601, UTC
    holder_engagement: boolean;
    closer_engagement: boolean;
    impression_interaction: boolean;
    cost: number;
    hours_to_conversion: number;
}

export interface Journey {
    conv_id: string;
    user_id: string;
    conv_timestamp: string;
    revenue: number;
    touchpoints: Touchpoint[];
}

export interface AttributionResult {
    conv_id: string;
    session_id: string;
    ihc: number;
}

export interface ChannelReport {
    channel_name: string;
    date: string;
    cost: number;
    ihc: number;
    ihc_revenue: number;
    CPO: number | null;
    ROAS: number | null;
}

/**
 * Inclusive conversion date range. Absent bounds mean open-ended.
 */
export interface DateRange {
    start_date?: string;
    end_date?: string;
}

export interface DataQualityIssue {
    table: 'session_sources' | 'conversions' | 'session_costs' | 'attribution_customer_journey';
    key?: string;
    reason: string;
}

export interface ErrorLogEntry {
    id: number;
    type: string;
    message: string;
    stack: string | null;
    metadata: string | null;
    created_at: Date;
}
