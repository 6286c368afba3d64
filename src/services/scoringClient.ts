/**
 * IHC Scoring API transport
 * Posts journey batches to the external attribution service
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { AttributionResult, Journey } from '../types';
import { classifyHttpStatus, ScoringApiError } from '../utils/errors';

export interface ScoringTouchpoint {
    session_id: string;
    channel: string;
    timestamp: string;
    holder_engagement: boolean;
    closer_engagement: boolean;
    impression_interaction: boolean;
    conversion: boolean;
}

export interface ScoringRequest {
    conversion_type: string;
    journeys: Array<{ conv_id: string; touchpoints: ScoringTouchpoint[] }>;
    redistribution_parameter?: Record<string, unknown>;
}

export interface ScoringTransport {
    score(request: ScoringRequest): Promise<AttributionResult[]>;
}

export const buildScoringRequest = (
    journeys: readonly Journey[],
    conversionType: string,
    redistribution?: Record<string, unknown>
): ScoringRequest => ({
    conversion_type: conversionType,
    journeys: journeys.map((journey) => ({
        conv_id: journey.conv_id,
        touchpoints: journey.touchpoints.map((touchpoint, index) => ({
            session_id: touchpoint.session_id,
            channel: touchpoint.channel_name,
            timestamp: touchpoint.timestamp,
            holder_engagement: touchpoint.holder_engagement,
            closer_engagement: touchpoint.closer_engagement,
            impression_interaction: touchpoint.impression_interaction,
            // The last touchpoint is the converting one
            conversion: index === journey.touchpoints.length - 1,
        })),
    })),
    ...(redistribution ? { redistribution_parameter: redistribution } : {}),
});

const creditTriple = z
    .object({
        conv_id: z.string().optional(),
        conversion_id: z.string().optional(),
        session_id: z.string(),
        ihc: z.number().finite(),
    })
    .transform((triple, ctx) => {
        const convId = triple.conv_id ?? triple.conversion_id;
        if (convId === undefined) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'conv_id is required' });
            return z.NEVER;
        }
        return { conv_id: convId, session_id: triple.session_id, ihc: triple.ihc };
    });

const scoringResponse = z.union([
    z.array(creditTriple),
    z.object({ statusCode: z.number().optional(), value: z.array(creditTriple) }).transform((envelope) => envelope.value),
]);

// The service can answer HTTP 200 while reporting a failure inside the envelope
const envelopeStatus = z.object({ statusCode: z.number().int() });

/**
 * Parse a 2xx body. A non-2xx `statusCode` in the envelope fails the batch
 * like the same HTTP status would. Anything that is not a list of credit
 * triples (bare or wrapped in `value`) is a malformed response.
 */
export function parseScoringResponse(body: unknown): AttributionResult[] {
    const envelope = envelopeStatus.safeParse(body);
    if (envelope.success && (envelope.data.statusCode < 200 || envelope.data.statusCode >= 300)) {
        const status = envelope.data.statusCode;
        throw new ScoringApiError(classifyHttpStatus(status), `Scoring API reported status ${status}`, { status });
    }

    const result = scoringResponse.safeParse(body);
    if (!result.success) {
        throw new ScoringApiError('malformed', `Malformed scoring response: ${result.error.issues[0]?.message ?? 'unknown shape'}`);
    }
    return result.data;
}

const parseRetryAfter = (value: unknown): number | undefined => {
    if (typeof value !== 'string' && typeof value !== 'number') return undefined;
    const seconds = Number(value);
    return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
};

export interface HttpScoringOptions {
    baseUrl: string;
    apiKey: string;
    conversionTypeId: string;
    timeoutMs: number;
}

export class HttpScoringTransport implements ScoringTransport {
    private http: Pick<AxiosInstance, 'post'>;

    constructor(private readonly options: HttpScoringOptions, http?: Pick<AxiosInstance, 'post'>) {
        this.http = http ?? axios.create();
    }

    async score(request: ScoringRequest): Promise<AttributionResult[]> {
        let body: unknown;
        try {
            const response = await this.http.post<unknown>(this.options.baseUrl, request, {
                params: { conv_type_id: this.options.conversionTypeId },
                headers: {
                    'Content-Type': 'application/json',
                    'x-api-key': this.options.apiKey,
                },
                timeout: this.options.timeoutMs,
                // Raw text so an unparseable body surfaces as malformed, not as a thrown SyntaxError
                responseType: 'text',
                transformResponse: [(data: unknown) => data],
            });
            body = response.data;
        } catch (error: unknown) {
            throw this.toScoringError(error);
        }

        if (typeof body === 'string') {
            try {
                body = JSON.parse(body);
            } catch {
                throw new ScoringApiError('malformed', 'Scoring response is not valid JSON');
            }
        }
        return parseScoringResponse(body);
    }

    private toScoringError(error: unknown): ScoringApiError {
        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            if (status !== undefined) {
                return new ScoringApiError(
                    classifyHttpStatus(status),
                    `Scoring API responded ${status}`,
                    { status, retryAfterSeconds: parseRetryAfter(error.response?.headers['retry-after']), cause: error }
                );
            }
            // No response: timeout, reset, DNS
            return new ScoringApiError('transient', `Scoring API unreachable: ${error.code ?? error.message}`, { cause: error });
        }
        return new ScoringApiError('transient', `Scoring request failed: ${String(error)}`, { cause: error });
    }
}
