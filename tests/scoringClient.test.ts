import { describe, it, expect, vi } from 'vitest';
import { AxiosError, AxiosHeaders, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { buildScoringRequest, HttpScoringTransport, parseScoringResponse } from '../src/services/scoringClient';
import { Journey } from '../src/types';
import { ScoringApiError } from '../src/utils/errors';

const journey: Journey = {
    conv_id: 'c1',
    user_id: 'u1',
    conv_timestamp: '2024-01-05T12:00:00.000Z',
    revenue: 100,
    touchpoints: [
        {
            session_id: 's1',
            channel_name: 'Email',
            event_date: '2024-01-01',
            timestamp: '2024-01-01T10:00:00.000Z',
            holder_engagement: true,
            closer_engagement: false,
            impression_interaction: false,
            cost: 3,
            hours_to_conversion: 98,
        },
        {
            session_id: 's2',
            channel_name: 'Paid Search',
            event_date: '2024-01-05',
            timestamp: '2024-01-05T11:00:00.000Z',
            holder_engagement: false,
            closer_engagement: true,
            impression_interaction: true,
            cost: 7,
            hours_to_conversion: 1,
        },
    ],
};

const options = {
    baseUrl: 'https://scoring.test/v1/compute_ihc',
    apiKey: 'test-secret',
    conversionTypeId: 'purchase',
    timeoutMs: 1000,
};

const requestConfig = (): InternalAxiosRequestConfig => ({ headers: new AxiosHeaders() });

const httpError = (status: number, headers: Record<string, string> = {}) => {
    const config = requestConfig();
    const response: AxiosResponse = {
        data: '{"error":"nope"}',
        status,
        statusText: String(status),
        headers,
        config,
    };
    return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, {}, response);
};

const okResponse = (data: string): AxiosResponse => ({
    data,
    status: 200,
    statusText: 'OK',
    headers: {},
    config: requestConfig(),
});

describe('buildScoringRequest', () => {
    it('serializes journeys in order and flags the converting touchpoint', () => {
        const request = buildScoringRequest([journey], 'purchase');

        expect(request).toEqual({
            conversion_type: 'purchase',
            journeys: [
                {
                    conv_id: 'c1',
                    touchpoints: [
                        {
                            session_id: 's1',
                            channel: 'Email',
                            timestamp: '2024-01-01T10:00:00.000Z',
                            holder_engagement: true,
                            closer_engagement: false,
                            impression_interaction: false,
                            conversion: false,
                        },
                        {
                            session_id: 's2',
                            channel: 'Paid Search',
                            timestamp: '2024-01-05T11:00:00.000Z',
                            holder_engagement: false,
                            closer_engagement: true,
                            impression_interaction: true,
                            conversion: true,
                        },
                    ],
                },
            ],
        });
    });

    it('adds redistribution parameters when configured', () => {
        const redistribution = { closer: { receive_threshold: 0.1 } };

        expect(buildScoringRequest([journey], 'purchase', redistribution).redistribution_parameter).toEqual(redistribution);
    });
});

describe('parseScoringResponse', () => {
    it('accepts a bare array and the value envelope', () => {
        expect(parseScoringResponse([{ conv_id: 'c1', session_id: 's1', ihc: 0.25 }])).toEqual([
            { conv_id: 'c1', session_id: 's1', ihc: 0.25 },
        ]);
        expect(parseScoringResponse({ statusCode: 200, value: [{ conversion_id: 'c1', session_id: 's2', ihc: 0.75 }] })).toEqual([
            { conv_id: 'c1', session_id: 's2', ihc: 0.75 },
        ]);
    });

    it.each([
        [500, 'transient'],
        [429, 'transient'],
        [400, 'permanent'],
    ])('fails on an envelope statusCode of %i as %s', (statusCode, kind) => {
        const error = (() => {
            try {
                parseScoringResponse({ statusCode, value: [] });
            } catch (e) {
                return e;
            }
            return undefined;
        })();

        expect(error).toBeInstanceOf(ScoringApiError);
        expect(error).toMatchObject({ kind, status: statusCode, message: `Scoring API reported status ${statusCode}` });
    });

    it('rejects other shapes as malformed', () => {
        for (const body of [null, { value: 'nope' }, [{ session_id: 's1', ihc: 1 }], [{ conv_id: 'c1', session_id: 's1', ihc: 'high' }]]) {
            expect(() => parseScoringResponse(body)).toThrowError(ScoringApiError);
        }
    });
});

describe('HttpScoringTransport', () => {
    it('posts with the api key header and conversion type query parameter', async () => {
        const post = vi.fn().mockResolvedValue(okResponse('[{"conv_id":"c1","session_id":"s1","ihc":1}]'));
        const transport = new HttpScoringTransport(options, { post });

        const results = await transport.score(buildScoringRequest([journey], 'purchase'));

        expect(results).toEqual([{ conv_id: 'c1', session_id: 's1', ihc: 1 }]);
        expect(post).toHaveBeenCalledTimes(1);
        const [url, body, config] = post.mock.calls[0];
        expect(url).toBe('https://scoring.test/v1/compute_ihc');
        expect(body).toMatchObject({ conversion_type: 'purchase' });
        expect(config).toMatchObject({
            params: { conv_type_id: 'purchase' },
            headers: { 'x-api-key': 'test-secret' },
            timeout: 1000,
        });
    });

    it.each([
        [503, 'transient'],
        [500, 'transient'],
        [429, 'transient'],
        [400, 'permanent'],
        [401, 'permanent'],
        [404, 'permanent'],
    ])('classifies HTTP %i as %s', async (status, kind) => {
        const transport = new HttpScoringTransport(options, { post: vi.fn().mockRejectedValue(httpError(status)) });

        const error = await transport.score(buildScoringRequest([journey], 'purchase')).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ScoringApiError);
        expect(error).toMatchObject({ kind, status });
    });

    it('reads Retry-After on rate limiting', async () => {
        const transport = new HttpScoringTransport(options, {
            post: vi.fn().mockRejectedValue(httpError(429, { 'retry-after': '7' })),
        });

        await expect(transport.score(buildScoringRequest([journey], 'purchase'))).rejects.toMatchObject({
            kind: 'transient',
            retryAfterSeconds: 7,
        });
    });

    it('treats timeouts and network errors as transient', async () => {
        const timeout = new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED', requestConfig());
        const transport = new HttpScoringTransport(options, { post: vi.fn().mockRejectedValue(timeout) });

        await expect(transport.score(buildScoringRequest([journey], 'purchase'))).rejects.toMatchObject({
            kind: 'transient',
            message: 'Scoring API unreachable: ECONNABORTED',
        });
    });

    it('fails an HTTP 200 whose envelope reports an error', async () => {
        const transport = new HttpScoringTransport(options, {
            post: vi.fn().mockResolvedValue(okResponse('{"statusCode":503,"value":"Service busy"}')),
        });

        await expect(transport.score(buildScoringRequest([journey], 'purchase'))).rejects.toMatchObject({
            kind: 'transient',
            status: 503,
        });
    });

    it('reports an unparseable body as malformed', async () => {
        const transport = new HttpScoringTransport(options, { post: vi.fn().mockResolvedValue(okResponse('<html>oops</html>')) });

        await expect(transport.score(buildScoringRequest([journey], 'purchase'))).rejects.toMatchObject({
            kind: 'malformed',
        });
    });
});
