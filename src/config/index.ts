import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { isCalendarDate } from '../utils/helpers';

dotenv.config();

export const config = {
    server: {
        port: parseInt(process.env.PORT || '3000', 10),
        env: process.env.NODE_ENV || 'development',
    },
    database: {
        host: process.env.DB_HOST || 'localhost',
        port: parseInt(process.env.DB_PORT || '5432', 10),
        name: process.env.DB_NAME || 'attribution_db',
        user: process.env.DB_USER || 'postgres',
        password: process.env.DB_PASSWORD || '',
    },
    redis: {
        host: process.env.REDIS_HOST || 'localhost',
        port: parseInt(process.env.REDIS_PORT || '6379', 10),
        password: process.env.REDIS_PASSWORD || undefined,
    },
    security: {
        apiSecretKey: process.env.API_SECRET_KEY || 'change_this_in_production',
    },
    scoring: {
        baseUrl: process.env.SCORING_API_URL || 'https://api.ihc-attribution.com/v1/compute_ihc',
        apiKey: process.env.SCORING_API_KEY || '',
        conversionTypeId: process.env.CONVERSION_TYPE_ID || 'data_engineering_challenge',
        batchSize: process.env.BATCH_SIZE || '200',
        maxRetries: process.env.MAX_RETRIES || '3',
        backoffBaseMs: process.env.BACKOFF_BASE_MS || '1000',
        backoffMaxMs: process.env.BACKOFF_MAX_MS || '30000',
        timeoutMs: process.env.SCORING_TIMEOUT_MS || '30000',
        redistributionParameters: process.env.REDISTRIBUTION_PARAMETERS || '',
    },
    pipeline: {
        startDate: process.env.START_DATE || '',
        endDate: process.env.END_DATE || '',
        reportPath: process.env.REPORT_PATH || 'channel_reporting.csv',
        lockEnabled: process.env.RUN_LOCK_ENABLED || 'false',
        lockTtlMs: process.env.RUN_LOCK_TTL_MS || '3600000',
    },
};

export type RawConfig = Pick<typeof config, 'scoring' | 'pipeline'>;

const isoDate = z.string().refine(isCalendarDate, 'must be YYYY-MM-DD');

const optionalDate = z
    .string()
    .transform((value) => value.trim())
    .pipe(z.union([z.literal(''), isoDate]))
    .transform((value) => (value === '' ? undefined : value));

const redistributionParameters = z
    .string()
    .transform((value, ctx) => {
        if (value.trim() === '') {
            return undefined;
        }
        try {
            const parsed: unknown = JSON.parse(value);
            if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a JSON object' });
                return z.NEVER;
            }
            return parsed;
        } catch {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'is not valid JSON' });
            return z.NEVER;
        }
    })
    .pipe(z.record(z.unknown()).optional());

const pipelineConfigSchema = z
    .object({
        scoring: z.object({
            baseUrl: z.string().url(),
            apiKey: z.string().trim().min(1, 'API key is required'),
            conversionTypeId: z.string().trim().min(1, 'conversion type id is required'),
            batchSize: z.coerce.number().int().positive('batch size must be > 0'),
            maxRetries: z.coerce.number().int().min(0, 'max retries must be >= 0'),
            backoffBaseMs: z.coerce.number().min(0, 'backoff base must be >= 0'),
            backoffMaxMs: z.coerce.number().min(0, 'backoff cap must be >= 0'),
            timeoutMs: z.coerce.number().int().positive(),
            redistributionParameters,
        }),
        pipeline: z.object({
            startDate: optionalDate,
            endDate: optionalDate,
            reportPath: z.string().trim().min(1),
            lockEnabled: z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1'),
            lockTtlMs: z.coerce.number().int().positive(),
        }),
    })
    .superRefine((value, ctx) => {
        const { startDate, endDate } = value.pipeline;
        if (startDate && endDate && startDate > endDate) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['pipeline', 'startDate'],
                message: `start date ${startDate} is after end date ${endDate}`,
            });
        }
    });

export type PipelineConfig = Readonly<z.infer<typeof pipelineConfigSchema>>;

/**
 * Validate the raw settings once at startup. Every offending field is
 * reported in a single ConfigurationError.
 */
export const buildPipelineConfig = (raw: RawConfig = config): PipelineConfig => {
    const result = pipelineConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigurationError(
            result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    return Object.freeze(result.data);
};
