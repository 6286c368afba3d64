import { z } from 'zod';
import { AttributionResult, Conversion, Session, SessionCost } from '../types';
import { isCalendarDate, isClockTime } from '../utils/helpers';

const requiredText = z
    .union([z.string(), z.number()])
    .transform(String)
    .pipe(z.string().trim().min(1, 'is required'));

const date = z.string().refine(isCalendarDate, 'must be YYYY-MM-DD');
const time = z.string().refine(isClockTime, 'must be HH:MM[:SS]');

// Engagement flags arrive as booleans or 0/1 depending on the source
const flag = z.union([
    z.boolean(),
    z.literal(0).transform(() => false),
    z.literal(1).transform(() => true),
    z.enum(['0', '1', 'true', 'false']).transform((value) => value === '1' || value === 'true'),
]);

const decimal = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());

const nonNegativeDecimal = decimal.pipe(z.number().min(0, 'must be >= 0'));

export const sessionRowSchema: z.ZodType<Session, z.ZodTypeDef, unknown> = z.object({
    session_id: requiredText,
    user_id: requiredText,
    channel_name: requiredText,
    event_date: date,
    event_time: time,
    holder_engagement: flag,
    closer_engagement: flag,
    impression_interaction: flag,
});

export const conversionRowSchema: z.ZodType<Conversion, z.ZodTypeDef, unknown> = z.object({
    conv_id: requiredText,
    user_id: requiredText,
    conv_date: date,
    conv_time: time,
    revenue: nonNegativeDecimal,
});

export const sessionCostRowSchema: z.ZodType<SessionCost, z.ZodTypeDef, unknown> = z.object({
    session_id: requiredText,
    cost: nonNegativeDecimal,
});

export const attributionResultRowSchema: z.ZodType<AttributionResult, z.ZodTypeDef, unknown> = z.object({
    conv_id: requiredText,
    session_id: requiredText,
    ihc: decimal,
});

export type RowParseResult<T> =
    | { ok: true; value: T }
    | { ok: false; key?: string; reason: string };

/**
 * Validate one raw row. The failure carries the row's key when it has one.
 */
export function parseRow<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    row: unknown,
    keyField: string
): RowParseResult<T> {
    const result = schema.safeParse(row);
    if (result.success) {
        return { ok: true, value: result.data };
    }

    let key: string | undefined;
    if (typeof row === 'object' && row !== null && keyField in row) {
        const candidate: unknown = Reflect.get(row, keyField);
        if (typeof candidate === 'string' || typeof candidate === 'number') {
            key = String(candidate);
        }
    }
    const reason = result.error.issues
        .map((issue) => `${issue.path.join('.') || 'row'} ${issue.message}`)
        .join('; ');
    return { ok: false, key, reason };
}
