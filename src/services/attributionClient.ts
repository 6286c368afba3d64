import { AttributionResultWriter } from '../repositories/attributionStore';
import { AttributionResult, DataQualityIssue, Journey } from '../types';
import { errorMessage } from '../utils/errors';
import { eventLogger } from '../utils/eventLogger';
import { partition } from '../utils/helpers';
import { executeWithRetry, RetryPolicy, Sleep } from './retryPolicy';
import { buildScoringRequest, ScoringTransport } from './scoringClient';

export interface AttributionClientOptions {
    batchSize: number;
    conversionTypeId: string;
    redistributionParameters?: Record<string, unknown>;
}

export interface BatchOutcome {
    index: number;
    convIds: string[];
    status: 'succeeded' | 'failed';
    attempts: number;
    resultsWritten: number;
    /** Submitted (conv_id, session_id) pairs the service returned no credit for */
    missingPairs: number;
    /** Returned pairs that were not part of the batch */
    unexpectedPairs: number;
    error?: string;
}

export interface FailedJourney {
    conv_id: string;
    batch: number;
    reason: string;
}

export interface AttributionRunSummary {
    batches: BatchOutcome[];
    journeysSubmitted: number;
    emptyJourneys: string[];
    resultsWritten: number;
    failedJourneys: FailedJourney[];
    dataQualityIssues: DataQualityIssue[];
}

const CREDIT_SUM_TOLERANCE = 0.001;

const pairKey = (convId: string, sessionId: string) => `${convId}\u0000${sessionId}`;

/**
 * Sends journeys to the scoring service one batch at a time and upserts the
 * returned credit. A failed batch is recorded and the run moves on.
 */
export class AttributionClient {
    constructor(
        private readonly transport: ScoringTransport,
        private readonly writer: AttributionResultWriter,
        private readonly options: AttributionClientOptions,
        private readonly retryPolicy: RetryPolicy,
        private readonly sleep?: Sleep
    ) {
        if (!Number.isInteger(options.batchSize) || options.batchSize <= 0) {
            throw new RangeError(`batchSize must be a positive integer, got ${options.batchSize}`);
        }
    }

    async run(journeys: Iterable<Journey> | AsyncIterable<Journey>): Promise<AttributionRunSummary> {
        const summary: AttributionRunSummary = {
            batches: [],
            journeysSubmitted: 0,
            emptyJourneys: [],
            resultsWritten: 0,
            failedJourneys: [],
            dataQualityIssues: [],
        };

        for await (const batch of partition(this.scoreable(journeys, summary.emptyJourneys), this.options.batchSize)) {
            const outcome = await this.processBatch(summary.batches.length + 1, batch, summary);
            summary.batches.push(outcome);
            summary.journeysSubmitted += batch.length;
            summary.resultsWritten += outcome.resultsWritten;
        }

        const failed = summary.batches.filter((batch) => batch.status === 'failed').length;
        eventLogger.log(
            'batch',
            `Scored ${summary.journeysSubmitted} journeys in ${summary.batches.length} batches (${failed} failed, ${summary.resultsWritten} rows written)`
        );
        return summary;
    }

    // Journeys without touchpoints have nothing to score
    private async *scoreable(
        journeys: Iterable<Journey> | AsyncIterable<Journey>,
        empty: string[]
    ): AsyncGenerator<Journey> {
        for await (const journey of journeys) {
            if (journey.touchpoints.length === 0) {
                empty.push(journey.conv_id);
                continue;
            }
            yield journey;
        }
    }

    private async processBatch(index: number, batch: Journey[], summary: AttributionRunSummary): Promise<BatchOutcome> {
        const convIds = batch.map((journey) => journey.conv_id);
        const request = buildScoringRequest(batch, this.options.conversionTypeId, this.options.redistributionParameters);

        eventLogger.log('batch', `Processing batch ${index} with ${batch.length} journeys`);

        const outcome = await executeWithRetry(
            () => this.transport.score(request),
            this.retryPolicy,
            this.sleep,
            (attempt, delayMs, error) => {
                eventLogger.log('batch', `Batch ${index} retry ${attempt}/${this.retryPolicy.maxRetries} in ${delayMs}ms: ${errorMessage(error)}`);
            }
        );

        if (!outcome.ok) {
            const reason = outcome.exhausted
                ? `retries exhausted after ${outcome.attempts} attempts: ${errorMessage(outcome.error)}`
                : errorMessage(outcome.error);
            eventLogger.log('error', `Batch ${index} failed`, { batch: index, conv_ids: convIds, reason });
            for (const convId of convIds) {
                summary.failedJourneys.push({ conv_id: convId, batch: index, reason });
            }
            return {
                index,
                convIds,
                status: 'failed',
                attempts: outcome.attempts,
                resultsWritten: 0,
                missingPairs: 0,
                unexpectedPairs: 0,
                error: reason,
            };
        }

        const submitted = new Set<string>();
        for (const journey of batch) {
            for (const touchpoint of journey.touchpoints) {
                submitted.add(pairKey(journey.conv_id, touchpoint.session_id));
            }
        }

        // Last value wins for duplicated pairs
        const accepted = new Map<string, AttributionResult>();
        let unexpectedPairs = 0;
        for (const result of outcome.value) {
            const key = pairKey(result.conv_id, result.session_id);
            if (!submitted.has(key)) {
                unexpectedPairs++;
                continue;
            }
            accepted.set(key, result);
        }

        const rows = [...accepted.values()];
        summary.dataQualityIssues.push(...checkCredit(rows));

        // Store errors are fatal for the stage, so they propagate
        const resultsWritten = await this.writer.replaceAttributionResults(convIds, rows);

        if (unexpectedPairs > 0) {
            eventLogger.log('batch', `Batch ${index}: ignored ${unexpectedPairs} pairs that were not submitted`);
        }

        return {
            index,
            convIds,
            status: 'succeeded',
            attempts: outcome.attempts,
            resultsWritten,
            missingPairs: submitted.size - accepted.size,
            unexpectedPairs,
        };
    }
}

/**
 * Credits should lie in [0, 1] and sum to 1 per conversion. Violations are
 * reported, not corrected.
 */
export function checkCredit(rows: readonly AttributionResult[]): DataQualityIssue[] {
    const issues: DataQualityIssue[] = [];
    const totals = new Map<string, number>();

    for (const row of rows) {
        if (row.ihc < 0 || row.ihc > 1) {
            issues.push({
                table: 'attribution_customer_journey',
                key: `${row.conv_id}/${row.session_id}`,
                reason: `credit ${row.ihc} outside [0, 1]`,
            });
        }
        totals.set(row.conv_id, (totals.get(row.conv_id) ?? 0) + row.ihc);
    }

    for (const [convId, total] of totals) {
        if (Math.abs(total - 1) > CREDIT_SUM_TOLERANCE) {
            issues.push({
                table: 'attribution_customer_journey',
                key: convId,
                reason: `credit sums to ${total.toFixed(4)}, expected 1`,
            });
        }
    }
    return issues;
}
