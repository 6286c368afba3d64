import { PipelineConfig } from './config';
import { AttributionStore } from './repositories/attributionStore';
import { AttributionClient, AttributionRunSummary, FailedJourney } from './services/attributionClient';
import { JourneyBuilder, JourneyStats, summarizeJourneys } from './services/journeyBuilder';
import { ResultsAggregator } from './services/resultsAggregator';
import { createRetryPolicy, Sleep } from './services/retryPolicy';
import { noopRunLock, RunLock } from './services/runLock';
import { ScoringTransport } from './services/scoringClient';
import { ChannelReport, DataQualityIssue, Journey } from './types';
import { errorMessage } from './utils/errors';
import { eventLogger } from './utils/eventLogger';

export type RunStatus = 'succeeded' | 'completed_with_failures' | 'failed';

export const EXIT_CODES: Record<RunStatus, number> = {
    succeeded: 0,
    failed: 1,
    completed_with_failures: 2,
};

export interface RunSummary {
    status: RunStatus;
    exitCode: number;
    stats?: JourneyStats;
    attribution?: AttributionRunSummary;
    report?: ChannelReport[];
    failedJourneys: FailedJourney[];
    dataQualityIssues: DataQualityIssue[];
    error?: string;
}

export interface PipelineDeps {
    store: AttributionStore;
    transport: ScoringTransport;
    lock?: RunLock;
    sleep?: Sleep;
}

const finish = (status: RunStatus, fields: Omit<RunSummary, 'status' | 'exitCode'>): RunSummary => ({
    status,
    exitCode: EXIT_CODES[status],
    ...fields,
});

/**
 * Journey building, scoring and aggregation, strictly in that order. Each
 * stage's output is fully materialized before the next one starts.
 */
export async function runPipeline(config: PipelineConfig, deps: PipelineDeps): Promise<RunSummary> {
    const lock = deps.lock ?? noopRunLock;
    const range = { start_date: config.pipeline.startDate, end_date: config.pipeline.endDate };

    if (!(await lock.acquire())) {
        eventLogger.log('error', 'Another pipeline run holds the lock');
        return finish('failed', { failedJourneys: [], dataQualityIssues: [], error: 'run lock is held by another run' });
    }

    const dataQualityIssues: DataQualityIssue[] = [];
    try {
        eventLogger.log('system', `Starting attribution run${range.start_date || range.end_date ? ` for ${range.start_date ?? '…'} to ${range.end_date ?? '…'}` : ''}`);

        const builder = new JourneyBuilder(deps.store);
        const journeys: Journey[] = [];
        for await (const journey of builder.build(range)) {
            journeys.push(journey);
        }
        dataQualityIssues.push(...builder.dataQualityIssues);

        const stats = summarizeJourneys(journeys);
        eventLogger.log('journey', `Built ${stats.total_conversions} journeys with ${stats.total_touchpoints} touchpoints`, stats);

        const client = new AttributionClient(
            deps.transport,
            deps.store,
            {
                batchSize: config.scoring.batchSize,
                conversionTypeId: config.scoring.conversionTypeId,
                redistributionParameters: config.scoring.redistributionParameters,
            },
            createRetryPolicy(config.scoring),
            deps.sleep
        );
        const attribution = await client.run(journeys);
        dataQualityIssues.push(...attribution.dataQualityIssues);

        const failedBatches = attribution.batches.filter((batch) => batch.status === 'failed');
        if (attribution.batches.length > 0 && failedBatches.length === attribution.batches.length) {
            eventLogger.log('error', `All ${failedBatches.length} batches failed; channel report not written`);
            return finish('failed', {
                stats,
                attribution,
                failedJourneys: attribution.failedJourneys,
                dataQualityIssues,
                error: 'every batch failed',
            });
        }

        const aggregation = await new ResultsAggregator(deps.store).run(journeys, config.pipeline.reportPath);
        dataQualityIssues.push(...aggregation.dataQualityIssues);

        if (dataQualityIssues.length > 0) {
            eventLogger.log('system', `${dataQualityIssues.length} data-quality issues recorded`);
        }

        const status: RunStatus = failedBatches.length > 0 ? 'completed_with_failures' : 'succeeded';
        if (status === 'completed_with_failures') {
            eventLogger.log(
                'error',
                `Run completed with ${failedBatches.length} failed batches`,
                { batches: failedBatches.map((batch) => ({ index: batch.index, conv_ids: batch.convIds, error: batch.error })) }
            );
        } else {
            eventLogger.log('system', 'Processing completed successfully');
        }

        return finish(status, {
            stats,
            attribution,
            report: aggregation.rows,
            failedJourneys: attribution.failedJourneys,
            dataQualityIssues,
        });
    } catch (error) {
        eventLogger.log('error', `Pipeline run failed: ${errorMessage(error)}`, error);
        return finish('failed', { failedJourneys: [], dataQualityIssues, error: errorMessage(error) });
    } finally {
        // An unreleased lock still expires after its TTL
        try {
            await lock.release();
        } catch (error) {
            eventLogger.log('error', `Failed to release run lock: ${errorMessage(error)}`, error);
        }
        await eventLogger.flush();
    }
}
