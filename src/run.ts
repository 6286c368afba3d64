#!/usr/bin/env node
import { buildPipelineConfig, PipelineConfig } from './config';
import { initDatabase, pool } from './config/database';
import { createRedisClient } from './config/redis';
import { EXIT_CODES, runPipeline } from './pipeline';
import { PgAttributionStore } from './repositories/pgAttributionStore';
import { noopRunLock, RedisRunLock } from './services/runLock';
import { HttpScoringTransport } from './services/scoringClient';
import { ConfigurationError, errorMessage, StoreAccessError } from './utils/errors';
import { eventLogger } from './utils/eventLogger';

const loadConfig = (): PipelineConfig | null => {
    try {
        return buildPipelineConfig();
    } catch (error) {
        if (error instanceof ConfigurationError) {
            error.issues.forEach((issue) => console.error(`❌ ${issue}`));
            return null;
        }
        throw error;
    }
};

const main = async (): Promise<number> => {
    const pipelineConfig = loadConfig();
    if (!pipelineConfig) {
        return EXIT_CODES.failed;
    }

    console.log('🚀 Starting attribution pipeline...');

    const redis = pipelineConfig.pipeline.lockEnabled ? createRedisClient() : null;
    const lock = redis ? new RedisRunLock(redis, pipelineConfig.pipeline.lockTtlMs) : noopRunLock;

    try {
        try {
            await initDatabase();
        } catch (error) {
            console.error(`❌ ${new StoreAccessError('initDatabase', error).message}`);
            return EXIT_CODES.failed;
        }

        const store = new PgAttributionStore();
        eventLogger.attachSink(store);

        const summary = await runPipeline(pipelineConfig, {
            store,
            lock,
            transport: new HttpScoringTransport(pipelineConfig.scoring),
        });

        if (summary.failedJourneys.length > 0) {
            console.log(`⚠️ ${summary.failedJourneys.length} journeys were not attributed:`);
            for (const failed of summary.failedJourneys) {
                console.log(`   batch ${failed.batch} · ${failed.conv_id} · ${failed.reason}`);
            }
        }
        console.log(`📊 Run ${summary.status}${summary.error ? `: ${summary.error}` : ''}`);
        return summary.exitCode;
    } finally {
        await redis?.quit();
        await pool.end();
    }
};

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error('💥 Pipeline crashed:', errorMessage(error));
        process.exitCode = EXIT_CODES.failed;
    });
