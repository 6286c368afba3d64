import { createApp } from './app';
import { config } from './config';
import { initDatabase } from './config/database';
import { PgAttributionStore } from './repositories/pgAttributionStore';
import { eventLogger } from './utils/eventLogger';

const startServer = async () => {
    try {
        console.log('🚀 Starting attribution reporting server...');

        await initDatabase();

        const store = new PgAttributionStore();
        eventLogger.attachSink(store);
        const app = createApp(store, { apiSecretKey: config.security.apiSecretKey });

        const PORT = config.server.port;
        app.listen(PORT, () => {
            console.log(`✅ Server running on port ${PORT}`);
            console.log(`📊 Environment: ${config.server.env}`);
            console.log(`🔗 Health check: http://localhost:${PORT}/health`);
            console.log(`📈 Channel report: http://localhost:${PORT}/api/v1/reports/channels`);
        });
    } catch (error) {
        console.error('❌ Failed to start server:', error);
        process.exitCode = 1;
    }
};

void startServer();

// Prevent silent crashes
process.on('uncaughtException', (err) => {
    console.error('💥 Uncaught Exception:', err);
});
process.on('unhandledRejection', (reason) => {
    console.error('💥 Unhandled Rejection:', reason);
});
