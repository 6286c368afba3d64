import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { ReportController } from './controllers/reportController';
import { validateApiKey } from './middleware/auth';
import { ReportReader } from './repositories/attributionStore';
import { createReportRoutes } from './routes/reportRoutes';

export interface AppOptions {
    apiSecretKey: string;
}

export const createApp = (reader: ReportReader, options: AppOptions): Application => {
    const app: Application = express();

    // Middleware
    app.use(cors());
    app.use(express.json());

    // Health check endpoint (before auth)
    app.get('/health', (req: Request, res: Response) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    app.use('/api/v1', validateApiKey(options.apiSecretKey), createReportRoutes(new ReportController(reader)));

    // 404 handler
    app.use((req: Request, res: Response) => {
        res.status(404).json({ error: 'Endpoint not found' });
    });

    // Error handler
    app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
        console.error('Unhandled error:', err);
        res.status(500).json({ error: 'Internal server error' });
    });

    return app;
};
