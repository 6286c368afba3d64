import { Request, Response } from 'express';
import { ReportReader } from '../repositories/attributionStore';
import { eventLogger } from '../utils/eventLogger';

const parseLimit = (value: unknown, fallback: number, max: number): number => {
    const parsed = typeof value === 'string' ? parseInt(value, 10) : NaN;
    if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
    return Math.min(parsed, max);
};

export class ReportController {
    constructor(private readonly reader: ReportReader) {}

    /**
     * Channel report from the last run
     * GET /api/v1/reports/channels
     */
    async getChannelReport(req: Request, res: Response): Promise<void> {
        try {
            const rows = await this.reader.fetchChannelReports();
            res.json({
                rows,
                count: rows.length,
            });
        } catch (error) {
            console.error('Error getting channel report:', error);
            res.status(500).json({ error: 'Failed to get channel report' });
        }
    }

    /**
     * Credit rows for one conversion
     * GET /api/v1/attributions/:convId
     */
    async getAttributions(req: Request, res: Response): Promise<void> {
        try {
            const { convId } = req.params;
            const rows = await this.reader.fetchAttributionsForConversion(convId);

            if (rows.length === 0) {
                res.status(404).json({ error: 'No attribution for conversion' });
                return;
            }

            res.json({
                conv_id: convId,
                attributions: rows,
                total_ihc: rows.reduce((sum, row) => sum + row.ihc, 0),
            });
        } catch (error) {
            console.error('Error getting attributions:', error);
            res.status(500).json({ error: 'Failed to get attributions' });
        }
    }

    /**
     * Recent pipeline events (live log)
     * GET /api/v1/admin/events?since=<timestamp>
     */
    async getEvents(req: Request, res: Response): Promise<void> {
        const since = typeof req.query.since === 'string' ? parseInt(req.query.since, 10) : undefined;
        res.json({ events: eventLogger.getEvents(Number.isFinite(since) ? since : undefined) });
    }

    /**
     * GET /api/v1/admin/logs/errors?limit=50
     */
    async getErrorLogs(req: Request, res: Response): Promise<void> {
        try {
            const limit = parseLimit(req.query.limit, 50, 500);
            const logs = await this.reader.fetchErrorLogs(limit);
            res.json({ logs, count: logs.length });
        } catch (error) {
            console.error('Error getting error logs:', error);
            res.status(500).json({ error: 'Failed to get error logs' });
        }
    }
}
