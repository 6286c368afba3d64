import { Router } from 'express';
import { ReportController } from '../controllers/reportController';

export const createReportRoutes = (controller: ReportController): Router => {
    const router = Router();

    /**
     * Channel report
     * GET /api/v1/reports/channels
     */
    router.get('/reports/channels', controller.getChannelReport.bind(controller));

    /**
     * Attribution rows for a conversion
     * GET /api/v1/attributions/:convId
     */
    router.get('/attributions/:convId', controller.getAttributions.bind(controller));

    /**
     * Live events
     * GET /api/v1/admin/events
     */
    router.get('/admin/events', controller.getEvents.bind(controller));

    router.get('/admin/logs/errors', controller.getErrorLogs.bind(controller));

    return router;
};
