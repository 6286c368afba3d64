import { Request, Response, NextFunction, RequestHandler } from 'express';
import { timingSafeEqual } from 'crypto';
import { eventLogger } from '../utils/eventLogger';

const matches = (provided: string, expected: string): boolean => {
    const a = Buffer.from(provided);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
};

/**
 * Middleware to validate API key
 */
export const validateApiKey = (expectedKey: string): RequestHandler =>
    (req: Request, res: Response, next: NextFunction): void => {
        const apiKey = req.headers['x-api-key'];

        if (typeof apiKey !== 'string' || apiKey === '') {
            res.status(401).json({ error: 'API key required' });
            return;
        }

        if (!matches(apiKey, expectedKey)) {
            console.warn('⚠️ Invalid API key attempt:', apiKey.substring(0, 15) + '...');
            eventLogger.log('error', 'Authentication Failed: Invalid API Key', {
                api_key: apiKey.substring(0, 10) + '...',
                ip: req.ip,
                url: req.originalUrl
            });
            res.status(403).json({ error: 'Invalid API key' });
            return;
        }

        next();
    };
