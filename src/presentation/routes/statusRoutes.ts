import { Router, Request, Response } from 'express';
import { ServiceContext } from '../../application/ServiceContext';
import { PrometheusMetricsAdapter } from '../../infrastructure/metrics/PrometheusMetricsAdapter';
import { asyncHandler } from '../middleware/errorHandler';

/**
 * Health, status and metrics endpoints.
 */
export function createStatusRoutes(context: ServiceContext, metrics: PrometheusMetricsAdapter): Router {
    const router = Router();

    router.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'healthy',
            message: 'Avatar stream server is running',
            timestamp: new Date().toISOString(),
        });
    });

    /**
     * GET /status
     *
     * Avatars with their lane state, job totals and pool usage.
     */
    router.get('/status', (_req: Request, res: Response) => {
        res.json({
            status: context.isStopped ? 'stopping' : 'running',
            ...context.getStatus(),
            timestamp: new Date().toISOString(),
        });
    });

    router.get(
        '/metrics',
        asyncHandler(async (_req: Request, res: Response) => {
            res.set('Content-Type', metrics.contentType);
            res.send(await metrics.getMetrics());
        })
    );

    return router;
}
