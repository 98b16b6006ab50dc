import { Router, Request, Response } from 'express';
import { SessionCoordinator } from '../../application/SessionCoordinator';
import { GenerationJob } from '../../domain/entities/GenerationJob';
import { NotFoundError } from '../middleware/errorHandler';

function toJobResponse(job: GenerationJob): Record<string, unknown> {
    const response: Record<string, unknown> = {
        job_id: job.id,
        avatar_id: job.avatar.avatarId,
        output_name: job.outputName,
        status: job.status,
        created_at: job.createdAt.toISOString(),
        updated_at: job.updatedAt.toISOString(),
    };

    if (job.sessionId) {
        response.session_id = job.sessionId;
    }
    if (job.startedAt) {
        response.started_at = job.startedAt.toISOString();
    }
    if (job.completedAt) {
        response.completed_at = job.completedAt.toISOString();
    }
    if (job.detached) {
        response.detached = true;
    }

    // Add error for failed jobs
    if (job.status === 'failed' && job.error) {
        response.error = job.error;
    }

    return response;
}

/**
 * Creates job status routes with dependency injection.
 */
export function createJobRoutes(coordinator: SessionCoordinator): Router {
    const router = Router();

    /**
     * GET /jobs/:jobId
     *
     * Returns the current status of a generation job.
     */
    router.get('/jobs/:jobId', (req: Request, res: Response) => {
        const { jobId } = req.params;
        const job = coordinator.getJob(jobId);

        if (!job) {
            throw new NotFoundError(`Job not found: ${jobId}`);
        }

        res.json(toJobResponse(job));
    });

    /**
     * GET /jobs
     *
     * Lists recent jobs (for debugging/monitoring).
     */
    router.get('/jobs', (_req: Request, res: Response) => {
        const jobs = coordinator.listJobs().map(toJobResponse);
        res.json({
            total: jobs.length,
            jobs,
        });
    });

    return router;
}
