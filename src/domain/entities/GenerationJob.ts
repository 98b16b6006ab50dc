import { AvatarRef } from './Avatar';
import { ServiceErrorCode } from '../errors/ServiceError';

/**
 * Possible statuses for a GenerationJob.
 * 'cancelled' is only reachable from 'queued'.
 */
export type GenerationJobStatus =
    | 'queued'
    | 'running'
    | 'completed'
    | 'failed'
    | 'cancelled';

/**
 * GenerationJob maps one audio unit, against one avatar, to a video artifact.
 */
export interface GenerationJob {
    id: string;
    avatar: AvatarRef;
    audioUnitId: string;
    /** Base name of the produced video (without extension) */
    outputName: string;
    /** Streaming session that submitted the job, if any */
    sessionId?: string;
    status: GenerationJobStatus;
    /** Set when the caller stopped waiting while the job was running */
    detached: boolean;
    artifactPath?: string;
    error?: {
        code: ServiceErrorCode;
        message: string;
    };
    createdAt: Date;
    updatedAt: Date;
    startedAt?: Date;
    completedAt?: Date;
}

/**
 * What submit hands back to callers.
 */
export interface GenerationJobHandle {
    readonly jobId: string;
    readonly avatarId: string;
}

/**
 * A produced video. Callers must release it once delivered.
 */
export interface GenerationArtifact {
    jobId: string;
    avatarId: string;
    outputName: string;
    path: string;
    durationMs: number;
    release(): Promise<void>;
}

export function createGenerationJob(
    id: string,
    avatar: AvatarRef,
    audioUnitId: string,
    outputName: string,
    sessionId?: string
): GenerationJob {
    if (!outputName.trim()) {
        throw new Error('GenerationJob output name cannot be empty');
    }
    const now = new Date();
    return {
        id,
        avatar,
        audioUnitId,
        outputName,
        sessionId,
        status: 'queued',
        detached: false,
        createdAt: now,
        updatedAt: now,
    };
}

export function startJob(job: GenerationJob): GenerationJob {
    const now = new Date();
    return { ...job, status: 'running', startedAt: now, updatedAt: now };
}

export function completeJob(job: GenerationJob, artifactPath: string): GenerationJob {
    const now = new Date();
    return { ...job, status: 'completed', artifactPath, completedAt: now, updatedAt: now };
}

export function failJob(job: GenerationJob, code: ServiceErrorCode, message: string): GenerationJob {
    const now = new Date();
    return { ...job, status: 'failed', error: { code, message }, completedAt: now, updatedAt: now };
}

export function cancelJob(job: GenerationJob): GenerationJob {
    const now = new Date();
    return { ...job, status: 'cancelled', completedAt: now, updatedAt: now };
}

export function isJobTerminal(job: GenerationJob): boolean {
    return job.status === 'completed' || job.status === 'failed' || job.status === 'cancelled';
}

export function toJobHandle(job: GenerationJob): GenerationJobHandle {
    return Object.freeze({ jobId: job.id, avatarId: job.avatar.avatarId });
}
