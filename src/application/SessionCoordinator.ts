import { v4 as uuidv4 } from 'uuid';
import { Avatar, toAvatarRef } from '../domain/entities/Avatar';
import { AudioUnit, claimAudioUnit } from '../domain/entities/AudioUnit';
import {
    GenerationArtifact,
    GenerationJob,
    GenerationJobHandle,
    cancelJob,
    completeJob,
    createGenerationJob,
    failJob,
    isJobTerminal,
    startJob,
    toJobHandle,
} from '../domain/entities/GenerationJob';
import {
    AvatarDegradedError,
    AvatarNotFoundError,
    AvatarNotReadyError,
    InvalidInputError,
    JobCancelledError,
    JobNotFoundError,
    ResourceExhaustedError,
    ServiceError,
    isInvokerFailure,
    toServiceError,
} from '../domain/errors/ServiceError';
import { IInferenceInvoker, InvocationResult } from '../domain/ports/IInferenceInvoker';
import { IMetricsPort, METRICS } from '../domain/ports/IMetricsPort';
import { PreparingPolicy } from '../config';
import { AvatarRegistry } from './AvatarRegistry';
import { WorkerPool, WorkerPoolStats } from './WorkerPool';

const OUTPUT_NAME_PATTERN = /^[A-Za-z0-9_.-]{1,128}$/;

export interface SessionCoordinatorOptions {
    /** Upper bound on queued (not yet running) jobs across all avatars */
    maxQueuedJobs: number;
    /** Consecutive invoker failures before an avatar is degraded; 0 disables */
    degradedFailureThreshold: number;
    preparingPolicy: PreparingPolicy;
    jobTimeoutMs?: number;
    /** Finished jobs kept for getJob() (default: 200) */
    historyLimit?: number;
    metrics?: IMetricsPort;
}

export interface SubmitOptions {
    outputName?: string;
    sessionId?: string;
}

export interface LaneStats {
    avatar_id: string;
    queued: number;
    running: string | null;
}

export interface CoordinatorStats {
    queuedJobs: number;
    activeJobs: number;
    lanes: LaneStats[];
    pool: WorkerPoolStats;
}

interface Deferred<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (reason: Error) => void;
    settled: boolean;
}

interface JobRecord {
    job: GenerationJob;
    audio: AudioUnit | null;
    deferred: Deferred<GenerationArtifact>;
    abort: AbortController;
}

/**
 * One lane per avatar: a FIFO of waiting jobs and at most one running job.
 */
interface AvatarLane {
    avatarId: string;
    queue: JobRecord[];
    running: JobRecord | null;
    draining: boolean;
}

/**
 * SessionCoordinator - single-flight scheduling of generation jobs.
 *
 * Jobs for the same avatar run strictly one at a time in submission order.
 * Jobs for different avatars run concurrently, bounded by the shared WorkerPool.
 * Invoker failures fail the offending job only; the coordinator itself never throws
 * out of its scheduling loop.
 */
export class SessionCoordinator {
    private records: Map<string, JobRecord> = new Map();
    private history: string[] = [];
    private lanes: Map<string, AvatarLane> = new Map();
    private readonly historyLimit: number;
    private closed = false;

    constructor(
        private readonly registry: AvatarRegistry,
        private readonly invoker: IInferenceInvoker,
        private readonly pool: WorkerPool,
        private readonly options: SessionCoordinatorOptions
    ) {
        this.historyLimit = options.historyLimit ?? 200;
    }

    /**
     * Accepts a job for the avatar. Throws without creating a job when the avatar is
     * unknown or unusable, or when the global queue is full.
     */
    submit(avatarId: string, audio: AudioUnit, options: SubmitOptions = {}): GenerationJobHandle {
        if (this.closed) {
            throw new ResourceExhaustedError('Coordinator is shutting down');
        }

        const avatar = this.registry.find(avatarId);
        if (!avatar) {
            throw new AvatarNotFoundError(avatarId);
        }
        this.assertAcceptsJobs(avatar);

        const queued = this.countQueued();
        if (queued >= this.options.maxQueuedJobs) {
            throw new ResourceExhaustedError(
                `Generation queue is full (${queued}/${this.options.maxQueuedJobs} jobs waiting)`
            );
        }

        const id = `job_${uuidv4().substring(0, 8)}`;
        const outputName = options.outputName ?? `${avatarId}_${id}`;
        if (!OUTPUT_NAME_PATTERN.test(outputName)) {
            throw new InvalidInputError(
                `Invalid output_name "${outputName}": use letters, digits, '.', '_' or '-'`
            );
        }

        claimAudioUnit(audio);

        const record: JobRecord = {
            job: createGenerationJob(id, toAvatarRef(avatar), audio.id, outputName, options.sessionId),
            audio,
            deferred: createDeferred<GenerationArtifact>(),
            abort: new AbortController(),
        };
        this.records.set(id, record);

        const lane = this.laneFor(avatarId);
        lane.queue.push(record);
        this.options.metrics?.incrementCounter(METRICS.JOBS_SUBMITTED);
        console.log(
            `[Coordinator] Job ${id} queued for avatar ${avatarId} (position ${lane.queue.length}${lane.running ? ', lane busy' : ''})`
        );
        this.reportGauges();
        this.pump(lane);

        return toJobHandle(record.job);
    }

    /**
     * Waits for the job's artifact. Rejects with the job's failure, or with
     * JobCancelledError once the caller cancelled it.
     */
    awaitJob(handle: GenerationJobHandle): Promise<GenerationArtifact> {
        const record = this.records.get(handle.jobId);
        if (!record) {
            return Promise.reject(new JobNotFoundError(handle.jobId));
        }
        return record.deferred.promise;
    }

    /**
     * Cancels a queued job; returns true if it was removed before running.
     * A running job is detached instead: it runs to completion, its waiter is
     * rejected and its artifact released. Unknown or finished jobs return false.
     */
    cancel(handle: GenerationJobHandle): boolean {
        const record = this.records.get(handle.jobId);
        if (!record) {
            return false;
        }

        if (record.job.status === 'queued') {
            const lane = this.lanes.get(record.job.avatar.avatarId);
            if (lane) {
                lane.queue = lane.queue.filter((r) => r !== record);
            }
            record.job = cancelJob(record.job);
            record.abort.abort(new JobCancelledError(record.job.id));
            this.settleFailure(record, new JobCancelledError(record.job.id));
            this.options.metrics?.incrementCounter(METRICS.JOBS_CANCELLED);
            console.log(`[Coordinator] Job ${record.job.id} cancelled while queued`);
            this.archive(record);
            this.reportGauges();
            return true;
        }

        if (record.job.status === 'running' && !record.job.detached) {
            record.job = { ...record.job, detached: true, updatedAt: new Date() };
            this.settleFailure(record, new JobCancelledError(record.job.id));
            console.log(`[Coordinator] Job ${record.job.id} detached; result will be discarded`);
        }
        return false;
    }

    /**
     * Cancels every queued job of a streaming session and detaches its running one.
     * Returns the number of jobs cancelled before they ran.
     */
    cancelSession(sessionId: string): number {
        return this.cancelWhere((job) => job.sessionId === sessionId);
    }

    /**
     * Same as cancelSession, for every job of one avatar.
     */
    cancelAvatar(avatarId: string): number {
        return this.cancelWhere((job) => job.avatar.avatarId === avatarId);
    }

    getJob(jobId: string): GenerationJob | null {
        const record = this.records.get(jobId);
        return record ? { ...record.job } : null;
    }

    /**
     * Most recent jobs first.
     */
    listJobs(limit: number = 50): GenerationJob[] {
        return Array.from(this.records.values())
            .map((record) => ({ ...record.job }))
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
            .slice(0, limit);
    }

    getStats(): CoordinatorStats {
        const lanes: LaneStats[] = Array.from(this.lanes.values()).map((lane) => ({
            avatar_id: lane.avatarId,
            queued: lane.queue.length,
            running: lane.running ? lane.running.job.id : null,
        }));
        return {
            queuedJobs: this.countQueued(),
            activeJobs: this.countActive(),
            lanes,
            pool: this.pool.stats,
        };
    }

    /**
     * Stops accepting work and cancels everything still queued. Running jobs are
     * detached; terminating their processes is the invoker's shutdown.
     */
    shutdown(): void {
        if (this.closed) return;
        this.closed = true;
        const cancelled = this.cancelWhere(() => true);
        console.log(`[Coordinator] Shut down (${cancelled} queued jobs cancelled)`);
    }

    private cancelWhere(predicate: (job: GenerationJob) => boolean): number {
        let cancelled = 0;
        for (const record of Array.from(this.records.values())) {
            if (isJobTerminal(record.job) || !predicate(record.job)) continue;
            if (this.cancel(toJobHandle(record.job))) {
                cancelled++;
            }
        }
        return cancelled;
    }

    private assertAcceptsJobs(avatar: Avatar): void {
        switch (avatar.status) {
            case 'ready':
                return;
            case 'degraded':
                throw new AvatarDegradedError(avatar.avatarId);
            case 'preparing':
                if (this.options.preparingPolicy === 'queue') return;
                throw new AvatarNotReadyError(avatar.avatarId, avatar.status);
            default:
                throw new AvatarNotReadyError(avatar.avatarId, avatar.status);
        }
    }

    private laneFor(avatarId: string): AvatarLane {
        let lane = this.lanes.get(avatarId);
        if (!lane) {
            lane = { avatarId, queue: [], running: null, draining: false };
            this.lanes.set(avatarId, lane);
        }
        return lane;
    }

    private pump(lane: AvatarLane): void {
        if (lane.draining) return;
        this.drain(lane).catch((error) => {
            console.error(`[Coordinator] Lane ${lane.avatarId} stopped unexpectedly:`, error);
        });
    }

    /**
     * Runs the lane's jobs one at a time until its queue is empty.
     */
    private async drain(lane: AvatarLane): Promise<void> {
        lane.draining = true;
        try {
            while (lane.queue.length > 0) {
                const record = lane.queue[0];
                const slot = await this.claimSlot(lane, record);
                if (!slot) continue;

                lane.queue = lane.queue.filter((r) => r !== record);
                lane.running = record;
                try {
                    await this.execute(record, slot.avatar);
                } finally {
                    lane.running = null;
                    slot.release();
                    await this.returnLease(record, slot.returnLease);
                }
            }
        } finally {
            lane.draining = false;
            if (lane.queue.length === 0 && !lane.running) {
                this.lanes.delete(lane.avatarId);
            }
            this.reportGauges();
        }
    }

    /**
     * Waits until the job may run: its avatar settled and a pool slot is held.
     * Returns null when the job was cancelled or failed on the way.
     */
    private async claimSlot(
        lane: AvatarLane,
        record: JobRecord
    ): Promise<{ avatar: Avatar; release: () => void; returnLease: () => Promise<void> } | null> {
        let release: (() => void) | null = null;
        try {
            await this.waitForPreparation(record);
            release = await this.pool.acquire(record.abort.signal);
            const avatar = this.dispatchableAvatar(record);
            if (record.job.status === 'cancelled') {
                release();
                return null;
            }
            // Leased in the same turn as the readiness check
            return { avatar, release, returnLease: this.registry.lease(record.job.avatar) };
        } catch (error) {
            release?.();
            if (record.job.status !== 'cancelled') {
                lane.queue = lane.queue.filter((r) => r !== record);
                console.warn(`[Coordinator] Job ${record.job.id} not dispatched: ${toServiceError(error).message}`);
                this.failRecord(record, toServiceError(error));
            }
            return null;
        }
    }

    private async waitForPreparation(record: JobRecord): Promise<void> {
        const current = this.registry.resolve(record.job.avatar);
        if (current?.status !== 'preparing') return;
        console.log(`[Coordinator] Job ${record.job.id} waiting for avatar ${current.avatarId} to finish preparing`);
        await waitOrAbort(this.registry.whenSettled(current.avatarId), record.abort.signal);
    }

    /**
     * Re-checks the avatar right before dispatch; throws and gives the slot back
     * if it was retired, degraded or failed while the job waited.
     */
    private dispatchableAvatar(record: JobRecord): Avatar {
        const avatarId = record.job.avatar.avatarId;
        const avatar = this.registry.resolve(record.job.avatar);
        if (avatar?.status === 'ready') {
            return avatar;
        }
        throw avatar?.status === 'degraded'
            ? new AvatarDegradedError(avatarId)
            : new AvatarNotReadyError(avatarId, avatar ? avatar.status : 'retired');
    }

    private async execute(record: JobRecord, avatar: Avatar): Promise<void> {
        const { audio } = record;
        if (!audio) {
            this.failRecord(record, new ServiceError('INTERNAL', `Audio for job ${record.job.id} is gone`));
            return;
        }

        record.job = startJob(record.job);
        this.reportGauges();
        console.log(`[Coordinator] Job ${record.job.id} running on avatar ${avatar.avatarId}`);
        const stopTimer = this.options.metrics?.startTimer(METRICS.JOB_DURATION, { version: avatar.version });

        let result: InvocationResult;
        try {
            result = await this.invoker.run(avatar, audio, {
                outputName: record.job.outputName,
                timeoutMs: this.options.jobTimeoutMs,
            });
        } catch (error) {
            stopTimer?.();
            const failure = toServiceError(error);
            if (isInvokerFailure(error)) {
                this.countFailure(record, failure);
            }
            this.failRecord(record, failure);
            return;
        }
        stopTimer?.();

        this.registry.recordSuccess(record.job.avatar);
        record.job = completeJob(record.job, result.artifactPath);
        this.options.metrics?.incrementCounter(METRICS.JOBS_COMPLETED);
        console.log(`[Coordinator] Job ${record.job.id} completed in ${(result.durationMs / 1000).toFixed(1)}s`);
        this.archive(record);

        if (record.job.detached || record.deferred.settled) {
            await this.releaseQuietly(result);
            console.log(`[Coordinator] Discarded result of detached job ${record.job.id}`);
            return;
        }

        record.deferred.settled = true;
        record.deferred.resolve(this.toArtifact(record.job, result));
    }

    private async returnLease(record: JobRecord, returnLease: () => Promise<void>): Promise<void> {
        try {
            await returnLease();
        } catch (error) {
            console.error(`[Coordinator] Cleanup after job ${record.job.id} failed:`, error);
        }
    }

    private countFailure(record: JobRecord, failure: ServiceError): void {
        const threshold = this.options.degradedFailureThreshold;
        const failures = this.registry.recordFailure(record.job.avatar, failure.message);
        console.warn(
            `[Coordinator] Job ${record.job.id} failed (${failure.code}); ${failures} consecutive failure(s) on avatar ${record.job.avatar.avatarId}`
        );
        if (threshold > 0 && failures >= threshold) {
            this.registry.markDegraded(
                record.job.avatar,
                `${failures} consecutive generation failures, last: ${failure.message}`
            );
        }
    }

    private failRecord(record: JobRecord, failure: ServiceError): void {
        record.job = failJob(record.job, failure.code, failure.message);
        this.options.metrics?.incrementCounter(METRICS.JOBS_FAILED, { code: failure.code });
        this.settleFailure(record, failure);
        this.archive(record);
    }

    private settleFailure(record: JobRecord, error: ServiceError): void {
        if (record.deferred.settled) return;
        record.deferred.settled = true;
        record.deferred.reject(error);
    }

    private toArtifact(job: GenerationJob, result: InvocationResult): GenerationArtifact {
        let released = false;
        return {
            jobId: job.id,
            avatarId: job.avatar.avatarId,
            outputName: job.outputName,
            path: result.artifactPath,
            durationMs: result.durationMs,
            release: async () => {
                if (released) return;
                released = true;
                await this.invoker.release(result);
            },
        };
    }

    private async releaseQuietly(result: InvocationResult): Promise<void> {
        try {
            await this.invoker.release(result);
        } catch (error) {
            console.error(`[Coordinator] Failed to release ${result.workDir}:`, error);
        }
    }

    /**
     * Drops the audio of a finished job and trims the history of finished jobs.
     */
    private archive(record: JobRecord): void {
        record.audio = null;
        this.history.push(record.job.id);
        while (this.history.length > this.historyLimit) {
            const oldest = this.history.shift();
            if (oldest) this.records.delete(oldest);
        }
    }

    private countQueued(): number {
        let total = 0;
        for (const lane of this.lanes.values()) {
            total += lane.queue.length;
        }
        return total;
    }

    private countActive(): number {
        let total = 0;
        for (const lane of this.lanes.values()) {
            if (lane.running) total++;
        }
        return total;
    }

    private reportGauges(): void {
        this.options.metrics?.recordGauge(METRICS.QUEUED_JOBS, this.countQueued());
        this.options.metrics?.recordGauge(METRICS.ACTIVE_JOBS, this.countActive());
    }
}

function createDeferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined;
    let reject: (reason: Error) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    // Nobody may be waiting on a job; its rejection must not crash the process
    promise.catch(() => undefined);
    return { promise, resolve, reject, settled: false };
}

function waitOrAbort(promise: Promise<void>, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
        return Promise.reject(signal.reason instanceof Error ? signal.reason : new Error('Aborted'));
    }
    return new Promise((resolve, reject) => {
        const onAbort = () => reject(signal.reason instanceof Error ? signal.reason : new Error('Aborted'));
        signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            () => {
                signal.removeEventListener('abort', onAbort);
                resolve();
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error instanceof Error ? error : new Error(String(error)));
            }
        );
    });
}
