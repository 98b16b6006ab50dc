import fs from 'fs';
import path from 'path';
import { Config } from '../config';
import { Avatar, AvatarSummary, AvatarVersion } from '../domain/entities/Avatar';
import { IInferenceInvoker } from '../domain/ports/IInferenceInvoker';
import { IMetricsPort, METRICS } from '../domain/ports/IMetricsPort';
import { AvatarRegistry } from './AvatarRegistry';
import { CoordinatorStats, SessionCoordinator } from './SessionCoordinator';
import { StreamingSession } from './StreamingSession';
import { WorkerPool } from './WorkerPool';

export interface ServiceContextPaths {
    uploadsDir: string;
    avatarsDir: string;
    /** Per-invocation working directories of the engine */
    jobsDir: string;
}

export interface ServiceContextDependencies {
    config: Config;
    invoker: IInferenceInvoker;
    metrics: IMetricsPort;
    paths: ServiceContextPaths;
}

export interface InitializeAvatarRequest {
    avatarId: string;
    sourceVideoPath: string;
    version: AvatarVersion;
    replace?: boolean;
    /** The source is an upload the service should delete with the avatar */
    ownsSource?: boolean;
}

export interface ServiceStatus {
    avatars_count: number;
    avatar_ids: string[];
    avatars: Array<AvatarSummary & { queued: number; running: string | null }>;
    active_jobs: number;
    queued_jobs: number;
    pool: CoordinatorStats['pool'];
    open_sessions: number;
}

/**
 * Owns the registry, the coordinator and the invoker for the lifetime of the
 * process. Both transports go through it.
 */
export class ServiceContext {
    readonly registry: AvatarRegistry;
    readonly coordinator: SessionCoordinator;
    readonly pool: WorkerPool;
    private sessions: Map<string, StreamingSession> = new Map();
    private started = false;
    private stopped = false;

    constructor(private readonly deps: ServiceContextDependencies) {
        const { config, invoker, metrics, paths } = deps;
        this.pool = new WorkerPool(config.scheduling.maxConcurrentJobs);
        this.registry = new AvatarRegistry(invoker, {
            cacheRoot: paths.avatarsDir,
            prepareTimeoutMs: config.inference.prepareTimeoutMs,
            metrics,
        });
        this.coordinator = new SessionCoordinator(this.registry, invoker, this.pool, {
            maxQueuedJobs: config.scheduling.maxQueuedJobs,
            degradedFailureThreshold: config.scheduling.degradedFailureThreshold,
            preparingPolicy: config.scheduling.preparingPolicy,
            jobTimeoutMs: config.inference.timeoutMs,
            metrics,
        });
    }

    get config(): Config {
        return this.deps.config;
    }

    get paths(): ServiceContextPaths {
        return this.deps.paths;
    }

    get isStopped(): boolean {
        return this.stopped;
    }

    /**
     * Creates the working directories. Called once before the transports accept traffic.
     */
    async start(): Promise<void> {
        if (this.started) return;
        const { uploadsDir, avatarsDir, jobsDir } = this.deps.paths;
        for (const dir of [uploadsDir, avatarsDir, jobsDir]) {
            await fs.promises.mkdir(dir, { recursive: true });
        }
        this.started = true;
        console.log(`[Context] Started (work dirs under ${path.dirname(uploadsDir)})`);
    }

    /**
     * Registers (or re-registers) and prepares an avatar. A source the service owns
     * is deleted when registration is refused.
     */
    async initializeAvatar(request: InitializeAvatarRequest): Promise<Avatar> {
        return this.registry.initialize(request.avatarId, request.sourceVideoPath, request.version, {
            replace: request.replace,
            ownsSource: request.ownsSource,
        });
    }

    /**
     * Cancels the avatar's queued jobs, detaches its running one, then removes it.
     */
    async deleteAvatar(avatarId: string): Promise<AvatarSummary> {
        const existing = this.registry.get(avatarId);
        this.coordinator.cancelAvatar(existing.avatarId);
        return this.registry.remove(avatarId);
    }

    openSession(clientId: string): StreamingSession {
        const { streaming } = this.deps.config;
        const session = new StreamingSession(clientId, this.coordinator, {
            maxPendingChunks: streaming.maxPendingChunks,
            audio: {
                sampleRate: streaming.sampleRate,
                channels: streaming.channels,
                maxDurationSeconds: streaming.maxChunkSeconds,
            },
        });
        this.sessions.set(clientId, session);
        this.deps.metrics.incrementCounter(METRICS.STREAM_CONNECTIONS);
        this.deps.metrics.recordGauge(METRICS.OPEN_SESSIONS, this.sessions.size);
        return session;
    }

    closeSession(session: StreamingSession): void {
        session.close();
        this.sessions.delete(session.id);
        this.deps.metrics.recordGauge(METRICS.OPEN_SESSIONS, this.sessions.size);
    }

    getStatus(): ServiceStatus {
        const stats = this.coordinator.getStats();
        const lanes = new Map(stats.lanes.map((lane) => [lane.avatar_id, lane]));
        const avatars = this.registry.list().map((summary) => {
            const lane = lanes.get(summary.avatar_id);
            return { ...summary, queued: lane ? lane.queued : 0, running: lane ? lane.running : null };
        });
        return {
            avatars_count: avatars.length,
            avatar_ids: avatars.map((avatar) => avatar.avatar_id),
            avatars,
            active_jobs: stats.activeJobs,
            queued_jobs: stats.queuedJobs,
            pool: stats.pool,
            open_sessions: this.sessions.size,
        };
    }

    listAvatars(): AvatarSummary[] {
        return this.registry.list();
    }

    /**
     * Deletes an uploaded file that never made it into the registry.
     */
    async discardUpload(filePath: string): Promise<void> {
        await fs.promises.rm(filePath, { force: true });
    }

    /**
     * Closes every session, cancels queued work and terminates engine processes.
     */
    async shutdown(): Promise<void> {
        if (this.stopped) return;
        this.stopped = true;
        for (const session of Array.from(this.sessions.values())) {
            this.closeSession(session);
        }
        this.coordinator.shutdown();
        await this.deps.invoker.shutdown();
        console.log('[Context] Shutdown complete');
    }
}
