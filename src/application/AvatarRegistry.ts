import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
    Avatar,
    AvatarRef,
    AvatarStatus,
    AvatarSummary,
    AvatarVersion,
    createAvatar,
    toAvatarSummary,
    updateAvatarStatus,
} from '../domain/entities/Avatar';
import {
    AvatarNotFoundError,
    DuplicateAvatarError,
    InvalidInputError,
    InvalidSourceError,
} from '../domain/errors/ServiceError';
import { IInferenceInvoker } from '../domain/ports/IInferenceInvoker';
import { IMetricsPort, METRICS } from '../domain/ports/IMetricsPort';
import { KeyedMutex } from './KeyedMutex';

const AVATAR_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/;

export interface AvatarRegistryOptions {
    /** Avatar caches live under <cacheRoot>/<avatarId>/<instanceId> */
    cacheRoot: string;
    prepareTimeoutMs?: number;
    metrics?: IMetricsPort;
}

export interface RegisterOptions {
    /** Retire an existing avatar with the same id instead of failing */
    replace?: boolean;
    /** The registry deletes the source video when the avatar is retired or removed */
    ownsSource?: boolean;
}

interface AvatarEntry {
    avatar: Avatar;
    ownsSource: boolean;
}

/**
 * Registry of avatars and their prepared caches.
 *
 * Registration, preparation and removal of one avatar id are serialized; different
 * ids proceed independently. Every read returns a copy.
 */
export class AvatarRegistry {
    private entries: Map<string, AvatarEntry> = new Map();
    private settling: Map<string, Promise<void>> = new Map();
    /** Running jobs per instance id */
    private leases: Map<string, number> = new Map();
    private pendingCleanups: Map<string, () => Promise<void>> = new Map();
    private readonly lock = new KeyedMutex();

    constructor(
        private readonly invoker: IInferenceInvoker,
        private readonly options: AvatarRegistryOptions
    ) {}

    /**
     * Records a new avatar in 'unprepared' state. The source video must exist and be non-empty.
     * An owned source is deleted when registration is refused.
     */
    async register(
        avatarId: string,
        sourceVideoPath: string,
        version: AvatarVersion,
        options: RegisterOptions = {}
    ): Promise<Avatar> {
        return this.lock.runExclusive(avatarId, async () => {
            const entry = await this.registerLocked(avatarId, sourceVideoPath, version, options);
            return { ...entry.avatar };
        });
    }

    /**
     * Builds the avatar's cache through the engine. A ready avatar is returned as is,
     * so calling this twice never runs the engine twice.
     */
    async prepare(avatarId: string): Promise<Avatar> {
        return this.lock.runExclusive(avatarId, () => this.prepareLocked(avatarId));
    }

    /**
     * Registers and prepares under one hold of the avatar lock, so a concurrent
     * replacement of the same id waits until this instance is prepared (or failed).
     */
    async initialize(
        avatarId: string,
        sourceVideoPath: string,
        version: AvatarVersion,
        options: RegisterOptions = {}
    ): Promise<Avatar> {
        return this.lock.runExclusive(avatarId, async () => {
            await this.registerLocked(avatarId, sourceVideoPath, version, options);
            return this.prepareLocked(avatarId);
        });
    }

    get(avatarId: string): Avatar {
        const entry = this.entries.get(avatarId);
        if (!entry) {
            throw new AvatarNotFoundError(avatarId);
        }
        return { ...entry.avatar };
    }

    find(avatarId: string): Avatar | null {
        const entry = this.entries.get(avatarId);
        return entry ? { ...entry.avatar } : null;
    }

    /**
     * The avatar a reference points at, or null once it was replaced or removed.
     */
    resolve(ref: AvatarRef): Avatar | null {
        const entry = this.entries.get(ref.avatarId);
        if (!entry || entry.avatar.instanceId !== ref.instanceId) {
            return null;
        }
        return { ...entry.avatar };
    }

    isCurrent(ref: AvatarRef): boolean {
        return this.resolve(ref) !== null;
    }

    list(): AvatarSummary[] {
        return Array.from(this.entries.values())
            .map((entry) => toAvatarSummary(entry.avatar))
            .sort((a, b) => a.created_at.localeCompare(b.created_at));
    }

    get size(): number {
        return this.entries.size;
    }

    /**
     * Resolves once any preparation in flight for this avatar has finished.
     */
    whenSettled(avatarId: string): Promise<void> {
        return this.settling.get(avatarId) ?? Promise.resolve();
    }

    /**
     * Counts a failed generation against the current instance. Returns the new count.
     */
    recordFailure(ref: AvatarRef, message: string): number {
        const entry = this.currentEntry(ref);
        if (!entry) return 0;
        entry.avatar = {
            ...entry.avatar,
            consecutiveFailures: entry.avatar.consecutiveFailures + 1,
            lastError: message,
            updatedAt: new Date(),
        };
        return entry.avatar.consecutiveFailures;
    }

    recordSuccess(ref: AvatarRef): void {
        const entry = this.currentEntry(ref);
        if (!entry || entry.avatar.consecutiveFailures === 0) return;
        entry.avatar = { ...entry.avatar, consecutiveFailures: 0, updatedAt: new Date() };
    }

    /**
     * Takes a ready avatar out of service until it is re-initialized.
     */
    markDegraded(ref: AvatarRef, reason: string): boolean {
        const entry = this.currentEntry(ref);
        if (!entry || entry.avatar.status !== 'ready') return false;
        entry.avatar = updateAvatarStatus(entry.avatar, 'degraded', reason);
        this.options.metrics?.incrementCounter(METRICS.AVATARS_DEGRADED);
        console.warn(`[Registry] Avatar ${ref.avatarId} degraded: ${reason}`);
        return true;
    }

    /**
     * Deletes the avatar and its cache. Jobs still holding a reference see it as retired;
     * one already running keeps the cache until it finishes.
     */
    async remove(avatarId: string): Promise<AvatarSummary> {
        return this.lock.runExclusive(avatarId, async () => {
            const entry = this.entries.get(avatarId);
            if (!entry) {
                throw new AvatarNotFoundError(avatarId);
            }
            this.entries.delete(avatarId);
            const summary = toAvatarSummary(entry.avatar);
            await this.dispose(entry);
            console.log(`[Registry] Removed avatar ${avatarId}`);
            return summary;
        });
    }

    /**
     * Marks the instance as used by a running job. Deleting the cache and source of a
     * retired or removed instance waits until every lease is returned.
     */
    lease(ref: AvatarRef): () => Promise<void> {
        this.leases.set(ref.instanceId, (this.leases.get(ref.instanceId) ?? 0) + 1);
        let returned = false;
        return async () => {
            if (returned) return;
            returned = true;
            const remaining = (this.leases.get(ref.instanceId) ?? 1) - 1;
            if (remaining > 0) {
                this.leases.set(ref.instanceId, remaining);
                return;
            }
            this.leases.delete(ref.instanceId);
            const cleanup = this.pendingCleanups.get(ref.instanceId);
            if (cleanup) {
                this.pendingCleanups.delete(ref.instanceId);
                await this.lock.runExclusive(ref.avatarId, cleanup);
            }
        };
    }

    private async registerLocked(
        avatarId: string,
        sourceVideoPath: string,
        version: AvatarVersion,
        options: RegisterOptions
    ): Promise<AvatarEntry> {
        const resolvedSource = path.resolve(sourceVideoPath);
        try {
            assertAvatarId(avatarId);
            const existing = this.entries.get(avatarId);
            if (existing && !options.replace) {
                throw new DuplicateAvatarError(avatarId);
            }
            await checkSource(resolvedSource);

            if (existing) {
                await this.retire(existing, resolvedSource);
            }
        } catch (error) {
            if (options.ownsSource) {
                await fs.promises.rm(resolvedSource, { force: true });
            }
            throw error;
        }

        const instanceId = uuidv4();
        const avatar = createAvatar(
            avatarId,
            instanceId,
            resolvedSource,
            version,
            path.join(this.options.cacheRoot, avatarId, instanceId)
        );
        const entry: AvatarEntry = { avatar, ownsSource: options.ownsSource ?? false };
        this.entries.set(avatarId, entry);
        console.log(`[Registry] Registered avatar ${avatarId} (${version}, instance ${instanceId.substring(0, 8)})`);
        return entry;
    }

    private async prepareLocked(avatarId: string): Promise<Avatar> {
        const entry = this.entries.get(avatarId);
        if (!entry) {
            throw new AvatarNotFoundError(avatarId);
        }
        if (entry.avatar.status === 'ready') {
            console.log(`[Registry] Avatar ${avatarId} already prepared, skipping`);
            return { ...entry.avatar };
        }

        let settle: () => void = () => undefined;
        this.settling.set(avatarId, new Promise<void>((resolve) => {
            settle = resolve;
        }));
        this.setStatus(entry, 'preparing');
        const stopTimer = this.options.metrics?.startTimer(METRICS.PREPARE_DURATION, { version: entry.avatar.version });
        console.log(`[Registry] Preparing avatar ${avatarId} (${entry.avatar.version})...`);

        try {
            await fs.promises.mkdir(entry.avatar.cacheDir, { recursive: true });
            await this.invoker.prepare({ ...entry.avatar }, { timeoutMs: this.options.prepareTimeoutMs });
            this.setStatus(entry, 'ready');
            this.options.metrics?.incrementCounter(METRICS.AVATARS_PREPARED, { version: entry.avatar.version });
            console.log(`[Registry] Avatar ${avatarId} ready`);
            return { ...entry.avatar };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            await fs.promises.rm(entry.avatar.cacheDir, { recursive: true, force: true });
            this.setStatus(entry, 'failed', message);
            this.options.metrics?.incrementCounter(METRICS.AVATARS_PREPARE_FAILED, { version: entry.avatar.version });
            console.error(`[Registry] Preparation of avatar ${avatarId} failed: ${message}`);
            throw error;
        } finally {
            stopTimer?.();
            this.settling.delete(avatarId);
            settle();
        }
    }

    private async retire(entry: AvatarEntry, replacementSource: string): Promise<void> {
        const { avatar } = entry;
        entry.avatar = updateAvatarStatus(avatar, 'retired');
        this.entries.delete(avatar.avatarId);
        console.log(`[Registry] Retired avatar ${avatar.avatarId} instance ${avatar.instanceId.substring(0, 8)}`);
        await this.dispose(entry, replacementSource);
    }

    /**
     * Deletes the instance's cache and owned source, or schedules that for when its
     * last running job returns the lease. Must be called under the avatar lock.
     */
    private async dispose(entry: AvatarEntry, keepSource?: string): Promise<void> {
        const { avatar, ownsSource } = entry;
        const cleanup = async (): Promise<void> => {
            await fs.promises.rm(avatar.cacheDir, { recursive: true, force: true });
            if (ownsSource && avatar.sourceVideoPath !== keepSource) {
                await fs.promises.rm(avatar.sourceVideoPath, { force: true });
            }
            if (!this.entries.has(avatar.avatarId)) {
                await removeEmptyDir(path.dirname(avatar.cacheDir));
            }
        };

        if (this.leases.has(avatar.instanceId)) {
            this.pendingCleanups.set(avatar.instanceId, cleanup);
            console.log(
                `[Registry] Cleanup of ${avatar.avatarId} instance ${avatar.instanceId.substring(0, 8)} deferred until its running job finishes`
            );
            return;
        }
        await cleanup();
    }

    private currentEntry(ref: AvatarRef): AvatarEntry | null {
        const entry = this.entries.get(ref.avatarId);
        return entry && entry.avatar.instanceId === ref.instanceId ? entry : null;
    }

    private setStatus(entry: AvatarEntry, status: AvatarStatus, error?: string): void {
        entry.avatar = updateAvatarStatus(entry.avatar, status, error);
    }
}

function assertAvatarId(avatarId: string): void {
    if (!AVATAR_ID_PATTERN.test(avatarId)) {
        throw new InvalidInputError(
            `Invalid avatar_id "${avatarId}": use up to 128 letters, digits, '.', '_' or '-'`
        );
    }
}

async function removeEmptyDir(dir: string): Promise<void> {
    try {
        await fs.promises.rmdir(dir);
    } catch (error) {
        const code = error instanceof Error ? Reflect.get(error, 'code') : undefined;
        if (code !== 'ENOENT' && code !== 'ENOTEMPTY' && code !== 'EEXIST') {
            throw error;
        }
    }
}

async function checkSource(sourcePath: string): Promise<void> {
    let stats: fs.Stats;
    try {
        stats = await fs.promises.stat(sourcePath);
    } catch {
        throw new InvalidSourceError(sourcePath, 'missing');
    }
    if (!stats.isFile()) {
        throw new InvalidSourceError(sourcePath, 'not a file');
    }
    if (stats.size === 0) {
        throw new InvalidSourceError(sourcePath, 'empty');
    }
    try {
        await fs.promises.access(sourcePath, fs.constants.R_OK);
    } catch {
        throw new InvalidSourceError(sourcePath, 'unreadable');
    }
}
