/**
 * Lifecycle of a registered avatar.
 * - 'retired': replaced by a re-initialization; references to it are stale
 * - 'degraded': too many consecutive generation failures, needs re-initialization
 */
export type AvatarStatus =
    | 'unprepared'
    | 'preparing'
    | 'ready'
    | 'failed'
    | 'degraded'
    | 'retired';

/**
 * Model variant used for preparation and generation.
 */
export type AvatarVersion = 'v1' | 'v15';

export const AVATAR_VERSIONS: readonly AvatarVersion[] = ['v1', 'v15'];

export const DEFAULT_AVATAR_VERSION: AvatarVersion = 'v15';

export function isAvatarVersion(value: unknown): value is AvatarVersion {
    return typeof value === 'string' && (AVATAR_VERSIONS as readonly string[]).includes(value);
}

/**
 * Avatar is a prepared identity derived from a source video.
 */
export interface Avatar {
    /** Caller-chosen unique identifier */
    avatarId: string;
    /** Changes on every registration so stale references can be detected */
    instanceId: string;
    /** Absolute path to the source video */
    sourceVideoPath: string;
    version: AvatarVersion;
    status: AvatarStatus;
    /** Directory holding the prepared frames/latents for this instance */
    cacheDir: string;
    /** Generation failures since the last success */
    consecutiveFailures: number;
    lastError?: string;
    createdAt: Date;
    updatedAt: Date;
    readyAt?: Date;
}

/**
 * What the coordinator holds on to: enough to find the avatar again and to notice
 * that it has been replaced in the meantime.
 */
export interface AvatarRef {
    avatarId: string;
    instanceId: string;
}

export interface AvatarSummary {
    avatar_id: string;
    version: AvatarVersion;
    status: AvatarStatus;
    video_path: string;
    consecutive_failures: number;
    created_at: string;
    ready_at?: string;
    last_error?: string;
}

export function createAvatar(
    avatarId: string,
    instanceId: string,
    sourceVideoPath: string,
    version: AvatarVersion,
    cacheDir: string
): Avatar {
    if (!avatarId.trim()) {
        throw new Error('Avatar id cannot be empty');
    }
    const now = new Date();
    return {
        avatarId,
        instanceId,
        sourceVideoPath,
        version,
        status: 'unprepared',
        cacheDir,
        consecutiveFailures: 0,
        createdAt: now,
        updatedAt: now,
    };
}

export function updateAvatarStatus(avatar: Avatar, status: AvatarStatus, error?: string): Avatar {
    const now = new Date();
    return {
        ...avatar,
        status,
        lastError: error ?? (status === 'ready' ? undefined : avatar.lastError),
        readyAt: status === 'ready' ? now : avatar.readyAt,
        consecutiveFailures: status === 'ready' ? 0 : avatar.consecutiveFailures,
        updatedAt: now,
    };
}

export function toAvatarRef(avatar: Avatar): AvatarRef {
    return { avatarId: avatar.avatarId, instanceId: avatar.instanceId };
}

export function toAvatarSummary(avatar: Avatar): AvatarSummary {
    const summary: AvatarSummary = {
        avatar_id: avatar.avatarId,
        version: avatar.version,
        status: avatar.status,
        video_path: avatar.sourceVideoPath,
        consecutive_failures: avatar.consecutiveFailures,
        created_at: avatar.createdAt.toISOString(),
    };
    if (avatar.readyAt) {
        summary.ready_at = avatar.readyAt.toISOString();
    }
    if (avatar.lastError) {
        summary.last_error = avatar.lastError;
    }
    return summary;
}
