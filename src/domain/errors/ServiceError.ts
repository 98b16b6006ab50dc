/**
 * Error taxonomy shared by the registry, the coordinator and both transports.
 * Transports map `code` to their own signaling (HTTP status, stream `error` message).
 */
export type ServiceErrorCode =
    | 'NOT_FOUND'
    | 'INVALID_INPUT'
    | 'INVALID_SOURCE'
    | 'DUPLICATE_AVATAR'
    | 'AVATAR_NOT_READY'
    | 'AVATAR_DEGRADED'
    | 'JOB_CANCELLED'
    | 'RESOURCE_EXHAUSTED'
    | 'INVOKER_TIMEOUT'
    | 'INVOKER_CRASHED'
    | 'OUTPUT_MISSING'
    | 'INTERNAL';

export class ServiceError extends Error {
    constructor(
        public readonly code: ServiceErrorCode,
        message: string
    ) {
        super(message);
        this.name = 'ServiceError';
    }
}

export class AvatarNotFoundError extends ServiceError {
    constructor(public readonly avatarId: string) {
        super('NOT_FOUND', `Avatar ${avatarId} not found. Initialize avatar first.`);
        this.name = 'AvatarNotFoundError';
    }
}

export class JobNotFoundError extends ServiceError {
    constructor(public readonly jobId: string) {
        super('NOT_FOUND', `Job not found: ${jobId}`);
        this.name = 'JobNotFoundError';
    }
}

export class InvalidInputError extends ServiceError {
    constructor(message: string) {
        super('INVALID_INPUT', message);
        this.name = 'InvalidInputError';
    }
}

export class InvalidSourceError extends ServiceError {
    constructor(public readonly sourcePath: string, reason: string) {
        super('INVALID_SOURCE', `Avatar video is not usable (${reason}): ${sourcePath}`);
        this.name = 'InvalidSourceError';
    }
}

export class DuplicateAvatarError extends ServiceError {
    constructor(public readonly avatarId: string) {
        super('DUPLICATE_AVATAR', `Avatar ${avatarId} already exists; pass replace to re-initialize it`);
        this.name = 'DuplicateAvatarError';
    }
}

export class AvatarNotReadyError extends ServiceError {
    constructor(public readonly avatarId: string, public readonly status: string) {
        super('AVATAR_NOT_READY', `Avatar ${avatarId} is not ready (status: ${status})`);
        this.name = 'AvatarNotReadyError';
    }
}

export class AvatarDegradedError extends ServiceError {
    constructor(public readonly avatarId: string) {
        super('AVATAR_DEGRADED', `Avatar ${avatarId} is degraded after repeated failures; re-initialize it`);
        this.name = 'AvatarDegradedError';
    }
}

export class JobCancelledError extends ServiceError {
    constructor(public readonly jobId: string) {
        super('JOB_CANCELLED', `Job ${jobId} was cancelled`);
        this.name = 'JobCancelledError';
    }
}

export class ResourceExhaustedError extends ServiceError {
    constructor(message: string) {
        super('RESOURCE_EXHAUSTED', message);
        this.name = 'ResourceExhaustedError';
    }
}

export class InvokerTimeoutError extends ServiceError {
    constructor(public readonly timeoutMs: number) {
        super('INVOKER_TIMEOUT', `Inference process exceeded ${timeoutMs / 1000}s and was terminated`);
        this.name = 'InvokerTimeoutError';
    }
}

export class InvokerCrashedError extends ServiceError {
    constructor(
        public readonly exitCode: number | null,
        public readonly stderr: string
    ) {
        super(
            'INVOKER_CRASHED',
            `Inference process exited with code ${exitCode}${stderr ? `: ${stderr}` : ''}`
        );
        this.name = 'InvokerCrashedError';
    }
}

export class OutputMissingError extends ServiceError {
    constructor(public readonly expectedPath: string) {
        super('OUTPUT_MISSING', `Generated video not found at expected path: ${expectedPath}`);
        this.name = 'OutputMissingError';
    }
}

/** Failures that count towards degrading an avatar. */
export function isInvokerFailure(error: unknown): boolean {
    return error instanceof InvokerTimeoutError
        || error instanceof InvokerCrashedError
        || error instanceof OutputMissingError;
}

/**
 * Normalizes anything thrown into a ServiceError, keeping taxonomy errors as they are.
 */
export function toServiceError(error: unknown): ServiceError {
    if (error instanceof ServiceError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    const wrapped = new ServiceError('INTERNAL', message);
    if (error instanceof Error && error.stack) {
        wrapped.stack = error.stack;
    }
    return wrapped;
}
