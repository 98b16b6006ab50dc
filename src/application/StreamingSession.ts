import { Avatar } from '../domain/entities/Avatar';
import { StreamAudioOptions, createAudioUnitFromStreamPayload } from '../domain/entities/AudioUnit';
import { GenerationArtifact } from '../domain/entities/GenerationJob';
import {
    InvalidInputError,
    ResourceExhaustedError,
    ServiceError,
    toServiceError,
} from '../domain/errors/ServiceError';
import { BoundedChannel } from './BoundedChannel';
import { SessionCoordinator } from './SessionCoordinator';

/**
 * What a submitted chunk turned into, delivered in submission order.
 */
export type ChunkOutcome =
    | { kind: 'video'; jobId: string; sequence: number; artifact: GenerationArtifact }
    | { kind: 'error'; jobId: string; sequence: number; error: ServiceError };

export interface ChunkReceipt {
    jobId: string;
    sequence: number;
}

export interface StreamingSessionOptions {
    maxPendingChunks: number;
    audio: StreamAudioOptions;
}

export interface StreamingSessionStatus {
    client_id: string;
    avatar_initialized: boolean;
    avatar_id: string | null;
    queue_size: number;
    processing: boolean;
}

/**
 * Per-connection state of the streaming transport: the bound avatar, a chunk
 * sequence counter and the ordered list of chunks not yet delivered.
 */
export class StreamingSession {
    private avatarId: string | null = null;
    private sequence = 0;
    private readonly pending: BoundedChannel<Promise<ChunkOutcome>>;
    private closed = false;

    constructor(
        readonly id: string,
        private readonly coordinator: SessionCoordinator,
        private readonly options: StreamingSessionOptions
    ) {
        this.pending = new BoundedChannel(options.maxPendingChunks);
    }

    get boundAvatarId(): string | null {
        return this.avatarId;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Binds the session to a ready avatar. A session binds once.
     */
    bind(avatar: Avatar): void {
        if (this.avatarId !== null) {
            throw new InvalidInputError(`Session already bound to avatar ${this.avatarId}`);
        }
        this.avatarId = avatar.avatarId;
        console.log(`[Stream] Session ${this.id} bound to avatar ${avatar.avatarId}`);
    }

    /**
     * Turns one audio payload into a generation job. Raw PCM16 is wrapped into WAV;
     * RIFF payloads are used as they are.
     */
    submitChunk(payload: Buffer, format: Partial<Pick<StreamAudioOptions, 'sampleRate' | 'channels'>> = {}): ChunkReceipt {
        if (this.closed) {
            throw new InvalidInputError('Session is closed');
        }
        if (this.avatarId === null) {
            throw new ServiceError('AVATAR_NOT_READY', 'Avatar not initialized. Send initialize_avatar first.');
        }
        if (this.pending.isFull) {
            throw new ResourceExhaustedError(
                `Too many undelivered chunks (limit ${this.pending.capacity}); wait for video before sending more audio`
            );
        }

        const unit = createAudioUnitFromStreamPayload(payload, {
            ...this.options.audio,
            sampleRate: format.sampleRate ?? this.options.audio.sampleRate,
            channels: format.channels ?? this.options.audio.channels,
        });
        const sequence = this.sequence + 1;
        const handle = this.coordinator.submit(this.avatarId, unit, {
            sessionId: this.id,
            outputName: `${this.id}_${sequence}`,
        });
        this.sequence = sequence;

        const outcome: Promise<ChunkOutcome> = this.coordinator.awaitJob(handle).then(
            (artifact): ChunkOutcome => ({ kind: 'video', jobId: handle.jobId, sequence, artifact }),
            (error: unknown): ChunkOutcome => ({
                kind: 'error',
                jobId: handle.jobId,
                sequence,
                error: toServiceError(error),
            })
        );
        this.pending.tryPush(outcome);
        return { jobId: handle.jobId, sequence };
    }

    status(): StreamingSessionStatus {
        return {
            client_id: this.id,
            avatar_initialized: this.avatarId !== null,
            avatar_id: this.avatarId,
            queue_size: this.pending.size,
            processing: this.pending.size > 0,
        };
    }

    /**
     * Delivers outcomes in submission order until the session closes. Each artifact
     * is released after its delivery, or discarded once the session is closed.
     */
    async deliver(sink: (outcome: ChunkOutcome) => Promise<void>): Promise<void> {
        for await (const pending of this.pending) {
            const outcome = await pending;
            try {
                if (!this.closed) {
                    await sink(outcome);
                }
            } catch (error) {
                console.error(`[Stream] Session ${this.id} failed to deliver chunk ${outcome.sequence}:`, error);
            } finally {
                if (outcome.kind === 'video') {
                    await releaseArtifact(outcome.artifact);
                }
            }
        }
    }

    /**
     * Cancels queued chunks and detaches the running one. Pending outcomes still
     * drain through deliver() so their artifacts are released.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        const cancelled = this.coordinator.cancelSession(this.id);
        this.pending.close();
        console.log(`[Stream] Session ${this.id} closed (${cancelled} queued chunk(s) cancelled)`);
    }
}

async function releaseArtifact(artifact: GenerationArtifact): Promise<void> {
    try {
        await artifact.release();
    } catch (error) {
        console.error(`[Stream] Failed to release artifact of job ${artifact.jobId}:`, error);
    }
}
