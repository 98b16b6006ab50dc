import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { ServiceContext } from '../../application/ServiceContext';
import { ChunkOutcome, StreamingSession } from '../../application/StreamingSession';
import { Avatar, DEFAULT_AVATAR_VERSION, isAvatarVersion } from '../../domain/entities/Avatar';
import { InvalidInputError, ServiceError, toServiceError } from '../../domain/errors/ServiceError';
import {
    AudioChunkPayload,
    InitializeAvatarPayload,
    decodeBase64,
    describeValidationErrors,
    validateAudioChunk,
    validateEnvelope,
    validateInitializeAvatar,
} from './protocol';
import { WsTransport } from './wsTransport';

/** Close code for protocol violations */
export const CLOSE_POLICY_VIOLATION = 1008;

/**
 * Handles one WebSocket client: parses its messages, drives its StreamingSession
 * and sends results back in the order the audio arrived.
 */
export class StreamingConnection {
    // Messages are handled one at a time so an initialize completes before later audio
    private inbound: Promise<void> = Promise.resolve();
    private initializing = false;

    constructor(
        private readonly transport: WsTransport,
        private readonly session: StreamingSession,
        private readonly context: ServiceContext
    ) {}

    get clientId(): string {
        return this.session.id;
    }

    start(): void {
        this.send({
            type: 'connection_established',
            client_id: this.clientId,
            message: 'Connected to avatar stream server',
        });
        this.session.deliver((outcome) => this.deliver(outcome)).catch((error) => {
            console.error(`[Stream] Delivery loop for ${this.clientId} stopped:`, error);
        });
    }

    receive(raw: string): void {
        // Status requests skip the queue while an initialization holds it
        if (this.initializing && isStatusRequest(raw)) {
            this.sendStatus();
            return;
        }
        this.inbound = this.inbound
            .then(() => this.handle(raw))
            .catch((error) => {
                console.error(`[Stream] Error handling message from ${this.clientId}:`, error);
                this.sendError(toServiceError(error));
            });
    }

    rejectBinary(): void {
        this.sendError(new InvalidInputError('Binary frames are not supported; send JSON messages'));
    }

    close(): void {
        this.context.closeSession(this.session);
    }

    private async handle(raw: string): Promise<void> {
        let message: unknown;
        try {
            message = JSON.parse(raw);
        } catch {
            this.sendError(new InvalidInputError('Invalid JSON message'));
            return;
        }

        if (!validateEnvelope(message)) {
            this.sendError(new InvalidInputError('Message must be a JSON object with a string "type"'));
            return;
        }

        switch (message.type) {
            case 'initialize_avatar':
                if (!validateInitializeAvatar(message)) {
                    this.closeMalformed(describeValidationErrors(validateInitializeAvatar.errors));
                    return;
                }
                await this.initializeAvatar(message);
                return;
            case 'audio_chunk':
                if (!validateAudioChunk(message)) {
                    this.sendError(new InvalidInputError(
                        `Invalid audio_chunk: ${describeValidationErrors(validateAudioChunk.errors)}`
                    ));
                    return;
                }
                this.submitAudio(message);
                return;
            case 'get_status':
                this.sendStatus();
                return;
            default:
                this.sendError(new InvalidInputError(`Unknown message type: ${message.type}`));
        }
    }

    private async initializeAvatar(message: InitializeAvatarPayload): Promise<void> {
        const bound = this.session.boundAvatarId;
        if (bound !== null) {
            this.sendError(new InvalidInputError(`Session already bound to avatar ${bound}`));
            return;
        }

        const version = message.version ?? DEFAULT_AVATAR_VERSION;
        if (!isAvatarVersion(version)) {
            this.sendError(new InvalidInputError('Invalid version. Must be v1 or v15'));
            return;
        }

        const videoData = message.avatar_video_data !== undefined
            ? decodeBase64(message.avatar_video_data)
            : null;

        let avatar: Avatar;
        this.initializing = true;
        try {
            if (videoData) {
                const avatarId = message.avatar_id ?? `avatar_${this.clientId}`;
                const sourceVideoPath = path.join(
                    this.context.paths.uploadsDir,
                    `${Date.now()}_${uuidv4().substring(0, 8)}.mp4`
                );
                await fs.promises.writeFile(sourceVideoPath, videoData);
                this.send({ type: 'avatar_initialization_started', avatar_id: avatarId });
                avatar = await this.context.initializeAvatar({
                    avatarId,
                    sourceVideoPath,
                    version,
                    replace: message.replace,
                    ownsSource: true,
                });
            } else {
                const existing = message.avatar_id ? this.context.registry.find(message.avatar_id) : null;
                if (!existing) {
                    this.closeMalformed('avatar_video_data or the avatar_id of a registered avatar is required');
                    return;
                }
                this.send({ type: 'avatar_initialization_started', avatar_id: existing.avatarId });
                avatar = await this.context.registry.prepare(existing.avatarId);
            }
        } catch (error) {
            this.sendError(toServiceError(error));
            return;
        } finally {
            this.initializing = false;
        }

        this.session.bind(avatar);
        this.send({ type: 'avatar_ready', avatar_id: avatar.avatarId, version: avatar.version });
    }

    private submitAudio(message: AudioChunkPayload): void {
        const audio = decodeBase64(message.audio_data);
        if (!audio) {
            this.sendError(new InvalidInputError('audio_data must be non-empty base64'));
            return;
        }

        try {
            const receipt = this.session.submitChunk(audio, {
                sampleRate: message.sample_rate,
                channels: message.channels,
            });
            this.send({ type: 'audio_received', job_id: receipt.jobId, sequence: receipt.sequence });
        } catch (error) {
            this.sendError(toServiceError(error));
        }
    }

    private async deliver(outcome: ChunkOutcome): Promise<void> {
        if (outcome.kind === 'error') {
            await this.transport.sendJson({
                type: 'error',
                code: outcome.error.code,
                message: outcome.error.message,
                job_id: outcome.jobId,
                sequence: outcome.sequence,
            });
            return;
        }

        const video = await fs.promises.readFile(outcome.artifact.path);
        await this.transport.sendJson({
            type: 'video_chunk',
            video_data: video.toString('base64'),
            job_id: outcome.jobId,
            sequence: outcome.sequence,
            output_name: outcome.artifact.outputName,
            timestamp: Date.now() / 1000,
        });
    }

    private closeMalformed(reason: string): void {
        this.sendError(new InvalidInputError(`Malformed initialize_avatar: ${reason}`));
        this.transport.close(CLOSE_POLICY_VIOLATION, 'Malformed initialize_avatar');
    }

    private sendStatus(): void {
        this.send({ type: 'status', ...this.session.status() });
    }

    private sendError(error: ServiceError): void {
        this.send({ type: 'error', code: error.code, message: error.message });
    }

    private send(message: Parameters<WsTransport['sendJson']>[0]): void {
        this.transport.sendJson(message).catch((error) => {
            console.warn(`[Stream] Send to ${this.clientId} failed:`, error);
        });
    }
}

function isStatusRequest(raw: string): boolean {
    let message: unknown;
    try {
        message = JSON.parse(raw);
    } catch {
        return false;
    }
    return validateEnvelope(message) && message.type === 'get_status';
}
