import Ajv, { ErrorObject, JSONSchemaType } from 'ajv';
import { AvatarVersion } from '../../domain/entities/Avatar';
import { StreamingSessionStatus } from '../../application/StreamingSession';

const ajv = new Ajv({ allErrors: true });

// =============================================================================
// CLIENT → SERVER
// =============================================================================

export interface ClientEnvelope {
    type: string;
}

export interface InitializeAvatarPayload {
    avatar_video_data?: string;
    avatar_id?: string;
    version?: string;
    replace?: boolean;
}

export interface AudioChunkPayload {
    audio_data: string;
    sample_rate?: number;
    channels?: number;
}

const ENVELOPE_SCHEMA: JSONSchemaType<ClientEnvelope> = {
    type: 'object',
    properties: {
        type: { type: 'string', minLength: 1 },
    },
    required: ['type'],
    additionalProperties: true,
};

const INITIALIZE_AVATAR_SCHEMA: JSONSchemaType<InitializeAvatarPayload> = {
    type: 'object',
    properties: {
        avatar_video_data: { type: 'string', nullable: true },
        avatar_id: { type: 'string', nullable: true, minLength: 1 },
        version: { type: 'string', nullable: true },
        replace: { type: 'boolean', nullable: true },
    },
    required: [],
    additionalProperties: true,
};

const AUDIO_CHUNK_SCHEMA: JSONSchemaType<AudioChunkPayload> = {
    type: 'object',
    properties: {
        audio_data: { type: 'string', minLength: 1 },
        sample_rate: { type: 'integer', nullable: true, minimum: 8000, maximum: 192000 },
        channels: { type: 'integer', nullable: true, minimum: 1, maximum: 2 },
    },
    required: ['audio_data'],
    additionalProperties: true,
};

export const validateEnvelope = ajv.compile(ENVELOPE_SCHEMA);
export const validateInitializeAvatar = ajv.compile(INITIALIZE_AVATAR_SCHEMA);
export const validateAudioChunk = ajv.compile(AUDIO_CHUNK_SCHEMA);

/**
 * Flattens ajv errors into one line for error messages.
 */
export function describeValidationErrors(errors: ErrorObject[] | null | undefined): string {
    if (!errors || errors.length === 0) {
        return 'invalid message';
    }
    return errors
        .map((error) => `${error.instancePath || 'message'} ${error.message ?? 'is invalid'}`)
        .join('; ');
}

// =============================================================================
// SERVER → CLIENT
// =============================================================================

export type ServerMessage =
    | { type: 'connection_established'; client_id: string; message: string }
    | { type: 'avatar_initialization_started'; avatar_id: string }
    | { type: 'avatar_ready'; avatar_id: string; version: AvatarVersion }
    | { type: 'audio_received'; job_id: string; sequence: number }
    | {
          type: 'video_chunk';
          video_data: string;
          job_id: string;
          sequence: number;
          output_name: string;
          timestamp: number;
      }
    | ({ type: 'status' } & StreamingSessionStatus)
    | { type: 'error'; code: string; message: string; job_id?: string; sequence?: number };

/**
 * Strict base64 decoding; null when the text is not base64 or decodes to nothing.
 */
export function decodeBase64(text: string): Buffer | null {
    const compact = text.replace(/\s+/g, '');
    if (compact.length === 0 || compact.length % 4 !== 0 || !/^[A-Za-z0-9+/]*={0,2}$/.test(compact)) {
        return null;
    }
    const decoded = Buffer.from(compact, 'base64');
    return decoded.length > 0 ? decoded : null;
}
