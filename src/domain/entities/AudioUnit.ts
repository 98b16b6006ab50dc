import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { InvalidInputError } from '../errors/ServiceError';
import { encodeWav, isWavBuffer, parseWavHeader } from '../services/WavContainer';

export type AudioFormat = 'wav' | 'mp3' | 'm4a' | 'flac' | 'ogg' | 'webm';

export const SUPPORTED_AUDIO_FORMATS: readonly AudioFormat[] = ['wav', 'mp3', 'm4a', 'flac', 'ogg', 'webm'];

/**
 * One bounded slice of audio submitted for generation: a whole uploaded file
 * (HTTP) or a fixed-duration chunk (stream). Frozen on construction.
 */
export interface AudioUnit {
    readonly id: string;
    /** Encoded file bytes, ready to be written to disk for the engine */
    readonly data: Buffer;
    readonly format: AudioFormat;
    /** Known for WAV input; compressed uploads are decoded by the engine itself */
    readonly sampleRate?: number;
    readonly channels?: number;
    readonly durationSeconds?: number;
    readonly source: 'upload' | 'stream';
    readonly createdAt: Date;
}

export interface StreamAudioOptions {
    /** Format assumed for raw PCM16 payloads */
    sampleRate: number;
    channels: number;
    /** Upper bound on a single chunk; longer chunks are rejected */
    maxDurationSeconds?: number;
}

const claimed = new WeakSet<AudioUnit>();

function freeze(unit: AudioUnit): AudioUnit {
    return Object.freeze(unit);
}

function checkDuration(durationSeconds: number, maxDurationSeconds?: number): void {
    if (maxDurationSeconds !== undefined && durationSeconds > maxDurationSeconds) {
        throw new InvalidInputError(
            `Audio chunk is ${durationSeconds.toFixed(2)}s long; the limit is ${maxDurationSeconds}s`
        );
    }
}

/**
 * Wraps raw little-endian PCM16 frames into a WAV audio unit.
 */
export function createAudioUnitFromPcm(pcm: Buffer, options: StreamAudioOptions): AudioUnit {
    if (pcm.length === 0) {
        throw new InvalidInputError('No audio data provided');
    }
    const blockAlign = options.channels * 2;
    if (pcm.length % blockAlign !== 0) {
        throw new InvalidInputError(
            `PCM payload of ${pcm.length} bytes is not a whole number of ${options.channels}-channel 16-bit frames`
        );
    }
    const durationSeconds = pcm.length / (options.sampleRate * blockAlign);
    checkDuration(durationSeconds, options.maxDurationSeconds);

    return freeze({
        id: `audio_${uuidv4().substring(0, 8)}`,
        data: encodeWav(Buffer.from(pcm), { sampleRate: options.sampleRate, channels: options.channels }),
        format: 'wav',
        sampleRate: options.sampleRate,
        channels: options.channels,
        durationSeconds,
        source: 'stream',
        createdAt: new Date(),
    });
}

/**
 * Builds a unit from a decoded stream payload. Payloads that already carry a WAV
 * header are kept as they are; anything else is treated as raw PCM16.
 */
export function createAudioUnitFromStreamPayload(payload: Buffer, options: StreamAudioOptions): AudioUnit {
    if (!isWavBuffer(payload)) {
        return createAudioUnitFromPcm(payload, options);
    }

    const info = parseWavHeader(payload);
    if (!info || info.dataBytes === 0) {
        throw new InvalidInputError('Audio chunk has a malformed or empty WAV container');
    }
    checkDuration(info.durationSeconds, options.maxDurationSeconds);

    return freeze({
        id: `audio_${uuidv4().substring(0, 8)}`,
        data: Buffer.from(payload),
        format: 'wav',
        sampleRate: info.sampleRate,
        channels: info.channels,
        durationSeconds: info.durationSeconds,
        source: 'stream',
        createdAt: new Date(),
    });
}

function isAudioFormat(value: string): value is AudioFormat {
    return (SUPPORTED_AUDIO_FORMATS as readonly string[]).includes(value);
}

export function audioFormatFromFilename(filename: string): AudioFormat | null {
    const ext = path.extname(filename).toLowerCase().replace('.', '');
    const normalized = ext === 'oga' ? 'ogg' : ext;
    return isAudioFormat(normalized) ? normalized : null;
}

/**
 * Builds a unit from an uploaded audio file.
 */
export function createAudioUnitFromFile(data: Buffer, filename: string): AudioUnit {
    if (data.length === 0) {
        throw new InvalidInputError('Uploaded audio file is empty');
    }
    const format = audioFormatFromFilename(filename);
    if (!format) {
        throw new InvalidInputError(
            `Unsupported audio format: ${filename}. Supported: ${SUPPORTED_AUDIO_FORMATS.join(', ')}`
        );
    }

    if (format === 'wav') {
        const info = parseWavHeader(data);
        if (!info) {
            throw new InvalidInputError(`${filename} is not a valid WAV file`);
        }
        return freeze({
            id: `audio_${uuidv4().substring(0, 8)}`,
            data,
            format,
            sampleRate: info.sampleRate,
            channels: info.channels,
            durationSeconds: info.durationSeconds,
            source: 'upload',
            createdAt: new Date(),
        });
    }

    return freeze({
        id: `audio_${uuidv4().substring(0, 8)}`,
        data,
        format,
        source: 'upload',
        createdAt: new Date(),
    });
}

/**
 * Marks a unit as taken by a generation job. Each unit may feed exactly one job.
 */
export function claimAudioUnit(unit: AudioUnit): void {
    if (claimed.has(unit)) {
        throw new InvalidInputError(`Audio unit ${unit.id} has already been submitted`);
    }
    claimed.add(unit);
}

export function isAudioUnitClaimed(unit: AudioUnit): boolean {
    return claimed.has(unit);
}
