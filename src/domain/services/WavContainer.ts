/**
 * Minimal RIFF/WAVE handling for 16-bit PCM. Streaming clients send raw PCM frames;
 * the inference engine wants a file it can decode, so chunks are wrapped here.
 */

export interface PcmFormat {
    sampleRate: number;
    channels: number;
    bitsPerSample?: number;
}

export interface WavInfo {
    sampleRate: number;
    channels: number;
    bitsPerSample: number;
    audioFormat: number;
    /** Byte length of the data chunk */
    dataBytes: number;
    durationSeconds: number;
}

const HEADER_BYTES = 44;
const PCM_FORMAT_TAG = 1;

export function encodeWav(pcm: Buffer, format: PcmFormat): Buffer {
    const bitsPerSample = format.bitsPerSample ?? 16;
    const blockAlign = format.channels * (bitsPerSample / 8);
    const byteRate = format.sampleRate * blockAlign;

    const header = Buffer.alloc(HEADER_BYTES);
    header.write('RIFF', 0, 'ascii');
    header.writeUInt32LE(36 + pcm.length, 4);
    header.write('WAVE', 8, 'ascii');
    header.write('fmt ', 12, 'ascii');
    header.writeUInt32LE(16, 16);
    header.writeUInt16LE(PCM_FORMAT_TAG, 20);
    header.writeUInt16LE(format.channels, 22);
    header.writeUInt32LE(format.sampleRate, 24);
    header.writeUInt32LE(byteRate, 28);
    header.writeUInt16LE(blockAlign, 32);
    header.writeUInt16LE(bitsPerSample, 34);
    header.write('data', 36, 'ascii');
    header.writeUInt32LE(pcm.length, 40);

    return Buffer.concat([header, pcm]);
}

export function isWavBuffer(data: Buffer): boolean {
    return data.length >= 12
        && data.toString('ascii', 0, 4) === 'RIFF'
        && data.toString('ascii', 8, 12) === 'WAVE';
}

/**
 * Reads the fmt and data chunks. Returns null when the buffer is not a usable WAV file.
 */
export function parseWavHeader(data: Buffer): WavInfo | null {
    if (!isWavBuffer(data)) {
        return null;
    }

    let offset = 12;
    let fmt: { audioFormat: number; channels: number; sampleRate: number; bitsPerSample: number } | null = null;
    let dataBytes: number | null = null;

    while (offset + 8 <= data.length) {
        const chunkId = data.toString('ascii', offset, offset + 4);
        const chunkSize = data.readUInt32LE(offset + 4);
        const body = offset + 8;

        if (chunkId === 'fmt ' && body + 16 <= data.length) {
            fmt = {
                audioFormat: data.readUInt16LE(body),
                channels: data.readUInt16LE(body + 2),
                sampleRate: data.readUInt32LE(body + 4),
                bitsPerSample: data.readUInt16LE(body + 14),
            };
        } else if (chunkId === 'data') {
            dataBytes = Math.min(chunkSize, data.length - body);
            break;
        }

        // Chunks are word aligned
        offset = body + chunkSize + (chunkSize % 2);
    }

    if (!fmt || dataBytes === null || fmt.channels === 0 || fmt.sampleRate === 0 || fmt.bitsPerSample === 0) {
        return null;
    }

    const bytesPerSecond = fmt.sampleRate * fmt.channels * (fmt.bitsPerSample / 8);
    return {
        ...fmt,
        dataBytes,
        durationSeconds: dataBytes / bytesPerSecond,
    };
}

export function createSilentWav(durationSeconds: number, sampleRate: number = 16000): Buffer {
    const samples = Math.round(durationSeconds * sampleRate);
    return encodeWav(Buffer.alloc(samples * 2), { sampleRate, channels: 1 });
}
