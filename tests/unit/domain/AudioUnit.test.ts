import {
    audioFormatFromFilename,
    claimAudioUnit,
    createAudioUnitFromFile,
    createAudioUnitFromPcm,
    createAudioUnitFromStreamPayload,
    isAudioUnitClaimed,
} from '../../../src/domain/entities/AudioUnit';
import { InvalidInputError } from '../../../src/domain/errors/ServiceError';
import { encodeWav } from '../../../src/domain/services/WavContainer';
import { createPcm } from '../../helpers/testConfig';

const STREAM_FORMAT = { sampleRate: 16000, channels: 1 };

describe('AudioUnit', () => {
    describe('createAudioUnitFromPcm', () => {
        it('should wrap PCM frames into a WAV unit', () => {
            const unit = createAudioUnitFromPcm(createPcm(0.5), STREAM_FORMAT);

            expect(unit.format).toBe('wav');
            expect(unit.source).toBe('stream');
            expect(unit.durationSeconds).toBe(0.5);
            expect(unit.data.length).toBe(44 + 16000);
            expect(unit.data.toString('ascii', 0, 4)).toBe('RIFF');
            expect(unit.id).toMatch(/^audio_[0-9a-f]{8}$/);
        });

        it('should be frozen', () => {
            const unit = createAudioUnitFromPcm(createPcm(0.1), STREAM_FORMAT);
            expect(Object.isFrozen(unit)).toBe(true);
        });

        it('should reject empty payloads', () => {
            expect(() => createAudioUnitFromPcm(Buffer.alloc(0), STREAM_FORMAT)).toThrow(InvalidInputError);
        });

        it('should reject a partial frame', () => {
            expect(() => createAudioUnitFromPcm(Buffer.alloc(3), STREAM_FORMAT)).toThrow(
                'PCM payload of 3 bytes is not a whole number of 1-channel 16-bit frames'
            );
        });

        it('should reject chunks longer than the limit', () => {
            expect(() =>
                createAudioUnitFromPcm(createPcm(3), { ...STREAM_FORMAT, maxDurationSeconds: 2 })
            ).toThrow('Audio chunk is 3.00s long; the limit is 2s');
        });
    });

    describe('createAudioUnitFromStreamPayload', () => {
        it('should keep WAV payloads as they are', () => {
            const wav = encodeWav(createPcm(1, 8000), { sampleRate: 8000, channels: 1 });
            const unit = createAudioUnitFromStreamPayload(wav, STREAM_FORMAT);

            expect(unit.data.equals(wav)).toBe(true);
            expect(unit.sampleRate).toBe(8000);
            expect(unit.durationSeconds).toBe(1);
        });

        it('should treat everything else as PCM', () => {
            const unit = createAudioUnitFromStreamPayload(createPcm(0.25), STREAM_FORMAT);

            expect(unit.data.length).toBe(44 + 8000);
            expect(unit.sampleRate).toBe(16000);
        });

        it('should reject an empty WAV container', () => {
            const wav = encodeWav(Buffer.alloc(0), { sampleRate: 16000, channels: 1 });
            expect(() => createAudioUnitFromStreamPayload(wav, STREAM_FORMAT)).toThrow(
                'Audio chunk has a malformed or empty WAV container'
            );
        });
    });

    describe('createAudioUnitFromFile', () => {
        it('should accept compressed uploads by extension', () => {
            const unit = createAudioUnitFromFile(Buffer.from('ID3 fake mp3'), 'speech.MP3');

            expect(unit.format).toBe('mp3');
            expect(unit.source).toBe('upload');
            expect(unit.durationSeconds).toBeUndefined();
        });

        it('should reject unsupported extensions', () => {
            expect(() => createAudioUnitFromFile(Buffer.from('x'), 'notes.txt')).toThrow(
                'Unsupported audio format: notes.txt. Supported: wav, mp3, m4a, flac, ogg, webm'
            );
        });

        it('should reject a .wav file that is not WAV', () => {
            expect(() => createAudioUnitFromFile(Buffer.from('plain text'), 'speech.wav')).toThrow(
                'speech.wav is not a valid WAV file'
            );
        });

        it('should map .oga to ogg', () => {
            expect(audioFormatFromFilename('voice.oga')).toBe('ogg');
            expect(audioFormatFromFilename('voice')).toBeNull();
        });
    });

    describe('claimAudioUnit', () => {
        it('should allow each unit to be claimed once', () => {
            const unit = createAudioUnitFromPcm(createPcm(0.1), STREAM_FORMAT);

            expect(isAudioUnitClaimed(unit)).toBe(false);
            claimAudioUnit(unit);
            expect(isAudioUnitClaimed(unit)).toBe(true);
            expect(() => claimAudioUnit(unit)).toThrow(`Audio unit ${unit.id} has already been submitted`);
        });
    });
});
