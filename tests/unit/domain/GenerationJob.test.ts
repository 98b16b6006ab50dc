import {
    cancelJob,
    completeJob,
    createGenerationJob,
    failJob,
    isJobTerminal,
    startJob,
    toJobHandle,
} from '../../../src/domain/entities/GenerationJob';
import { createAvatar, toAvatarSummary, updateAvatarStatus } from '../../../src/domain/entities/Avatar';

const ref = { avatarId: 'demo', instanceId: 'instance-1' };

describe('GenerationJob', () => {
    it('should start queued and not detached', () => {
        const job = createGenerationJob('job_1', ref, 'audio_1', 'clip');

        expect(job.status).toBe('queued');
        expect(job.detached).toBe(false);
        expect(isJobTerminal(job)).toBe(false);
    });

    it('should reject an empty output name', () => {
        expect(() => createGenerationJob('job_1', ref, 'audio_1', '  ')).toThrow(
            'GenerationJob output name cannot be empty'
        );
    });

    it('should move through running to completed', () => {
        const running = startJob(createGenerationJob('job_1', ref, 'audio_1', 'clip'));
        expect(running.status).toBe('running');
        expect(running.startedAt).toBeInstanceOf(Date);

        const done = completeJob(running, '/tmp/clip.mp4');
        expect(done.status).toBe('completed');
        expect(done.artifactPath).toBe('/tmp/clip.mp4');
        expect(isJobTerminal(done)).toBe(true);
    });

    it('should record failure code and message', () => {
        const failed = failJob(createGenerationJob('job_1', ref, 'audio_1', 'clip'), 'INVOKER_TIMEOUT', 'too slow');

        expect(failed.error).toEqual({ code: 'INVOKER_TIMEOUT', message: 'too slow' });
        expect(isJobTerminal(failed)).toBe(true);
    });

    it('should treat cancelled as terminal', () => {
        expect(isJobTerminal(cancelJob(createGenerationJob('job_1', ref, 'audio_1', 'clip')))).toBe(true);
    });

    it('should hand out frozen handles', () => {
        const handle = toJobHandle(createGenerationJob('job_1', ref, 'audio_1', 'clip'));

        expect(handle).toEqual({ jobId: 'job_1', avatarId: 'demo' });
        expect(Object.isFrozen(handle)).toBe(true);
    });
});

describe('Avatar', () => {
    it('should reset failures and clear the last error when ready', () => {
        const avatar = {
            ...createAvatar('demo', 'instance-1', '/videos/demo.mp4', 'v15', '/cache/demo'),
            consecutiveFailures: 2,
            lastError: 'boom',
        };
        const ready = updateAvatarStatus(avatar, 'ready');

        expect(ready.consecutiveFailures).toBe(0);
        expect(ready.lastError).toBeUndefined();
        expect(ready.readyAt).toBeInstanceOf(Date);
    });

    it('should summarize with snake_case keys', () => {
        const avatar = createAvatar('demo', 'instance-1', '/videos/demo.mp4', 'v1', '/cache/demo');
        const summary = toAvatarSummary(updateAvatarStatus(avatar, 'failed', 'no face found'));

        expect(summary).toEqual({
            avatar_id: 'demo',
            version: 'v1',
            status: 'failed',
            video_path: '/videos/demo.mp4',
            consecutive_failures: 0,
            created_at: avatar.createdAt.toISOString(),
            last_error: 'no face found',
        });
    });

    it('should refuse an empty id', () => {
        expect(() => createAvatar(' ', 'instance-1', '/v.mp4', 'v15', '/c')).toThrow('Avatar id cannot be empty');
    });
});
