import path from 'path';
import { detectAcceleratorCount, getConfig, loadConfig, resetConfig, validateConfig } from '../../src/config/index';

describe('ConfigLoader', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        process.env = { ...originalEnv };
        delete process.env.ACCELERATOR_COUNT;
        delete process.env.CUDA_VISIBLE_DEVICES;
        delete process.env.MAX_CONCURRENT_JOBS;
        delete process.env.PORT;
        delete process.env.PREPARING_POLICY;
        resetConfig();
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    it('should strip quotes and whitespace from environment variables', () => {
        process.env.INFERENCE_COMMAND = '  "/opt/engine/bin/python"  ';
        process.env.STREAMING_PATH = "'/live'";

        const config = loadConfig();
        expect(config.inference.command).toBe('/opt/engine/bin/python');
        expect(config.streaming.path).toBe('/live');
    });

    it('should handle numeric variables with quotes', () => {
        process.env.PORT = '"4000"';

        expect(loadConfig().port).toBe(4000);
    });

    it('should reject non-numeric numbers', () => {
        process.env.MAX_QUEUED_JOBS = 'lots';

        expect(() => loadConfig()).toThrow('Environment variable MAX_QUEUED_JOBS must be a number, got: lots');
    });

    it('should build the engine module arguments', () => {
        process.env.INFERENCE_MODULE = 'engine.generate';

        const config = loadConfig();
        expect(config.inference.generateArgs).toEqual(['-m', 'engine.generate']);
        expect(config.inference.prepareArgs[0]).toBe('-m');
    });

    it('should resolve the work dir to an absolute path', () => {
        process.env.WORK_DIR = './scratch';

        expect(loadConfig().workDir).toBe(path.resolve('./scratch'));
    });

    it('should default concurrency to the detected accelerators', () => {
        process.env.CUDA_VISIBLE_DEVICES = '0,1,2';

        const config = loadConfig();
        expect(config.scheduling.acceleratorCount).toBe(3);
        expect(config.scheduling.maxConcurrentJobs).toBe(3);
    });

    it('should let MAX_CONCURRENT_JOBS override the accelerator count', () => {
        process.env.CUDA_VISIBLE_DEVICES = '0,1';
        process.env.MAX_CONCURRENT_JOBS = '1';

        expect(loadConfig().scheduling.maxConcurrentJobs).toBe(1);
    });

    it('should only accept queue as the alternative preparing policy', () => {
        process.env.PREPARING_POLICY = 'queue';
        expect(loadConfig().scheduling.preparingPolicy).toBe('queue');

        process.env.PREPARING_POLICY = 'whatever';
        expect(loadConfig().scheduling.preparingPolicy).toBe('reject');
    });

    it('should cache the loaded config until reset', () => {
        process.env.PORT = '4100';
        const first = getConfig();
        process.env.PORT = '4200';

        expect(getConfig()).toBe(first);
        resetConfig();
        expect(getConfig().port).toBe(4200);
    });

    describe('detectAcceleratorCount', () => {
        it('should prefer ACCELERATOR_COUNT', () => {
            expect(detectAcceleratorCount({ ACCELERATOR_COUNT: '4', CUDA_VISIBLE_DEVICES: '0' })).toBe(4);
        });

        it('should count visible devices and ignore -1', () => {
            expect(detectAcceleratorCount({ CUDA_VISIBLE_DEVICES: '0, 2' })).toBe(2);
            expect(detectAcceleratorCount({ CUDA_VISIBLE_DEVICES: '-1' })).toBe(1);
        });

        it('should fall back to one', () => {
            expect(detectAcceleratorCount({ ACCELERATOR_COUNT: 'zero' })).toBe(1);
            expect(detectAcceleratorCount({})).toBe(1);
        });
    });

    describe('validateConfig', () => {
        it('should accept the defaults', () => {
            expect(validateConfig(loadConfig())).toEqual([]);
        });

        it('should report every out-of-range value', () => {
            const config = loadConfig();
            const errors = validateConfig({
                ...config,
                port: 70000,
                scheduling: { ...config.scheduling, maxConcurrentJobs: 0, degradedFailureThreshold: -1 },
                streaming: { ...config.streaming, path: 'stream', channels: 6 },
            });

            expect(errors).toEqual([
                'PORT must be an integer between 0 and 65535, got 70000',
                'MAX_CONCURRENT_JOBS must be a positive integer',
                'DEGRADED_FAILURE_THRESHOLD cannot be negative (use 0 to disable)',
                'STREAMING_PATH must start with "/"',
                'STREAM_CHANNELS must be 1 or 2',
            ]);
        });
    });
});
