import dotenv from 'dotenv';
import path from 'path';
import { AvatarVersion } from '../domain/entities/Avatar';

// Load environment variables
dotenv.config();

/**
 * What happens when a job is submitted for an avatar that is still preparing.
 * - 'reject': fail with AvatarNotReady
 * - 'queue': accept and hold the job until preparation settles
 */
export type PreparingPolicy = 'reject' | 'queue';

export interface ModelWeights {
    unetModelPath: string;
    unetConfigPath: string;
}

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    corsOrigins: string[];
    /** Root for uploads, avatar caches and per-job working directories */
    workDir: string;
    uploadMaxBytes: number;
    /** Audio files accepted by one /generate_video_batch request */
    batchMaxFiles: number;

    // External inference engine
    inference: {
        command: string;
        /** Arguments placed before the fixed contract for generation, e.g. ['-m', 'scripts.inference'] */
        generateArgs: string[];
        /** Arguments placed before the fixed contract for avatar preparation */
        prepareArgs: string[];
        /** Working directory of the engine process */
        projectPath: string;
        batchSize: number;
        useFloat16: boolean;
        timeoutMs: number;
        prepareTimeoutMs: number;
        killGraceMs: number;
        weights: Record<AvatarVersion, ModelWeights>;
    };

    // Scheduling
    scheduling: {
        acceleratorCount: number;
        maxConcurrentJobs: number;
        maxQueuedJobs: number;
        /** Consecutive failures before an avatar is degraded; 0 disables */
        degradedFailureThreshold: number;
        preparingPolicy: PreparingPolicy;
    };

    // Streaming transport
    streaming: {
        path: string;
        maxPendingChunks: number;
        maxPayloadBytes: number;
        sampleRate: number;
        channels: number;
        maxChunkSeconds: number;
    };
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return getEnvVar(key).toLowerCase() === 'true';
}

function getEnvVarList(key: string, defaultValue: string[]): string[] {
    const value = process.env[key];
    if (value === undefined) {
        return defaultValue;
    }
    return getEnvVar(key)
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

/**
 * Number of accelerators this process may use: ACCELERATOR_COUNT if set,
 * otherwise the devices listed in CUDA_VISIBLE_DEVICES, otherwise 1.
 */
export function detectAcceleratorCount(env: NodeJS.ProcessEnv = process.env): number {
    const explicit = env.ACCELERATOR_COUNT;
    if (explicit !== undefined && explicit.trim() !== '') {
        const parsed = parseInt(explicit.trim(), 10);
        if (!isNaN(parsed) && parsed > 0) {
            return parsed;
        }
    }

    const visible = env.CUDA_VISIBLE_DEVICES;
    if (visible !== undefined) {
        const devices = visible
            .split(',')
            .map((device) => device.trim())
            .filter((device) => device !== '' && device !== '-1');
        if (devices.length > 0) {
            return devices.length;
        }
    }

    return 1;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    const acceleratorCount = detectAcceleratorCount();

    return {
        // Server
        port: getEnvVarNumber('PORT', 5000),
        environment: getEnvVar('NODE_ENV', 'development'),
        corsOrigins: getEnvVarList('CORS_ORIGINS', ['*']),
        workDir: path.resolve(getEnvVar('WORK_DIR', './data')),
        uploadMaxBytes: getEnvVarNumber('UPLOAD_MAX_BYTES', 200 * 1024 * 1024),
        batchMaxFiles: getEnvVarNumber('BATCH_MAX_FILES', 16),

        // External inference engine
        inference: {
            command: getEnvVar('INFERENCE_COMMAND', 'python'),
            generateArgs: ['-m', getEnvVar('INFERENCE_MODULE', 'scripts.inference')],
            prepareArgs: ['-m', getEnvVar('PREPARE_MODULE', 'scripts.realtime_inference')],
            projectPath: path.resolve(getEnvVar('INFERENCE_PROJECT_PATH', '.')),
            batchSize: getEnvVarNumber('INFERENCE_BATCH_SIZE', 8),
            useFloat16: getEnvVarBoolean('INFERENCE_USE_FLOAT16', false),
            timeoutMs: getEnvVarNumber('INFERENCE_TIMEOUT_MS', 120000), // 2 minutes per inference
            prepareTimeoutMs: getEnvVarNumber('PREPARE_TIMEOUT_MS', 300000), // 5 minutes
            killGraceMs: getEnvVarNumber('PROCESS_KILL_GRACE_MS', 5000),
            weights: {
                v15: {
                    unetModelPath: getEnvVar('V15_UNET_MODEL_PATH', 'models/musetalkV15/unet.pth'),
                    unetConfigPath: getEnvVar('V15_UNET_CONFIG', 'models/musetalkV15/musetalk.json'),
                },
                v1: {
                    unetModelPath: getEnvVar('V1_UNET_MODEL_PATH', 'models/musetalk/pytorch_model.bin'),
                    unetConfigPath: getEnvVar('V1_UNET_CONFIG', 'models/musetalk/musetalk.json'),
                },
            },
        },

        // Scheduling
        scheduling: {
            acceleratorCount,
            maxConcurrentJobs: getEnvVarNumber('MAX_CONCURRENT_JOBS', acceleratorCount),
            maxQueuedJobs: getEnvVarNumber('MAX_QUEUED_JOBS', 64),
            degradedFailureThreshold: getEnvVarNumber('DEGRADED_FAILURE_THRESHOLD', 3),
            preparingPolicy: getEnvVar('PREPARING_POLICY', 'reject') === 'queue' ? 'queue' : 'reject',
        },

        // Streaming transport
        streaming: {
            path: getEnvVar('STREAMING_PATH', '/stream'),
            maxPendingChunks: getEnvVarNumber('STREAM_MAX_PENDING_CHUNKS', 8),
            maxPayloadBytes: getEnvVarNumber('STREAM_MAX_PAYLOAD_BYTES', 50 * 1024 * 1024), // 50MB for video data
            sampleRate: getEnvVarNumber('STREAM_SAMPLE_RATE', 16000),
            channels: getEnvVarNumber('STREAM_CHANNELS', 1),
            maxChunkSeconds: getEnvVarNumber('STREAM_MAX_CHUNK_SECONDS', 30),
        },
    };
}

/**
 * Validates value ranges. Returns one message per problem.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
        errors.push(`PORT must be an integer between 0 and 65535, got ${config.port}`);
    }
    if (!config.inference.command) {
        errors.push('INFERENCE_COMMAND is required to run the inference engine');
    }
    if (!Number.isInteger(config.inference.batchSize) || config.inference.batchSize < 1) {
        errors.push('INFERENCE_BATCH_SIZE must be a positive integer');
    }
    if (config.inference.timeoutMs <= 0 || config.inference.prepareTimeoutMs <= 0) {
        errors.push('INFERENCE_TIMEOUT_MS and PREPARE_TIMEOUT_MS must be positive');
    }
    if (!Number.isInteger(config.scheduling.maxConcurrentJobs) || config.scheduling.maxConcurrentJobs < 1) {
        errors.push('MAX_CONCURRENT_JOBS must be a positive integer');
    }
    if (!Number.isInteger(config.batchMaxFiles) || config.batchMaxFiles < 1) {
        errors.push('BATCH_MAX_FILES must be a positive integer');
    }
    if (config.scheduling.maxQueuedJobs < 1) {
        errors.push('MAX_QUEUED_JOBS must be at least 1');
    }
    if (config.scheduling.degradedFailureThreshold < 0) {
        errors.push('DEGRADED_FAILURE_THRESHOLD cannot be negative (use 0 to disable)');
    }
    if (!config.streaming.path.startsWith('/')) {
        errors.push('STREAMING_PATH must start with "/"');
    }
    if (config.streaming.maxPendingChunks < 1) {
        errors.push('STREAM_MAX_PENDING_CHUNKS must be at least 1');
    }
    if (![1, 2].includes(config.streaming.channels)) {
        errors.push('STREAM_CHANNELS must be 1 or 2');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
