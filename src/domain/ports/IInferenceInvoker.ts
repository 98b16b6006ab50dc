import { Avatar } from '../entities/Avatar';
import { AudioUnit } from '../entities/AudioUnit';

export interface PrepareOptions {
    /** Deadline for the preparation process */
    timeoutMs?: number;
}

export interface InvocationOptions {
    /** Base name of the video to produce */
    outputName: string;
    /** Deadline for the generation process */
    timeoutMs?: number;
}

/**
 * Outcome of one successful engine invocation.
 */
export interface InvocationResult {
    /** Path of the produced video */
    artifactPath: string;
    /** Isolated directory owned by this invocation; removed by release() */
    workDir: string;
    durationMs: number;
}

/**
 * IInferenceInvoker - Port for the external audio-to-video engine.
 * Implementations: SubprocessInferenceInvoker
 *
 * Failures surface as InvokerTimeoutError, InvokerCrashedError or OutputMissingError.
 */
export interface IInferenceInvoker {
    /**
     * Runs the engine's one-time preparation for an avatar, writing its cache
     * into avatar.cacheDir.
     */
    prepare(avatar: Avatar, options?: PrepareOptions): Promise<void>;

    /**
     * Generates one video from one audio unit.
     */
    run(avatar: Avatar, audio: AudioUnit, options: InvocationOptions): Promise<InvocationResult>;

    /**
     * Deletes everything an invocation left behind.
     */
    release(result: InvocationResult): Promise<void>;

    /**
     * Terminates any engine process still running.
     */
    shutdown(): Promise<void>;
}
