import { spawn } from 'child_process';
import fs from 'fs';
import path from 'path';
import YAML from 'yaml';
import { Avatar, AvatarVersion } from '../../domain/entities/Avatar';
import { AudioUnit } from '../../domain/entities/AudioUnit';
import {
    InvokerCrashedError,
    InvokerTimeoutError,
    OutputMissingError,
} from '../../domain/errors/ServiceError';
import {
    IInferenceInvoker,
    InvocationOptions,
    InvocationResult,
    PrepareOptions,
} from '../../domain/ports/IInferenceInvoker';
import { createSilentWav } from '../../domain/services/WavContainer';
import { ModelWeights } from '../../config';
import { ProcessRegistry } from './ProcessRegistry';

const STDERR_TAIL_BYTES = 4000;

export interface SubprocessInvokerOptions {
    command: string;
    /** Placed before the fixed argument contract when generating */
    generateArgs: string[];
    /** Placed before the fixed argument contract when preparing an avatar */
    prepareArgs: string[];
    /** Working directory of the engine */
    projectPath: string;
    /** Parent of the per-invocation working directories */
    jobsDir: string;
    batchSize: number;
    useFloat16: boolean;
    timeoutMs: number;
    prepareTimeoutMs: number;
    killGraceMs: number;
    weights: Record<AvatarVersion, ModelWeights>;
}

/**
 * Runs the external audio-to-video engine as a child process.
 *
 * Every generation gets its own working directory holding the audio, the YAML
 * task file and the results, so concurrent invocations never share files.
 */
export class SubprocessInferenceInvoker implements IInferenceInvoker {
    private readonly processes = new ProcessRegistry();

    constructor(private readonly options: SubprocessInvokerOptions) {}

    async prepare(avatar: Avatar, options: PrepareOptions = {}): Promise<void> {
        await fs.promises.mkdir(avatar.cacheDir, { recursive: true });

        // Preparation mode needs an audio clip to accept the task
        const silencePath = path.join(avatar.cacheDir, 'preparation_silence.wav');
        await fs.promises.writeFile(silencePath, createSilentWav(1));

        const task = {
            [avatar.avatarId]: {
                preparation: true,
                video_path: avatar.sourceVideoPath,
                bbox_shift: 0,
                audio_clips: { dummy: silencePath },
            },
        };
        const configPath = path.join(avatar.cacheDir, 'preparation.yaml');
        await fs.promises.writeFile(configPath, YAML.stringify(task));

        const args = [
            ...this.options.prepareArgs,
            ...this.contractArgs(avatar.version, configPath, avatar.cacheDir),
        ];
        console.log(`[Invoker] Preparing avatar ${avatar.avatarId} (${avatar.version})`);
        await this.spawnEngine(args, options.timeoutMs ?? this.options.prepareTimeoutMs, `prepare:${avatar.avatarId}`);
    }

    async run(avatar: Avatar, audio: AudioUnit, options: InvocationOptions): Promise<InvocationResult> {
        const startTime = Date.now();
        await fs.promises.mkdir(this.options.jobsDir, { recursive: true });
        const workDir = await fs.promises.mkdtemp(path.join(this.options.jobsDir, `${avatar.avatarId}_`));

        try {
            const audioPath = path.join(workDir, `input.${audio.format}`);
            await fs.promises.writeFile(audioPath, audio.data);

            const resultDir = path.join(workDir, 'results');
            await fs.promises.mkdir(resultDir, { recursive: true });

            const entry: Record<string, string | number> = {
                video_path: avatar.sourceVideoPath,
                audio_path: audioPath,
                result_name: `${options.outputName}.mp4`,
            };
            if (avatar.version === 'v1') {
                entry.bbox_shift = 0;
            }
            const configPath = path.join(workDir, 'inference.yaml');
            await fs.promises.writeFile(configPath, YAML.stringify({ task_0: entry }));

            const args = [
                ...this.options.generateArgs,
                ...this.contractArgs(avatar.version, configPath, resultDir),
            ];
            await this.spawnEngine(args, options.timeoutMs ?? this.options.timeoutMs, `generate:${options.outputName}`);

            const artifactPath = path.join(resultDir, avatar.version, `${options.outputName}.mp4`);
            if (!(await fileExists(artifactPath))) {
                throw new OutputMissingError(artifactPath);
            }

            const durationMs = Date.now() - startTime;
            console.log(`[Invoker] Generated ${path.basename(artifactPath)} in ${(durationMs / 1000).toFixed(1)}s`);
            return { artifactPath, workDir, durationMs };
        } catch (error) {
            await fs.promises.rm(workDir, { recursive: true, force: true });
            throw error;
        }
    }

    async release(result: InvocationResult): Promise<void> {
        await fs.promises.rm(result.workDir, { recursive: true, force: true });
    }

    async shutdown(): Promise<void> {
        if (this.processes.size > 0) {
            console.log(`[Invoker] Terminating ${this.processes.size} engine process(es)`);
        }
        await this.processes.terminateAll(this.options.killGraceMs);
    }

    get activeProcessCount(): number {
        return this.processes.size;
    }

    private contractArgs(version: AvatarVersion, configPath: string, resultDir: string): string[] {
        const weights = this.options.weights[version];
        const args = [
            '--inference_config', configPath,
            '--version', version,
            '--result_dir', resultDir,
            '--batch_size', String(this.options.batchSize),
            '--unet_model_path', weights.unetModelPath,
            '--unet_config', weights.unetConfigPath,
        ];
        if (this.options.useFloat16) {
            args.push('--use_float16');
        }
        return args;
    }

    /**
     * Resolves on exit code 0. Rejects only after the process is gone, so a timeout
     * never leaves an engine running.
     */
    private spawnEngine(args: string[], timeoutMs: number, label: string): Promise<void> {
        return new Promise((resolve, reject) => {
            const child = spawn(this.options.command, args, {
                cwd: this.options.projectPath,
                stdio: ['ignore', 'ignore', 'pipe'],
                detached: process.platform !== 'win32',
            });
            this.processes.register(child, label);

            let stderrTail = '';
            let timedOut = false;
            let settled = false;

            const timeoutId = setTimeout(() => {
                timedOut = true;
                console.warn(`[Invoker] ${label} exceeded ${timeoutMs / 1000}s, terminating`);
                this.processes.terminate(child, this.options.killGraceMs);
            }, timeoutMs);

            child.stderr?.on('data', (data: Buffer) => {
                stderrTail = (stderrTail + data.toString()).slice(-STDERR_TAIL_BYTES);
            });

            child.on('error', (err) => {
                clearTimeout(timeoutId);
                if (settled) return;
                settled = true;
                reject(new InvokerCrashedError(null, `Spawn error: ${err.message}`));
            });

            child.on('close', (code, signal) => {
                clearTimeout(timeoutId);
                if (settled) return;
                settled = true;

                if (timedOut) {
                    reject(new InvokerTimeoutError(timeoutMs));
                    return;
                }
                if (code !== 0) {
                    const detail = stderrTail.trim() || (signal ? `terminated by ${signal}` : '');
                    console.error(`[Invoker] ${label} exited with code ${code}`);
                    reject(new InvokerCrashedError(code, detail));
                    return;
                }
                resolve();
            });
        });
    }
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        const stats = await fs.promises.stat(filePath);
        return stats.isFile();
    } catch {
        return false;
    }
}
