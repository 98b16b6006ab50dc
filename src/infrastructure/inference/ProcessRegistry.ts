import type { ChildProcess } from 'child_process';

interface TrackedProcess {
    child: ChildProcess;
    name: string;
    exited: Promise<void>;
}

const isPosix = process.platform !== 'win32';

/**
 * Tracks live engine processes so timeouts and shutdown can terminate them.
 * Children are expected to be spawned detached so their whole process group
 * can be signalled.
 */
export class ProcessRegistry {
    private active: Map<number, TrackedProcess> = new Map();

    register(child: ChildProcess, name: string): void {
        const pid = child.pid;
        if (typeof pid !== 'number' || pid <= 0) {
            return;
        }
        const exited = new Promise<void>((resolve) => {
            child.once('exit', () => {
                this.active.delete(pid);
                resolve();
            });
        });
        this.active.set(pid, { child, name, exited });
    }

    /**
     * SIGTERM now, SIGKILL after the grace period if the process is still there.
     */
    terminate(child: ChildProcess, graceMs: number): void {
        const pid = child.pid;
        if (typeof pid !== 'number') return;

        sendSignal(child, 'SIGTERM');
        const timer = setTimeout(() => {
            if (child.exitCode === null && child.signalCode === null) {
                console.warn(`[Invoker] Process ${pid} ignored SIGTERM, sending SIGKILL`);
                sendSignal(child, 'SIGKILL');
            }
        }, graceMs);
        timer.unref();
        child.once('exit', () => clearTimeout(timer));
    }

    /**
     * Terminates every tracked process and waits for all of them to exit.
     */
    async terminateAll(graceMs: number): Promise<void> {
        const tracked = Array.from(this.active.entries());
        for (const [pid, { child, name }] of tracked) {
            console.log(`[Invoker] Killing engine process: ${name} (pid=${pid})`);
            this.terminate(child, graceMs);
        }
        await Promise.all(tracked.map(([, { exited }]) => exited));
    }

    get size(): number {
        return this.active.size;
    }
}

function sendSignal(child: ChildProcess, signal: NodeJS.Signals): void {
    const pid = child.pid;
    try {
        // Negative pid addresses the whole process group
        if (isPosix && typeof pid === 'number' && pid > 0) {
            process.kill(-pid, signal);
        } else {
            child.kill(signal);
        }
    } catch (error) {
        if (isNoSuchProcess(error)) return;
        console.warn(`[Invoker] Failed to send ${signal} to process ${pid}:`, error);
        child.kill(signal);
    }
}

function isNoSuchProcess(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ESRCH';
}
