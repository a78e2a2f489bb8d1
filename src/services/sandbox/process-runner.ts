// src/services/sandbox/process-runner.ts

import { spawn } from 'child_process';
import os from 'os';

export interface ProcessSpec {
    command: string;
    args: string[];
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    timeoutMs?: number;
    signal?: AbortSignal;
    /** Per stream. Bytes past the cap are dropped. */
    maxOutputBytes?: number;
}

export interface ProcessResult {
    stdout: string;
    stderr: string;
    exitCode: number;
    timedOut: boolean;
}

export type ProcessRunner = (spec: ProcessSpec) => Promise<ProcessResult>;

export const EXIT_LAUNCH_FAILED = 127;
export const EXIT_KILLED = 124;
const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

class CappedBuffer {
    private readonly chunks: Buffer[] = [];
    private size = 0;
    private truncated = false;

    constructor(private readonly limit: number) {}

    push(chunk: Buffer): void {
        const room = this.limit - this.size;
        if (room <= 0) {
            this.truncated = this.truncated || chunk.length > 0;
            return;
        }
        if (chunk.length > room) {
            this.chunks.push(chunk.subarray(0, room));
            this.size += room;
            this.truncated = true;
            return;
        }
        this.chunks.push(chunk);
        this.size += chunk.length;
    }

    toString(): string {
        const text = Buffer.concat(this.chunks).toString('utf8');
        return this.truncated ? `${text}\n[output truncated after ${this.limit} bytes]` : text;
    }
}

/**
 * Spawns a process and waits for it to exit, capturing both output streams.
 * Never rejects: launch failures, timeouts and aborts are reported through the exit code.
 */
export const runProcess: ProcessRunner = (spec) =>
    new Promise((resolve) => {
        const limit = spec.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
        const stdout = new CappedBuffer(limit);
        const stderr = new CappedBuffer(limit);
        let settled = false;
        let killReason: string | undefined;
        let timedOut = false;
        let timer: ReturnType<typeof setTimeout> | undefined;

        const child = spawn(spec.command, spec.args, {
            cwd: spec.cwd,
            env: spec.env,
            stdio: ['ignore', 'pipe', 'pipe'],
        });

        const kill = (reason: string) => {
            if (killReason !== undefined) return;
            killReason = reason;
            child.kill('SIGKILL');
        };
        const onAbort = () => kill('aborted');

        const finish = (result: Omit<ProcessResult, 'timedOut'>) => {
            if (settled) return;
            settled = true;
            if (timer) clearTimeout(timer);
            spec.signal?.removeEventListener('abort', onAbort);
            resolve({ ...result, timedOut });
        };

        child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

        if (spec.timeoutMs !== undefined) {
            const timeoutMs = spec.timeoutMs;
            timer = setTimeout(() => {
                timedOut = true;
                kill(`timed out after ${timeoutMs}ms`);
            }, timeoutMs);
        }
        if (spec.signal) {
            if (spec.signal.aborted) {
                onAbort();
            } else {
                spec.signal.addEventListener('abort', onAbort, { once: true });
            }
        }

        child.on('error', (error) => {
            finish({
                stdout: stdout.toString(),
                stderr: `${stderr.toString()}${error.message}`,
                exitCode: EXIT_LAUNCH_FAILED,
            });
        });

        child.on('close', (code, signal) => {
            if (killReason !== undefined) {
                finish({
                    stdout: stdout.toString(),
                    stderr: `${stderr.toString()}\n[process killed: ${killReason}]`,
                    exitCode: EXIT_KILLED,
                });
                return;
            }
            let exitCode = code ?? 1;
            if (code === null && signal) {
                exitCode = 128 + os.constants.signals[signal];
            }
            finish({ stdout: stdout.toString(), stderr: stderr.toString(), exitCode });
        });
    });
