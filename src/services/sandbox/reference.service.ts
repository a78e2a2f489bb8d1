// src/services/sandbox/reference.service.ts

import { Console } from 'console';
import vm from 'vm';
import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { ReferenceOutcome } from '../../models/conversion.model';
import { describeError } from '../../utils/errors';

interface ReferenceSandboxConfig extends ServiceConfig {
    timeoutMs?: number;
}

const toText = (chunk: unknown): string => {
    if (typeof chunk === 'string') return chunk;
    if (chunk instanceof Uint8Array) return Buffer.from(chunk).toString('utf8');
    return String(chunk);
};

/**
 * Redirects process.stdout into a buffer while `body` runs.
 * The original writer is put back on every exit path.
 */
export function captureStdout<T>(body: () => T): { value: T; output: string } {
    const chunks: string[] = [];
    const originalWrite = process.stdout.write;

    process.stdout.write = (chunk: unknown, ...rest: unknown[]): boolean => {
        chunks.push(toText(chunk));
        const callback = rest.find((arg): arg is (error: Error | null) => void => typeof arg === 'function');
        callback?.(null);
        return true;
    };

    try {
        const value = body();
        return { value, output: chunks.join('') };
    } finally {
        process.stdout.write = originalWrite;
    }
}

/**
 * Runs the original JavaScript in a fresh vm context to get baseline output.
 * The context shares nothing with the harness except a console bound to the process streams.
 * Promise jobs run before evaluation returns, and a rejection nobody handled is the
 * program's error rather than the host's.
 */
export class ReferenceSandbox extends BaseService {
    private readonly timeoutMs?: number;

    constructor(config: ReferenceSandboxConfig) {
        super(config);
        this.timeoutMs = config.timeoutMs;
    }

    async evaluate(sourceText: string): Promise<ReferenceOutcome> {
        // Bound late: Console looks up stream.write on every call, so the capture sees it.
        const sandboxConsole = new Console({ stdout: process.stdout, stderr: process.stderr });
        const context = vm.createContext({ console: sandboxConsole }, { microtaskMode: 'afterEvaluate' });
        const sandboxPromise: unknown = vm.runInContext('Promise', context);
        const rejections: unknown[] = [];

        const onUnhandledRejection = (reason: unknown, promise: Promise<unknown>) => {
            if (typeof sandboxPromise === 'function' && promise instanceof sandboxPromise) {
                rejections.push(reason);
                return;
            }
            this.logFailure('error', 'Unhandled rejection outside the reference program', reason);
        };

        process.on('unhandledRejection', onUnhandledRejection);
        try {
            const outcome = this.run(sourceText, context);
            // Node reports unhandled rejections once the current tick has finished.
            await new Promise<void>((resolve) => setImmediate(resolve));
            if (outcome.error === undefined && rejections.length > 0) {
                this.logFailure('warn', 'Reference program left a promise rejected', rejections[0]);
                return { stdout: '', error: describeError(rejections[0]) };
            }
            return outcome;
        } finally {
            process.off('unhandledRejection', onUnhandledRejection);
        }
    }

    private run(sourceText: string, context: vm.Context): ReferenceOutcome {
        try {
            const { output } = captureStdout(() =>
                vm.runInContext(sourceText, context, { filename: 'reference.js', timeout: this.timeoutMs }),
            );
            this.logger.debug('Reference evaluation finished', { outputLength: output.length });
            return { stdout: output };
        } catch (error) {
            this.logFailure('warn', 'Reference evaluation raised', error);
            return { stdout: '', error: describeError(error) };
        }
    }
}
