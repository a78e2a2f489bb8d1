// src/services/sandbox/compile-execute.service.ts

import path from 'path';
import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type {
    ArtifactRecord,
    CompileOutcome,
    ConversionState,
    ExecutionOutcome,
    VerificationReport,
} from '../../models/conversion.model';
import { runProcess, type ProcessRunner } from './process-runner';

export interface ToolchainConfig {
    compiler: string;
    flags: string[];
    binaryName: string;
}

export type SandboxStage = Extract<
    ConversionState,
    'compiling' | 'compile-failed' | 'compiled' | 'executing' | 'runtime-failed' | 'completed'
>;

export interface StageOptions {
    signal?: AbortSignal;
}

export interface RunOptions extends StageOptions {
    onStage?: (stage: SandboxStage) => void;
}

interface CompileExecuteConfig extends ServiceConfig {
    workDir: string;
    toolchain?: ToolchainConfig;
    runner?: ProcessRunner;
    compileTimeoutMs?: number;
    executeTimeoutMs?: number;
    maxOutputBytes?: number;
}

export function defaultToolchain(platform: NodeJS.Platform = process.platform, arch: string = process.arch): ToolchainConfig {
    if (platform === 'darwin' && arch === 'arm64') {
        return { compiler: 'clang++', flags: ['-O3', '-std=c++17', '-march=armv8.3-a'], binaryName: 'optimized' };
    }
    return { compiler: 'g++', flags: ['-O3', '-std=c++17', '-march=native'], binaryName: 'optimized' };
}

/** User-visible text for a report: diagnostics, runtime stderr, or program output. */
export function describeReport(report: VerificationReport): string {
    switch (report.status) {
        case 'compile-failed':
            return report.compile.diagnostics;
        case 'runtime-failed':
            return report.execution.stderr;
        case 'completed':
            return report.execution.stdout;
    }
}

/**
 * Builds an artifact with the native toolchain and runs the binary.
 * Both stages run with a time limit and capped output, and the binary sees
 * only PATH from the environment. There is no filesystem or network confinement.
 */
export class CompileExecuteSandbox extends BaseService {
    readonly toolchain: ToolchainConfig;
    readonly workDir: string;
    private readonly runner: ProcessRunner;
    private readonly compileTimeoutMs?: number;
    private readonly executeTimeoutMs?: number;
    private readonly maxOutputBytes?: number;

    constructor(config: CompileExecuteConfig) {
        super(config);
        this.workDir = path.resolve(config.workDir);
        this.toolchain = config.toolchain ?? defaultToolchain();
        this.runner = config.runner ?? runProcess;
        this.compileTimeoutMs = config.compileTimeoutMs;
        this.executeTimeoutMs = config.executeTimeoutMs;
        this.maxOutputBytes = config.maxOutputBytes;
    }

    get binaryPath(): string {
        return path.join(this.workDir, this.toolchain.binaryName);
    }

    async compile(artifact: ArtifactRecord, options: StageOptions = {}): Promise<CompileOutcome> {
        const args = [...this.toolchain.flags, '-o', this.binaryPath, artifact.path];
        this.logger.info('Compiling artifact', { backend: artifact.backend, compiler: this.toolchain.compiler, args });

        const result = await this.runner({
            command: this.toolchain.compiler,
            args,
            cwd: this.workDir,
            timeoutMs: this.compileTimeoutMs,
            signal: options.signal,
            maxOutputBytes: this.maxOutputBytes,
        });

        const outcome: CompileOutcome = {
            success: result.exitCode === 0,
            diagnostics: result.stderr,
            exitCode: result.exitCode,
        };
        if (!outcome.success) {
            this.logger.warn('Compilation failed', { backend: artifact.backend, exitCode: outcome.exitCode });
        }
        return outcome;
    }

    async execute(options: StageOptions = {}): Promise<ExecutionOutcome> {
        this.logger.info('Executing binary', { binary: this.binaryPath });

        const result = await this.runner({
            command: this.binaryPath,
            args: [],
            cwd: this.workDir,
            env: { PATH: process.env.PATH },
            timeoutMs: this.executeTimeoutMs,
            signal: options.signal,
            maxOutputBytes: this.maxOutputBytes,
        });

        if (result.exitCode !== 0) {
            this.logger.warn('Binary exited with failure', { exitCode: result.exitCode, timedOut: result.timedOut });
        }
        return { stdout: result.stdout, stderr: result.stderr, exitCode: result.exitCode };
    }

    /** Compile, then execute only if compilation succeeded. */
    async run(artifact: ArtifactRecord, options: RunOptions = {}): Promise<VerificationReport> {
        const { onStage, ...stageOptions } = options;

        onStage?.('compiling');
        const compile = await this.compile(artifact, stageOptions);
        if (!compile.success) {
            onStage?.('compile-failed');
            return { status: 'compile-failed', artifact, compile };
        }
        onStage?.('compiled');

        onStage?.('executing');
        const execution = await this.execute(stageOptions);
        if (execution.exitCode !== 0) {
            onStage?.('runtime-failed');
            return { status: 'runtime-failed', artifact, compile, execution };
        }
        onStage?.('completed');
        return { status: 'completed', artifact, compile, execution };
    }
}
