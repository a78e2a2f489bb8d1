import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { Harness } from '../src/bootstrap';
import type { Logger } from '../src/services/base/types';
import { ArtifactStore } from '../src/services/artifact-store.service';
import { ConversionService } from '../src/services/conversion.service';
import { ProgramCatalogService } from '../src/services/program-catalog.service';
import { ResponseAggregatorService } from '../src/services/response-aggregator.service';
import { CompileExecuteSandbox } from '../src/services/sandbox/compile-execute.service';
import { ReferenceSandbox } from '../src/services/sandbox/reference.service';
import type { BackendId, ConversionRequest, Fragment, GatewayStyle } from '../src/models/conversion.model';
import type { ProviderGateway, SubmitOptions } from '../src/services/provider/types';
import type { ProcessResult, ProcessRunner, ProcessSpec } from '../src/services/sandbox/process-runner';

export interface LogEntry {
    level: 'info' | 'error' | 'debug' | 'warn';
    message: string;
    meta?: Record<string, unknown>;
}

export function createTestLogger(): Logger & { entries: LogEntry[] } {
    const entries: LogEntry[] = [];
    const record = (level: LogEntry['level']) => (message: string, meta?: Record<string, unknown>) => {
        entries.push({ level, message, meta });
    };
    return { entries, info: record('info'), error: record('error'), debug: record('debug'), warn: record('warn') };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
    const items: T[] = [];
    for await (const item of iterable) {
        items.push(item);
    }
    return items;
}

export async function* fragmentsOf(backend: BackendId, texts: string[], failWith?: Error): AsyncGenerator<Fragment> {
    let sequence = 0;
    for (const text of texts) {
        yield { backend, sequence: sequence++, text };
    }
    if (failWith) {
        throw failWith;
    }
}

export async function makeTempDir(prefix: string): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

/** Gateway stand-in that replays canned text pieces, or fails after them. */
export class FakeGateway implements ProviderGateway {
    calls = 0;
    readonly requests: ConversionRequest[] = [];

    constructor(
        readonly backend: BackendId,
        readonly style: GatewayStyle,
        private readonly pieces: string[],
        private readonly failWith?: Error,
    ) {}

    async *submit(request: ConversionRequest, _options?: SubmitOptions): AsyncGenerator<Fragment, void, undefined> {
        this.calls++;
        this.requests.push(request);
        yield* fragmentsOf(this.backend, this.pieces, this.failWith);
    }
}

export const ok = (stdout = '', stderr = ''): ProcessResult => ({ stdout, stderr, exitCode: 0, timedOut: false });
export const failed = (exitCode: number, stderr: string): ProcessResult => ({ stdout: '', stderr, exitCode, timedOut: false });

/** Process runner stand-in: records each spec and answers from a queue. */
export function scriptedRunner(results: ProcessResult[]): ProcessRunner & { calls: ProcessSpec[] } {
    const calls: ProcessSpec[] = [];
    const queue = [...results];
    const runner = async (spec: ProcessSpec): Promise<ProcessResult> => {
        calls.push(spec);
        const next = queue.shift();
        if (!next) {
            throw new Error(`unexpected process launch: ${spec.command}`);
        }
        return next;
    };
    return Object.assign(runner, { calls });
}

/** Every service wired the way bootstrap does, over fake gateways and a scripted runner, rooted in `dir`. */
export function createTestHarness(
    dir: string,
    gateways: ProviderGateway[],
    runner: ProcessRunner = scriptedRunner([]),
): Harness {
    const logger = createTestLogger();
    const registry = new Map<BackendId, ProviderGateway>(gateways.map((gateway) => [gateway.backend, gateway]));
    const artifactStore = new ArtifactStore({ baseDir: dir, logger });
    const sandbox = new CompileExecuteSandbox({
        workDir: dir,
        toolchain: { compiler: 'g++', flags: ['-O3'], binaryName: 'optimized' },
        runner,
        logger,
    });
    return {
        gateways: registry,
        artifactStore,
        sandbox,
        referenceSandbox: new ReferenceSandbox({ timeoutMs: 1000, logger }),
        programCatalog: new ProgramCatalogService({ programsDir: dir, logger }),
        conversionService: new ConversionService({
            gateways: registry,
            aggregator: new ResponseAggregatorService({ logger }),
            artifactStore,
            sandbox,
            logger,
        }),
    };
}
