#!/usr/bin/env node
// src/cli.ts
// Batch mode: convert one program with one or both backends, optionally build and run it.

import { promises as fs } from 'fs';
import { Command, InvalidArgumentError, Option } from 'commander';
import { createHarness, type Harness } from './bootstrap';
import { loadConfig } from './config';
import { parseBackendSelection, resolveBackends, type BackendId } from './models/conversion.model';
import { describeReport } from './services/sandbox/compile-execute.service';
import { InputError, describeError } from './utils/errors';
import { createLogger, logToStderr, setLogLevel } from './utils/logger';

export interface CliOptions {
    file?: string;
    code?: string;
    model: string;
    maxTokens?: number;
    run: boolean;
    reference: boolean;
    verbose: boolean;
}

export interface CliIO {
    write: (text: string) => void;
}

const parsePositiveInt = (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
};

export function buildProgram(): Command {
    return new Command()
        .name('transpile-bench')
        .description('Rewrite a JavaScript program as C++ with an LLM backend, then optionally compile and run it')
        .addOption(new Option('-f, --file <path>', 'JavaScript file to convert').conflicts('code'))
        .addOption(new Option('-c, --code <source>', 'inline JavaScript source to convert').conflicts('file'))
        .option('-m, --model <backend>', 'backend to use: gpt, groq or both', 'both')
        .option('-t, --max-tokens <n>', 'maximum output tokens (single-shot backend only)', parsePositiveInt)
        .option('-r, --run', 'compile and run each generated artifact', false)
        .option('--reference', 'also evaluate the original program for comparison', false)
        .option('-v, --verbose', 'log at debug level', false)
        .exitOverride();
}

/** `--verbose` wins over LOG_LEVEL. Returns the level in effect. */
export function applyLogLevel(verbose: boolean, configuredLevel: string): string {
    const level = verbose ? 'debug' : configuredLevel;
    setLogLevel(level);
    return level;
}

export async function readSource(options: Pick<CliOptions, 'file' | 'code'>): Promise<string> {
    if (options.code !== undefined) {
        return options.code;
    }
    if (options.file !== undefined) {
        try {
            return await fs.readFile(options.file, 'utf-8');
        } catch (error: unknown) {
            throw new InputError(`Cannot read ${options.file}: ${describeError(error)}`);
        }
    }
    throw new InputError('One of --file or --code is required');
}

export async function runConversions(
    harness: Harness,
    sourceText: string,
    backends: BackendId[],
    maxOutputTokens: number,
    options: Pick<CliOptions, 'run' | 'reference'>,
    io: CliIO,
): Promise<void> {
    if (options.reference) {
        const reference = await harness.referenceSandbox.evaluate(sourceText);
        io.write('=== reference output ===\n');
        io.write(reference.error ? `${reference.error}\n` : reference.stdout);
    }

    const outcomes = await harness.conversionService.convertMany(sourceText, backends, maxOutputTokens, {
        verify: options.run,
        onStateChange: (state, backend) => {
            if (state === 'submitted') {
                io.write(`\n=== ${backend} ===\n`);
            }
        },
        onFragment: (fragment) => io.write(fragment.text),
    });

    for (const outcome of outcomes) {
        io.write(`\n\n[${outcome.artifact.backend}] artifact written to ${outcome.artifact.path}\n`);
        if (outcome.report) {
            io.write(`[${outcome.artifact.backend}] ${outcome.report.status}\n`);
            io.write(describeReport(outcome.report));
            io.write('\n');
        }
    }
}

export async function main(argv: string[] = process.argv): Promise<number> {
    const logger = createLogger('cli');
    const program = buildProgram();

    try {
        program.parse(argv);
    } catch (error: unknown) {
        // commander has already printed its message; --help and --version exit cleanly
        const exitCode = typeof error === 'object' && error !== null && 'exitCode' in error ? error.exitCode : 1;
        return exitCode === 0 ? 0 : 1;
    }

    const options = program.opts<CliOptions>();
    // stdout carries the generated code
    logToStderr();
    if (options.verbose) {
        setLogLevel('debug');
    }

    process.once('SIGINT', () => {
        logger.warn('Interrupted');
        process.exit(1);
    });

    try {
        const sourceText = await readSource(options);
        const backends = resolveBackends(parseBackendSelection(options.model));
        const config = loadConfig();
        applyLogLevel(options.verbose, config.LOG_LEVEL);
        const harness = createHarness(config);

        await runConversions(harness, sourceText, backends, options.maxTokens ?? config.MAX_TOKENS, options, {
            write: (text) => process.stdout.write(text),
        });
        return 0;
    } catch (error: unknown) {
        logger.error('Conversion failed', { error: describeError(error) });
        return 1;
    }
}

if (require.main === module) {
    main().then(
        (code) => {
            process.exitCode = code;
        },
        (error: unknown) => {
            process.stderr.write(`${describeError(error)}\n`);
            process.exitCode = 1;
        },
    );
}
