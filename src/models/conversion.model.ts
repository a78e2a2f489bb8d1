// src/models/conversion.model.ts

import { z } from 'zod';
import { InputError } from '../utils/errors';

export const BACKENDS = ['gpt', 'groq'] as const;

export type BackendId = (typeof BACKENDS)[number];
export type BackendSelection = BackendId | 'both';
export type GatewayStyle = 'streaming' | 'single-shot';

export interface ConversionRequest {
    readonly sourceText: string;
    readonly backend: BackendId;
    readonly maxOutputTokens: number;
}

export interface Fragment {
    backend: BackendId;
    /** 0-based arrival order within one backend call. */
    sequence: number;
    text: string;
}

export interface ConversionResult {
    backend: BackendId;
    rawText: string;
    normalizedCode: string;
    fragmentCount: number;
    producedAt: Date;
}

export interface ArtifactRecord {
    backend: BackendId;
    path: string;
    code: string;
}

export interface CompileOutcome {
    success: boolean;
    diagnostics: string;
    exitCode: number;
}

export interface ExecutionOutcome {
    stdout: string;
    stderr: string;
    exitCode: number;
}

export interface ReferenceOutcome {
    stdout: string;
    error?: string;
}

export type VerificationReport =
    | { status: 'compile-failed'; artifact: ArtifactRecord; compile: CompileOutcome }
    | { status: 'runtime-failed'; artifact: ArtifactRecord; compile: CompileOutcome; execution: ExecutionOutcome }
    | { status: 'completed'; artifact: ArtifactRecord; compile: CompileOutcome; execution: ExecutionOutcome };

export type ConversionState =
    | 'idle'
    | 'submitted'
    | 'streaming'
    | 'waiting'
    | 'aggregated'
    | 'persisted'
    | 'compiling'
    | 'compile-failed'
    | 'compiled'
    | 'executing'
    | 'runtime-failed'
    | 'completed';

export const backendSchema = z.enum(BACKENDS);
export const backendSelectionSchema = z.enum(['gpt', 'groq', 'both']);

const conversionRequestSchema = z.object({
    sourceText: z.string().refine((text) => text.trim().length > 0, 'sourceText must not be empty'),
    backend: backendSchema,
    maxOutputTokens: z.number().int().positive(),
});

export function createConversionRequest(input: {
    sourceText: string;
    backend: BackendId;
    maxOutputTokens: number;
}): ConversionRequest {
    const parsed = conversionRequestSchema.safeParse(input);
    if (!parsed.success) {
        throw new InputError(parsed.error.issues.map((issue) => issue.message).join('; '));
    }
    return Object.freeze({ ...parsed.data });
}

export function parseBackendSelection(value: string): BackendSelection {
    const parsed = backendSelectionSchema.safeParse(value);
    if (!parsed.success) {
        throw new InputError(`Unknown backend "${value}". Expected one of: ${backendSelectionSchema.options.join(', ')}`);
    }
    return parsed.data;
}

export function resolveBackends(selection: BackendSelection): BackendId[] {
    return selection === 'both' ? [...BACKENDS] : [selection];
}
