// src/services/provider/types.ts

import type { BackendId, ConversionRequest, Fragment, GatewayStyle } from '../../models/conversion.model';

export interface SubmitOptions {
    signal?: AbortSignal;
    /** Deadline for the whole backend call, including every fragment. */
    timeoutMs?: number;
}

/**
 * Uniform call surface over the backends. The returned generator is single-use:
 * once drained (or failed) it yields nothing more; call submit again for a new request.
 */
export interface ProviderGateway {
    readonly backend: BackendId;
    readonly style: GatewayStyle;
    submit(request: ConversionRequest, options?: SubmitOptions): AsyncGenerator<Fragment, void, undefined>;
}

export type GatewayRegistry = ReadonlyMap<BackendId, ProviderGateway>;

export interface ChatMessage {
    role: 'system' | 'user';
    content: string;
}

export interface CompletionParams {
    model: string;
    messages: ChatMessage[];
    maxTokens?: number;
}

/** Opens a token stream. Chunks are validated by the gateway, so they stay unknown here. */
export type StreamingCompletion = (params: CompletionParams, signal: AbortSignal) => Promise<AsyncIterable<unknown>>;

/** Performs one request/response completion; the body is validated by the gateway. */
export type SingleShotCompletion = (params: CompletionParams, signal: AbortSignal) => Promise<unknown>;
