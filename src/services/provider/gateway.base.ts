// src/services/provider/gateway.base.ts

import { BaseService } from '../base/BaseService';
import type { ServiceConfig } from '../base/types';
import type { BackendId, ConversionRequest, Fragment, GatewayStyle } from '../../models/conversion.model';
import { RequestError, describeError } from '../../utils/errors';
import { createDeadline, type Deadline } from '../../utils/deadline';
import type { ProviderGateway, SubmitOptions } from './types';

export interface GatewayConfig extends ServiceConfig {
    backend: BackendId;
    model: string;
    /** Used when submit() is called without its own timeoutMs. */
    defaultTimeoutMs?: number;
}

export abstract class GatewayBase extends BaseService implements ProviderGateway {
    abstract readonly style: GatewayStyle;
    readonly backend: BackendId;
    protected readonly model: string;
    private readonly defaultTimeoutMs?: number;

    constructor(config: GatewayConfig) {
        super(config);
        this.backend = config.backend;
        this.model = config.model;
        this.defaultTimeoutMs = config.defaultTimeoutMs;
    }

    async *submit(request: ConversionRequest, options: SubmitOptions = {}): AsyncGenerator<Fragment, void, undefined> {
        const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
        const deadline = createDeadline({ signal: options.signal, timeoutMs });
        let produced = 0;

        this.logger.debug('Submitting conversion request', {
            backend: this.backend,
            model: this.model,
            style: this.style,
            sourceLength: request.sourceText.length,
            timeoutMs,
        });

        try {
            for await (const text of this.generate(request, deadline.signal)) {
                yield { backend: this.backend, sequence: produced++, text };
            }
            this.logger.info('Backend call completed', { backend: this.backend, fragments: produced });
        } catch (error) {
            const requestError = this.toRequestError(error, deadline, timeoutMs);
            this.logger.error('Backend call failed', {
                backend: this.backend,
                fragmentsDiscarded: produced,
                error: requestError.message,
            });
            throw requestError;
        } finally {
            deadline.dispose();
        }
    }

    /** Yields the raw text pieces of one backend call, in arrival order. */
    protected abstract generate(request: ConversionRequest, signal: AbortSignal): AsyncIterable<string>;

    protected malformed(detail: string): RequestError {
        return new RequestError(this.backend, `Malformed response from ${this.backend}: ${detail}`);
    }

    private toRequestError(error: unknown, deadline: Deadline, timeoutMs: number | undefined): RequestError {
        if (deadline.expired()) {
            return new RequestError(this.backend, `${this.backend} request timed out after ${timeoutMs}ms`, { cause: error });
        }
        if (error instanceof RequestError) {
            return error;
        }
        return new RequestError(this.backend, `${this.backend} request failed: ${describeError(error)}`, { cause: error });
    }
}
