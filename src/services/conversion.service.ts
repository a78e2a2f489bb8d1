// src/services/conversion.service.ts

import { v4 as uuidv4 } from 'uuid';
import { BaseService } from './base/BaseService';
import type { ServiceConfig } from './base/types';
import {
    createConversionRequest,
    type ArtifactRecord,
    type BackendId,
    type ConversionRequest,
    type ConversionResult,
    type ConversionState,
    type Fragment,
    type VerificationReport,
} from '../models/conversion.model';
import { InputError } from '../utils/errors';
import type { GatewayRegistry, ProviderGateway } from './provider/types';
import type { ArtifactStore } from './artifact-store.service';
import type { ResponseAggregatorService } from './response-aggregator.service';
import type { CompileExecuteSandbox } from './sandbox/compile-execute.service';

export interface ConversionOptions {
    onFragment?: (fragment: Fragment, accumulatedRaw: string) => void;
    onStateChange?: (state: ConversionState, backend: BackendId) => void;
    signal?: AbortSignal;
    timeoutMs?: number;
}

export interface VerifyOptions extends ConversionOptions {
    /** Compile and run the artifact after writing it. */
    verify?: boolean;
}

export interface ConversionOutcome {
    result: ConversionResult;
    artifact: ArtifactRecord;
    report?: VerificationReport;
}

interface ConversionServiceConfig extends ServiceConfig {
    gateways: GatewayRegistry;
    aggregator: ResponseAggregatorService;
    artifactStore: ArtifactStore;
    sandbox: CompileExecuteSandbox;
}

/**
 * Drives one conversion at a time through
 * submitted → streaming|waiting → aggregated → persisted → compiling → … .
 */
export class ConversionService extends BaseService {
    private readonly gateways: GatewayRegistry;
    private readonly aggregator: ResponseAggregatorService;
    private readonly artifactStore: ArtifactStore;
    private readonly sandbox: CompileExecuteSandbox;

    constructor(config: ConversionServiceConfig) {
        super(config);
        this.gateways = config.gateways;
        this.aggregator = config.aggregator;
        this.artifactStore = config.artifactStore;
        this.sandbox = config.sandbox;
    }

    async convert(request: ConversionRequest, options: ConversionOptions = {}): Promise<ConversionResult> {
        return this.runConversion(request, options, this.transitionFn(uuidv4(), request.backend, options));
    }

    async convertAndVerify(request: ConversionRequest, options: VerifyOptions = {}): Promise<ConversionOutcome> {
        const transition = this.transitionFn(uuidv4(), request.backend, options);
        const result = await this.runConversion(request, options, transition);

        const artifact = await this.artifactStore.write(result.normalizedCode, request.backend);
        transition('persisted');

        if (!options.verify) {
            return { result, artifact };
        }

        const report = await this.sandbox.run(artifact, { signal: options.signal, onStage: transition });
        return { result, artifact, report };
    }

    /**
     * Converts the same source with each backend in turn. The first failure
     * propagates; later backends are not attempted.
     */
    async convertMany(
        sourceText: string,
        backends: BackendId[],
        maxOutputTokens: number,
        options: VerifyOptions = {},
    ): Promise<ConversionOutcome[]> {
        const outcomes: ConversionOutcome[] = [];
        for (const backend of backends) {
            const request = createConversionRequest({ sourceText, backend, maxOutputTokens });
            outcomes.push(await this.convertAndVerify(request, options));
        }
        return outcomes;
    }

    private async runConversion(
        request: ConversionRequest,
        options: ConversionOptions,
        transition: (state: ConversionState) => void,
    ): Promise<ConversionResult> {
        const gateway = this.gatewayFor(request.backend);

        transition('submitted');
        const fragments = gateway.submit(request, { signal: options.signal, timeoutMs: options.timeoutMs });
        transition(gateway.style === 'streaming' ? 'streaming' : 'waiting');

        const result = await this.aggregator.aggregate(fragments, request.backend, options.onFragment);
        transition('aggregated');
        return result;
    }

    private gatewayFor(backend: BackendId): ProviderGateway {
        const gateway = this.gateways.get(backend);
        if (!gateway) {
            throw new InputError(`No gateway registered for backend "${backend}"`);
        }
        return gateway;
    }

    private transitionFn(runId: string, backend: BackendId, options: ConversionOptions) {
        return (state: ConversionState) => {
            this.logger.debug('Conversion state changed', { runId, backend, state });
            options.onStateChange?.(state, backend);
        };
    }
}
