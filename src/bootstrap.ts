// src/bootstrap.ts
// Builds every service once; entry points pass these instances down explicitly.

import type { AppConfig } from './config';
import { createGateways } from './services/provider';
import type { GatewayRegistry } from './services/provider/types';
import { ArtifactStore } from './services/artifact-store.service';
import { ConversionService } from './services/conversion.service';
import { ProgramCatalogService } from './services/program-catalog.service';
import { ResponseAggregatorService } from './services/response-aggregator.service';
import { CompileExecuteSandbox } from './services/sandbox/compile-execute.service';
import { ReferenceSandbox } from './services/sandbox/reference.service';
import { createLogger } from './utils/logger';

export interface Harness {
    gateways: GatewayRegistry;
    artifactStore: ArtifactStore;
    sandbox: CompileExecuteSandbox;
    referenceSandbox: ReferenceSandbox;
    programCatalog: ProgramCatalogService;
    conversionService: ConversionService;
}

export function createHarness(config: AppConfig): Harness {
    const gateways = createGateways(config, createLogger('gateway'));
    const artifactStore = new ArtifactStore({ baseDir: config.OUTPUT_DIR, logger: createLogger('artifact-store') });
    const sandbox = new CompileExecuteSandbox({
        workDir: config.WORK_DIR,
        compileTimeoutMs: config.SANDBOX_COMPILE_TIMEOUT_MS,
        executeTimeoutMs: config.SANDBOX_EXECUTE_TIMEOUT_MS,
        logger: createLogger('sandbox'),
    });
    const referenceSandbox = new ReferenceSandbox({
        timeoutMs: config.REFERENCE_TIMEOUT_MS,
        logger: createLogger('reference-sandbox'),
    });
    const programCatalog = new ProgramCatalogService({
        programsDir: config.PROGRAMS_DIR,
        logger: createLogger('program-catalog'),
    });
    const conversionService = new ConversionService({
        gateways,
        aggregator: new ResponseAggregatorService({ logger: createLogger('aggregator') }),
        artifactStore,
        sandbox,
        logger: createLogger('conversion'),
    });

    return { gateways, artifactStore, sandbox, referenceSandbox, programCatalog, conversionService };
}
