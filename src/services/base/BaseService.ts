// src/services/base/BaseService.ts
import { describeError } from '../../utils/errors';
import type { LogMeta, Logger, ServiceConfig } from './types';

export abstract class BaseService {
    protected readonly logger: Logger;

    constructor(config: ServiceConfig) {
        this.logger = config.logger;
    }

    /** Logs a caught error as text; errors from a vm context do not serialize otherwise. */
    protected logFailure(level: 'warn' | 'error', message: string, error: unknown, meta: LogMeta = {}): void {
        this.logger[level](message, { ...meta, error: describeError(error) });
    }
}
