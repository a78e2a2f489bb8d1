// src/services/base/types.ts

export type LogMeta = Record<string, unknown>;

export interface Logger {
    info: (message: string, meta?: LogMeta) => void;
    error: (message: string, meta?: LogMeta) => void;
    debug: (message: string, meta?: LogMeta) => void;
    warn: (message: string, meta?: LogMeta) => void;
}

export interface ServiceConfig {
    logger: Logger;
}
