// src/utils/errors.ts

import type { BackendId } from '../models/conversion.model';

export class HarnessError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Missing or unusable configuration. Fatal at startup. */
export class ConfigurationError extends HarnessError {}

/** Bad user input: empty source, unknown backend, conflicting options. */
export class InputError extends HarnessError {}

/**
 * A backend call failed: transport, auth, error payload, malformed response
 * or deadline. Aborts the current conversion; nothing produced by the call is kept.
 */
export class RequestError extends HarnessError {
    readonly backend: BackendId;

    constructor(backend: BackendId, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.backend = backend;
    }
}

// Errors thrown inside a vm context come from another realm, so instanceof Error is not reliable.
export function describeError(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error) {
        const message = String(error.message);
        const name = 'name' in error && typeof error.name === 'string' && error.name ? error.name : 'Error';
        return `${name}: ${message}`;
    }
    return `Error: ${String(error)}`;
}
