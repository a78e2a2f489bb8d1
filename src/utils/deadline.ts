// src/utils/deadline.ts

export interface DeadlineOptions {
    signal?: AbortSignal;
    timeoutMs?: number;
}

export interface Deadline {
    readonly signal: AbortSignal;
    /** True once the timeout (not the caller's signal) fired. */
    expired(): boolean;
    dispose(): void;
}

/**
 * Links an optional caller signal with an optional timeout into one signal.
 * Always call dispose() so the timer and listener do not outlive the call.
 */
export function createDeadline({ signal, timeoutMs }: DeadlineOptions = {}): Deadline {
    const controller = new AbortController();
    let timedOut = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onParentAbort = () => controller.abort(signal?.reason);
    if (signal) {
        if (signal.aborted) {
            controller.abort(signal.reason);
        } else {
            signal.addEventListener('abort', onParentAbort, { once: true });
        }
    }

    if (timeoutMs !== undefined && timeoutMs > 0) {
        timer = setTimeout(() => {
            timedOut = true;
            controller.abort(new Error(`deadline of ${timeoutMs}ms exceeded`));
        }, timeoutMs);
    }

    return {
        signal: controller.signal,
        expired: () => timedOut,
        dispose: () => {
            if (timer) clearTimeout(timer);
            signal?.removeEventListener('abort', onParentAbort);
        },
    };
}
