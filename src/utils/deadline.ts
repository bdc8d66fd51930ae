import { setTimeout as delay } from 'timers/promises';

export class DeadlineExceededError extends Error {
    constructor(message = 'Deadline exceeded') {
        super(message);
        this.name = 'DeadlineExceededError';
    }
}

/** Aborts the returned signal once `deadlineAt` (epoch ms) passes. */
export function deadlineSignal(deadlineAt: number, now: number = Date.now()): { signal: AbortSignal; clear: () => void } {
    const controller = new AbortController();
    const remaining = deadlineAt - now;
    if (remaining <= 0) {
        controller.abort(new DeadlineExceededError());
        return { signal: controller.signal, clear: () => undefined };
    }
    const timer = setTimeout(() => controller.abort(new DeadlineExceededError()), remaining);
    timer.unref();
    return { signal: controller.signal, clear: () => clearTimeout(timer) };
}

/**
 * Settles with `promise` unless `signal` aborts first. The underlying operation is
 * not cancelled; its eventual result is simply no longer observed here.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    if (signal.aborted) {
        return Promise.reject(new DeadlineExceededError());
    }
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(new DeadlineExceededError());
        signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            },
        );
    });
}

export async function sleep(ms: number, signal: AbortSignal): Promise<void> {
    try {
        await delay(ms, undefined, { signal });
    } catch (error) {
        if (signal.aborted) {
            throw new DeadlineExceededError();
        }
        throw error;
    }
}

export function backoffDelay(attempt: number, initialMs: number, maxMs: number): number {
    return Math.min(initialMs * 2 ** Math.max(0, attempt), maxMs);
}
