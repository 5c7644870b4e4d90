// src/utils/time.ts

/**
 * Source of the current time in Unix seconds.
 */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: () => Date.now() / 1000,
};

/**
 * Sleep for `ms`, resolving early (without rejecting) when `signal` aborts.
 * Callers check `signal.aborted` afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener("abort", onAbort);
            resolve();
        }, ms);
        signal?.addEventListener("abort", onAbort, { once: true });
    });
}
