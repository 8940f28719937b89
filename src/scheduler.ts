/**
 * Clock and sleep behind an interface so loops can be driven by fake time in tests.
 */
export interface Scheduler {
    now(): Date;
    /**
     * Resolve after `ms`, or early when `signal` aborts.
     */
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemScheduler: Scheduler = {
    now: () => new Date(),
    sleep: (ms, signal) => new Promise<void>(resolve => {
        if (signal?.aborted) return resolve();
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    })
};
