import { log } from 'crawlee';
import { CancelledError } from './errors.js';

export interface Clock {
    now(): number;
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** 취소 가능한 지연. signal 이 abort 되면 CancelledError 로 reject. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(new CancelledError('run cancelled'));
    if (ms <= 0) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
        const onAbort = () => {
            clearTimeout(timer);
            reject(new CancelledError('run cancelled'));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: delay,
};

/**
 * promise 에 제한 시간을 건다. 시간이 지나면 onTimeout() 의 오류로 reject.
 * ms <= 0 이면 제한 없음.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
    if (!(ms > 0) || !Number.isFinite(ms)) return promise;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(onTimeout()), ms);
    });
    try {
        return await Promise.race([promise, timeout]);
    } catch (err) {
        // 타임아웃으로 버려진 작업이 나중에 실패해도 unhandled rejection 이 되지 않도록
        void promise.catch((late: unknown) => log.debug('Late failure after timeout', { error: String(late) }));
        throw err;
    } finally {
        clearTimeout(timer);
    }
}
