import { describe, expect, it } from 'vitest';
import { CancelledError, LoadError } from '../../errors.js';
import { PolitenessGate } from '../../politeness.js';
import { delay, withTimeout } from '../../timing.js';
import { ManualClock } from '../helpers/fakes.js';

describe('delay', () => {
    it('rejects with CancelledError when aborted while waiting', async () => {
        const controller = new AbortController();
        const pending = delay(10_000, controller.signal);
        controller.abort();
        await expect(pending).rejects.toBeInstanceOf(CancelledError);
    });

    it('rejects immediately on an already aborted signal, even for 0 ms', async () => {
        const controller = new AbortController();
        controller.abort();
        await expect(delay(0, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    });
});

describe('withTimeout', () => {
    it('rejects with the timeout error when the promise is too slow', async () => {
        const never = new Promise<string>(() => undefined);
        await expect(withTimeout(never, 10, () => new LoadError('too slow'))).rejects.toThrow('too slow');
    });

    it('passes the value through when in time or unlimited', async () => {
        await expect(withTimeout(Promise.resolve('ok'), 1_000, () => new LoadError('x'))).resolves.toBe('ok');
        await expect(withTimeout(Promise.resolve('ok'), 0, () => new LoadError('x'))).resolves.toBe('ok');
    });
});

describe('PolitenessGate', () => {
    it('spaces request starts globally, in reservation order', async () => {
        const clock = new ManualClock(0);
        const gate = new PolitenessGate(100, clock);
        await Promise.all([gate.wait(), gate.wait(), gate.wait()]);
        expect(clock.sleeps).toEqual([0, 100, 200]);

        clock.time = 500;
        await gate.wait();
        expect(clock.sleeps.at(-1)).toBe(0);
    });

    it('never waits with a zero interval', async () => {
        const clock = new ManualClock(0);
        const gate = new PolitenessGate(0, clock);
        await gate.wait();
        await gate.wait();
        expect(clock.sleeps).toEqual([0, 0]);
    });

    it('propagates cancellation', async () => {
        const controller = new AbortController();
        controller.abort();
        const gate = new PolitenessGate(100, new ManualClock());
        await expect(gate.wait(controller.signal)).rejects.toBeInstanceOf(CancelledError);
    });

    it('rejects a negative interval', () => {
        expect(() => new PolitenessGate(-1)).toThrow(RangeError);
    });
});
