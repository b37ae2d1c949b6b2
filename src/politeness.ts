import { systemClock, type Clock } from './timing.js';

/**
 * 전역 요청 간격 게이트.
 *
 * 워커 수와 무관하게, 연속된 두 외부 요청의 시작 시각이 intervalMs 이상 벌어지도록 한다.
 * 슬롯 예약은 동기적으로 이뤄지므로 동시에 wait() 를 부른 워커들은 예약 순서대로 통과한다.
 */
export class PolitenessGate {
    private nextSlot = Number.NEGATIVE_INFINITY;

    constructor(private readonly intervalMs: number, private readonly clock: Clock = systemClock) {
        if (!(intervalMs >= 0)) throw new RangeError(`politeness interval must be >= 0, got ${intervalMs}`);
    }

    async wait(signal?: AbortSignal): Promise<void> {
        const now = this.clock.now();
        const slot = Math.max(now, this.nextSlot);
        this.nextSlot = slot + this.intervalMs;
        await this.clock.sleep(slot - now, signal);
    }
}
