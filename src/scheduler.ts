import { log as rootLog, type Log } from 'crawlee';
import { assembleUnit, type ArticleWorker } from './article-worker.js';
import { WriteError, describeError } from './errors.js';
import { formatDuration } from './format.js';
import type { Sequencer } from './sequencer.js';
import { systemClock, type Clock } from './timing.js';
import type { DataQualityKind, UnitSink } from './types.js';

// ===[ 기사 상태 머신 ]=======================================================

export type ArticleState = 'pending' | 'in_progress' | 'retrying' | 'completed' | 'failed';

const TRANSITIONS: Record<ArticleState, readonly ArticleState[]> = {
    pending: ['in_progress'],
    in_progress: ['completed', 'retrying', 'failed'],
    retrying: ['in_progress', 'failed'],
    completed: [],
    failed: [],
};

/** URL 별 상태. 허용되지 않은 전이는 프로그래밍 오류로 던진다. */
export class ArticleStateTracker {
    private readonly states = new Map<string, ArticleState>();

    register(url: string): void {
        if (this.states.has(url)) throw new Error(`article already registered: ${url}`);
        this.states.set(url, 'pending');
    }

    transition(url: string, to: ArticleState): void {
        const from = this.states.get(url);
        if (from === undefined) throw new Error(`unknown article: ${url}`);
        if (!TRANSITIONS[from].includes(to)) {
            throw new Error(`illegal article state transition ${from} → ${to} for ${url}`);
        }
        this.states.set(url, to);
    }

    get(url: string): ArticleState | undefined {
        return this.states.get(url);
    }

    urlsIn(state: ArticleState): string[] {
        return [...this.states].filter(([, s]) => s === state).map(([url]) => url);
    }
}

// ===[ 작업 풀 ]==============================================================

/**
 * 동시에 최대 concurrency 개의 handler 를 돌린다.
 * shouldStop() 이 true 가 되면 새 항목을 꺼내지 않는다 (진행 중인 항목은 끝까지 기다린다).
 */
export async function runPool<T>(
    items: readonly T[],
    concurrency: number,
    handler: (item: T, index: number, total: number) => Promise<void>,
    shouldStop: () => boolean = () => false,
): Promise<void> {
    let next = 0;

    async function worker(): Promise<void> {
        while (next < items.length && !shouldStop()) {
            const index = next++;
            await handler(items[index], index + 1, items.length);
        }
    }

    await Promise.all(Array.from({ length: Math.max(1, concurrency) }, () => worker()));
}

// ===[ 스케줄러 ]=============================================================

export interface FailedArticle {
    url: string;
    reason: string;
    attempts: number;
}

export interface RunSummary {
    total: number;
    succeeded: number;
    failed: FailedArticle[];
    /** 재개 시 이미 기록돼 있어 건너뛴 URL 수 */
    skipped: number;
    /** 취소로 중단됐거나 시작하지 못한 URL */
    interrupted: string[];
    commentsWritten: number;
    notes: Record<DataQualityKind, number>;
    durationMs: number;
    cancelled: boolean;
}

export interface SchedulerOptions {
    maxWorkers: number;
    clock?: Clock;
    log?: Log;
}

export interface RunOptions {
    /** 이미 커밋된 URL (재개) */
    completed?: ReadonlySet<string>;
    signal?: AbortSignal;
}

/**
 * ---------------------------------------------------------------------------
 * 스케줄러: URL 목록을 제한된 수의 워커로 처리하고 성공 단위를 Writer 로 넘긴다.
 *
 *  - 기사 ID 는 커밋 직전에 발급하고 같은 tick 에 write() 를 호출한다 → 커밋 순서 = ID 순서
 *  - WriteError 가 나면 더 이상 배분하지 않고, 진행 중인 워커는 끝나되 커밋하지 않으며, 마지막에 다시 던진다
 * ---------------------------------------------------------------------------
 */
export class Scheduler<H> {
    private readonly clock: Clock;
    private readonly log: Log;

    constructor(
        private readonly worker: ArticleWorker<H>,
        private readonly sequencer: Sequencer,
        private readonly sink: UnitSink,
        private readonly options: SchedulerOptions,
    ) {
        if (!Number.isInteger(options.maxWorkers) || options.maxWorkers < 1) {
            throw new RangeError(`maxWorkers must be a positive integer, got ${options.maxWorkers}`);
        }
        this.clock = options.clock ?? systemClock;
        this.log = options.log ?? rootLog.child({ prefix: 'Scheduler' });
    }

    async run(urls: readonly string[], runOptions: RunOptions = {}): Promise<RunSummary> {
        const { completed = new Set<string>(), signal } = runOptions;
        const startedAt = this.clock.now();

        const unique = [...new Set(urls)];
        if (unique.length < urls.length) {
            this.log.warning(`${urls.length - unique.length} duplicate URLs will be processed once`);
        }
        const todo = unique.filter((url) => !completed.has(url));
        const skipped = unique.length - todo.length;
        if (skipped > 0) this.log.info(`Skipping ${skipped} URLs already written`);

        const tracker = new ArticleStateTracker();
        for (const url of todo) tracker.register(url);

        const summary: RunSummary = {
            total: unique.length,
            succeeded: 0,
            failed: [],
            skipped,
            interrupted: [],
            commentsWritten: 0,
            notes: { field: 0, hierarchy: 0, duplicate: 0, pagination: 0, date: 0 },
            durationMs: 0,
            cancelled: false,
        };

        let fatal: unknown;
        let finished = 0;
        const logProgress = (url: string, status: 'SUCCESS' | 'FAILURE') => {
            finished++;
            const elapsed = this.clock.now() - startedAt;
            const eta = (elapsed / finished) * (todo.length - finished);
            this.log.info(
                `[${status}] ${finished}/${todo.length} (${((finished / todo.length) * 100).toFixed(2)}%) - ${url}. ETA: ${formatDuration(eta)}`,
            );
        };

        this.log.info(`Starting crawl for ${todo.length} articles with ${this.options.maxWorkers} worker(s)`);

        await runPool(
            todo,
            this.options.maxWorkers,
            async (url) => {
                tracker.transition(url, 'in_progress');
                const result = await this.worker.process(url, {
                    signal,
                    onRetryScheduled: () => tracker.transition(url, 'retrying'),
                    onRetryStarted: () => tracker.transition(url, 'in_progress'),
                }).catch((err: unknown) => {
                    fatal ??= err;
                    return undefined;
                });

                if (result === undefined) {
                    tracker.transition(url, 'failed');
                    return;
                }
                if (result.status === 'failed') {
                    tracker.transition(url, 'failed');
                    if (result.cancelled) {
                        summary.interrupted.push(url);
                        this.log.info(`cancelled: ${url}`);
                    } else {
                        summary.failed.push({ url, reason: result.reason, attempts: result.attempts });
                        logProgress(url, 'FAILURE');
                    }
                    return;
                }
                if (fatal !== undefined) {
                    this.log.warning(`not writing ${url}: output already failed`);
                    tracker.transition(url, 'failed');
                    return;
                }

                const unit = assembleUnit(result.draft, this.sequencer.nextArticleId());
                try {
                    await this.sink.write(unit);
                } catch (err) {
                    fatal ??= err instanceof WriteError ? err : new WriteError(describeError(err), { cause: err, url });
                    tracker.transition(url, 'failed');
                    return;
                }
                tracker.transition(url, 'completed');
                summary.succeeded++;
                summary.commentsWritten += unit.comments.length;
                for (const note of result.draft.notes) summary.notes[note.kind]++;
                logProgress(url, 'SUCCESS');
            },
            () => fatal !== undefined || signal?.aborted === true,
        );

        summary.cancelled = signal?.aborted === true;
        summary.interrupted.push(...tracker.urlsIn('pending'));
        summary.durationMs = this.clock.now() - startedAt;

        if (fatal !== undefined) {
            this.log.error(`Run stopped: ${describeError(fatal)}`);
            throw fatal;
        }
        return summary;
    }
}

/** 실행 요약을 로그로 남긴다. */
export function logRunSummary(summary: RunSummary, log: Log): void {
    log.info(
        `Run finished in ${formatDuration(summary.durationMs)}: ${summary.succeeded} succeeded, `
        + `${summary.failed.length} failed, ${summary.skipped} skipped, ${summary.commentsWritten} comments written`,
    );
    const notes = Object.entries(summary.notes).filter(([, n]) => n > 0);
    if (notes.length > 0) {
        log.info(`Data-quality notes: ${notes.map(([kind, n]) => `${kind}=${n}`).join(', ')}`);
    }
    for (const failure of summary.failed) {
        log.warning(`FAILED ${failure.url} after ${failure.attempts} attempt(s): ${failure.reason}`);
    }
    if (summary.cancelled) {
        log.warning(`Run cancelled: ${summary.interrupted.length} articles not written (use --resume to continue)`);
    }
}
