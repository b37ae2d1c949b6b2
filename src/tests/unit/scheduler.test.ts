import { describe, expect, it } from 'vitest';
import { ArticleWorker, type WorkerOptions } from '../../article-worker.js';
import { WriteError } from '../../errors.js';
import { PolitenessGate } from '../../politeness.js';
import { ArticleStateTracker, Scheduler, runPool } from '../../scheduler.js';
import { Sequencer } from '../../sequencer.js';
import type { ArticleUnit, UnitSink } from '../../types.js';
import { FakeExtractor, MemorySink, WORKER_DEFAULTS, rc, type FakeArticle } from '../helpers/fakes.js';

const url = (n: number) => `https://n.news.naver.com/article/001/000000000${n}`;

interface SetupOptions {
    maxWorkers?: number;
    sink?: UnitSink;
    worker?: Partial<WorkerOptions>;
}

function setup(articles: Record<string, FakeArticle>, options: SetupOptions = {}) {
    const extractor = new FakeExtractor(articles);
    const sequencer = new Sequencer();
    const memory = new MemorySink();
    const worker = new ArticleWorker(extractor, sequencer, new PolitenessGate(0), { ...WORKER_DEFAULTS, ...options.worker });
    const scheduler = new Scheduler(worker, sequencer, options.sink ?? memory, { maxWorkers: options.maxWorkers ?? 1 });
    return { extractor, sequencer, scheduler, units: memory.units };
}

describe('ArticleStateTracker', () => {
    it('accepts the documented lifecycle', () => {
        const tracker = new ArticleStateTracker();
        tracker.register('u');
        tracker.transition('u', 'in_progress');
        tracker.transition('u', 'retrying');
        tracker.transition('u', 'in_progress');
        tracker.transition('u', 'completed');
        expect(tracker.get('u')).toBe('completed');
    });

    it('rejects illegal transitions', () => {
        const tracker = new ArticleStateTracker();
        tracker.register('u');
        expect(() => tracker.transition('u', 'completed')).toThrow('illegal article state transition pending → completed for u');
        tracker.transition('u', 'in_progress');
        tracker.transition('u', 'failed');
        expect(() => tracker.transition('u', 'in_progress')).toThrow(/illegal/);
        expect(() => tracker.transition('other', 'in_progress')).toThrow('unknown article: other');
    });
});

describe('runPool', () => {
    it('never runs more than the concurrency limit at once', async () => {
        let running = 0;
        let peak = 0;
        const seen: number[] = [];
        await runPool([1, 2, 3, 4, 5], 2, async (item) => {
            running++;
            peak = Math.max(peak, running);
            await new Promise((r) => setTimeout(r, 5));
            seen.push(item);
            running--;
        });
        expect(peak).toBe(2);
        expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
    });

    it('stops taking items once asked to', async () => {
        const seen: number[] = [];
        await runPool([1, 2, 3], 1, async (item) => {
            seen.push(item);
        }, () => seen.length >= 2);
        expect(seen).toEqual([1, 2]);
    });
});

describe('Scheduler', () => {
    it('processes duplicates once, skips completed urls and numbers articles in commit order', async () => {
        const { scheduler, units } = setup({ [url(1)]: {}, [url(2)]: {}, [url(3)]: {} });

        const summary = await scheduler.run([url(1), url(2), url(1), url(3)], { completed: new Set([url(3)]) });

        expect(summary).toMatchObject({ total: 3, succeeded: 2, skipped: 1, failed: [], interrupted: [], cancelled: false });
        expect(units.map((u) => [u.article.articleId, u.article.url])).toEqual([[1, url(1)], [2, url(2)]]);
    });

    it('reports permanent failures and writes nothing for them', async () => {
        const { scheduler, units } = setup(
            { [url(1)]: { loadFailures: 9 }, [url(2)]: {} },
            { worker: { maxAttempts: 2 } },
        );

        const summary = await scheduler.run([url(1), url(2)]);

        expect(summary.succeeded).toBe(1);
        expect(summary.failed).toEqual([{ url: url(1), reason: 'LoadError: Error: boom 2', attempts: 2 }]);
        expect(units.map((u) => u.article.url)).toEqual([url(2)]);
    });

    it('keeps each unit whole when a slow article runs beside a fast one', async () => {
        const { scheduler, units } = setup(
            {
                [url(1)]: { pages: [[rc('a'), rc('a1', 'a')], [rc('a2', 'a')], [rc('b')]], pageDelayMs: 15 },
                [url(2)]: { pages: [[rc('x'), rc('x1', 'x'), rc('y')]] },
            },
            { maxWorkers: 2 },
        );

        const summary = await scheduler.run([url(1), url(2)]);

        expect(summary.succeeded).toBe(2);
        expect(summary.commentsWritten).toBe(7);
        // 빠른 기사가 먼저 커밋되고 먼저 번호를 받는다
        expect(units.map((u) => [u.article.articleId, u.article.url])).toEqual([[1, url(2)], [2, url(1)]]);
        for (const unit of units) {
            expect(unit.comments.every((c) => c.articleId === unit.article.articleId)).toBe(true);
        }
        const ids = units.flatMap((u) => u.comments.map((c) => c.commentId));
        expect(new Set(ids).size).toBe(7);
        const slow = units[1].comments;
        expect(slow.map((c) => c.commentId)).toEqual([...slow.map((c) => c.commentId)].sort((p, q) => p - q));
        expect(slow.map((c) => c.replyCount)).toEqual([2, 0, 0, 0]);
    });

    it('stops dispatching and rethrows when the output fails', async () => {
        const failing: UnitSink = {
            write: async (_unit: ArticleUnit) => {
                throw new WriteError('disk full');
            },
        };
        const { scheduler, extractor } = setup({ [url(1)]: {}, [url(2)]: {} }, { sink: failing });

        await expect(scheduler.run([url(1), url(2)])).rejects.toThrow('disk full');
        expect(extractor.loads.has(url(2))).toBe(false);
    });

    it('starts nothing once the run is cancelled', async () => {
        const { scheduler, units, extractor } = setup({ [url(1)]: {}, [url(2)]: {} });
        const controller = new AbortController();
        controller.abort();

        const summary = await scheduler.run([url(1), url(2)], { signal: controller.signal });

        expect(summary.cancelled).toBe(true);
        expect(summary.succeeded).toBe(0);
        expect(summary.interrupted).toEqual([url(1), url(2)]);
        expect(extractor.loads.size).toBe(0);
        expect(units).toEqual([]);
    });

    it('rejects a non-positive worker count', () => {
        expect(() => setup({}, { maxWorkers: 0 })).toThrow(RangeError);
    });
});
