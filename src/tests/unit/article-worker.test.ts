import { describe, expect, it, vi } from 'vitest';
import { ArticleWorker, assembleUnit, normalizeArticleFields, type WorkerOptions } from '../../article-worker.js';
import { PolitenessGate } from '../../politeness.js';
import { Sequencer } from '../../sequencer.js';
import { FakeExtractor, ManualClock, WORKER_DEFAULTS, rc, type FakeArticle } from '../helpers/fakes.js';

const URL_A = 'https://n.news.naver.com/article/001/0000000001';
const NOW = Date.UTC(2024, 4, 1, 3, 0, 0);

const THREADS = [
    [rc('a'), rc('a1', 'a'), rc('a2', 'a')],
    [rc('a3', 'a'), rc('b'), rc('b1', 'b')],
];

function setup(article: FakeArticle, options: Partial<WorkerOptions> = {}) {
    const extractor = new FakeExtractor({ [URL_A]: article });
    const sequencer = new Sequencer();
    const clock = new ManualClock(NOW);
    const worker = new ArticleWorker(
        extractor,
        sequencer,
        new PolitenessGate(0, clock),
        { ...WORKER_DEFAULTS, ...options },
        clock,
    );
    return { extractor, sequencer, clock, worker };
}

describe('normalizeArticleFields', () => {
    it('parses counts, ratios and dates and leaves unparseable values unset', () => {
        const { fields, notes } = normalizeArticleFields(
            {
                title: '  제목  ',
                content: '',
                likeCount: '1,234',
                femaleRatio: '45%',
                maleRatio: 'abc',
                publishDate: '2024.05.01. 오후 3:20',
            },
            NOW,
        );
        expect(fields).toEqual({ title: '제목', likeCount: 1234, femaleRatio: 45, publishDate: '2024-05-01 15:20:00' });
        expect(notes).toEqual([{ kind: 'field', message: 'maleRatio: unparseable value "abc" left unset' }]);
    });

    it('keeps zero distinct from unset', () => {
        const { fields } = normalizeArticleFields({ title: 't', age10sRatio: '0%' }, NOW);
        expect(fields.age10sRatio).toBe(0);
        expect(fields.age20sRatio).toBeUndefined();
    });
});

describe('assembleUnit', () => {
    it('stamps the article id and scrape time on the article and every comment', () => {
        const unit = assembleUnit(
            {
                url: URL_A,
                fields: { title: 't' },
                comments: [{ commentId: 4, commentType: 'comment', content: 'c', author: 'u', likeCount: 0, dislikeCount: 0, replyCount: 0, createdAt: '2024-05-01 10:00:00' }],
                scrapedAt: '2024-05-01 12:00:00',
                notes: [],
            },
            9,
        );
        expect(unit.article).toEqual({ articleId: 9, url: URL_A, title: 't', scrapedAt: '2024-05-01 12:00:00' });
        expect(unit.comments[0]).toMatchObject({ articleId: 9, commentId: 4, scrapedAt: '2024-05-01 12:00:00' });
    });
});

describe('ArticleWorker', () => {
    it('extracts metadata and the whole comment tree', async () => {
        const { worker, extractor } = setup({ fields: { title: '기사', commentCount: '6' }, pages: THREADS });

        const result = await worker.process(URL_A);
        if (result.status !== 'completed') throw new Error(`expected completion, got ${result.reason}`);
        expect(result.attempts).toBe(1);
        expect(result.draft.fields).toEqual({ title: '기사', commentCount: 6 });
        expect(result.draft.scrapedAt).toBe('2024-05-01 12:00:00');
        expect(result.draft.comments.map((c) => c.replyCount)).toEqual([3, 0, 0, 0, 1, 0]);
        expect(result.draft.comments.map((c) => c.parentCommentId)).toEqual([undefined, 1, 1, 1, undefined, 5]);
        expect(extractor.closed).toBe(1);
    });

    it('retries transient load failures with exponential backoff', async () => {
        const { worker, clock } = setup({ loadFailures: 2 }, { maxAttempts: 3, backoffMs: 1_000 });
        const onRetryScheduled = vi.fn();
        const onRetryStarted = vi.fn();

        const result = await worker.process(URL_A, { onRetryScheduled, onRetryStarted });
        expect(result.status).toBe('completed');
        expect(result.attempts).toBe(3);
        expect(onRetryScheduled.mock.calls).toEqual([
            [1, 'LoadError: Error: boom 1', 1_000],
            [2, 'LoadError: Error: boom 2', 2_000],
        ]);
        expect(onRetryStarted.mock.calls).toEqual([[2], [3]]);
        expect(clock.sleeps.filter((ms) => ms > 0)).toEqual([1_000, 2_000]);
    });

    it('reports a permanent failure once attempts are exhausted', async () => {
        const { worker, extractor } = setup({ loadFailures: 5 }, { maxAttempts: 2 });

        const result = await worker.process(URL_A);
        expect(result).toEqual({ status: 'failed', reason: 'LoadError: Error: boom 2', attempts: 2, cancelled: false });
        expect(extractor.loads.get(URL_A)).toBe(2);
    });

    it('releases a page that finishes loading after the timeout', async () => {
        const { worker, extractor } = setup({ loadDelayMs: 80 }, { requestTimeoutMs: 20, maxAttempts: 1 });

        const result = await worker.process(URL_A);
        expect(result).toEqual({
            status: 'failed',
            reason: 'LoadError: page load timed out after 20ms',
            attempts: 1,
            cancelled: false,
        });
        await vi.waitFor(() => expect(extractor.closed).toBe(1));
    });

    it('re-runs extraction from scratch after a pagination failure, leaving an id gap', async () => {
        const { worker, sequencer } = setup({ pages: THREADS, failPageOnAttempts: [1] });

        const result = await worker.process(URL_A);
        if (result.status !== 'completed') throw new Error('expected completion');
        expect(result.attempts).toBe(2);
        // 첫 시도에서 받은 1..3 은 버려진다
        expect(result.draft.comments.map((c) => c.commentId)).toEqual([4, 5, 6, 7, 8, 9]);
        expect(result.draft.comments.map((c) => c.parentCommentId)).toEqual([undefined, 4, 4, 4, undefined, 8]);
        expect(result.draft.comments.map((c) => c.replyCount)).toEqual([3, 0, 0, 0, 1, 0]);
        expect(sequencer.snapshot().lastCommentId).toBe(9);
    });

    it('treats a missing title as a stale extraction', async () => {
        const { worker } = setup({ fields: { content: 'body only' } }, { maxAttempts: 2 });

        const result = await worker.process(URL_A);
        expect(result).toEqual({
            status: 'failed',
            reason: 'LoadError: stale extraction: article title missing',
            attempts: 2,
            cancelled: false,
        });
    });

    it('sets comment_count to 0 or unset when there is no comment section', async () => {
        const zero = await setup({ fields: { title: 't' } }, { emptyCommentCount: 'zero' }).worker.process(URL_A);
        const empty = await setup({ fields: { title: 't', commentCount: '0' } }, { emptyCommentCount: 'empty' }).worker.process(URL_A);
        if (zero.status !== 'completed' || empty.status !== 'completed') throw new Error('expected completion');

        expect(zero.draft.fields.commentCount).toBe(0);
        expect(zero.draft.comments).toEqual([]);
        expect(empty.draft.fields.commentCount).toBeUndefined();
    });

    it('fails as cancelled without retrying when the run is aborted', async () => {
        const { worker, extractor } = setup({ pages: THREADS });
        const controller = new AbortController();
        controller.abort();

        const result = await worker.process(URL_A, { signal: controller.signal });
        expect(result).toEqual({ status: 'failed', reason: 'cancelled', attempts: 1, cancelled: true });
        expect(extractor.loads.size).toBe(0);
    });

    it('gives up at once on an unknown page', async () => {
        const extractor = new FakeExtractor({});
        const clock = new ManualClock(NOW);
        const worker = new ArticleWorker(extractor, new Sequencer(), new PolitenessGate(0, clock), WORKER_DEFAULTS, clock);

        const result = await worker.process(URL_A);
        expect(result.status).toBe('failed');
        expect(result.attempts).toBe(3);
    });
});
