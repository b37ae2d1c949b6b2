import { log as rootLog, type Log } from 'crawlee';
import { CommentTreeBuilder, type OrphanPolicy } from './comment-tree.js';
import {
    CancelledError,
    CrawlError,
    LoadError,
    PaginationError,
    WriteError,
    describeError,
    isRetryable,
} from './errors.js';
import { extractCount, formatTimestamp, normalizeSiteDate, parseRatio } from './format.js';
import type { PolitenessGate } from './politeness.js';
import type { Sequencer } from './sequencer.js';
import { systemClock, withTimeout, type Clock } from './timing.js';
import type {
    ArticleDraft,
    ArticleFields,
    ArticleUnit,
    CountField,
    DataQualityNote,
    DraftComment,
    ExtractorPort,
    RatioField,
    RawArticleFields,
    TextField,
} from './types.js';

/** 댓글 영역이 없는 기사의 comment_count 표기 */
export type EmptyCommentCountPolicy = 'zero' | 'empty';

export interface WorkerOptions {
    /** 첫 시도 포함 최대 시도 횟수 */
    maxAttempts: number;
    /** n번째 재시도 전 대기 = backoffMs * 2^(n-1) */
    backoffMs: number;
    requestTimeoutMs: number;
    maxCommentPages: number;
    maxCommentMillis: number;
    requireTitle: boolean;
    emptyCommentCount: EmptyCommentCountPolicy;
    orphanPolicy: OrphanPolicy;
}

export interface WorkerHooks {
    signal?: AbortSignal;
    /** 재시도 대기 시작 (in_progress → retrying) */
    onRetryScheduled?: (attempt: number, reason: string, waitMs: number) => void;
    /** 재시도 시작 (retrying → in_progress) */
    onRetryStarted?: (attempt: number) => void;
}

export type WorkerResult =
    | { status: 'completed'; draft: ArticleDraft; attempts: number }
    | { status: 'failed'; reason: string; attempts: number; cancelled: boolean };

const TEXT_FIELDS: readonly TextField[] = ['title', 'content', 'author', 'category'];
const COUNT_FIELDS: readonly CountField[] = [
    'likeCount', 'commentCount', 'activeCommentCount', 'deletedCommentCount', 'removedCommentCount',
];
const RATIO_FIELDS: readonly RatioField[] = [
    'maleRatio', 'femaleRatio',
    'age10sRatio', 'age20sRatio', 'age30sRatio', 'age40sRatio', 'age50sRatio', 'age60plusRatio',
];

/**
 * 원문 필드 → 정규화 필드. 값이 있는데 해석되지 않으면 unset + 기록.
 */
export function normalizeArticleFields(raw: RawArticleFields, now: number): { fields: ArticleFields; notes: DataQualityNote[] } {
    const fields: ArticleFields = {};
    const notes: DataQualityNote[] = [];
    const reject = (name: string, value: string) =>
        notes.push({ kind: 'field', message: `${name}: unparseable value "${value}" left unset` });

    for (const key of TEXT_FIELDS) {
        const value = raw[key]?.trim();
        if (value) fields[key] = value;
    }

    const publishRaw = raw.publishDate?.trim();
    if (publishRaw) {
        const publishDate = normalizeSiteDate(publishRaw, now);
        if (publishDate) fields.publishDate = publishDate;
        else reject('publishDate', publishRaw);
    }

    for (const key of COUNT_FIELDS) {
        const value = raw[key]?.trim();
        if (!value) continue;
        const count = extractCount(value);
        if (count === undefined) reject(key, value);
        else fields[key] = count;
    }

    for (const key of RATIO_FIELDS) {
        const value = raw[key]?.trim();
        if (!value) continue;
        const ratio = parseRatio(value);
        if (ratio === undefined) reject(key, value);
        else fields[key] = ratio;
    }

    return { fields, notes };
}

/** 성공한 초안에 기사 ID 를 붙여 Writer 단위로 만든다. 호출 즉시 Writer 에 넘겨야 커밋 순서가 ID 순서와 같아진다. */
export function assembleUnit(draft: ArticleDraft, articleId: number): ArticleUnit {
    return {
        article: { articleId, url: draft.url, ...draft.fields, scrapedAt: draft.scrapedAt },
        comments: draft.comments.map((c) => ({ articleId, ...c, scrapedAt: draft.scrapedAt })),
    };
}

/**
 * ---------------------------------------------------------------------------
 * 기사 워커: URL 하나를 완료 또는 최종 실패까지 처리한다.
 *
 *  - 재시도는 매번 처음부터 (부분 진행 이어받기 없음). 폐기된 시도의 comment_id 는 버려진다.
 *  - 기사 ID 는 여기서 붙이지 않는다 → assembleUnit()
 * ---------------------------------------------------------------------------
 */
export class ArticleWorker<H> {
    private readonly log: Log;

    constructor(
        private readonly extractor: ExtractorPort<H>,
        private readonly sequencer: Sequencer,
        private readonly gate: PolitenessGate,
        private readonly options: WorkerOptions,
        private readonly clock: Clock = systemClock,
        log?: Log,
    ) {
        this.log = log ?? rootLog.child({ prefix: 'Worker' });
    }

    async process(url: string, hooks: WorkerHooks = {}): Promise<WorkerResult> {
        const { signal } = hooks;
        for (let attempt = 1; ; attempt++) {
            if (attempt > 1) hooks.onRetryStarted?.(attempt);
            try {
                const draft = await this.attempt(url, signal);
                return { status: 'completed', draft, attempts: attempt };
            } catch (err) {
                if (err instanceof WriteError) throw err;
                const reason = describeError(err);
                if (signal?.aborted || err instanceof CancelledError) {
                    return { status: 'failed', reason: 'cancelled', attempts: attempt, cancelled: true };
                }
                if (!isRetryable(err) || attempt >= this.options.maxAttempts) {
                    this.log.error(`giving up on ${url} after ${attempt} attempt(s): ${reason}`);
                    return { status: 'failed', reason, attempts: attempt, cancelled: false };
                }

                const waitMs = this.options.backoffMs * 2 ** (attempt - 1);
                this.log.warning(`attempt ${attempt}/${this.options.maxAttempts} failed for ${url}: ${reason} (retry in ${waitMs}ms)`);
                hooks.onRetryScheduled?.(attempt, reason, waitMs);
                try {
                    await this.clock.sleep(waitMs, signal);
                } catch (sleepErr) {
                    if (sleepErr instanceof CancelledError) {
                        return { status: 'failed', reason: 'cancelled', attempts: attempt, cancelled: true };
                    }
                    throw sleepErr;
                }
            }
        }
    }

    /** 한 번의 시도: 로드 → 메타데이터 → 댓글 → 초안 */
    private async attempt(url: string, signal?: AbortSignal): Promise<ArticleDraft> {
        const timeoutMs = this.options.requestTimeoutMs;
        const startedAt = this.clock.now();

        await this.gate.wait(signal);
        const loading = this.extractor.load(url);
        const handle = await withTimeout(
            loading,
            timeoutMs,
            () => {
                // 제한 시간이 지난 뒤에 끝난 로드도 페이지는 닫는다
                void loading
                    .then((late) => this.extractor.close(late))
                    .catch((err: unknown) => this.log.debug(`late page for ${url} not released: ${describeError(err)}`));
                return new LoadError(`page load timed out after ${timeoutMs}ms`, { url });
            },
        ).catch((err: unknown) => {
            throw err instanceof CrawlError ? err : new LoadError(describeError(err), { url, cause: err });
        });

        try {
            const metadata = await withTimeout(
                this.extractor.extractMetadata(handle),
                timeoutMs,
                () => new LoadError(`metadata extraction timed out after ${timeoutMs}ms`, { url }),
            );
            const { fields, notes } = normalizeArticleFields(metadata.fields, startedAt);
            for (const issue of metadata.issues) notes.push({ kind: 'field', message: issue.message });
            for (const note of notes) this.log.debug(`${url} ${note.message}`);

            if (this.options.requireTitle && !fields.title) {
                throw new LoadError('stale extraction: article title missing', { url });
            }

            let comments: DraftComment[] = [];
            if (await this.extractor.hasComments(handle)) {
                const builder = new CommentTreeBuilder(this.sequencer, {
                    orphanPolicy: this.options.orphanPolicy,
                    now: startedAt,
                });
                const end = await builder.consume(
                    async (cursor) => {
                        await this.gate.wait(signal);
                        return withTimeout(
                            this.extractor.fetchCommentPage(handle, cursor),
                            timeoutMs,
                            () => new PaginationError(`comment page ${cursor} timed out after ${timeoutMs}ms`, { url }),
                        ).catch((err: unknown) => {
                            throw err instanceof CrawlError ? err : new PaginationError(describeError(err), { url, cause: err });
                        });
                    },
                    {
                        maxPages: this.options.maxCommentPages,
                        maxMillis: this.options.maxCommentMillis,
                        clock: this.clock,
                        signal,
                    },
                );
                comments = builder.build();
                notes.push(...builder.issues());
                this.log.debug(`${url}: ${comments.length} comments (${end})`);
            } else if (this.options.emptyCommentCount === 'zero') {
                fields.commentCount ??= 0;
            } else {
                fields.commentCount = undefined;
            }

            return { url, fields, comments, scrapedAt: formatTimestamp(this.clock.now()), notes };
        } finally {
            await this.extractor.close(handle).catch((err: unknown) =>
                this.log.warning(`failed to release page for ${url}: ${describeError(err)}`));
        }
    }
}
