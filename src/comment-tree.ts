import { log as rootLog, type Log } from 'crawlee';
import { CancelledError, HierarchyError } from './errors.js';
import { extractCount, normalizeSiteDate } from './format.js';
import type { Sequencer } from './sequencer.js';
import type { Clock } from './timing.js';
import type {
    CommentCursor,
    CommentPage,
    DataQualityKind,
    DataQualityNote,
    DraftComment,
    RawCommentRecord,
} from './types.js';

/**
 * ---------------------------------------------------------------------------
 * 댓글 트리 구성기
 *
 *  - 페이지 단위로 들어오는 평면 댓글 스트림을 2단계(댓글/답글) 구조로 복원한다.
 *  - comment_id 는 레코드를 처음 본 순서대로 Sequencer 에서 받는다.
 *  - 답글의 답글은 가장 가까운 최상위 조상 아래로 평탄화한다.
 *  - 부모를 찾지 못한 답글(orphan)은 정책(drop | promote)대로 처리하고 기록만 남긴다.
 * ---------------------------------------------------------------------------
 */

export type OrphanPolicy = 'drop' | 'promote';

export interface CommentTreeOptions {
    orphanPolicy: OrphanPolicy;
    /** 상대 시간("5분 전") 해석 기준 */
    now: number;
    log?: Log;
}

export interface PaginationLimits {
    maxPages: number;
    maxMillis: number;
    clock: Clock;
    signal?: AbortSignal;
}

/** 스트림이 끝난 이유 */
export type PaginationEnd = 'end-marker' | 'no-new-records' | 'page-ceiling' | 'time-ceiling';

export type CommentPageFetcher = (cursor: CommentCursor) => Promise<CommentPage>;

interface ThreadEntry {
    commentId: number;
    /** 최상위 조상의 comment_id (최상위 댓글이면 자기 자신) */
    rootCommentId: number;
}

export class CommentTreeBuilder {
    private readonly entries = new Map<string, ThreadEntry>();
    private readonly dropped = new Set<string>();
    private readonly topLevel = new Map<number, DraftComment>();
    private readonly comments: DraftComment[] = [];
    private readonly notes: DataQualityNote[] = [];
    private readonly log: Log;
    private duplicates = 0;

    constructor(private readonly sequencer: Sequencer, private readonly options: CommentTreeOptions) {
        this.log = options.log ?? rootLog.child({ prefix: 'CommentTree' });
    }

    /**
     * 레코드 묶음을 스트림 순서대로 반영한다.
     * @returns 이번 묶음에서 처음 본 레코드 수 (중복 제외)
     */
    add(records: readonly RawCommentRecord[]): number {
        let fresh = 0;
        for (const record of records) {
            const siteId = record.siteId.trim();
            if (!siteId) {
                this.note('hierarchy', 'comment record without site id skipped');
                continue;
            }
            if (this.entries.has(siteId) || this.dropped.has(siteId)) {
                this.duplicates += 1;
                continue;
            }
            fresh += 1;

            const parentSiteId = record.parentSiteId?.trim();
            if (!parentSiteId || parentSiteId === siteId) {
                this.addTopLevel(siteId, record);
                continue;
            }

            const parent = this.entries.get(parentSiteId);
            if (parent) {
                if (parent.commentId !== parent.rootCommentId) {
                    this.log.debug(`reply ${siteId} flattened: ${parentSiteId} is itself a reply`);
                }
                this.addReply(siteId, record, parent.rootCommentId);
                continue;
            }

            const orphan = new HierarchyError(siteId, `parent ${parentSiteId} of reply ${siteId} not seen`);
            if (this.options.orphanPolicy === 'promote') {
                this.note('hierarchy', `${orphan.message}; kept as top-level comment`);
                this.addTopLevel(siteId, record);
            } else {
                this.note('hierarchy', `${orphan.message}; dropped`);
                this.dropped.add(siteId);
            }
        }
        return fresh;
    }

    /**
     * fetchPage 를 커서 0부터 반복 호출해 스트림을 끝까지 소비한다.
     * 종료 조건: 다음 커서 없음, 새 레코드 없음(전부 이미 본 레코드), 페이지/시간 상한.
     * fetchPage 의 실패는 그대로 전파된다 (기사 단위 재시도 대상).
     */
    async consume(fetchPage: CommentPageFetcher, limits: PaginationLimits): Promise<PaginationEnd> {
        const startedAt = limits.clock.now();
        let cursor: CommentCursor | null = 0;
        let pages = 0;

        while (cursor !== null) {
            if (limits.signal?.aborted) throw new CancelledError('run cancelled during comment pagination');
            if (pages >= limits.maxPages) {
                this.note('pagination', `comment page ceiling reached (${limits.maxPages} pages)`);
                return 'page-ceiling';
            }
            if (limits.clock.now() - startedAt >= limits.maxMillis) {
                this.note('pagination', `comment time ceiling reached (${limits.maxMillis}ms)`);
                return 'time-ceiling';
            }

            const page: CommentPage = await fetchPage(cursor);
            pages += 1;
            const fresh = this.add(page.records);
            // site id 가 없는 레코드는 중복 여부를 알 수 없으므로 종료 판단에서 새 레코드로 친다
            const unidentified = page.records.filter((r) => !r.siteId.trim()).length;
            this.log.debug(`comment page ${pages}: ${page.records.length} records, ${fresh} new`);
            if (fresh === 0 && unidentified === 0) return 'no-new-records';
            cursor = page.next;
        }
        return 'end-marker';
    }

    /** 최초 관측 순서(= comment_id 순서)의 댓글 목록 */
    build(): DraftComment[] {
        return this.comments.map((c) => ({ ...c }));
    }

    issues(): DataQualityNote[] {
        const out = [...this.notes];
        if (this.duplicates > 0) {
            out.push({ kind: 'duplicate', message: `${this.duplicates} duplicate comment records ignored` });
        }
        return out;
    }

    private addTopLevel(siteId: string, record: RawCommentRecord): void {
        const commentId = this.sequencer.nextCommentId();
        const comment = this.toDraft(record, commentId);
        this.entries.set(siteId, { commentId, rootCommentId: commentId });
        this.topLevel.set(commentId, comment);
        this.comments.push(comment);
    }

    private addReply(siteId: string, record: RawCommentRecord, rootCommentId: number): void {
        const root = this.topLevel.get(rootCommentId);
        if (!root) throw new Error(`top-level comment ${rootCommentId} missing from thread index`);
        const commentId = this.sequencer.nextCommentId();
        const comment = this.toDraft(record, commentId, rootCommentId);
        this.entries.set(siteId, { commentId, rootCommentId });
        root.replyCount += 1;
        this.comments.push(comment);
    }

    private toDraft(record: RawCommentRecord, commentId: number, parentCommentId?: number): DraftComment {
        const deleted = record.deleted === true;
        return {
            commentId,
            parentCommentId,
            commentType: parentCommentId === undefined ? 'comment' : 'reply',
            content: record.content,
            author: record.author,
            likeCount: deleted ? 0 : extractCount(record.likeCount) ?? 0,
            dislikeCount: deleted ? 0 : extractCount(record.dislikeCount) ?? 0,
            replyCount: 0,
            createdAt: this.createdAt(record),
        };
    }

    private createdAt(record: RawCommentRecord): string {
        const normalized = normalizeSiteDate(record.createdAt, this.options.now);
        if (normalized) return normalized;
        const raw = record.createdAt.trim();
        this.note('date', `comment ${record.siteId}: unrecognised date "${raw}" kept as-is`);
        return raw;
    }

    private note(kind: DataQualityKind, message: string): void {
        this.notes.push({ kind, message });
        if (kind === 'date') this.log.debug(message);
        else this.log.warning(message);
    }
}
