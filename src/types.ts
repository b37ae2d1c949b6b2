import type { ExtractionError } from './errors.js';

// ===[ 원시 추출 결과 (Extractor Port → 코어) ]===============================

/** 기사 페이지에서 읽어 온 원문 텍스트. 각 필드는 독립적으로 없을 수 있다. */
export interface RawArticleFields {
    title?: string;
    content?: string;
    author?: string;
    publishDate?: string;
    category?: string;
    likeCount?: string;
    commentCount?: string;
    activeCommentCount?: string;
    deletedCommentCount?: string;
    removedCommentCount?: string;
    maleRatio?: string;
    femaleRatio?: string;
    age10sRatio?: string;
    age20sRatio?: string;
    age30sRatio?: string;
    age40sRatio?: string;
    age50sRatio?: string;
    age60plusRatio?: string;
}

export interface ExtractedMetadata {
    fields: RawArticleFields;
    /** 필드 단위 실패. 기사 처리는 계속된다. */
    issues: ExtractionError[];
}

/** 댓글 스트림의 레코드 하나 (사이트 고유 ID 기준) */
export interface RawCommentRecord {
    siteId: string;
    /** 답글일 때만 존재 */
    parentSiteId?: string;
    content: string;
    author: string;
    likeCount?: string;
    dislikeCount?: string;
    createdAt: string;
    deleted?: boolean;
}

/** 0 = 첫 페이지(댓글 뷰 진입), 이후는 "더보기" 횟수 */
export type CommentCursor = number;

export interface CommentPage {
    records: RawCommentRecord[];
    /** null 이면 스트림 끝 */
    next: CommentCursor | null;
}

/**
 * 사이트/버전별 추출기 인터페이스. 코어는 셀렉터 문자열을 알지 못한다.
 * H 는 로드된 페이지 핸들 타입.
 */
export interface ExtractorPort<H> {
    load(url: string): Promise<H>;
    extractMetadata(handle: H): Promise<ExtractedMetadata>;
    hasComments(handle: H): Promise<boolean>;
    fetchCommentPage(handle: H, cursor: CommentCursor): Promise<CommentPage>;
    close(handle: H): Promise<void>;
}

// ===[ 정규화된 엔티티 ]======================================================

export type RatioField =
    | 'maleRatio'
    | 'femaleRatio'
    | 'age10sRatio'
    | 'age20sRatio'
    | 'age30sRatio'
    | 'age40sRatio'
    | 'age50sRatio'
    | 'age60plusRatio';

export type CountField =
    | 'likeCount'
    | 'commentCount'
    | 'activeCommentCount'
    | 'deletedCommentCount'
    | 'removedCommentCount';

export type TextField = 'title' | 'content' | 'author' | 'publishDate' | 'category';

/** undefined = unset (0 과 구분된다) */
export type ArticleFields =
    & { [K in TextField]?: string }
    & { [K in CountField]?: number }
    & { [K in RatioField]?: number };

export interface Article extends ArticleFields {
    articleId: number;
    url: string;
    /** YYYY-MM-DD HH:MM:SS (KST), 추출 완료 시점 */
    scrapedAt: string;
}

export type CommentType = 'comment' | 'reply';

export interface Comment {
    articleId: number;
    commentId: number;
    /** 최상위 댓글이면 없음 */
    parentCommentId?: number;
    commentType: CommentType;
    content: string;
    author: string;
    likeCount: number;
    dislikeCount: number;
    replyCount: number;
    createdAt: string;
    scrapedAt: string;
}

/** 기사 ID가 붙기 전, 추출이 끝난 댓글 */
export type DraftComment = Omit<Comment, 'articleId' | 'scrapedAt'>;

export type DataQualityKind = 'field' | 'hierarchy' | 'duplicate' | 'pagination' | 'date';

export interface DataQualityNote {
    kind: DataQualityKind;
    message: string;
}

/** 한 번의 성공한 시도 결과. 기사 ID는 아직 없다. */
export interface ArticleDraft {
    url: string;
    fields: ArticleFields;
    comments: DraftComment[];
    scrapedAt: string;
    notes: DataQualityNote[];
}

/** Writer 로 넘어가는 원자적 단위 */
export interface ArticleUnit {
    article: Article;
    comments: Comment[];
}

/** 완성된 단위를 영속화하는 쪽 (직렬 쓰기) */
export interface UnitSink {
    write(unit: ArticleUnit): Promise<void>;
}
