/**
 * ---------------------------------------------------------------------------
 * 크롤링 오류 분류
 *
 *  • LoadError        : 페이지 이동/타임아웃, stale 추출 → 기사 단위 재시도
 *  • ExtractionError  : 개별 필드 추출 실패 → 해당 필드만 unset, 기사 계속 진행
 *  • PaginationError  : 댓글 페이지 로드 실패 → 기사 단위 재시도 (댓글 단위 X)
 *  • HierarchyError   : 부모를 찾지 못한 답글 → 정책대로 처리, 절대 치명적이지 않음
 *  • WriteError       : 출력 I/O 실패 → 실행 전체 중단
 * ---------------------------------------------------------------------------
 */

export type CrawlErrorKind =
    | 'load'
    | 'extraction'
    | 'pagination'
    | 'hierarchy'
    | 'write'
    | 'cancelled'
    | 'config';

export interface CrawlErrorOptions {
    cause?: unknown;
    url?: string;
}

export abstract class CrawlError extends Error {
    abstract readonly kind: CrawlErrorKind;
    abstract readonly retryable: boolean;
    readonly url?: string;

    constructor(message: string, options: CrawlErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = new.target.name;
        this.url = options.url;
    }
}

export class LoadError extends CrawlError {
    readonly kind = 'load';
    readonly retryable = true;
}

export class ExtractionError extends CrawlError {
    readonly kind = 'extraction';
    readonly retryable = false;

    constructor(readonly field: string, message: string, options: CrawlErrorOptions = {}) {
        super(`${field}: ${message}`, options);
    }
}

export class PaginationError extends CrawlError {
    readonly kind = 'pagination';
    readonly retryable = true;
}

export class HierarchyError extends CrawlError {
    readonly kind = 'hierarchy';
    readonly retryable = false;

    constructor(readonly siteId: string, message: string, options: CrawlErrorOptions = {}) {
        super(message, options);
    }
}

export class WriteError extends CrawlError {
    readonly kind = 'write';
    readonly retryable = false;
}

/** 실행 취소(SIGINT 등). 종류상 재시도 가능하지만 취소된 실행에서는 재시도하지 않는다. */
export class CancelledError extends CrawlError {
    readonly kind = 'cancelled';
    readonly retryable = true;
}

export class ConfigError extends CrawlError {
    readonly kind = 'config';
    readonly retryable = false;
}

/** CrawlError가 아닌 오류(브라우저 원시 오류 등)는 일시적인 것으로 보고 재시도한다. */
export function isRetryable(err: unknown): boolean {
    if (err instanceof CrawlError) return err.retryable;
    return true;
}

/** 로그/요약용 한 줄 사유 */
export function describeError(err: unknown): string {
    if (err instanceof CrawlError) return `${err.name}: ${err.message}`;
    if (err instanceof Error) return `${err.name}: ${err.message.split('\n')[0]}`;
    return String(err);
}
