export interface SequencerState {
    lastArticleId: number;
    lastCommentId: number;
}

/**
 * article_id / comment_id 발급기.
 *
 * 두 카운터 모두 1부터 단조 증가하며 실행 전체에서 공유된다. 이벤트 루프가 하나뿐이므로
 * next*() 호출 하나하나가 원자적이고, 여러 워커가 번갈아 호출해도 값이 겹치지 않는다.
 * 폐기된 작업(재시도 소진, 재시도 전 시도)이 받아 간 ID 는 다시 쓰지 않는다 → 출력에 ID 간격이 생길 수 있다.
 */
export class Sequencer {
    private lastArticleId: number;
    private lastCommentId: number;

    constructor(start: SequencerState = { lastArticleId: 0, lastCommentId: 0 }) {
        if (!Number.isInteger(start.lastArticleId) || start.lastArticleId < 0
            || !Number.isInteger(start.lastCommentId) || start.lastCommentId < 0) {
            throw new RangeError(`invalid sequencer state: ${JSON.stringify(start)}`);
        }
        this.lastArticleId = start.lastArticleId;
        this.lastCommentId = start.lastCommentId;
    }

    nextArticleId(): number {
        this.lastArticleId += 1;
        return this.lastArticleId;
    }

    nextCommentId(): number {
        this.lastCommentId += 1;
        return this.lastCommentId;
    }

    snapshot(): SequencerState {
        return { lastArticleId: this.lastArticleId, lastCommentId: this.lastCommentId };
    }
}
