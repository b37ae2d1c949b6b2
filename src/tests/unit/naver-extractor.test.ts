import { describe, expect, it } from 'vitest';
import { ConfigSchema } from '../../config.js';
import {
    ageFieldFor,
    parseDataInfo,
    statFieldFor,
    toRawComment,
    type CommentNodeSnapshot,
} from '../../naver-extractor.js';

const labels = ConfigSchema.parse({}).ui_labels;

const node = (dataInfo: string | null, extra: Partial<CommentNodeSnapshot> = {}): CommentNodeSnapshot => ({
    dataInfo,
    content: '좋은 기사네요',
    author: 'abcd****',
    deletedAuthor: '',
    like: '12',
    dislike: '3',
    dateValue: '2024-05-01T15:20:11+0900',
    dateText: '2024.05.01. 15:20',
    ...extra,
});

describe('parseDataInfo', () => {
    it('reads the comment identity fields', () => {
        expect(parseDataInfo("{commentNo:'745', parentCommentNo:'700', replyLevel:2, deleted:false}")).toEqual({
            commentNo: '745',
            parentCommentNo: '700',
            replyLevel: 2,
            deleted: false,
        });
    });

    it('defaults the reply level and deleted flag', () => {
        expect(parseDataInfo("commentNo:'12'")).toEqual({
            commentNo: '12',
            parentCommentNo: undefined,
            replyLevel: 1,
            deleted: false,
        });
    });

    it('accepts double quotes and a deleted flag', () => {
        expect(parseDataInfo('{commentNo:"9", replyLevel:1, deleted:true}')?.deleted).toBe(true);
    });

    it('returns undefined without a comment number', () => {
        expect(parseDataInfo(null)).toBeUndefined();
        expect(parseDataInfo('')).toBeUndefined();
        expect(parseDataInfo("{parentCommentNo:'1', replyLevel:1}")).toBeUndefined();
    });
});

describe('toRawComment', () => {
    it('treats a top-level comment as its own parent', () => {
        expect(toRawComment(node("{commentNo:'745', parentCommentNo:'745', replyLevel:1, deleted:false}"), labels)).toEqual({
            siteId: '745',
            parentSiteId: undefined,
            content: '좋은 기사네요',
            author: 'abcd****',
            likeCount: '12',
            dislikeCount: '3',
            createdAt: '2024-05-01T15:20:11+0900',
            deleted: false,
        });
    });

    it('links a reply to its parent', () => {
        const record = toRawComment(node("{commentNo:'800', parentCommentNo:'745', replyLevel:2, deleted:false}"), labels);
        expect(record?.parentSiteId).toBe('745');
    });

    it('replaces deleted comment content and drops its counters', () => {
        const record = toRawComment(
            node("{commentNo:'801', parentCommentNo:'801', replyLevel:1, deleted:true}", { content: '', like: '', dislike: '' }),
            labels,
        );
        expect(record).toMatchObject({ siteId: '801', content: '삭제된 댓글입니다', deleted: true });
        expect(record?.likeCount).toBeUndefined();
        expect(record?.dislikeCount).toBeUndefined();
    });

    it('reads the author of a deleted comment from its own selector', () => {
        const record = toRawComment(
            node("{commentNo:'802', replyLevel:1, deleted:true}", { author: '', deletedAuthor: 'efgh****' }),
            labels,
        );
        expect(record?.author).toBe('efgh****');
    });

    it('keeps the regular author when the deleted-author selector finds nothing', () => {
        const record = toRawComment(node("{commentNo:'803', replyLevel:1, deleted:true}", { deletedAuthor: '' }), labels);
        expect(record?.author).toBe('abcd****');
    });

    it('ignores the deleted-author value on live comments', () => {
        const record = toRawComment(node("{commentNo:'804', replyLevel:1, deleted:false}", { deletedAuthor: 'efgh****' }), labels);
        expect(record?.author).toBe('abcd****');
    });

    it('falls back to the displayed date', () => {
        const record = toRawComment(node("commentNo:'5'", { dateValue: null }), labels);
        expect(record?.createdAt).toBe('2024.05.01. 15:20');
    });

    it('skips nodes without data-info', () => {
        expect(toRawComment(node(null), labels)).toBeUndefined();
    });
});

describe('label lookups', () => {
    it('maps age bar labels to ratio fields', () => {
        expect(ageFieldFor('10대', labels)).toBe('age10sRatio');
        expect(ageFieldFor('60대 이상', labels)).toBe('age60plusRatio');
        expect(ageFieldFor('기타', labels)).toBeUndefined();
    });

    it('maps comment stat titles to count fields', () => {
        expect(statFieldFor('현재 댓글', labels)).toBe('activeCommentCount');
        expect(statFieldFor('작성자 삭제', labels)).toBe('deletedCommentCount');
        expect(statFieldFor('규정 미준수', labels)).toBe('removedCommentCount');
        expect(statFieldFor('전체', labels)).toBeUndefined();
    });
});
