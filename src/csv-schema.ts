import { stringify } from 'csv-stringify/sync';
import type { Article, Comment } from './types.js';

export const ARTICLE_COLUMNS = [
    'article_id', 'url', 'title', 'content', 'author', 'publish_date', 'category',
    'like_count', 'comment_count', 'active_comment_count', 'deleted_comment_count', 'removed_comment_count',
    'male_ratio', 'female_ratio',
    'age_10s_ratio', 'age_20s_ratio', 'age_30s_ratio', 'age_40s_ratio', 'age_50s_ratio', 'age_60plus_ratio',
    'scraped_at',
] as const;

export const COMMENT_COLUMNS = [
    'article_id', 'comment_id', 'parent_comment_id', 'comment_type',
    'content', 'author', 'like_count', 'dislike_count', 'reply_count',
    'created_at', 'scraped_at',
] as const;

const text = (value: string | undefined): string => value ?? '';
const count = (value: number | undefined): string => (value === undefined ? '' : String(value));
const ratio = (value: number | undefined): string => (value === undefined ? '' : value.toFixed(2));

export function articleToRow(a: Article): string[] {
    return [
        String(a.articleId), a.url, text(a.title), text(a.content), text(a.author), text(a.publishDate), text(a.category),
        count(a.likeCount), count(a.commentCount),
        count(a.activeCommentCount), count(a.deletedCommentCount), count(a.removedCommentCount),
        ratio(a.maleRatio), ratio(a.femaleRatio),
        ratio(a.age10sRatio), ratio(a.age20sRatio), ratio(a.age30sRatio),
        ratio(a.age40sRatio), ratio(a.age50sRatio), ratio(a.age60plusRatio),
        a.scrapedAt,
    ];
}

export function commentToRow(c: Comment): string[] {
    return [
        String(c.articleId), String(c.commentId), count(c.parentCommentId), c.commentType,
        c.content, c.author, String(c.likeCount), String(c.dislikeCount),
        // 답글의 reply_count 는 항상 "0"
        c.commentType === 'reply' ? '0' : String(c.replyCount),
        c.createdAt, c.scrapedAt,
    ];
}

/** 모든 필드(빈 값 포함)를 큰따옴표로 감싼 CSV 레코드들, 레코드 구분자 "\n" */
export function toCsv(rows: readonly (readonly string[])[]): string {
    if (rows.length === 0) return '';
    return stringify(rows.map((r) => [...r]), { quoted: true, quoted_empty: true, record_delimiter: 'unix' });
}
