import { log as rootLog, type Log } from 'crawlee';
import { parse } from 'csv-parse/sync';
import { mkdir, open, readFile, rename, stat, truncate, writeFile, type FileHandle } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ARTICLE_COLUMNS, COMMENT_COLUMNS, articleToRow, commentToRow, toCsv } from './csv-schema.js';
import { WriteError, describeError } from './errors.js';
import type { SequencerState } from './sequencer.js';
import type { ArticleUnit, UnitSink } from './types.js';

/**
 * ---------------------------------------------------------------------------
 * CSV Writer (단일 쓰기 경로)
 *
 * 커밋 단위 = 기사 1건 + 그 댓글 전부.
 *   1) comments 행 append → fsync
 *   2) articles 행 append → fsync   (기사 행이 커밋 표식)
 *   3) checkpoint 교체 (tmp → rename)
 * 재개(--resume) 시 두 파일을 checkpoint 의 바이트 길이로 잘라 미완 꼬리를 버린다.
 * checkpoint 가 없으면 두 표를 파싱해 상태를 재구성한다.
 * ---------------------------------------------------------------------------
 */

export interface OutputPaths {
    articles: string;
    comments: string;
    checkpoint: string;
}

export function outputPaths(outputDir: string, stem: string): OutputPaths {
    return {
        articles: path.join(outputDir, `articles_${stem}.csv`),
        comments: path.join(outputDir, `comments_${stem}.csv`),
        checkpoint: path.join(outputDir, `checkpoint_${stem}.json`),
    };
}

const CheckpointSchema = z.object({
    version: z.literal(1),
    articlesBytes: z.number().int().nonnegative(),
    commentsBytes: z.number().int().nonnegative(),
    lastArticleId: z.number().int().nonnegative(),
    lastCommentId: z.number().int().nonnegative(),
    completedUrls: z.array(z.string()),
});

export type Checkpoint = z.infer<typeof CheckpointSchema>;

export interface ResumeState extends SequencerState {
    completedUrls: ReadonlySet<string>;
}

export interface WriterOptions {
    resume: boolean;
    log?: Log;
}

const ARTICLE_HEADER = toCsv([ARTICLE_COLUMNS]);
const COMMENT_HEADER = toCsv([COMMENT_COLUMNS]);
const byteLength = (s: string): number => Buffer.byteLength(s, 'utf8');

const CsvRowsSchema = z.array(z.array(z.string()));

async function fileSize(file: string): Promise<number | undefined> {
    try {
        return (await stat(file)).size;
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
        throw err;
    }
}

function parseTable(content: string, columns: readonly string[], file: string): string[][] {
    let rows: string[][];
    try {
        const parsed: unknown = parse(content, { skip_empty_lines: true, relax_column_count: false });
        rows = CsvRowsSchema.parse(parsed);
    } catch (err) {
        throw new WriteError(`cannot resume: ${file} is not a readable table (${describeError(err)})`, { cause: err });
    }
    const [header, ...records] = rows;
    if (!header || header.join(',') !== columns.join(',')) {
        throw new WriteError(`cannot resume: ${file} has an unexpected header`);
    }
    return records;
}

export class CsvWriter implements UnitSink {
    private tail: Promise<void> = Promise.resolve();
    private failure?: WriteError;
    private closed = false;
    private readonly completedUrls: Set<string>;

    private constructor(
        private readonly paths: OutputPaths,
        private readonly articlesFile: FileHandle,
        private readonly commentsFile: FileHandle,
        private checkpoint: Checkpoint,
        private readonly log: Log,
    ) {
        this.completedUrls = new Set(checkpoint.completedUrls);
    }

    static async open(paths: OutputPaths, options: WriterOptions): Promise<CsvWriter> {
        const log = options.log ?? rootLog.child({ prefix: 'Writer' });
        let checkpoint: Checkpoint;
        try {
            await mkdir(path.dirname(paths.articles), { recursive: true });
            checkpoint = options.resume
                ? await CsvWriter.recover(paths, log)
                : await CsvWriter.initialize(paths);
            await CsvWriter.saveCheckpoint(paths, checkpoint);
        } catch (err) {
            throw err instanceof WriteError ? err : new WriteError(`cannot prepare output: ${describeError(err)}`, { cause: err });
        }

        let articlesFile: FileHandle | undefined;
        try {
            articlesFile = await open(paths.articles, 'a');
            const commentsFile = await open(paths.comments, 'a');
            log.info(`Output ready: ${paths.articles}, ${paths.comments} (last article_id ${checkpoint.lastArticleId}, last comment_id ${checkpoint.lastCommentId})`);
            return new CsvWriter(paths, articlesFile, commentsFile, checkpoint, log);
        } catch (err) {
            await articlesFile?.close();
            throw new WriteError(`cannot open output: ${describeError(err)}`, { cause: err });
        }
    }

    /** 재개 시 Sequencer 시작점과 건너뛸 URL */
    get resumeState(): ResumeState {
        return {
            lastArticleId: this.checkpoint.lastArticleId,
            lastCommentId: this.checkpoint.lastCommentId,
            completedUrls: new Set(this.completedUrls),
        };
    }

    /**
     * 단위를 커밋 대기열에 넣는다. 대기열 순서 = 커밋 순서.
     * 한 번 WriteError 가 나면 이후 모든 write() 는 같은 오류로 reject 된다.
     */
    write(unit: ArticleUnit): Promise<void> {
        if (this.failure) return Promise.reject(this.failure);
        if (this.closed) return Promise.reject(new WriteError('writer is closed'));

        const job = this.tail.then(() => this.commit(unit));
        this.tail = job.catch((err: unknown) => {
            this.failure ??= err instanceof WriteError ? err : new WriteError(describeError(err), { cause: err });
            this.log.error(`Output is no longer writable: ${this.failure.message}`);
        });
        return job;
    }

    /** 대기 중인 단위를 모두 쓴 뒤 파일을 닫는다. */
    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        await this.tail;
        await Promise.all([this.articlesFile.close(), this.commentsFile.close()]);
    }

    private async commit(unit: ArticleUnit): Promise<void> {
        if (this.failure) throw this.failure;
        const { article, comments } = unit;
        const commentChunk = toCsv(comments.map(commentToRow));
        const articleChunk = toCsv([articleToRow(article)]);

        try {
            if (commentChunk) {
                await this.commentsFile.appendFile(commentChunk, 'utf8');
                await this.commentsFile.sync();
            }
            await this.articlesFile.appendFile(articleChunk, 'utf8');
            await this.articlesFile.sync();
        } catch (err) {
            throw new WriteError(`failed to append article ${article.articleId}: ${describeError(err)}`, { cause: err, url: article.url });
        }

        this.completedUrls.add(article.url);
        this.checkpoint = {
            version: 1,
            articlesBytes: this.checkpoint.articlesBytes + byteLength(articleChunk),
            commentsBytes: this.checkpoint.commentsBytes + byteLength(commentChunk),
            lastArticleId: Math.max(this.checkpoint.lastArticleId, article.articleId),
            lastCommentId: comments.reduce((max, c) => Math.max(max, c.commentId), this.checkpoint.lastCommentId),
            completedUrls: [...this.completedUrls],
        };
        try {
            await CsvWriter.saveCheckpoint(this.paths, this.checkpoint);
        } catch (err) {
            throw new WriteError(`failed to save checkpoint after article ${article.articleId}: ${describeError(err)}`, { cause: err });
        }
        this.log.debug(`committed article ${article.articleId} with ${comments.length} comments`);
    }

    // ===[ 준비/재개 ]==========================================================

    private static async initialize(paths: OutputPaths): Promise<Checkpoint> {
        await writeFile(paths.articles, ARTICLE_HEADER, 'utf8');
        await writeFile(paths.comments, COMMENT_HEADER, 'utf8');
        return {
            version: 1,
            articlesBytes: byteLength(ARTICLE_HEADER),
            commentsBytes: byteLength(COMMENT_HEADER),
            lastArticleId: 0,
            lastCommentId: 0,
            completedUrls: [],
        };
    }

    private static async recover(paths: OutputPaths, log: Log): Promise<Checkpoint> {
        const saved = await CsvWriter.readCheckpoint(paths.checkpoint);
        if (saved) {
            await CsvWriter.truncateTo(paths.articles, saved.articlesBytes, log);
            await CsvWriter.truncateTo(paths.comments, saved.commentsBytes, log);
            log.info(`Resuming from checkpoint: ${saved.completedUrls.length} articles already written`);
            return saved;
        }

        const articlesSize = await fileSize(paths.articles);
        if (articlesSize === undefined) {
            log.info('Nothing to resume, starting fresh output');
            return CsvWriter.initialize(paths);
        }
        return CsvWriter.derive(paths, log);
    }

    private static async readCheckpoint(file: string): Promise<Checkpoint | undefined> {
        let content: string;
        try {
            content = await readFile(file, 'utf8');
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
            throw err;
        }
        try {
            return CheckpointSchema.parse(JSON.parse(content));
        } catch (err) {
            throw new WriteError(`cannot resume: checkpoint ${file} is invalid (${describeError(err)})`, { cause: err });
        }
    }

    private static async truncateTo(file: string, bytes: number, log: Log): Promise<void> {
        const size = await fileSize(file);
        if (size === undefined || size < bytes) {
            throw new WriteError(`cannot resume: ${file} is shorter than its checkpoint (${size ?? 0} < ${bytes} bytes)`);
        }
        if (size > bytes) {
            log.warning(`Discarding ${size - bytes} uncommitted bytes at the end of ${file}`);
            await truncate(file, bytes);
        }
    }

    /** checkpoint 없이 기존 표에서 상태를 재구성. 기사 행이 없는 댓글 행은 제거한다. */
    private static async derive(paths: OutputPaths, log: Log): Promise<Checkpoint> {
        log.warning('No checkpoint found, re-deriving state from existing tables');
        const articleRows = parseTable(await readFile(paths.articles, 'utf8'), ARTICLE_COLUMNS, paths.articles);
        const commentsContent = (await fileSize(paths.comments)) === undefined
            ? COMMENT_HEADER
            : await readFile(paths.comments, 'utf8');
        const commentRows = parseTable(commentsContent, COMMENT_COLUMNS, paths.comments);

        const committed = new Set<string>();
        const urls: string[] = [];
        let lastArticleId = 0;
        for (const row of articleRows) {
            const id = parseInt(row[0], 10);
            if (!Number.isInteger(id)) throw new WriteError(`cannot resume: bad article_id "${row[0]}" in ${paths.articles}`);
            committed.add(row[0]);
            urls.push(row[1]);
            lastArticleId = Math.max(lastArticleId, id);
        }

        const kept = commentRows.filter((row) => committed.has(row[0]));
        const lastCommentId = kept.reduce((max, row) => Math.max(max, parseInt(row[1], 10) || 0), 0);
        if (kept.length !== commentRows.length) {
            log.warning(`Removing ${commentRows.length - kept.length} comment rows without a committed article`);
            const tmp = `${paths.comments}.tmp`;
            await writeFile(tmp, COMMENT_HEADER + toCsv(kept), 'utf8');
            await rename(tmp, paths.comments);
        } else if (commentsContent === COMMENT_HEADER) {
            await writeFile(paths.comments, COMMENT_HEADER, 'utf8');
        }

        const [articlesBytes, commentsBytes] = await Promise.all([fileSize(paths.articles), fileSize(paths.comments)]);
        return {
            version: 1,
            articlesBytes: articlesBytes ?? 0,
            commentsBytes: commentsBytes ?? 0,
            lastArticleId,
            lastCommentId,
            completedUrls: urls,
        };
    }

    private static async saveCheckpoint(paths: OutputPaths, checkpoint: Checkpoint): Promise<void> {
        const tmp = `${paths.checkpoint}.tmp`;
        await writeFile(tmp, JSON.stringify(checkpoint), 'utf8');
        await rename(tmp, paths.checkpoint);
    }
}
