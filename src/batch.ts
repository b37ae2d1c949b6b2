import { log as rootLog, type Log } from 'crawlee';
import type { CrawlerConfig } from './config.js';
import { crawlUrlFile, type CrawlFileResult, type ExtractorFactory } from './crawl.js';
import { CancelledError, describeError } from './errors.js';
import { formatDuration } from './format.js';
import { systemClock, type Clock } from './timing.js';

export interface BatchOptions {
    outputDir: string;
    resume: boolean;
    /** 파일 하나가 치명적으로 실패해도 다음 파일로 넘어간다 */
    continueOnError: boolean;
    /** URL 파일 사이 대기(ms) */
    fileDelayMs: number;
    config: CrawlerConfig;
    signal?: AbortSignal;
    clock?: Clock;
    log?: Log;
}

export interface BatchFileError {
    urlFile: string;
    reason: string;
}

export interface BatchResult {
    files: CrawlFileResult[];
    errors: BatchFileError[];
    cancelled: boolean;
    durationMs: number;
}

/**
 * URL 파일들을 차례로 실행한다. 파일마다 출력 표가 따로 생긴다.
 * continueOnError 가 아니면 첫 치명적 오류를 그대로 던진다.
 */
export async function runBatch<H>(
    urlFiles: readonly string[],
    options: BatchOptions,
    createExtractor: ExtractorFactory<H>,
): Promise<BatchResult> {
    const clock = options.clock ?? systemClock;
    const log = options.log ?? rootLog.child({ prefix: 'Batch' });
    const startedAt = clock.now();
    const result: BatchResult = { files: [], errors: [], cancelled: false, durationMs: 0 };

    for (const [i, urlFile] of urlFiles.entries()) {
        if (options.signal?.aborted) break;
        if (i > 0 && options.fileDelayMs > 0) {
            log.info(`다음 파일까지 ${options.fileDelayMs / 1000}초 대기`);
            try {
                await clock.sleep(options.fileDelayMs, options.signal);
            } catch (err) {
                if (err instanceof CancelledError) break;
                throw err;
            }
        }

        log.info(`[${i + 1}/${urlFiles.length}] ${urlFile}`);
        try {
            const file = await crawlUrlFile(
                {
                    urlFile,
                    outputDir: options.outputDir,
                    resume: options.resume,
                    config: options.config,
                    signal: options.signal,
                    clock,
                    log,
                },
                createExtractor,
            );
            result.files.push(file);
            const { summary } = file;
            log.info(`[${i + 1}/${urlFiles.length}] ${urlFile}: ${summary.succeeded} succeeded, ${summary.failed.length} failed`);
            if (summary.cancelled) break;
        } catch (err) {
            if (!options.continueOnError) throw err;
            const reason = describeError(err);
            result.errors.push({ urlFile, reason });
            log.error(`[${i + 1}/${urlFiles.length}] ${urlFile} aborted: ${reason}`);
        }
    }

    result.cancelled = options.signal?.aborted === true;
    result.durationMs = clock.now() - startedAt;

    if (urlFiles.length > 1) {
        const succeeded = result.files.reduce((n, f) => n + f.summary.succeeded, 0);
        const failed = result.files.reduce((n, f) => n + f.summary.failed.length, 0);
        log.info(
            `배치 완료: files ${result.files.length}/${urlFiles.length}, articles ${succeeded} succeeded / ${failed} failed, `
            + `elapsed ${formatDuration(result.durationMs)}`,
        );
    }
    return result;
}

/** 0 = 전부 성공, 1 = 실패한 기사 있음, 2 = 치명적 오류, 130 = 취소 */
export function exitCodeFor(result: BatchResult): number {
    if (result.cancelled) return 130;
    if (result.errors.length > 0) return 2;
    const failed = result.files.reduce((n, f) => n + f.summary.failed.length, 0);
    return failed > 0 ? 1 : 0;
}
