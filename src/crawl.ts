import { log as rootLog, type Log } from 'crawlee';
import { ArticleWorker } from './article-worker.js';
import { politenessIntervalMs, workerOptions, type CrawlerConfig } from './config.js';
import { ConfigError } from './errors.js';
import { PolitenessGate } from './politeness.js';
import { Scheduler, logRunSummary, type RunSummary } from './scheduler.js';
import { Sequencer } from './sequencer.js';
import { systemClock, type Clock } from './timing.js';
import type { ExtractorPort } from './types.js';
import { loadUrls, saveFailedUrls, urlFileStem } from './url-sources.js';
import { CsvWriter, outputPaths } from './writer.js';

/** 브라우저 등 실행 단위 자원을 가진 Extractor */
export interface DisposableExtractor<H> extends ExtractorPort<H> {
    dispose(): Promise<void>;
}

export type ExtractorFactory<H> = () => Promise<DisposableExtractor<H>>;

export interface CrawlFileOptions {
    urlFile: string;
    outputDir: string;
    resume: boolean;
    config: CrawlerConfig;
    signal?: AbortSignal;
    clock?: Clock;
    log?: Log;
}

export interface CrawlFileResult {
    urlFile: string;
    stem: string;
    summary: RunSummary;
    /** 실패 URL 목록을 저장했다면 그 경로 */
    failedUrlsFile?: string;
}

/**
 * URL 파일 하나 = 실행 하나 (자체 Sequencer, 자체 출력 표).
 * WriteError 는 그대로 전파된다.
 */
export async function crawlUrlFile<H>(options: CrawlFileOptions, createExtractor: ExtractorFactory<H>): Promise<CrawlFileResult> {
    const { urlFile, outputDir, resume, config, signal } = options;
    const clock = options.clock ?? systemClock;
    const log = options.log ?? rootLog.child({ prefix: 'Batch' });
    const stem = urlFileStem(urlFile);

    const urls = await loadUrls(urlFile, log);
    if (urls.length === 0) throw new ConfigError(`no URLs to crawl in ${urlFile}`);

    const writer = await CsvWriter.open(outputPaths(outputDir, stem), { resume });
    try {
        const state = writer.resumeState;
        const sequencer = new Sequencer(state);
        const extractor = await createExtractor();
        try {
            const worker = new ArticleWorker(
                extractor,
                sequencer,
                new PolitenessGate(politenessIntervalMs(config), clock),
                workerOptions(config),
                clock,
            );
            const scheduler = new Scheduler(worker, sequencer, writer, {
                maxWorkers: config.scraping.max_workers,
                clock,
            });
            const summary = await scheduler.run(urls, { completed: state.completedUrls, signal });
            logRunSummary(summary, log);

            const failedUrlsFile = await saveFailedUrls(outputDir, stem, summary.failed, clock.now());
            if (failedUrlsFile) log.info(`실패 URL ${summary.failed.length}건 저장: ${failedUrlsFile}`);
            return { urlFile, stem, summary, failedUrlsFile };
        } finally {
            await extractor.dispose();
        }
    } finally {
        await writer.close();
    }
}
