#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { log } from 'crawlee';
import { exitCodeFor, runBatch } from './batch.js';
import { applyLogLevel, loadConfig } from './config.js';
import { ConfigError, describeError } from './errors.js';
import { NaverExtractor } from './naver-extractor.js';
import { findUrlFiles } from './url-sources.js';

/**
 * ---------------------------------------------------------------------------
 * 네이버 뉴스 기사/댓글 크롤러 엔트리
 *
 * 📌 역할
 *   - CLI 파싱, 설정 로드, URL 파일 목록 구성, 시그널 처리, 종료 코드
 *   - 실제 수집은 batch.ts → crawl.ts → scheduler.ts 가 담당
 *
 * 🚦 입력
 *   • --urls <file>                  : URL 파일 하나
 *   • --directory <dir> [--pattern]  : 디렉터리의 url*.txt 전부 (이름순)
 * ---------------------------------------------------------------------------
 */

interface CliOptions {
    urls?: string;
    directory?: string;
    pattern: string;
    config?: string;
    output: string;
    resume: boolean;
    continueOnError: boolean;
    fileDelay: number;
    delay?: number;
    timeout?: number;
    retryCount?: number;
    maxWorkers?: number;
}

const parseSeconds = (value: string): number => {
    const n = Number(value);
    if (!Number.isFinite(n) || n < 0) throw new InvalidArgumentError('expected a non-negative number of seconds');
    return n;
};

const parseCount = (value: string): number => {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('expected a non-negative integer');
    return n;
};

const program = new Command()
    .name('naver-news-crawler')
    .description('네이버 뉴스 기사와 댓글을 articles/comments CSV 로 수집합니다')
    .version('1.0.0')
    .option('-u, --urls <file>', 'URL 목록 파일')
    .option('-d, --directory <dir>', 'URL 목록 파일이 있는 디렉터리')
    .option('-p, --pattern <glob>', '--directory 에서 찾을 파일 패턴', 'url*.txt')
    .option('-c, --config <file>', '설정 파일 (기본 ./config.json)')
    .option('-o, --output <dir>', '출력 디렉터리', 'output')
    .option('--resume', '기존 출력과 checkpoint 에 이어서 수집', false)
    .option('--continue-on-error', '파일 하나가 실패해도 다음 파일 진행', false)
    .option('--file-delay <seconds>', 'URL 파일 사이 대기(초)', parseSeconds, 5)
    .option('--delay <seconds>', '요청 간 최소 간격(초)', parseSeconds)
    .option('--timeout <seconds>', '요청 제한 시간(초)', parseSeconds)
    .option('--retry-count <n>', '첫 시도 이후 재시도 횟수', parseCount)
    .option('--max-workers <n>', '동시에 처리할 기사 수', parseCount)
    .parse();

const options = program.opts<CliOptions>();

// ===[ 시그널 ]===============================================================
// 첫 SIGINT/SIGTERM: 새 기사 배분 중단, 진행 중 기사는 취소 처리, 대기열은 기록 후 종료
// 두 번째: 즉시 종료
const controller = new AbortController();
const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
        log.warning(`${signal} again, exiting immediately`);
        process.exit(130);
    }
    log.warning(`${signal} received, finishing queued writes before exit...`);
    controller.abort();
};
process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

async function main(): Promise<number> {
    const config = await loadConfig(options.config, {
        delay: options.delay,
        timeout: options.timeout,
        retryCount: options.retryCount,
        maxWorkers: options.maxWorkers,
    });
    applyLogLevel(config.logging.level);
    log.info('실행 파라미터:', { ...options });

    let urlFiles: string[];
    if (options.urls) {
        urlFiles = [options.urls];
    } else if (options.directory) {
        urlFiles = await findUrlFiles(options.directory, options.pattern);
        if (urlFiles.length === 0) throw new ConfigError(`no files matching ${options.pattern} in ${options.directory}`);
        log.info(`URL 파일 ${urlFiles.length}개: ${urlFiles.join(', ')}`);
    } else {
        throw new ConfigError('either --urls or --directory is required');
    }

    const result = await runBatch(
        urlFiles,
        {
            outputDir: options.output,
            resume: options.resume,
            continueOnError: options.continueOnError,
            fileDelayMs: options.fileDelay * 1000,
            config,
            signal: controller.signal,
        },
        () => NaverExtractor.launch(config),
    );

    const failed = result.files.reduce((n, f) => n + f.summary.failed.length, 0);
    if (failed > 0) log.warning(`${failed} articles failed permanently`);
    return exitCodeFor(result);
}

try {
    process.exitCode = await main();
} catch (err) {
    log.error(`크롤러 실행 실패: ${describeError(err)}`);
    process.exitCode = controller.signal.aborted ? 130 : 2;
}
log.info('크롤러가 종료되었습니다.');
