import { log as rootLog, type Log } from 'crawlee';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { formatTimestamp } from './format.js';
import type { FailedArticle } from './scheduler.js';

/**
 * URL 목록 파일 읽기.
 *  - 한 줄에 URL 하나, 앞뒤 공백 제거
 *  - 빈 줄과 '#' 주석은 건너뜀
 *  - http 로 시작하지 않는 줄은 줄 번호와 함께 경고 후 제외
 *  - 중복 URL 은 처음 것만 남김
 */
export async function loadUrls(file: string, log: Log = rootLog.child({ prefix: 'Batch' })): Promise<string[]> {
    const content = await readFile(file, 'utf8');
    const urls: string[] = [];
    const seen = new Set<string>();

    content.replace(/^\uFEFF/, '').split(/\r?\n/).forEach((raw, i) => {
        const line = raw.trim();
        if (!line || line.startsWith('#')) return;
        if (!line.startsWith('http')) {
            log.warning(`${path.basename(file)}:${i + 1}: not a URL, skipped: ${line}`);
            return;
        }
        if (seen.has(line)) {
            log.warning(`${path.basename(file)}:${i + 1}: duplicate URL skipped: ${line}`);
            return;
        }
        seen.add(line);
        urls.push(line);
    });

    log.info(`Loaded ${urls.length} URLs from ${file}`);
    return urls;
}

/** '*' 와 '?' 만 지원하는 파일명 패턴 → 정규식 */
export function wildcardToRegExp(pattern: string): RegExp {
    const source = pattern
        .split('')
        .map((ch) => {
            if (ch === '*') return '.*';
            if (ch === '?') return '.';
            return ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
        })
        .join('');
    return new RegExp(`^${source}$`);
}

/** 디렉터리 바로 아래에서 패턴에 맞는 파일(이름순) */
export async function findUrlFiles(directory: string, pattern = 'url*.txt'): Promise<string[]> {
    const matcher = wildcardToRegExp(pattern);
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
        .filter((entry) => entry.isFile() && matcher.test(entry.name))
        .map((entry) => entry.name)
        .sort()
        .map((name) => path.join(directory, name));
}

/** URL 파일 경로 → 출력 파일 이름에 쓰는 stem */
export function urlFileStem(file: string): string {
    return path.basename(file, path.extname(file));
}

/**
 * 실패 URL 을 재실행용 목록으로 저장한다. 실패가 없으면 아무것도 쓰지 않는다.
 * @returns 저장한 파일 경로
 */
export async function saveFailedUrls(
    outputDir: string,
    stem: string,
    failures: readonly FailedArticle[],
    now: number = Date.now(),
): Promise<string | undefined> {
    if (failures.length === 0) return undefined;
    await mkdir(outputDir, { recursive: true });
    const file = path.join(outputDir, `failed_urls_${stem}.txt`);
    const lines = [
        `# Failed URLs (${failures.length}) - generated ${formatTimestamp(now)}`,
        ...failures.flatMap((f) => [`# ${f.reason.replace(/\s+/g, ' ')}`, f.url]),
    ];
    await writeFile(file, `${lines.join('\n')}\n`, 'utf8');
    return file;
}
