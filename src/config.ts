import { log } from 'crawlee';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { WorkerOptions } from './article-worker.js';
import { ConfigError, describeError } from './errors.js';

// ===[ 스키마 ]===============================================================
// JSON 파일의 키(snake_case)를 그대로 쓴다. 빠진 키는 기본값.

const ScrapingSchema = z.object({
    /** 외부 요청 시작 간 최소 간격(초) */
    delay_between_requests: z.number().min(0).default(3),
    /** 요청 하나의 제한 시간(초) */
    timeout: z.number().positive().default(30),
    /** 첫 시도 이후 추가 시도 횟수 */
    retry_count: z.number().int().min(0).default(3),
    max_workers: z.number().int().min(1).default(1),
    /** 재시도 대기의 밑(초). 없으면 delay_between_requests * 2 */
    retry_backoff: z.number().min(0).optional(),
    max_comment_pages: z.number().int().min(1).default(500),
    max_comment_seconds: z.number().positive().default(600),
    require_title: z.boolean().default(true),
    empty_comment_count: z.enum(['zero', 'empty']).default('zero'),
    orphan_policy: z.enum(['drop', 'promote']).default('promote'),
    headless: z.boolean().default(true),
    disable_cleanbot: z.boolean().default(true),
}).strict();

const BrowserSchema = z.object({
    channel: z.string().min(1).optional(),
    args: z.array(z.string()).default([
        '--autoplay-policy=no-user-gesture-required',
        '--lang=ko-KR',
    ]),
    window_size: z.object({
        width: z.number().int().positive(),
        height: z.number().int().positive(),
    }).default({ width: 1280, height: 1800 }),
    locale: z.string().default('ko-KR'),
    blocked_resource_types: z.array(z.string()).default(['image', 'media', 'font']),
    blocked_domains: z.array(z.string()).default([
        'google-analytics.com', 'googletagmanager.com', 'doubleclick.net', 'criteo.com',
        'adnxs.com', 'adform.net', 'bidswitch.net', 'adsrvr.org', 'facebook.net',
    ]),
});

const SelectorsSchema = z.object({
    article: z.object({
        title: z.string().default('#title_area span, .media_end_head_headline'),
        content: z.string().default('#dic_area'),
        author: z.string().default('.media_end_head_journalist_name, .byline_s'),
        publish_date: z.string().default('.media_end_head_info_datestamp_time'),
        category: z.string().default('.media_end_categorize_item'),
        like_count: z.string().default('.u_likeit_text._count'),
        comment_count: z.string().default('.media_end_head_cmtcount_button'),
    }).default({}),
    comment_navigation: z.object({
        article_to_comment_button: z.string().default('.u_cbox_btn_view_comment'),
        comment_page_more_button: z.string().default('.u_cbox_btn_more'),
        reply_button: z.string().default('.u_cbox_btn_reply'),
    }).default({}),
    comment_stats: z.object({
        stat_count_info: z.string().default('.u_cbox_count_info'),
        stat_title: z.string().default('.u_cbox_info_title'),
        stat_value: z.string().default('.u_cbox_info_txt'),
        demographic_stats_container: z.string().default('.u_cbox_chart_wrap'),
        male_ratio: z.string().default('.u_cbox_chart_male .u_cbox_chart_per'),
        female_ratio: z.string().default('.u_cbox_chart_female .u_cbox_chart_per'),
        age_container: z.string().default('.u_cbox_chart_age'),
        age_item: z.string().default('.u_cbox_chart_progress'),
        age_label: z.string().default('.u_cbox_chart_cnt span'),
        age_value: z.string().default('.u_cbox_chart_per'),
    }).default({}),
    comments: z.object({
        comment_list: z.string().default('li.u_cbox_comment'),
        comment_content: z.string().default('.u_cbox_contents'),
        comment_author: z.string().default('.u_cbox_nick'),
        deleted_comment_author: z.string().default('.u_cbox_nick'),
        comment_like: z.string().default('.u_cbox_cnt_recomm'),
        comment_dislike: z.string().default('.u_cbox_cnt_unrecomm'),
        comment_date: z.string().default('.u_cbox_date'),
    }).default({}),
    cleanbot: z.object({
        cleanbot_container: z.string().default('.u_cbox_cleanbot'),
        cleanbot_message: z.string().default('.u_cbox_cleanbot_status'),
        setting_button: z.string().default('.u_cbox_cleanbot_setbutton'),
        checkbox: z.string().default('#cleanbot_dialog_checkbox_cbox_module'),
        confirm_button: z.string().default("button[data-action='updateCleanbotStatus']"),
    }).default({}),
});

const UiLabelsSchema = z.object({
    comments: z.object({
        current_comment_count: z.string().default('현재 댓글'),
        deleted_comment_count: z.string().default('작성자 삭제'),
        removed_comment_count: z.string().default('규정 미준수'),
        deleted_comment_content: z.string().default('삭제된 댓글입니다'),
        cleanbot_disabled: z.string().default('착한댓글'),
        '10s': z.string().default('10대'),
        '20s': z.string().default('20대'),
        '30s': z.string().default('30대'),
        '40s': z.string().default('40대'),
        '50s': z.string().default('50대'),
        '60s': z.string().default('60대'),
    }).default({}),
});

export const LOG_LEVEL_NAMES = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'OFF'] as const;
export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export const ConfigSchema = z.object({
    scraping: ScrapingSchema.default({}),
    browser: BrowserSchema.default({}),
    naver_selectors: SelectorsSchema.default({}),
    ui_labels: UiLabelsSchema.default({}),
    logging: z.object({
        level: z.enum(LOG_LEVEL_NAMES).default('INFO'),
    }).default({}),
});

export type CrawlerConfig = z.infer<typeof ConfigSchema>;
export type NaverSelectors = CrawlerConfig['naver_selectors'];
export type UiLabels = CrawlerConfig['ui_labels'];
export type BrowserConfig = CrawlerConfig['browser'];

// ===[ 로드 ]=================================================================

/** CLI 로 덮어쓰는 값 (초 단위) */
export interface ScrapingOverrides {
    delay?: number;
    timeout?: number;
    retryCount?: number;
    maxWorkers?: number;
}

export const DEFAULT_CONFIG_FILE = 'config.json';

function describeIssues(err: z.ZodError): string {
    return err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

async function readConfigFile(file: string, explicit: boolean): Promise<unknown> {
    let text: string;
    try {
        text = await readFile(file, 'utf8');
    } catch (err) {
        if (!explicit && err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            log.info(`${file} not found, using default settings`);
            return {};
        }
        throw new ConfigError(`cannot read config ${file}: ${describeError(err)}`, { cause: err });
    }
    try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
    } catch (err) {
        throw new ConfigError(`config ${file} is not valid JSON: ${describeError(err)}`, { cause: err });
    }
}

/**
 * 설정 파일 → 환경 변수 → CLI 순으로 덮어쓴 최종 설정.
 * env: LOG_LEVEL=DEBUG|INFO|WARN(ING)|ERROR|OFF, HEADFUL=1, PW_CHANNEL=chrome
 */
export async function loadConfig(
    file: string | undefined,
    overrides: ScrapingOverrides = {},
    env: NodeJS.ProcessEnv = process.env,
): Promise<CrawlerConfig> {
    const raw = await readConfigFile(file ?? DEFAULT_CONFIG_FILE, file !== undefined);
    const base = ConfigSchema.safeParse(raw);
    if (!base.success) {
        throw new ConfigError(`invalid config ${file ?? DEFAULT_CONFIG_FILE}: ${describeIssues(base.error)}`);
    }

    const config = base.data;
    const envLevel = env.LOG_LEVEL?.trim().toUpperCase();
    const merged = {
        ...config,
        scraping: {
            ...config.scraping,
            ...(overrides.delay !== undefined && { delay_between_requests: overrides.delay }),
            ...(overrides.timeout !== undefined && { timeout: overrides.timeout }),
            ...(overrides.retryCount !== undefined && { retry_count: overrides.retryCount }),
            ...(overrides.maxWorkers !== undefined && { max_workers: overrides.maxWorkers }),
            ...(env.HEADFUL === '1' && { headless: false }),
        },
        browser: {
            ...config.browser,
            ...(env.PW_CHANNEL ? { channel: env.PW_CHANNEL } : {}),
        },
        logging: {
            level: envLevel === 'WARN' ? 'WARNING' : envLevel || config.logging.level,
        },
    };

    const final = ConfigSchema.safeParse(merged);
    if (!final.success) {
        throw new ConfigError(`invalid settings after overrides: ${describeIssues(final.error)}`);
    }
    return final.data;
}

// ===[ 적용 ]=================================================================

const LOG_LEVELS = {
    DEBUG: log.LEVELS.DEBUG,
    INFO: log.LEVELS.INFO,
    WARNING: log.LEVELS.WARNING,
    ERROR: log.LEVELS.ERROR,
    OFF: log.LEVELS.OFF,
} as const;

export function applyLogLevel(level: LogLevelName): void {
    log.setLevel(LOG_LEVELS[level]);
}

export function workerOptions(config: CrawlerConfig): WorkerOptions {
    const s = config.scraping;
    return {
        maxAttempts: 1 + s.retry_count,
        backoffMs: (s.retry_backoff ?? s.delay_between_requests * 2) * 1000,
        requestTimeoutMs: s.timeout * 1000,
        maxCommentPages: s.max_comment_pages,
        maxCommentMillis: s.max_comment_seconds * 1000,
        requireTitle: s.require_title,
        emptyCommentCount: s.empty_comment_count,
        orphanPolicy: s.orphan_policy,
    };
}

/** 전역 요청 간격(ms) */
export function politenessIntervalMs(config: CrawlerConfig): number {
    return config.scraping.delay_between_requests * 1000;
}
