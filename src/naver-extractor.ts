import { log as rootLog, type Log } from 'crawlee';
import { chromium, type Browser, type BrowserContext, type Page } from 'playwright-core';
import type { CrawlerConfig, NaverSelectors, UiLabels } from './config.js';
import { ExtractionError, LoadError, PaginationError, describeError } from './errors.js';
import type {
    CommentCursor,
    CommentPage,
    ExtractedMetadata,
    ExtractorPort,
    RatioField,
    RawArticleFields,
    RawCommentRecord,
} from './types.js';

/**
 * ---------------------------------------------------------------------------
 * 네이버 뉴스 Extractor (Playwright)
 *
 *  • load            : 기사마다 새 BrowserContext, 무거운 리소스/광고 도메인 차단
 *  • extractMetadata : 기사 필드 → 댓글 뷰 진입 → 댓글 통계/성별·연령 비율
 *  • fetchCommentPage: 0 = 댓글 뷰(클린봇 해제), 이후 "더보기" 클릭. 매번 답글 펼침
 *  • 댓글 노드의 data-info(commentNo/parentCommentNo/replyLevel/deleted)가 계층 정보의 출처
 * ---------------------------------------------------------------------------
 */

export interface NaverPage {
    url: string;
    context: BrowserContext;
    page: Page;
    /** 댓글 뷰 진입 여부 */
    commentView: boolean;
    /** 기사에 표시된 댓글 수(원문) */
    commentCountText?: string;
    /** 이미 돌려준 commentNo */
    returned: Set<string>;
}

export interface DataInfo {
    commentNo: string;
    parentCommentNo?: string;
    replyLevel: number;
    deleted: boolean;
}

/** 브라우저에서 읽어 온 댓글 노드 한 개 */
export interface CommentNodeSnapshot {
    dataInfo: string | null;
    content: string;
    author: string;
    /** deleted_comment_author 셀렉터로 읽은 작성자 (삭제된 댓글용) */
    deletedAuthor: string;
    like: string;
    dislike: string;
    /** .u_cbox_date 의 data-value (ISO) */
    dateValue: string | null;
    dateText: string;
}

// ===[ 순수 파서 ]============================================================

/** "commentNo:'123',parentCommentNo:'100',replyLevel:2,deleted:false" → DataInfo */
export function parseDataInfo(text: string | null | undefined): DataInfo | undefined {
    if (!text) return undefined;
    const values = new Map<string, string>();
    const re = /([A-Za-z_$][\w$]*)\s*:\s*(?:'([^']*)'|"([^"]*)"|([^,{}]+))/g;
    for (const m of text.matchAll(re)) {
        values.set(m[1], (m[2] ?? m[3] ?? m[4] ?? '').trim());
    }
    const commentNo = values.get('commentNo');
    if (!commentNo) return undefined;
    const replyLevel = parseInt(values.get('replyLevel') ?? '1', 10);
    return {
        commentNo,
        parentCommentNo: values.get('parentCommentNo') || undefined,
        replyLevel: Number.isNaN(replyLevel) ? 1 : replyLevel,
        deleted: values.get('deleted') === 'true',
    };
}

/**
 * 노드 스냅샷 → 원시 댓글 레코드. data-info 가 없으면 undefined.
 * 최상위 댓글은 parentCommentNo 가 자기 자신이므로 replyLevel > 1 일 때만 부모로 본다.
 * 삭제된 댓글은 작성자를 삭제 댓글 전용 셀렉터 값에서 읽는다.
 */
export function toRawComment(node: CommentNodeSnapshot, labels: UiLabels): RawCommentRecord | undefined {
    const info = parseDataInfo(node.dataInfo);
    if (!info) return undefined;
    const parentSiteId = info.replyLevel > 1 && info.parentCommentNo !== info.commentNo
        ? info.parentCommentNo
        : undefined;
    return {
        siteId: info.commentNo,
        parentSiteId,
        content: info.deleted ? labels.comments.deleted_comment_content : node.content,
        author: info.deleted ? node.deletedAuthor || node.author : node.author,
        likeCount: info.deleted ? undefined : node.like,
        dislikeCount: info.deleted ? undefined : node.dislike,
        createdAt: node.dateValue || node.dateText,
        deleted: info.deleted,
    };
}

type AgeLabelKey = '10s' | '20s' | '30s' | '40s' | '50s' | '60s';

const AGE_FIELDS: readonly (readonly [AgeLabelKey, RatioField])[] = [
    ['10s', 'age10sRatio'],
    ['20s', 'age20sRatio'],
    ['30s', 'age30sRatio'],
    ['40s', 'age40sRatio'],
    ['50s', 'age50sRatio'],
    ['60s', 'age60plusRatio'],
];

/** 연령대 막대 라벨("20대") → 필드 */
export function ageFieldFor(label: string, labels: UiLabels): RatioField | undefined {
    const found = AGE_FIELDS.find(([key]) => label.includes(labels.comments[key]));
    return found?.[1];
}

/** 통계 행 제목 → 필드 (현재 댓글 / 작성자 삭제 / 규정 미준수) */
export function statFieldFor(
    title: string,
    labels: UiLabels,
): 'activeCommentCount' | 'deletedCommentCount' | 'removedCommentCount' | undefined {
    const c = labels.comments;
    if (title.includes(c.current_comment_count)) return 'activeCommentCount';
    if (title.includes(c.deleted_comment_count)) return 'deletedCommentCount';
    if (title.includes(c.removed_comment_count)) return 'removedCommentCount';
    return undefined;
}

const splitSelectors = (selector: string): string[] =>
    selector.split(',').map((s) => s.trim()).filter(Boolean);

// ===[ Extractor ]============================================================

export class NaverExtractor implements ExtractorPort<NaverPage> {
    private readonly selectors: NaverSelectors;
    private readonly labels: UiLabels;
    private readonly timeoutMs: number;

    private constructor(
        private readonly browser: Browser,
        private readonly config: CrawlerConfig,
        private readonly log: Log,
    ) {
        this.selectors = config.naver_selectors;
        this.labels = config.ui_labels;
        this.timeoutMs = config.scraping.timeout * 1000;
    }

    static async launch(config: CrawlerConfig, log: Log = rootLog.child({ prefix: 'Extractor' })): Promise<NaverExtractor> {
        const browser = await chromium.launch({
            headless: config.scraping.headless,
            channel: config.browser.channel,
            args: config.browser.args,
        });
        log.info(`Browser launched (headless=${config.scraping.headless}${config.browser.channel ? `, channel=${config.browser.channel}` : ''})`);
        return new NaverExtractor(browser, config, log);
    }

    async load(url: string): Promise<NaverPage> {
        const { browser: b } = this.config;
        const context = await this.browser.newContext({
            locale: b.locale,
            viewport: b.window_size,
            extraHTTPHeaders: { 'Accept-Language': 'ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7' },
        });
        try {
            const page = await context.newPage();
            await page.route('**/*', (route) => {
                const req = route.request();
                // 1) 무거운 리소스는 도메인과 무관하게 차단
                if (b.blocked_resource_types.includes(req.resourceType())) return route.abort();
                // 2) 광고/트래킹 도메인 차단
                if (b.blocked_domains.some((domain) => req.url().includes(domain))) return route.abort();
                return route.continue();
            });
            const response = await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.timeoutMs });
            if (response && response.status() >= 400) {
                throw new LoadError(`HTTP ${response.status()}`, { url });
            }
            await page.waitForSelector('body', { timeout: this.timeoutMs });
            return { url, context, page, commentView: false, returned: new Set() };
        } catch (err) {
            await context.close().catch((closeErr: unknown) =>
                this.log.debug(`context close failed for ${url}: ${describeError(closeErr)}`));
            throw err instanceof LoadError ? err : new LoadError(describeError(err), { url, cause: err });
        }
    }

    async extractMetadata(h: NaverPage): Promise<ExtractedMetadata> {
        const a = this.selectors.article;
        const fields: RawArticleFields = {};
        const issues: ExtractionError[] = [];

        const read = async (field: keyof RawArticleFields, selector: string, get: (sel: string) => Promise<string | undefined>) => {
            try {
                for (const sel of splitSelectors(selector)) {
                    const value = (await get(sel))?.replace(/\s+/g, ' ').trim();
                    if (value) {
                        fields[field] = value;
                        return;
                    }
                }
            } catch (err) {
                issues.push(new ExtractionError(field, describeError(err), { url: h.url, cause: err }));
            }
        };
        const text = (sel: string) => this.textOf(h.page, sel);

        await read('title', a.title, text);
        await read('content', a.content, text);
        await read('author', a.author, text);
        // 발행일은 data-date-time 속성을 우선
        await read('publishDate', a.publish_date, async (sel) =>
            (await this.attributeOf(h.page, sel, 'data-date-time')) ?? this.textOf(h.page, sel));
        await read('category', a.category, text);
        await read('likeCount', a.like_count, text);
        await read('commentCount', a.comment_count, text);
        h.commentCountText = fields.commentCount;

        if (await this.openCommentView(h)) {
            await this.readCommentStats(h, fields, issues);
            await this.readDemographics(h, fields, issues);
        }
        return { fields, issues };
    }

    async hasComments(h: NaverPage): Promise<boolean> {
        if (!h.commentView) return false;
        return h.commentCountText === undefined || /[1-9]/.test(h.commentCountText);
    }

    async fetchCommentPage(h: NaverPage, cursor: CommentCursor): Promise<CommentPage> {
        const nav = this.selectors.comment_navigation;
        const listSel = this.selectors.comments.comment_list;
        try {
            if (cursor === 0) {
                if (!h.commentView && !(await this.openCommentView(h))) {
                    throw new PaginationError('comment view is not available', { url: h.url });
                }
            } else {
                const more = h.page.locator(nav.comment_page_more_button).first();
                if (!(await more.isVisible())) return { records: [], next: null };
                const before = await h.page.locator(listSel).count();
                await more.click({ timeout: this.timeoutMs });
                // 새 댓글이 붙거나 더보기 버튼이 사라질 때까지
                await h.page.waitForFunction(
                    (arg) => {
                        const btn = document.querySelector<HTMLElement>(arg.button);
                        return document.querySelectorAll(arg.list).length > arg.before || !btn || btn.offsetParent === null;
                    },
                    { list: listSel, button: nav.comment_page_more_button, before },
                    { timeout: this.timeoutMs },
                );
            }

            await this.expandReplies(h);
            const records = (await this.snapshotComments(h.page))
                .map((node) => toRawComment(node, this.labels))
                .filter((r): r is RawCommentRecord => r !== undefined && !h.returned.has(r.siteId));
            for (const r of records) h.returned.add(r.siteId);

            const hasMore = await h.page.locator(nav.comment_page_more_button).first().isVisible();
            return { records, next: hasMore ? cursor + 1 : null };
        } catch (err) {
            if (err instanceof PaginationError) throw err;
            throw new PaginationError(`comment page ${cursor}: ${describeError(err)}`, { url: h.url, cause: err });
        }
    }

    async close(h: NaverPage): Promise<void> {
        await h.context.close();
    }

    async dispose(): Promise<void> {
        await this.browser.close();
    }

    // ===[ 내부 ]=============================================================

    private async textOf(page: Page, selector: string): Promise<string | undefined> {
        const loc = page.locator(selector).first();
        if ((await loc.count()) === 0) return undefined;
        return (await loc.textContent({ timeout: this.timeoutMs })) ?? undefined;
    }

    private async attributeOf(page: Page, selector: string, name: string): Promise<string | undefined> {
        const loc = page.locator(selector).first();
        if ((await loc.count()) === 0) return undefined;
        return (await loc.getAttribute(name, { timeout: this.timeoutMs })) ?? undefined;
    }

    /** 기사 → 댓글 뷰. 댓글 진입 버튼이 없으면 false */
    private async openCommentView(h: NaverPage): Promise<boolean> {
        if (h.commentView) return true;
        const button = h.page.locator(this.selectors.comment_navigation.article_to_comment_button).first();
        if ((await button.count()) === 0 || !(await button.isVisible())) {
            this.log.debug(`no comment entry point: ${h.url}`);
            return false;
        }
        await button.click({ timeout: this.timeoutMs });
        await h.page.waitForLoadState('domcontentloaded', { timeout: this.timeoutMs });
        await h.page.waitForSelector(this.selectors.comments.comment_list, { timeout: this.timeoutMs })
            .catch((err: unknown) => this.log.debug(`comment list not rendered for ${h.url}: ${describeError(err)}`));
        h.commentView = true;
        if (this.config.scraping.disable_cleanbot) await this.disableCleanbot(h);
        return true;
    }

    /** 클린봇 설정 → 체크 해제 → 확인. 이미 꺼져 있으면 그대로 */
    private async disableCleanbot(h: NaverPage): Promise<void> {
        const c = this.selectors.cleanbot;
        const container = h.page.locator(c.cleanbot_container).first();
        if ((await container.count()) === 0) return;

        const status = (await this.textOf(h.page, `${c.cleanbot_container} ${c.cleanbot_message}`)) ?? '';
        if (status.includes(this.labels.comments.cleanbot_disabled)) return;

        const setting = container.locator(c.setting_button).first();
        if (!(await setting.isVisible())) return;
        await setting.click({ timeout: this.timeoutMs });

        const checkbox = h.page.locator(c.checkbox).first();
        await checkbox.waitFor({ state: 'attached', timeout: this.timeoutMs });
        if (await checkbox.isChecked()) {
            // 체크박스가 숨겨진 경우 label 을 누른다
            await checkbox.uncheck({ timeout: this.timeoutMs, force: true });
        }
        const listSel = this.selectors.comments.comment_list;
        const before = await h.page.locator(listSel).count();
        await h.page.locator(c.confirm_button).first().click({ timeout: this.timeoutMs });
        await h.page.waitForFunction(
            (arg) => document.querySelectorAll(arg.list).length !== arg.before,
            { list: listSel, before },
            { timeout: Math.min(this.timeoutMs, 5000) },
        ).catch((err: unknown) => this.log.debug(`comment list unchanged after cleanbot toggle: ${describeError(err)}`));
        this.log.debug(`cleanbot disabled: ${h.url}`);
    }

    private async readCommentStats(h: NaverPage, fields: RawArticleFields, issues: ExtractionError[]): Promise<void> {
        const s = this.selectors.comment_stats;
        try {
            const rows = await h.page.$$eval(
                s.stat_count_info,
                (nodes, sel) => nodes.map((node) => ({
                    title: node.querySelector(sel.title)?.textContent?.trim() ?? '',
                    value: node.querySelector(sel.value)?.textContent?.trim() ?? '',
                })),
                { title: s.stat_title, value: s.stat_value },
            );
            for (const row of rows) {
                const field = statFieldFor(row.title, this.labels);
                if (field && row.value) fields[field] = row.value;
            }
        } catch (err) {
            issues.push(new ExtractionError('commentStats', describeError(err), { url: h.url, cause: err }));
        }
    }

    private async readDemographics(h: NaverPage, fields: RawArticleFields, issues: ExtractionError[]): Promise<void> {
        const s = this.selectors.comment_stats;
        try {
            const chart = h.page.locator(s.demographic_stats_container).first();
            if ((await chart.count()) === 0 || !(await chart.isVisible())) return;

            const male = await this.textOf(h.page, s.male_ratio);
            if (male) fields.maleRatio = male.trim();
            const female = await this.textOf(h.page, s.female_ratio);
            if (female) fields.femaleRatio = female.trim();

            const ages = await h.page.$$eval(
                `${s.age_container} ${s.age_item}`,
                (nodes, sel) => nodes.map((node) => ({
                    label: node.querySelector(sel.label)?.textContent?.trim() ?? '',
                    value: node.querySelector(sel.value)?.textContent?.trim() ?? '',
                })),
                { label: s.age_label, value: s.age_value },
            );
            for (const age of ages) {
                const field = ageFieldFor(age.label, this.labels);
                if (field && age.value) fields[field] = age.value;
            }
        } catch (err) {
            issues.push(new ExtractionError('demographics', describeError(err), { url: h.url, cause: err }));
        }
    }

    /** 답글 수가 있는 "답글" 버튼을 한 번씩만 눌러 펼친다. */
    private async expandReplies(h: NaverPage): Promise<void> {
        const clicked = await h.page.$$eval(
            this.selectors.comment_navigation.reply_button,
            (buttons: HTMLElement[]) => {
                let n = 0;
                for (const el of buttons) {
                    if (el.hasAttribute('data-crawler-expanded')) continue;
                    el.setAttribute('data-crawler-expanded', '1');
                    if (!/[1-9]/.test(el.textContent ?? '')) continue;
                    el.click();
                    n++;
                }
                return n;
            },
        );
        if (clicked === 0) return;
        this.log.debug(`expanding ${clicked} reply threads: ${h.url}`);
        await h.page.waitForLoadState('networkidle', { timeout: Math.min(this.timeoutMs, 10_000) })
            .catch((err: unknown) => this.log.debug(`reply expansion did not settle: ${describeError(err)}`));
    }

    private async snapshotComments(page: Page): Promise<CommentNodeSnapshot[]> {
        const c = this.selectors.comments;
        return page.$$eval(
            c.comment_list,
            (nodes, sel) => {
                const textIn = (node: Element, s: string) =>
                    (node.querySelector(s)?.textContent ?? '').replace(/\s+/g, ' ').trim();
                return nodes.map((node) => ({
                    dataInfo: node.getAttribute('data-info'),
                    content: textIn(node, sel.content),
                    author: textIn(node, sel.author),
                    deletedAuthor: textIn(node, sel.deletedAuthor),
                    like: textIn(node, sel.like),
                    dislike: textIn(node, sel.dislike),
                    dateValue: node.querySelector(sel.date)?.getAttribute('data-value') ?? null,
                    dateText: textIn(node, sel.date),
                }));
            },
            {
                content: c.comment_content,
                author: c.comment_author,
                deletedAuthor: c.deleted_comment_author,
                like: c.comment_like,
                dislike: c.comment_dislike,
                date: c.comment_date,
            },
        );
    }
}
