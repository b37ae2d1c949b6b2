// ===[ 고정 상수 ]============================================================
const KST_OFFSET_MIN = 9 * 60; // KST(UTC+9)
const MINUTE_MS = 60_000;

const RELATIVE_UNIT_MS: Record<string, number> = {
    초: 1_000,
    분: MINUTE_MS,
    시간: 60 * MINUTE_MS,
    일: 24 * 60 * MINUTE_MS,
};

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

// ===[ 시간 ]=================================================================

/** epoch ms → "YYYY-MM-DD HH:MM:SS" (KST 벽시계) */
export function formatTimestamp(at: number | Date): string {
    const ms = typeof at === 'number' ? at : at.getTime();
    const kst = new Date(ms + KST_OFFSET_MIN * MINUTE_MS);
    return `${kst.getUTCFullYear()}-${pad(kst.getUTCMonth() + 1)}-${pad(kst.getUTCDate())} `
        + `${pad(kst.getUTCHours())}:${pad(kst.getUTCMinutes())}:${pad(kst.getUTCSeconds())}`;
}

function wallClock(y: number, mo: number, d: number, h = 0, mi = 0, s = 0): string | undefined {
    if (mo < 1 || mo > 12 || d < 1 || h > 23 || mi > 59 || s > 59) return undefined;
    // 해당 월의 마지막 날 (윤년 포함)
    if (d > new Date(Date.UTC(y, mo, 0)).getUTCDate()) return undefined;
    return `${pad(y, 4)}-${pad(mo)}-${pad(d)} ${pad(h)}:${pad(mi)}:${pad(s)}`;
}

/**
 * 포털의 날짜 표기를 "YYYY-MM-DD HH:MM:SS"(KST)로 정규화. 인식 못 하면 undefined.
 * 허용:
 *  - 2024-05-01T15:20:11+0900 (오프셋/Z 포함 ISO)
 *  - 2024-05-01 15:20[:11]
 *  - 2024.05.01. 오후 3:20 / 2024.05.01. 15:20[:11]
 *  - 2024.05.01.
 *  - 방금 전, N초|분|시간|일 전 (now 기준)
 */
export function normalizeSiteDate(text: string | undefined, now: number): string | undefined {
    const s = (text ?? '').replace(/\s+/g, ' ').trim();
    if (!s) return undefined;

    if (s === '방금 전') return formatTimestamp(now);
    const rel = s.match(/^(\d{1,4})\s*(초|분|시간|일)\s*전$/);
    if (rel) return formatTimestamp(now - parseInt(rel[1], 10) * RELATIVE_UNIT_MS[rel[2]]);

    let m = s.match(/^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?(Z|[+-]\d{2}:?\d{2})$/);
    if (m) {
        const [, y, mo, d, h, mi, sec, zone] = m;
        let offsetMin = 0;
        if (zone !== 'Z') {
            const sign = zone.startsWith('-') ? -1 : 1;
            const digits = zone.slice(1).replace(':', '');
            offsetMin = sign * (parseInt(digits.slice(0, 2), 10) * 60 + parseInt(digits.slice(2), 10));
        }
        if (!wallClock(+y, +mo, +d, +h, +mi, sec ? +sec : 0)) return undefined;
        const utc = Date.UTC(+y, +mo - 1, +d, +h, +mi, sec ? +sec : 0) - offsetMin * MINUTE_MS;
        return formatTimestamp(utc);
    }

    m = s.match(/^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2})(?::(\d{2}))?$/);
    if (m) return wallClock(+m[1], +m[2], +m[3], +m[4], +m[5], m[6] ? +m[6] : 0);

    m = s.match(/^(\d{4})\.\s?(\d{1,2})\.\s?(\d{1,2})\.?\s?(?:(오전|오후)\s?)?(\d{1,2}):(\d{2})(?::(\d{2}))?$/);
    if (m) {
        let hour = +m[5];
        if (m[4] === '오후' && hour < 12) hour += 12;
        if (m[4] === '오전' && hour === 12) hour = 0;
        return wallClock(+m[1], +m[2], +m[3], hour, +m[6], m[7] ? +m[7] : 0);
    }

    m = s.match(/^(\d{4})\.\s?(\d{1,2})\.\s?(\d{1,2})\.?$/);
    if (m) return wallClock(+m[1], +m[2], +m[3]);

    return undefined;
}

/** ms → HH:MM:SS (진행률 ETA 표시용) */
export function formatDuration(ms: number): string {
    if (ms < 0) ms = 0;
    const totalSeconds = Math.floor(ms / 1000);
    const hours = Math.floor(totalSeconds / 3600);
    const minutes = Math.floor((totalSeconds % 3600) / 60);
    const seconds = totalSeconds % 60;
    return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

// ===[ 숫자 ]=================================================================

/** "1,234" → 1234, "1.2만" → 12000. 숫자가 없으면 undefined. */
export function extractCount(text: string | undefined): number | undefined {
    if (!text) return undefined;
    const man = text.match(/(\d+(?:\.\d+)?)\s*만/);
    if (man) return Math.round(parseFloat(man[1]) * 10_000);
    const m = text.match(/\d[\d,]*/);
    if (!m) return undefined;
    return parseInt(m[0].replace(/,/g, ''), 10);
}

/** "45%" → 45, "12.5" → 12.5. [0, 100] 밖이거나 숫자가 없으면 undefined. */
export function parseRatio(text: string | undefined): number | undefined {
    if (!text) return undefined;
    const m = text.match(/\d+(?:\.\d+)?/);
    if (!m) return undefined;
    const value = parseFloat(m[0]);
    return value >= 0 && value <= 100 ? value : undefined;
}
