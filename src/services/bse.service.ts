import axios, { AxiosInstance } from 'axios';
import {
    BSE_ANNOUNCEMENTS_URL,
    BSE_WARMUP_URL,
    REQUEST_HEADERS,
    WARMUP_TIMEOUT_MS,
} from '../config/constants';
import { daysAgo, formatCompactDate, formatDisplayDate, toWallClock } from '../helpers/date.helper';
import { logger } from '../helpers/logger';
import { toRecordList } from '../helpers/record.helper';
import { RawAnnouncement } from '../types/announcement';

export type HttpClient = Pick<AxiosInstance, 'get'>;

export interface FetcherOptions {
    http?: HttpClient;
    timeoutMs?: number;
    warmupDelayMs?: number;
    requestDelayMs?: number;
    delay?: (ms: number) => Promise<void>;
}

export interface AnnouncementQuery {
    fromDate: Date;
    toDate: Date;
    /** BSE category filter, `-1` (or empty) means all. */
    category?: string;
}

export function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export function collectCookies(setCookie: unknown): string {
    const values: unknown[] = Array.isArray(setCookie) ? setCookie : [setCookie];
    return values
        .filter((value): value is string => typeof value === 'string' && value.length > 0)
        .map(value => value.split(';')[0].trim())
        .join('; ');
}

export function createHttpClient(): AxiosInstance {
    return axios.create({ headers: REQUEST_HEADERS });
}

export class BseClient {
    private readonly http: HttpClient;
    private readonly timeoutMs: number;
    private readonly warmupDelayMs: number;
    private readonly requestDelayMs: number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(options: FetcherOptions = {}) {
        this.http = options.http ?? createHttpClient();
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.warmupDelayMs = options.warmupDelayMs ?? 500;
        this.requestDelayMs = options.requestDelayMs ?? 1000;
        this.sleep = options.delay ?? delay;
    }

    /**
     * The API only answers once the public announcements page has handed out
     * its session cookies, so every query starts with that page.
     */
    private async warmUp(): Promise<string> {
        const response = await this.http.get<unknown>(BSE_WARMUP_URL, {
            headers: REQUEST_HEADERS,
            timeout: WARMUP_TIMEOUT_MS,
            responseType: 'text',
        });
        return collectCookies(response.headers['set-cookie']);
    }

    async fetchAnnouncements(query: AnnouncementQuery): Promise<RawAnnouncement[]> {
        const from = formatCompactDate(query.fromDate);
        const to = formatCompactDate(query.toDate);
        const label = from === to
            ? formatDisplayDate(toWallClock(query.fromDate))
            : `${formatDisplayDate(toWallClock(query.fromDate))} - ${formatDisplayDate(toWallClock(query.toDate))}`;

        try {
            const cookies = await this.warmUp();
            await this.sleep(this.warmupDelayMs);

            const response = await this.http.get<unknown>(BSE_ANNOUNCEMENTS_URL, {
                params: {
                    strCat: query.category && query.category.length > 0 ? query.category : '-1',
                    strPrevDate: from,
                    strScrip: '',
                    strSearch: 'P',
                    strToDate: to,
                    strType: 'C',
                },
                headers: cookies ? { ...REQUEST_HEADERS, Cookie: cookies } : REQUEST_HEADERS,
                timeout: this.timeoutMs,
            });

            const body = response.data;
            const table = typeof body === 'object' && body !== null && 'Table' in body ? body.Table : undefined;
            const records = toRecordList(table);

            logger.info(`   📅 ${label}: found ${records.length} announcements`);
            return records;
        } catch (error) {
            logger.error(`   ❌ Error fetching BSE announcements for ${label}:`, error);
            return [];
        }
    }

    fetchAnnouncementsForDate(date: Date, category = '-1'): Promise<RawAnnouncement[]> {
        return this.fetchAnnouncements({ fromDate: date, toDate: date, category });
    }

    /** One query per day, newest first, pausing after each. */
    async fetchRecentAnnouncements(daysBack: number, category = '-1', now: Date = new Date()): Promise<RawAnnouncement[]> {
        const all: RawAnnouncement[] = [];

        for (let i = 0; i < daysBack; i++) {
            const daily = await this.fetchAnnouncementsForDate(daysAgo(now, i), category);
            all.push(...daily);
            await this.sleep(this.requestDelayMs);
        }

        return all;
    }
}
