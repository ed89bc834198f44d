import { NSE_ANNOUNCEMENTS_URL, NSE_WARMUP_URL, REQUEST_HEADERS, WARMUP_TIMEOUT_MS } from '../config/constants';
import { formatDashedDate } from '../helpers/date.helper';
import { logger } from '../helpers/logger';
import { isRecord, toRecordList } from '../helpers/record.helper';
import { RawAnnouncement } from '../types/announcement';
import { AnnouncementQuery, FetcherOptions, HttpClient, collectCookies, createHttpClient, delay } from './bse.service';

const NSE_HEADERS: Record<string, string> = {
    ...REQUEST_HEADERS,
    'Referer': 'https://www.nseindia.com/',
    'Origin': 'https://www.nseindia.com',
};

/** The endpoint has answered with a bare list as well as a wrapped one. */
export function extractNseRecords(body: unknown): RawAnnouncement[] {
    if (Array.isArray(body)) return toRecordList(body);
    if (isRecord(body)) {
        if (Array.isArray(body.Table)) return toRecordList(body.Table);
        if (Array.isArray(body.data)) return toRecordList(body.data);
    }
    return [];
}

/** One ranged query per run, so there is no pause between requests to configure. */
export type NseClientOptions = Omit<FetcherOptions, 'requestDelayMs'>;

export class NseClient {
    private readonly http: HttpClient;
    private readonly timeoutMs: number;
    private readonly warmupDelayMs: number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(options: NseClientOptions = {}) {
        this.http = options.http ?? createHttpClient();
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.warmupDelayMs = options.warmupDelayMs ?? 2000;
        this.sleep = options.delay ?? delay;
    }

    async fetchAnnouncements(query: AnnouncementQuery): Promise<RawAnnouncement[]> {
        const from = formatDashedDate(query.fromDate);
        const to = formatDashedDate(query.toDate);

        try {
            const warmup = await this.http.get<unknown>(NSE_WARMUP_URL, {
                headers: NSE_HEADERS,
                timeout: WARMUP_TIMEOUT_MS,
                responseType: 'text',
            });
            const cookies = collectCookies(warmup.headers['set-cookie']);
            await this.sleep(this.warmupDelayMs);

            const response = await this.http.get<unknown>(NSE_ANNOUNCEMENTS_URL, {
                params: { index: 'equities', from_date: from, to_date: to },
                headers: cookies ? { ...NSE_HEADERS, Cookie: cookies } : NSE_HEADERS,
                timeout: this.timeoutMs,
            });

            const records = extractNseRecords(response.data);
            logger.info(`   📅 NSE ${from} to ${to}: found ${records.length} announcements`);
            return records;
        } catch (error) {
            logger.error(`   ❌ Error fetching NSE announcements for ${from} to ${to}:`, error);
            return [];
        }
    }
}
