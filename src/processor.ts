import { BSE_PDF_BASE_URL, SUBJECT_DISPLAY_LENGTH } from './config/constants';
import { CompanyFilters } from './config/config';
import { parseAnnouncementDate } from './helpers/date.helper';
import { logger } from './helpers/logger';
import { pickField, pickRawField } from './helpers/record.helper';
import { categorizeAnnouncement } from './services/categorizer.service';
import { extractKeyHighlights } from './services/highlight.service';
import { assessInvestmentImplication } from './services/sentiment.service';
import { Announcement, RawAnnouncement } from './types/announcement';

// Candidate field names per attribute, BSE shape first, NSE shape second.
export const FIELD_CANDIDATES = {
    company: ['SLONGNAME', 'COMPANY_NAME'],
    scripCode: ['SCRIP_CD', 'SYMBOL'],
    subject: ['NEWSSUB', 'SUBJECT'],
    newsDate: ['NEWS_DT', 'DATE'],
    attachment: ['ATTACHMENTNAME', 'ATTACHMENT'],
} as const;

export const UNKNOWN_COMPANY = 'Unknown';
const DEDUP_SUBJECT_LENGTH = 50;

export interface ProcessOptions {
    filters?: CompanyFilters;
    /** 0 or unset means no limit. */
    maxAnnouncements?: number;
    /** Supplies extra text (PDF contents) for highlight extraction. */
    describe?: (pdfUrl: string) => Promise<string>;
    pdfBaseUrl?: string;
    now?: Date;
}

export function buildDedupKey(scripCode: string, subject: string, rawDate: unknown): string {
    const datePart = typeof rawDate === 'string' ? rawDate : rawDate === undefined ? '' : String(rawDate);
    return `${scripCode}_${subject.slice(0, DEDUP_SUBJECT_LENGTH)}_${datePart}`;
}

export function buildPdfUrl(attachment: string, baseUrl: string = BSE_PDF_BASE_URL): string {
    return attachment ? `${baseUrl}/${attachment}` : '';
}

export function shouldTrackCompany(company: string, scripCode: string, filters?: CompanyFilters): boolean {
    if (!filters) return true;

    const name = company.toLowerCase();
    if (filters.excludeCompanies.some(excluded => name.includes(excluded.toLowerCase()))) {
        return false;
    }

    if (filters.trackScripCodes.length === 0 && filters.trackCompanies.length === 0) {
        return true;
    }

    if (filters.trackScripCodes.includes(scripCode)) {
        return true;
    }

    return filters.trackCompanies.some(tracked => name.includes(tracked.toLowerCase()));
}

/** Descending on the display date string; equal dates keep their input order. */
export function sortByDisplayDate(records: readonly Announcement[]): Announcement[] {
    return [...records].sort((a, b) => {
        const left = a.occurredAt.date;
        const right = b.occurredAt.date;
        if (left === right) return 0;
        return left < right ? 1 : -1;
    });
}

async function describeSafely(describe: ProcessOptions['describe'], pdfUrl: string): Promise<string> {
    if (!describe || !pdfUrl) return '';
    try {
        return await describe(pdfUrl);
    } catch (error) {
        logger.warn(`   ⚠️  Could not read attachment text for ${pdfUrl}:`, error);
        return '';
    }
}

export async function processAnnouncements(
    rawAnnouncements: readonly RawAnnouncement[],
    options: ProcessOptions = {},
): Promise<Announcement[]> {
    const processed: Announcement[] = [];
    const seen = new Set<string>();
    const limit = options.maxAnnouncements ?? 0;

    for (const raw of rawAnnouncements) {
        if (limit > 0 && processed.length >= limit) {
            logger.info(`   ✋ Reached the limit of ${limit} announcements`);
            break;
        }

        try {
            const company = pickField(raw, FIELD_CANDIDATES.company, UNKNOWN_COMPANY);
            const scripCode = pickField(raw, FIELD_CANDIDATES.scripCode, '');
            const subject = pickField(raw, FIELD_CANDIDATES.subject, '');
            const rawDate = pickRawField(raw, FIELD_CANDIDATES.newsDate);
            const attachmentPath = pickField(raw, FIELD_CANDIDATES.attachment, '');

            const key = buildDedupKey(scripCode, subject, rawDate);
            if (seen.has(key)) continue;
            seen.add(key);

            if (!shouldTrackCompany(company, scripCode, options.filters)) {
                logger.debug(`   🔇 Skipping untracked company: ${company}`);
                continue;
            }

            const occurredAt = Object.freeze(parseAnnouncementDate(rawDate, options.now));
            const pdfUrl = buildPdfUrl(attachmentPath, options.pdfBaseUrl);
            const description = await describeSafely(options.describe, pdfUrl);

            const category = categorizeAnnouncement(subject);
            const highlights = extractKeyHighlights(description ? `${subject}. ${description}` : subject, category);
            const implication = assessInvestmentImplication(`${subject} ${highlights}`, category);

            processed.push(Object.freeze({
                company,
                scripCode,
                subject: subject.slice(0, SUBJECT_DISPLAY_LENGTH),
                occurredAt,
                attachmentPath,
                pdfUrl,
                category,
                highlights,
                implication,
            }));
        } catch (error) {
            logger.error('   ❌ Error processing announcement:', error);
        }
    }

    return sortByDisplayDate(processed);
}

/** Counts per label, largest first; ties keep first-seen order. */
export function countBy(records: readonly Announcement[], label: (record: Announcement) => string): [string, number][] {
    const counts = new Map<string, number>();
    for (const record of records) {
        const key = label(record);
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    return Array.from(counts.entries()).sort((a, b) => b[1] - a[1]);
}
