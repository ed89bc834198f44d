import { BSE_PDF_BASE_URL } from '../config/constants';
import {
    buildDedupKey,
    buildPdfUrl,
    countBy,
    processAnnouncements,
    shouldTrackCompany,
    sortByDisplayDate,
} from '../processor';
import { RawAnnouncement } from '../types/announcement';
import { makeAnnouncement, muteConsole } from './fixtures';

const alpha: RawAnnouncement = {
    SLONGNAME: 'Alpha Industries Ltd',
    SCRIP_CD: 500001,
    NEWSSUB: 'Board Meeting Intimation',
    NEWS_DT: '2024-01-15T10:00:00',
    ATTACHMENTNAME: 'alpha.pdf',
};
const beta: RawAnnouncement = {
    SLONGNAME: 'Beta Power Ltd',
    SCRIP_CD: '500002',
    NEWSSUB: 'Declaration of Dividend',
    NEWS_DT: '2024-01-17T11:00:00',
    ATTACHMENTNAME: '',
};
const gamma: RawAnnouncement = {
    SLONGNAME: 'Gamma Finance Ltd',
    SCRIP_CD: '500003',
    NEWSSUB: 'Credit Rating update',
    NEWS_DT: '16-Jan-2024 09:30:00',
};

const now = new Date(2024, 0, 18, 8, 0, 0);

describe('processAnnouncements', () => {
    muteConsole();

    it('should collapse duplicates and sort by display date, newest first', async () => {
        const result = await processAnnouncements([alpha, beta, { ...alpha }, gamma, { ...alpha }], { now });

        expect(result).toHaveLength(3);
        expect(result.map(r => r.scripCode)).toEqual(['500002', '500003', '500001']);
        expect(result[0].occurredAt.date).toBe('17 Jan 2024');
    });

    it('should build a canonical record', async () => {
        const [record] = await processAnnouncements([beta], { now });

        expect(record).toMatchObject({
            company: 'Beta Power Ltd',
            scripCode: '500002',
            subject: 'Declaration of Dividend',
            attachmentPath: '',
            pdfUrl: '',
            category: 'Dividend',
            highlights: '• Declaration of Dividend',
            implication: '★★★ POSITIVE',
        });
        expect(record.occurredAt).toMatchObject({ date: '17 Jan 2024', time: '11:00 AM' });
        expect(Object.isFrozen(record)).toBe(true);
    });

    it('should stringify numeric scrip codes and join the PDF URL', async () => {
        const [record] = await processAnnouncements([alpha], { now });

        expect(record.scripCode).toBe('500001');
        expect(record.pdfUrl).toBe(`${BSE_PDF_BASE_URL}/alpha.pdf`);
        expect(record.category).toBe('Board Meeting');
    });

    it('should read the NSE field names and skip null values', async () => {
        const [record] = await processAnnouncements([{
            SLONGNAME: null,
            COMPANY_NAME: 'Delta Motors',
            SYMBOL: 'DELTA',
            SUBJECT: 'Press release',
            DATE: '2024-01-16T12:00:00Z',
            ATTACHMENT: 'delta.pdf',
        }], { now });

        expect(record.company).toBe('Delta Motors');
        expect(record.scripCode).toBe('DELTA');
        expect(record.subject).toBe('Press release');
        expect(record.pdfUrl).toBe(`${BSE_PDF_BASE_URL}/delta.pdf`);
    });

    it('should fill defaults for an empty record', async () => {
        const [record] = await processAnnouncements([{}], { now });

        expect(record).toMatchObject({
            company: 'Unknown',
            scripCode: '',
            subject: '',
            category: 'Others',
            highlights: 'Details in PDF',
            implication: '★★ NEUTRAL',
        });
        expect(record.occurredAt.date).toBe('18 Jan 2024');
    });

    it('should cut long subjects for display only', async () => {
        const subject = `${'a'.repeat(210)} interim dividend declared`;

        const [record] = await processAnnouncements([{ ...alpha, NEWSSUB: subject }], { now });

        expect(record.subject).toBe('a'.repeat(200));
        expect(record.category).toBe('Dividend');
    });

    it('should treat subjects that differ only after 50 characters as duplicates', async () => {
        const base = 'Intimation under Regulation 30 of SEBI Listing Regulations 2015';
        const first = { ...gamma, NEWSSUB: `${base} - part one` };
        const second = { ...gamma, NEWSSUB: `${base} - part two` };

        expect(await processAnnouncements([first, second], { now })).toHaveLength(1);
    });

    it('should keep subjects that differ within the first 50 characters', async () => {
        const first = { ...gamma, NEWSSUB: 'Credit Rating update for bank facilities' };
        const second = { ...gamma, NEWSSUB: 'Credit Rating update for debentures' };

        expect(await processAnnouncements([first, second], { now })).toHaveLength(2);
    });

    it('should sort on the date string rather than chronologically', async () => {
        const result = await processAnnouncements([
            { ...alpha, NEWS_DT: '2024-02-01T10:00:00' },
            { ...beta, NEWS_DT: '2024-01-31T10:00:00' },
        ], { now });

        expect(result.map(r => r.occurredAt.date)).toEqual(['31 Jan 2024', '01 Feb 2024']);
    });

    it('should drop a failing record and keep the rest', async () => {
        const broken: RawAnnouncement = {};
        Object.defineProperty(broken, 'NEWSSUB', {
            enumerable: true,
            get() {
                throw new Error('malformed record');
            },
        });

        const result = await processAnnouncements([broken, beta], { now });

        expect(result.map(r => r.scripCode)).toEqual(['500002']);
        expect(console.error).toHaveBeenCalledWith('   ❌ Error processing announcement:', expect.any(Error));
    });

    it('should apply company filters', async () => {
        const filters = { trackScripCodes: [], trackCompanies: [], excludeCompanies: ['alpha'] };
        const result = await processAnnouncements([alpha, beta, gamma], { now, filters });

        expect(result.map(r => r.company)).toEqual(['Beta Power Ltd', 'Gamma Finance Ltd']);
    });

    it('should stop at the configured maximum', async () => {
        const result = await processAnnouncements([alpha, beta, gamma], { now, maxAnnouncements: 2 });

        expect(result.map(r => r.scripCode)).toEqual(['500002', '500001']);
    });

    it('should feed attachment text into the highlights', async () => {
        const describe = jest.fn().mockResolvedValue('Revenue: Rs 1,200 crore');
        const [record] = await processAnnouncements([alpha], { now, describe });

        expect(describe).toHaveBeenCalledWith(`${BSE_PDF_BASE_URL}/alpha.pdf`);
        expect(record.highlights).toBe('• REVENUE: 1,200');
        expect(record.category).toBe('Board Meeting');
    });

    it('should fall back to the subject when the attachment cannot be read', async () => {
        const describe = jest.fn().mockRejectedValue(new Error('404'));
        const [record] = await processAnnouncements([alpha], { now, describe });

        expect(record.highlights).toBe('• Board Meeting Intimation');
    });

    it('should not look up attachments for records without one', async () => {
        const describe = jest.fn().mockResolvedValue('');
        await processAnnouncements([beta], { now, describe });

        expect(describe).not.toHaveBeenCalled();
    });
});

describe('buildDedupKey', () => {
    it('should join scrip code, the first 50 subject characters and the raw date', () => {
        const subject = 'x'.repeat(60);
        expect(buildDedupKey('500001', subject, '2024-01-15T10:00:00')).toBe(`500001_${'x'.repeat(50)}_2024-01-15T10:00:00`);
        expect(buildDedupKey('500001', 'Notice', undefined)).toBe('500001_Notice_');
    });
});

describe('buildPdfUrl', () => {
    it('should be empty without an attachment', () => {
        expect(buildPdfUrl('')).toBe('');
        expect(buildPdfUrl('a.pdf', 'https://files.example.com')).toBe('https://files.example.com/a.pdf');
    });
});

describe('shouldTrackCompany', () => {
    const none = { trackScripCodes: [], trackCompanies: [], excludeCompanies: [] };

    it('should track everything without filters', () => {
        expect(shouldTrackCompany('Alpha', '1')).toBe(true);
        expect(shouldTrackCompany('Alpha', '1', none)).toBe(true);
    });

    it('should honour include lists by scrip code or partial name', () => {
        const filters = { ...none, trackScripCodes: ['500002'], trackCompanies: ['gamma'] };

        expect(shouldTrackCompany('Beta Power Ltd', '500002', filters)).toBe(true);
        expect(shouldTrackCompany('Gamma Finance Ltd', '500003', filters)).toBe(true);
        expect(shouldTrackCompany('Alpha Industries Ltd', '500001', filters)).toBe(false);
    });

    it('should let exclusions win', () => {
        const filters = { ...none, trackScripCodes: ['500001'], excludeCompanies: ['ALPHA'] };
        expect(shouldTrackCompany('Alpha Industries Ltd', '500001', filters)).toBe(false);
    });
});

describe('sortByDisplayDate', () => {
    it('should keep input order for equal dates', () => {
        const first = makeAnnouncement({ scripCode: 'A' });
        const second = makeAnnouncement({ scripCode: 'B' });

        expect(sortByDisplayDate([first, second]).map(r => r.scripCode)).toEqual(['A', 'B']);
    });
});

describe('countBy', () => {
    it('should order counts from largest to smallest', () => {
        const records = [
            makeAnnouncement({ category: 'Rating' }),
            makeAnnouncement({ category: 'Dividend' }),
            makeAnnouncement({ category: 'Dividend' }),
        ];

        expect(countBy(records, r => r.category)).toEqual([['Dividend', 2], ['Rating', 1]]);
    });
});
