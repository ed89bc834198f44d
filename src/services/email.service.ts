import { readFile } from 'fs/promises';
import * as path from 'path';
import Mailjet from 'node-mailjet';
import { EmailConfig } from '../config/config';
import { formatDisplayDate, formatDisplayTime, formatLongDate, toWallClock } from '../helpers/date.helper';
import { logger } from '../helpers/logger';

const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export function buildEmailSubject(count: number, now: Date): string {
    return `📊 India Corporate Announcements - ${formatDisplayDate(toWallClock(now))} (${count} updates)`;
}

export function buildEmailBody(count: number, now: Date, googleSheetId = ''): string {
    const clock = toWallClock(now);
    return [
        'Hello,',
        '',
        'Your daily India Corporate Announcements report is ready!',
        '',
        '📊 Summary:',
        `- Total Announcements: ${count}`,
        `- Report Date: ${formatLongDate(clock)}`,
        `- Time: ${formatDisplayTime(clock)}`,
        '',
        'The Excel report is attached. You can also view the live data in your Google Sheet.',
        '',
        `Google Sheet: https://docs.google.com/spreadsheets/d/${googleSheetId}/edit`,
        '',
        '---',
        'This is an automated report from your India Corporate Announcements Tracker.',
    ].join('\n');
}

export async function sendEmailReport(
    reportPath: string,
    announcementCount: number,
    config: EmailConfig | undefined,
    googleSheetId = '',
    now: Date = new Date(),
): Promise<boolean> {
    if (!config) {
        logger.info('ℹ️  Email credentials are not fully set. Skipping email report.');
        return false;
    }

    const mailjet = new Mailjet({ apiKey: config.apiKey, apiSecret: config.apiSecret });

    try {
        const attachment = await readFile(reportPath);

        await mailjet.post('send', { version: 'v3.1' }).request({
            Messages: [{
                From: { Email: config.senderEmail, Name: 'Corporate Announcements Tracker' },
                To: [{ Email: config.notifyEmail }],
                Subject: buildEmailSubject(announcementCount, now),
                TextPart: buildEmailBody(announcementCount, now, googleSheetId),
                Attachments: [{
                    ContentType: XLSX_CONTENT_TYPE,
                    Filename: path.basename(reportPath),
                    Base64Content: attachment.toString('base64'),
                }],
            }],
        });
        logger.info(`✅ Email report sent to ${config.notifyEmail} via Mailjet!`);
        return true;
    } catch (error) {
        logger.error('❌ Failed to send email report via Mailjet:', error);
        return false;
    }
}
