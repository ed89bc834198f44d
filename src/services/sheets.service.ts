import { google, sheets_v4 } from 'googleapis';
import { REPORT_HEADERS } from '../config/constants';
import { GoogleSheetConfig } from '../config/config';
import { formatDisplayDate, formatDisplayTime, toWallClock } from '../helpers/date.helper';
import { logger } from '../helpers/logger';
import { isRecord } from '../helpers/record.helper';
import { Announcement } from '../types/announcement';
import { toReportRow } from './excel.service';

export const SHEET_DATA_RANGE = 'Sheet1!A:I';
export const SHEET_START_CELL = 'Sheet1!A1';
export const SHEET_TIMESTAMP_CELL = 'Sheet1!K1';

const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

export type SheetValuesApi = Pick<sheets_v4.Resource$Spreadsheets$Values, 'clear' | 'update'>;

export function createSheetValuesApi(credentialsJson: string): SheetValuesApi {
    const parsed: unknown = JSON.parse(credentialsJson);
    const clientEmail = isRecord(parsed) ? parsed.client_email : undefined;
    const privateKey = isRecord(parsed) ? parsed.private_key : undefined;
    if (typeof clientEmail !== 'string' || typeof privateKey !== 'string') {
        throw new Error('GOOGLE_CREDENTIALS must be a service-account key with client_email and private_key');
    }

    const auth = new google.auth.GoogleAuth({
        credentials: { client_email: clientEmail, private_key: privateKey },
        scopes: [SHEETS_SCOPE],
    });
    return google.sheets({ version: 'v4', auth }).spreadsheets.values;
}

export function buildSheetRows(records: readonly Announcement[]): string[][] {
    return [[...REPORT_HEADERS], ...records.map(toReportRow)];
}

/**
 * Replaces the contents of the shared sheet with this run's rows. Returns
 * false, without throwing, when the sheet is not configured or the push fails.
 */
export async function updateGoogleSheet(
    records: readonly Announcement[],
    config: GoogleSheetConfig | undefined,
    api?: SheetValuesApi,
    now: Date = new Date(),
): Promise<boolean> {
    if (!config) {
        logger.info('ℹ️  Google credentials or sheet ID not configured. Skipping sheet update.');
        return false;
    }

    try {
        const values = api ?? createSheetValuesApi(config.credentialsJson);

        await values.clear({ spreadsheetId: config.sheetId, range: SHEET_DATA_RANGE });

        await values.update({
            spreadsheetId: config.sheetId,
            range: SHEET_START_CELL,
            valueInputOption: 'RAW',
            requestBody: { values: buildSheetRows(records) },
        });

        const clock = toWallClock(now);
        await values.update({
            spreadsheetId: config.sheetId,
            range: SHEET_TIMESTAMP_CELL,
            valueInputOption: 'RAW',
            requestBody: { values: [[`Last Updated: ${formatDisplayDate(clock)} ${formatDisplayTime(clock)}`]] },
        });

        logger.info(`✅ Google Sheet updated with ${records.length} announcements`);
        return true;
    } catch (error) {
        logger.error('❌ Error updating Google Sheet:', error);
        return false;
    }
}
