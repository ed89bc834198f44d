import pdf from 'pdf-parse';
import { REQUEST_HEADERS } from '../config/constants';
import { logger } from '../helpers/logger';
import { HttpClient, createHttpClient } from './bse.service';

export interface PdfTextOptions {
    maxPages: number;
    timeoutMs: number;
    http?: HttpClient;
}

export async function extractPdfText(buffer: Buffer, maxPages: number): Promise<string> {
    try {
        const data = await pdf(buffer, { max: maxPages });
        return data.text.trim();
    } catch (error) {
        logger.error('   ❌ [Error] Failed to extract text from PDF:', error);
        return '';
    }
}

export async function downloadPdfBuffer(http: HttpClient, url: string, timeoutMs: number): Promise<Buffer | null> {
    try {
        logger.debug(`   📥 Downloading ${url}`);
        const response = await http.get<ArrayBuffer>(url, {
            headers: REQUEST_HEADERS,
            responseType: 'arraybuffer',
            timeout: timeoutMs,
        });
        return Buffer.from(response.data);
    } catch (error) {
        logger.error(`   ❌ Failed to download ${url}:`, error);
        return null;
    }
}

/**
 * Returns a lookup that turns an attachment URL into its first pages of text,
 * or an empty string when the download or the extraction fails.
 */
export function createPdfDescriber(options: PdfTextOptions): (pdfUrl: string) => Promise<string> {
    const http = options.http ?? createHttpClient();

    return async (pdfUrl: string): Promise<string> => {
        if (!pdfUrl) return '';
        const buffer = await downloadPdfBuffer(http, pdfUrl, options.timeoutMs);
        if (!buffer) return '';
        return extractPdfText(buffer, options.maxPages);
    };
}
