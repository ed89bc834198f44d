import * as dotenv from 'dotenv';
import { z } from 'zod';
import { LogLevel } from '../helpers/logger';

export type AnnouncementSource = 'bse' | 'nse';

export interface GoogleSheetConfig {
    credentialsJson: string;
    sheetId: string;
}

export interface EmailConfig {
    apiKey: string;
    apiSecret: string;
    senderEmail: string;
    notifyEmail: string;
}

export interface CompanyFilters {
    trackScripCodes: string[];
    trackCompanies: string[];
    excludeCompanies: string[];
}

export interface TrackerConfig {
    daysBack: number;
    outputDir: string;
    sources: AnnouncementSource[];
    category: string;
    requestTimeoutMs: number;
    requestDelayMs: number;
    maxAnnouncements: number;
    filters: CompanyFilters;
    extractPdfText: boolean;
    maxPdfPages: number;
    /** Unset when either credentials or sheet id is missing. */
    google?: GoogleSheetConfig;
    /** Unset unless the Mailjet key, secret and sender are all present. */
    email?: EmailConfig;
    /** Sheet id is kept separately so the email can link to it even when the push is off. */
    googleSheetId?: string;
    logLevel: LogLevel;
    port: number;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

const optionalText = z
    .string()
    .optional()
    .transform(value => (value && value.trim().length > 0 ? value.trim() : undefined));

const commaList = z
    .string()
    .optional()
    .transform(value => (value ?? '').split(',').map(item => item.trim()).filter(item => item.length > 0));

const flag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform(value => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
    DAYS_BACK: z.coerce.number().int().min(1).default(4),
    OUTPUT_DIR: z.string().min(1).default('./output'),
    ANNOUNCEMENT_SOURCES: z
        .string()
        .default('bse')
        .transform(value => value.split(',').map(item => item.trim().toLowerCase()).filter(item => item.length > 0))
        .pipe(z.array(z.enum(['bse', 'nse'])).min(1)),
    ANNOUNCEMENT_CATEGORY: z.string().default('-1'),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    MAX_ANNOUNCEMENTS: z.coerce.number().int().min(0).default(0),
    TRACK_SCRIP_CODES: commaList,
    TRACK_COMPANIES: commaList,
    EXCLUDE_COMPANIES: commaList,
    EXTRACT_PDF_TEXT: flag,
    MAX_PDF_PAGES: z.coerce.number().int().positive().default(3),
    GOOGLE_CREDENTIALS: optionalText,
    GOOGLE_SHEET_ID: optionalText,
    MAILJET_API_KEY: optionalText,
    MAILJET_API_SECRET: optionalText,
    SENDER_EMAIL: optionalText,
    NOTIFY_EMAIL: optionalText,
    LOG_LEVEL: z
        .string()
        .default('info')
        .transform(value => {
            const level = value.trim().toLowerCase();
            return level === 'warning' ? 'warn' : level;
        })
        .pipe(z.enum(['debug', 'info', 'warn', 'error'])),
    PORT: z.coerce.number().int().positive().default(3000),
});

/**
 * Builds the run configuration once from the environment. Values in a local
 * `.env` file are merged into `process.env` first; explicit variables win.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<TrackerConfig> {
    if (env === process.env) {
        dotenv.config();
    }

    const result = envSchema.safeParse(env);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${issues}`);
    }

    const parsed = result.data;

    const google = parsed.GOOGLE_CREDENTIALS && parsed.GOOGLE_SHEET_ID
        ? { credentialsJson: parsed.GOOGLE_CREDENTIALS, sheetId: parsed.GOOGLE_SHEET_ID }
        : undefined;

    const email = parsed.MAILJET_API_KEY && parsed.MAILJET_API_SECRET && parsed.SENDER_EMAIL
        ? {
            apiKey: parsed.MAILJET_API_KEY,
            apiSecret: parsed.MAILJET_API_SECRET,
            senderEmail: parsed.SENDER_EMAIL,
            notifyEmail: parsed.NOTIFY_EMAIL ?? parsed.SENDER_EMAIL,
        }
        : undefined;

    return Object.freeze({
        daysBack: parsed.DAYS_BACK,
        outputDir: parsed.OUTPUT_DIR,
        sources: parsed.ANNOUNCEMENT_SOURCES,
        category: parsed.ANNOUNCEMENT_CATEGORY,
        requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
        requestDelayMs: parsed.REQUEST_DELAY_MS,
        maxAnnouncements: parsed.MAX_ANNOUNCEMENTS,
        filters: {
            trackScripCodes: parsed.TRACK_SCRIP_CODES,
            trackCompanies: parsed.TRACK_COMPANIES,
            excludeCompanies: parsed.EXCLUDE_COMPANIES,
        },
        extractPdfText: parsed.EXTRACT_PDF_TEXT,
        maxPdfPages: parsed.MAX_PDF_PAGES,
        google,
        email,
        googleSheetId: parsed.GOOGLE_SHEET_ID,
        logLevel: parsed.LOG_LEVEL,
        port: parsed.PORT,
    });
}
