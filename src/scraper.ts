#!/usr/bin/env node
import { Request, Response } from 'express';
import { loadConfig, TrackerConfig } from './config/config';
import { daysAgo } from './helpers/date.helper';
import { logger, setLogLevel } from './helpers/logger';
import { countBy, processAnnouncements } from './processor';
import { BseClient, FetcherOptions } from './services/bse.service';
import { sendEmailReport } from './services/email.service';
import { writeExcelReport } from './services/excel.service';
import { NseClient } from './services/nse.service';
import { createPdfDescriber } from './services/pdf.service';
import { updateGoogleSheet } from './services/sheets.service';
import { Announcement, RawAnnouncement } from './types/announcement';

export interface RunSummary {
    rawCount: number;
    processedCount: number;
    reportPath: string | null;
    categoryCounts: [string, number][];
    sheetUpdated: boolean;
    emailSent: boolean;
}

export interface TrackerDependencies {
    fetchRaw: (config: TrackerConfig, now: Date) => Promise<RawAnnouncement[]>;
    describe?: (pdfUrl: string) => Promise<string>;
    writeReport: (records: readonly Announcement[], outputDir: string, now: Date) => Promise<string>;
    updateSheet: (records: readonly Announcement[], config: TrackerConfig) => Promise<boolean>;
    sendEmail: (reportPath: string, count: number, config: TrackerConfig) => Promise<boolean>;
    now: () => Date;
}

export async function fetchFromSources(
    config: TrackerConfig,
    now: Date,
    transport: Pick<FetcherOptions, 'http' | 'delay'> = {},
): Promise<RawAnnouncement[]> {
    const raw: RawAnnouncement[] = [];

    if (config.sources.includes('bse')) {
        logger.info(`\n🔎 Fetching BSE announcements for the last ${config.daysBack} days...`);
        const bse = new BseClient({
            ...transport,
            timeoutMs: config.requestTimeoutMs,
            requestDelayMs: config.requestDelayMs,
        });
        raw.push(...await bse.fetchRecentAnnouncements(config.daysBack, config.category, now));
    }

    if (config.sources.includes('nse')) {
        logger.info(`\n🔎 Fetching NSE announcements for the last ${config.daysBack} days...`);
        const nse = new NseClient({ ...transport, timeoutMs: config.requestTimeoutMs });
        raw.push(...await nse.fetchAnnouncements({ fromDate: daysAgo(now, config.daysBack - 1), toDate: now }));
    }

    return raw;
}

function defaultDependencies(config: TrackerConfig): TrackerDependencies {
    return {
        fetchRaw: (cfg, now) => fetchFromSources(cfg, now),
        describe: config.extractPdfText
            ? createPdfDescriber({ maxPages: config.maxPdfPages, timeoutMs: config.requestTimeoutMs })
            : undefined,
        writeReport: writeExcelReport,
        updateSheet: (records, cfg) => updateGoogleSheet(records, cfg.google),
        sendEmail: (reportPath, count, cfg) => sendEmailReport(reportPath, count, cfg.email, cfg.googleSheetId),
        now: () => new Date(),
    };
}

function logCategorySummary(categoryCounts: [string, number][]): void {
    logger.info('\n📂 Category Summary:');
    for (const [category, count] of categoryCounts) {
        logger.info(`  ${category}: ${count}`);
    }
}

/**
 * One full run: fetch, process, write the workbook, then the optional
 * distribution channels. Only a failure to write the workbook escapes.
 */
export async function runTracker(
    config: TrackerConfig,
    overrides: Partial<TrackerDependencies> = {},
): Promise<RunSummary> {
    const deps: TrackerDependencies = { ...defaultDependencies(config), ...overrides };
    const now = deps.now();

    logger.info('🚀 Starting Corporate Announcements Tracker...');

    const raw = await deps.fetchRaw(config, now);
    logger.info(`\n📥 Total raw announcements: ${raw.length}`);

    logger.info('\n⚙️  Processing announcements...');
    const processed = await processAnnouncements(raw, {
        filters: config.filters,
        maxAnnouncements: config.maxAnnouncements,
        describe: deps.describe,
        now,
    });
    logger.info(`✅ Processed ${processed.length} unique announcements`);

    const summary: RunSummary = {
        rawCount: raw.length,
        processedCount: processed.length,
        reportPath: null,
        categoryCounts: countBy(processed, r => r.category),
        sheetUpdated: false,
        emailSent: false,
    };

    if (processed.length === 0) {
        logger.warn('\n⚠️  No announcements found. No report written.');
        return summary;
    }

    logger.info('\n📊 Creating Excel report...');
    summary.reportPath = await deps.writeReport(processed, config.outputDir, now);

    logger.info('\n📤 Updating Google Sheet...');
    summary.sheetUpdated = await deps.updateSheet(processed, config);

    logger.info('\n📧 Sending email report...');
    summary.emailSent = await deps.sendEmail(summary.reportPath, processed.length, config);

    logger.info(`
                ========================================
                            RUN COMPLETE
                ========================================
        `);
    logger.info(`Total announcements: ${processed.length}`);
    logCategorySummary(summary.categoryCounts);

    return summary;
}

/**
 * Express handler that answers 202 right away and runs the tracker in the
 * background. A second request while a run is active gets 409.
 */
export function createTrackerEndpoint(
    config: TrackerConfig,
    run: (config: TrackerConfig) => Promise<RunSummary> = runTracker,
) {
    let running = false;

    return (_req: Request, res: Response): void => {
        if (running) {
            res.status(409).send('A run is already in progress.');
            return;
        }

        logger.info('▶️  Tracker endpoint triggered.');
        running = true;
        res.status(202).send('Tracker run triggered successfully.');

        run(config)
            .catch(error => {
                logger.error('❌ An unexpected error occurred during the run:', error);
            })
            .finally(() => {
                running = false;
            });
    };
}

export async function main(): Promise<void> {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    await runTracker(config);
}

if (require.main === module) {
    main().catch(error => {
        logger.error('❌ Tracker run failed:', error);
        process.exitCode = 1;
    });
}
