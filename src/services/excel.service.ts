import { mkdir } from 'fs/promises';
import * as path from 'path';
import { Borders, Fill, Workbook, Worksheet } from 'exceljs';
import { REPORT_HEADERS } from '../config/constants';
import { formatCompactDate, formatDisplayTime, formatLongDate, toWallClock } from '../helpers/date.helper';
import { logger } from '../helpers/logger';
import { countBy } from '../processor';
import { Announcement } from '../types/announcement';

const COLUMN_WIDTHS = [30, 12, 18, 50, 15, 12, 45, 25, 60];
const IMPLICATION_COLUMN = 8;
const TOP_COMPANIES = 10;

const THIN_BORDER: Partial<Borders> = {
    top: { style: 'thin' },
    left: { style: 'thin' },
    bottom: { style: 'thin' },
    right: { style: 'thin' },
};

function solidFill(argb: string): Fill {
    return { type: 'pattern', pattern: 'solid', fgColor: { argb }, bgColor: { argb } };
}

export const HEADER_FILL = solidFill('FF1F4E79');
export const POSITIVE_FILL = solidFill('FFC6EFCE');
export const MODERATE_FILL = solidFill('FFFFEB9C');
export const CAUTIOUS_FILL = solidFill('FFFFC7CE');

export function implicationFill(implication: string): Fill | undefined {
    if (implication.includes('★★★')) return POSITIVE_FILL;
    if (implication.includes('CAUTIOUS')) return CAUTIOUS_FILL;
    if (implication.includes('★★')) return MODERATE_FILL;
    return undefined;
}

export function toReportRow(record: Announcement): string[] {
    return [
        record.company,
        record.scripCode,
        record.category,
        record.subject,
        record.occurredAt.date,
        record.occurredAt.time,
        record.highlights,
        record.implication,
        record.pdfUrl,
    ];
}

export function reportFileName(now: Date): string {
    return `India_Corporate_Announcements_${formatCompactDate(now)}.xlsx`;
}

function addAnnouncementsSheet(workbook: Workbook, records: readonly Announcement[]): Worksheet {
    const sheet = workbook.addWorksheet('Announcements', {
        views: [{ state: 'frozen', ySplit: 1 }],
    });

    const header = sheet.addRow([...REPORT_HEADERS]);
    header.height = 25;
    header.eachCell(cell => {
        cell.font = { bold: true, color: { argb: 'FFFFFFFF' }, size: 11 };
        cell.fill = HEADER_FILL;
        cell.alignment = { horizontal: 'center', vertical: 'middle', wrapText: true };
        cell.border = THIN_BORDER;
    });

    for (const record of records) {
        const row = sheet.addRow(toReportRow(record));
        row.height = 80;
        for (let col = 1; col <= REPORT_HEADERS.length; col++) {
            const cell = row.getCell(col);
            cell.alignment = { vertical: 'top', wrapText: true };
            cell.border = THIN_BORDER;
        }

        const fill = implicationFill(record.implication);
        if (fill) {
            row.getCell(IMPLICATION_COLUMN).fill = fill;
        }
    }

    COLUMN_WIDTHS.forEach((width, index) => {
        sheet.getColumn(index + 1).width = width;
    });
    sheet.autoFilter = `A1:I${records.length + 1}`;

    return sheet;
}

function writeCountSection(sheet: Worksheet, startRow: number, title: string, counts: [string, number][]): number {
    const heading = sheet.getCell(startRow, 1);
    heading.value = title;
    heading.font = { bold: true, size: 14 };

    let row = startRow + 1;
    for (const [label, count] of counts) {
        sheet.getCell(row, 1).value = label;
        sheet.getCell(row, 2).value = count;
        row++;
    }
    return row;
}

function addSummarySheet(workbook: Workbook, records: readonly Announcement[], generatedAt: Date): Worksheet {
    const sheet = workbook.addWorksheet('Summary');
    const clock = toWallClock(generatedAt);

    sheet.getCell('A1').value = 'Indian Corporate Announcements Summary';
    sheet.getCell('A1').font = { bold: true, size: 16 };
    sheet.getCell('A2').value = `Generated: ${formatLongDate(clock)} ${formatDisplayTime(clock)}`;

    let row = writeCountSection(sheet, 4, 'Announcements by Category', countBy(records, r => r.category));
    row = writeCountSection(sheet, row + 2, 'Investment Implications Breakdown', countBy(records, r => r.implication));
    writeCountSection(
        sheet,
        row + 2,
        'Companies with Most Announcements',
        countBy(records, r => r.company).slice(0, TOP_COMPANIES),
    );

    sheet.getColumn(1).width = 40;
    sheet.getColumn(2).width = 15;

    return sheet;
}

export function buildWorkbook(
    records: readonly Announcement[],
    generatedAt: Date = new Date(),
    includeSummary = true,
): Workbook {
    const workbook = new Workbook();
    workbook.created = generatedAt;

    if (includeSummary) {
        addSummarySheet(workbook, records, generatedAt);
    }
    addAnnouncementsSheet(workbook, records);

    return workbook;
}

/** Writes the report; failures propagate since nothing downstream works without it. */
export async function writeExcelReport(
    records: readonly Announcement[],
    outputDir: string,
    now: Date = new Date(),
): Promise<string> {
    await mkdir(outputDir, { recursive: true });
    const outputFile = path.join(outputDir, reportFileName(now));

    await buildWorkbook(records, now).xlsx.writeFile(outputFile);

    logger.info(`📊 Excel report saved: ${outputFile}`);
    return outputFile;
}
