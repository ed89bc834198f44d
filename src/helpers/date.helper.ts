import { AnnouncementDate } from '../types/announcement';

const MONTHS_SHORT = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const MONTHS_LONG = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December',
];

const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/;
const EXCHANGE_PATTERN = /^(\d{1,2})-([A-Za-z]{3})-(\d{4}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/;

/** Calendar fields as written in the source, before any timezone conversion. */
export interface WallClock {
    year: number;
    month: number; // 0-11
    day: number;
    hour: number;
    minute: number;
    second: number;
    millisecond: number;
}

function pad(value: number, width = 2): string {
    return String(value).padStart(width, '0');
}

export function toWallClock(date: Date): WallClock {
    return {
        year: date.getFullYear(),
        month: date.getMonth(),
        day: date.getDate(),
        hour: date.getHours(),
        minute: date.getMinutes(),
        second: date.getSeconds(),
        millisecond: date.getMilliseconds(),
    };
}

/** `20240115` */
export function formatCompactDate(date: Date): string {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/** `15-01-2024` */
export function formatDashedDate(date: Date): string {
    return `${pad(date.getDate())}-${pad(date.getMonth() + 1)}-${date.getFullYear()}`;
}

/** `15 Jan 2024` */
export function formatDisplayDate(clock: WallClock): string {
    return `${pad(clock.day)} ${MONTHS_SHORT[clock.month]} ${clock.year}`;
}

/** `15 January 2024` */
export function formatLongDate(clock: WallClock): string {
    return `${pad(clock.day)} ${MONTHS_LONG[clock.month]} ${clock.year}`;
}

/** `06:30 PM` */
export function formatDisplayTime(clock: WallClock): string {
    const hour12 = clock.hour % 12 === 0 ? 12 : clock.hour % 12;
    const meridiem = clock.hour < 12 ? 'AM' : 'PM';
    return `${pad(hour12)}:${pad(clock.minute)} ${meridiem}`;
}

export function daysAgo(from: Date, days: number): Date {
    const result = new Date(from.getTime());
    result.setDate(result.getDate() - days);
    return result;
}

function isValidClock(clock: WallClock): boolean {
    if (clock.month < 0 || clock.month > 11) return false;
    if (clock.hour > 23 || clock.minute > 59 || clock.second > 59) return false;
    const probe = new Date(Date.UTC(clock.year, clock.month, clock.day));
    return clock.day >= 1 && probe.getUTCDate() === clock.day;
}

function parseOffsetMinutes(zone: string): number {
    if (zone === 'Z') return 0;
    const sign = zone.startsWith('-') ? -1 : 1;
    // +05:30, +0530 and +05
    const digits = zone.slice(1).replace(':', '');
    const hours = Number(digits.slice(0, 2));
    const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
    return sign * (hours * 60 + minutes);
}

function parseIso(raw: string): { clock: WallClock; instant: Date } | null {
    const match = ISO_PATTERN.exec(raw);
    if (!match) return null;

    const [, year, month, day, hour, minute, second, fraction, zone] = match;
    const clock: WallClock = {
        year: Number(year),
        month: Number(month) - 1,
        day: Number(day),
        hour: Number(hour),
        minute: Number(minute),
        second: second ? Number(second) : 0,
        // Fractions past milliseconds are dropped
        millisecond: fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0,
    };
    if (!isValidClock(clock)) return null;

    if (zone) {
        const utc = Date.UTC(clock.year, clock.month, clock.day, clock.hour, clock.minute, clock.second, clock.millisecond);
        return { clock, instant: new Date(utc - parseOffsetMinutes(zone) * 60000) };
    }
    return {
        clock,
        instant: new Date(clock.year, clock.month, clock.day, clock.hour, clock.minute, clock.second, clock.millisecond),
    };
}

function parseExchangeFormat(raw: string): { clock: WallClock; instant: Date } | null {
    const match = EXCHANGE_PATTERN.exec(raw);
    if (!match) return null;

    const [, day, monthName, year, hour, minute, second] = match;
    const month = MONTHS_SHORT.findIndex(m => m.toLowerCase() === monthName.toLowerCase());
    const clock: WallClock = {
        year: Number(year),
        month,
        day: Number(day),
        hour: Number(hour),
        minute: Number(minute),
        second: Number(second),
        millisecond: 0,
    };
    if (!isValidClock(clock)) return null;

    return {
        clock,
        instant: new Date(clock.year, clock.month, clock.day, clock.hour, clock.minute, clock.second),
    };
}

/**
 * Parses an announcement timestamp. Strings containing `T` are read as
 * ISO-8601, anything else as `15-Jan-2024 18:30:45`. Display strings keep the
 * wall-clock time as written. Never throws: a value that is not a string is
 * treated as "now", and an unparseable string keeps its first 11 characters
 * as the display date with an empty time.
 */
export function parseAnnouncementDate(raw: unknown, now: Date = new Date()): AnnouncementDate {
    if (typeof raw !== 'string') {
        const clock = toWallClock(now);
        return { instant: now, date: formatDisplayDate(clock), time: formatDisplayTime(clock), raw: '' };
    }

    const parsed = raw.includes('T') ? parseIso(raw) : parseExchangeFormat(raw);
    if (!parsed) {
        return { instant: now, date: raw.slice(0, 11), time: '', raw };
    }

    return {
        instant: parsed.instant,
        date: formatDisplayDate(parsed.clock),
        time: formatDisplayTime(parsed.clock),
        raw,
    };
}
