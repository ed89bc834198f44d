import { RawAnnouncement } from '../types/announcement';

export function isRecord(value: unknown): value is RawAnnouncement {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toRecordList(value: unknown): RawAnnouncement[] {
    return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * Returns the first candidate field holding a usable value, as a string.
 * Strings are returned as-is and finite numbers are stringified. Null,
 * undefined and every other type count as absent.
 */
export function pickField(raw: RawAnnouncement, candidates: readonly string[], fallback: string): string {
    for (const name of candidates) {
        const value = raw[name];
        if (typeof value === 'string') return value;
        if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    }
    return fallback;
}

/** Like `pickField`, but hands back the raw value so callers can tell "absent" apart from a string. */
export function pickRawField(raw: RawAnnouncement, candidates: readonly string[]): unknown {
    for (const name of candidates) {
        const value = raw[name];
        if (value !== undefined && value !== null) return value;
    }
    return undefined;
}
