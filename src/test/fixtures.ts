import { Announcement } from '../types/announcement';

export function makeAnnouncement(overrides: Partial<Announcement> = {}): Announcement {
    return {
        company: 'Alpha Industries Ltd',
        scripCode: '500001',
        subject: 'Board Meeting Intimation',
        occurredAt: {
            instant: new Date(Date.UTC(2024, 0, 15, 10, 0, 0)),
            date: '15 Jan 2024',
            time: '10:00 AM',
            raw: '2024-01-15T10:00:00Z',
        },
        attachmentPath: 'alpha.pdf',
        pdfUrl: 'https://www.bseindia.com/xml-data/corpfiling/AttachLive/alpha.pdf',
        category: 'Board Meeting',
        highlights: '• Board Meeting Intimation',
        implication: '★★ NEUTRAL',
        ...overrides,
    };
}

/** Silences console output for the duration of a test file. */
export function muteConsole(): void {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'debug').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });
}
