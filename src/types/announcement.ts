export const CATEGORIES = [
    'Board Meeting',
    'Financial Results',
    'Dividend',
    'AGM/EGM',
    'Acquisition',
    'Investor Presentation',
    'Fund Raising',
    'Merger/Demerger',
    'Change in Directors',
    'Corporate Action',
    'Concall Transcript',
    'Order Win',
    'Expansion',
    'Rating',
    'Others',
] as const;

export type Category = typeof CATEGORIES[number];

export type Implication =
    | '★★★ POSITIVE'
    | '★★ MODERATE POSITIVE'
    | '★★ NEUTRAL'
    | '★★ WATCH'
    | '★ CAUTIOUS';

// Upstream records come in two shapes (BSE and NSE) and carry no guarantees.
export type RawAnnouncement = Record<string, unknown>;

export interface AnnouncementDate {
    instant: Date;
    date: string;
    time: string;
    raw: string;
}

export interface Announcement {
    readonly company: string;
    readonly scripCode: string;
    readonly subject: string;
    readonly occurredAt: Readonly<AnnouncementDate>;
    readonly attachmentPath: string;
    readonly pdfUrl: string;
    readonly category: Category;
    readonly highlights: string;
    readonly implication: Implication;
}
