export const BSE_WARMUP_URL = 'https://www.bseindia.com/corporates/ann.html';
export const BSE_ANNOUNCEMENTS_URL = 'https://api.bseindia.com/BseIndiaAPI/api/AnnGetData/w';
export const BSE_PDF_BASE_URL = 'https://www.bseindia.com/xml-data/corpfiling/AttachLive';

export const NSE_WARMUP_URL = 'https://www.nseindia.com';
export const NSE_ANNOUNCEMENTS_URL = 'https://www.nseindia.com/api/corporate-announcements';

export const REQUEST_HEADERS: Record<string, string> = {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Accept': 'application/json, text/plain, */*',
    'Accept-Language': 'en-US,en;q=0.9',
    'Referer': 'https://www.bseindia.com/',
    'Origin': 'https://www.bseindia.com',
};

export const WARMUP_TIMEOUT_MS = 10000;

export const REPORT_HEADERS = [
    'Company',
    'Scrip Code',
    'Category',
    'Subject',
    'Date',
    'Time',
    'Key Highlights',
    'Investment Implication',
    'PDF Link',
] as const;

export const SUBJECT_DISPLAY_LENGTH = 200;

export const POSITIVE_KEYWORDS: string[] = [
    // Results
    'profit increase', 'profit up', 'revenue growth', 'record', 'highest ever',
    'beat estimates', 'outperform', 'growth',

    // Shareholder returns
    'dividend', 'bonus',

    // Business development
    'acquisition', 'expansion', 'new order', 'contract win', 'upgrade',
    'investment', 'capex', 'expansion plan', 'new plant', 'capacity addition',
];

export const NEGATIVE_KEYWORDS: string[] = [
    // Results
    'profit decline', 'profit down', 'revenue decline', 'loss',
    'miss estimates', 'underperform', 'weak', 'challenging',

    // Governance and credit
    'downgrade', 'resign', 'exit', 'closure', 'default', 'penalty', 'fraud',
];
