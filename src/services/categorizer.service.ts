import { Category } from '../types/announcement';

export interface CategoryRule {
    category: Category;
    keywords: readonly string[];
}

// Order matters: the first rule with a matching keyword wins.
export const CATEGORY_RULES: readonly CategoryRule[] = [
    { category: 'Board Meeting', keywords: ['board meeting', 'meeting of board'] },
    { category: 'Financial Results', keywords: ['financial result', 'quarterly result', 'annual result', 'q1', 'q2', 'q3', 'q4'] },
    { category: 'Dividend', keywords: ['dividend', 'interim dividend', 'final dividend'] },
    { category: 'AGM/EGM', keywords: ['agm', 'egm', 'annual general', 'extraordinary general'] },
    { category: 'Acquisition', keywords: ['acquisition', 'acquire', 'takeover'] },
    { category: 'Investor Presentation', keywords: ['investor presentation', 'analyst meet', 'investor meet'] },
    { category: 'Fund Raising', keywords: ['fund raising', 'qip', 'preferential', 'rights issue', 'fpo'] },
    { category: 'Merger/Demerger', keywords: ['merger', 'demerger', 'amalgamation', 'scheme of arrangement'] },
    { category: 'Change in Directors', keywords: ['director', 'appointment', 'resignation', 'cessation'] },
    { category: 'Corporate Action', keywords: ['bonus', 'split', 'buyback', 'corporate action'] },
    { category: 'Concall Transcript', keywords: ['concall', 'conference call', 'earnings call', 'transcript'] },
    { category: 'Order Win', keywords: ['order', 'contract', 'award', 'mandate'] },
    { category: 'Expansion', keywords: ['expansion', 'capacity', 'capex', 'new plant', 'new facility'] },
    { category: 'Rating', keywords: ['rating', 'credit rating', 'upgrade', 'downgrade'] },
];

export const FALLBACK_CATEGORY: Category = 'Others';

export function matchesRule(text: string, rule: CategoryRule): boolean {
    return rule.keywords.some(keyword => text.includes(keyword));
}

export function categorizeAnnouncement(subject: string, description = ''): Category {
    const text = `${subject} ${description}`.toLowerCase();
    const rule = CATEGORY_RULES.find(candidate => matchesRule(text, candidate));
    return rule ? rule.category : FALLBACK_CATEGORY;
}
