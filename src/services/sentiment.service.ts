import { NEGATIVE_KEYWORDS, POSITIVE_KEYWORDS } from '../config/constants';
import { Category, Implication } from '../types/announcement';

const CATEGORY_BONUS: Partial<Record<Category, number>> = {
    'Dividend': 2,
    'Order Win': 2,
    'Expansion': 2,
    'Fund Raising': 1, // usually positive but dilutive
};

export function countKeywordHits(text: string, keywords: readonly string[]): number {
    return keywords.filter(keyword => text.includes(keyword)).length;
}

export function assessInvestmentImplication(text: string, category: Category): Implication {
    const lowered = text.toLowerCase();

    const positive = countKeywordHits(lowered, POSITIVE_KEYWORDS) + (CATEGORY_BONUS[category] ?? 0);
    const negative = countKeywordHits(lowered, NEGATIVE_KEYWORDS);

    if (positive > negative + 2) return '★★★ POSITIVE';
    if (positive > negative) return '★★ MODERATE POSITIVE';
    if (negative > positive + 2) return '★ CAUTIOUS';
    if (negative > positive) return '★★ WATCH';
    return '★★ NEUTRAL';
}
