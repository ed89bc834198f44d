import { Category } from '../types/announcement';

export interface HighlightRule {
    name: string;
    /** Must carry the `g` flag; matched against lower-cased text. */
    pattern: RegExp;
    limit: number;
    format: (match: RegExpMatchArray) => string;
}

export const MAX_HIGHLIGHTS = 8;
export const MAX_FALLBACK_SENTENCES = 3;
export const MIN_SENTENCE_LENGTH = 20;
export const HIGHLIGHT_FALLBACK = 'Details in PDF';

const CURRENCY = String.raw`(?:rs\.?|inr|₹)?`;
const AMOUNT = String.raw`([\d,\.]+)`;
const UNIT = String.raw`(?:crore|cr|lakh|billion|million)?`;

function metric(name: string, source: string): HighlightRule {
    return {
        name,
        pattern: new RegExp(source, 'g'),
        limit: 2,
        format: match => `${name}: ${match[1]}`,
    };
}

export function titleCase(word: string): string {
    return word.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_, before: string, letter: string) => before + letter.toUpperCase());
}

export const HIGHLIGHT_RULES: HighlightRule[] = [
    metric('REVENUE', String.raw`revenue[:\s]+${CURRENCY}\s*${AMOUNT}\s*${UNIT}`),
    metric('PROFIT', String.raw`(?:net\s+)?profit[:\s]+${CURRENCY}\s*${AMOUNT}\s*${UNIT}`),
    metric('GROWTH', String.raw`(?:growth|increase|up|rose)\s+(?:of\s+)?(\d+(?:\.\d+)?)\s*%`),
    metric('DIVIDEND', String.raw`dividend[:\s]+${CURRENCY}\s*${AMOUNT}\s*(?:per\s+share)?`),
    metric('ORDER_VALUE', String.raw`(?:order|contract)[:\s]+(?:worth\s+)?${CURRENCY}\s*${AMOUNT}\s*${UNIT}`),
    metric('EBITDA', String.raw`ebitda[:\s]+${CURRENCY}\s*${AMOUNT}\s*${UNIT}`),
    metric('MARGIN', String.raw`margin[:\s]+(\d+(?:\.\d+)?)\s*%`),
    metric('EPS', String.raw`eps[:\s]+${CURRENCY}\s*${AMOUNT}`),
    {
        name: 'CHANGE',
        pattern: /(\w+)\s+(?:increased|decreased|grew|fell|rose|dropped)\s+(?:by\s+)?(\d+(?:\.\d+)?)\s*%/g,
        limit: 3,
        format: match => `${titleCase(match[1])} change: ${match[2]}%`,
    },
];

function applyRules(text: string, rules: readonly HighlightRule[]): string[] {
    const lowered = text.toLowerCase();
    const highlights: string[] = [];

    for (const rule of rules) {
        const matches = Array.from(lowered.matchAll(rule.pattern)).slice(0, rule.limit);
        highlights.push(...matches.map(rule.format));
    }

    return highlights;
}

function leadingSentences(text: string): string[] {
    return text
        .split('.')
        .slice(0, MAX_FALLBACK_SENTENCES)
        .map(sentence => sentence.trim())
        .filter(sentence => sentence.length > MIN_SENTENCE_LENGTH);
}

/**
 * Builds a short bullet digest of the figures found in an announcement.
 * Falls back to the opening sentences, then to a fixed sentinel.
 *
 * `category` is not used by the current rules but stays part of the signature.
 */
export function extractKeyHighlights(
    text: string,
    _category: Category,
    rules: readonly HighlightRule[] = HIGHLIGHT_RULES,
): string {
    let highlights = applyRules(text, rules);

    if (highlights.length === 0) {
        highlights = leadingSentences(text);
    }

    if (highlights.length === 0) {
        return HIGHLIGHT_FALLBACK;
    }

    return highlights
        .slice(0, MAX_HIGHLIGHTS)
        .map(highlight => `• ${highlight}`)
        .join('\n');
}
