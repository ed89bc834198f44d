import { CATEGORY_RULES, categorizeAnnouncement, matchesRule } from '../services/categorizer.service';
import { CATEGORIES } from '../types/announcement';

describe('categorizeAnnouncement', () => {
    it('should return Expansion for a subject that only mentions capex', () => {
        expect(categorizeAnnouncement('Capex plan for FY25')).toBe('Expansion');
    });

    it('should prefer Board Meeting over Dividend when both match', () => {
        expect(categorizeAnnouncement('Board Meeting to consider Interim Dividend')).toBe('Board Meeting');
    });

    it('should match keywords case-insensitively', () => {
        expect(categorizeAnnouncement('DECLARATION OF INTERIM DIVIDEND')).toBe('Dividend');
        expect(categorizeAnnouncement('Intimation of Credit Rating')).toBe('Rating');
    });

    it('should treat quarter tokens as financial results', () => {
        expect(categorizeAnnouncement('Q2 performance update')).toBe('Financial Results');
    });

    it('should look at the description as well as the subject', () => {
        expect(categorizeAnnouncement('General update', 'Company has received an order')).toBe('Order Win');
    });

    it('should fall back to Others when nothing matches', () => {
        expect(categorizeAnnouncement('Updates')).toBe('Others');
        expect(categorizeAnnouncement('')).toBe('Others');
    });
});

describe('CATEGORY_RULES', () => {
    it('should list every category except the fallback, in priority order', () => {
        expect(CATEGORY_RULES.map(rule => rule.category)).toEqual(CATEGORIES.filter(c => c !== 'Others'));
    });

    it('should let each rule be checked on its own', () => {
        const fundRaising = CATEGORY_RULES[6];
        expect(fundRaising.category).toBe('Fund Raising');
        expect(matchesRule('approval for qip', fundRaising)).toBe(true);
        expect(matchesRule('allotment of shares', fundRaising)).toBe(false);
    });
});
