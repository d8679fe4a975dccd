import { describe, it, expect } from 'vitest';
import { StopwordOracle, getDefaultStopwords, isStopWord, isNotStopWord } from '../nlp/stopwords.js';

describe('StopwordOracle', () => {
    it('should sort, lowercase and deduplicate the word list', () => {
        const oracle = new StopwordOracle(['b', 'A', 'c', 'a']);
        expect(oracle.words()).toEqual(['a', 'b', 'c']);
        expect(oracle.size).toBe(3);
    });

    it('should not trust the order of the input list', () => {
        const oracle = new StopwordOracle(['zeta', 'alpha', 'mu']);
        expect(oracle.isStopWord('alpha')).toBe(true);
        expect(oracle.isStopWord('mu')).toBe(true);
        expect(oracle.isStopWord('zeta')).toBe(true);
    });

    it('should lowercase the word before lookup', () => {
        const oracle = new StopwordOracle(['the']);
        expect(oracle.isStopWord('THE')).toBe(true);
        expect(oracle.isNotStopWord('The')).toBe(false);
    });

    it('should treat a search past the end of the list as not found', () => {
        const oracle = new StopwordOracle(['a', 'b']);
        expect(oracle.isStopWord('zzz')).toBe(false);
        expect(oracle.isNotStopWord('zzz')).toBe(true);
    });

    it('should report words before the first entry and between entries as not found', () => {
        const oracle = new StopwordOracle(['b', 'd']);
        expect(oracle.isStopWord('a')).toBe(false);
        expect(oracle.isStopWord('c')).toBe(false);
    });

    it('should handle an empty list', () => {
        const oracle = new StopwordOracle([]);
        expect(oracle.isStopWord('anything')).toBe(false);
    });

    it('should freeze the normalized list', () => {
        const oracle = new StopwordOracle(['a']);
        expect(Object.isFrozen(oracle.words())).toBe(true);
    });
});

describe('Default stopwords', () => {
    it('should load the list once', () => {
        expect(getDefaultStopwords()).toBe(getDefaultStopwords());
    });

    it('should hold the deduplicated Russian list', () => {
        expect(getDefaultStopwords().size).toBe(560);
    });

    it('should be sorted in code-unit order', () => {
        const words = getDefaultStopwords().words();
        const resorted = [...words].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
        expect(words).toEqual(resorted);
    });

    it('should match function words case-insensitively', () => {
        expect(isStopWord('и')).toBe(true);
        expect(isStopWord('И')).toBe(true);
        expect(isStopWord('На')).toBe(true);
        expect(isStopWord('её')).toBe(true);
    });

    it('should include the Latin letter c from the list', () => {
        expect(isStopWord('c')).toBe(true);
        expect(isStopWord('C')).toBe(true);
    });

    it('should not match content words', () => {
        expect(isStopWord('кот')).toBe(false);
        expect(isNotStopWord('акция')).toBe(true);
        expect(isNotStopWord('the')).toBe(true);
    });
});
