import { readFileSync } from 'node:fs';
import { z } from 'zod';

const DEFAULT_STOPWORDS_FILE = new URL('../../data/stopwords-ru.json', import.meta.url);

const stopwordListSchema = z.array(z.string());

/**
 * Code-unit ordering shared by the sort and the search.
 */
function compareWords(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Membership test against a fixed list of common function words.
 *
 * The list is lowercased, deduplicated and sorted on construction and never
 * mutated afterwards, so lookups are a plain binary search.
 */
export class StopwordOracle {
    private readonly sorted: readonly string[];

    constructor(words: Iterable<string>) {
        const unique = new Set<string>();
        for (const word of words) {
            unique.add(word.toLowerCase());
        }
        this.sorted = Object.freeze(Array.from(unique).sort(compareWords));
    }

    get size(): number {
        return this.sorted.length;
    }

    words(): readonly string[] {
        return this.sorted;
    }

    isStopWord(word: string): boolean {
        const needle = word.toLowerCase();
        const index = this.lowerBound(needle);
        // Past the end means every entry sorts before the needle
        return index < this.sorted.length && this.sorted[index] === needle;
    }

    isNotStopWord(word: string): boolean {
        return !this.isStopWord(word);
    }

    /**
     * Index of the first entry not less than `needle`.
     */
    private lowerBound(needle: string): number {
        let lo = 0;
        let hi = this.sorted.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            const entry = this.sorted[mid];
            if (entry !== undefined && compareWords(entry, needle) < 0) {
                lo = mid + 1;
            } else {
                hi = mid;
            }
        }
        return lo;
    }
}

let defaultOracle: StopwordOracle | null = null;

/**
 * Load a stopword list from a JSON array of strings.
 */
export function loadStopwords(file: URL | string): StopwordOracle {
    const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    return new StopwordOracle(stopwordListSchema.parse(raw));
}

/**
 * Default (Russian) stopword oracle, read from disk on first use.
 */
export function getDefaultStopwords(): StopwordOracle {
    if (!defaultOracle) {
        defaultOracle = loadStopwords(DEFAULT_STOPWORDS_FILE);
    }
    return defaultOracle;
}

export function isStopWord(word: string): boolean {
    return getDefaultStopwords().isStopWord(word);
}

/**
 * Default tokenizer filter.
 */
export function isNotStopWord(word: string): boolean {
    return !isStopWord(word);
}
