import { DEFAULT_CONFIG, type Category, type ModelSnapshot, type Token } from '../types/index.js';

/**
 * Read side of the token/category statistics.
 */
export interface FrequencyView {
    countInCategory(token: Token, category: Category): number;
    /** Raw sum of a token's counts over every known category */
    totalSeen(token: Token): number;
    /** `totalSeen`, floored to a small positive weight for unseen tokens */
    totalWeight(token: Token): number;
    /** Known categories in code-unit order of the label */
    categories(): readonly Category[];
    trainingCount(category: Category): number;
    totalTrainingEvents(): number;
    vocabularySize(): number;
    snapshot(): ModelSnapshot;
}

export interface FrequencyWriter extends FrequencyView {
    record(token: Token, category: Category): void;
    recordCategory(category: Category): void;
}

/**
 * Token → category counts plus per-category training events.
 * Both maps only ever grow. Not synchronized: reach it through
 * `FrequencyModel`, which guards both maps with a single lock.
 */
export class FrequencyTable implements FrequencyWriter {
    private readonly tokenCategoryCounts = new Map<Token, Map<Category, number>>();
    private readonly trainingCounts = new Map<Category, number>();
    private sortedCategories: readonly Category[] | null = null;

    constructor(private readonly minTokenWeight: number = DEFAULT_CONFIG.minTokenWeight) {}

    record(token: Token, category: Category): void {
        let counts = this.tokenCategoryCounts.get(token);
        if (!counts) {
            counts = new Map<Category, number>();
            this.tokenCategoryCounts.set(token, counts);
        }
        counts.set(category, (counts.get(category) ?? 0) + 1);
    }

    /**
     * Counts one training event; called once per document, not per token.
     */
    recordCategory(category: Category): void {
        if (!this.trainingCounts.has(category)) {
            this.sortedCategories = null;
        }
        this.trainingCounts.set(category, (this.trainingCounts.get(category) ?? 0) + 1);
    }

    countInCategory(token: Token, category: Category): number {
        return this.tokenCategoryCounts.get(token)?.get(category) ?? 0;
    }

    totalSeen(token: Token): number {
        const counts = this.tokenCategoryCounts.get(token);
        if (!counts) return 0;

        let sum = 0;
        for (const category of this.categories()) {
            sum += counts.get(category) ?? 0;
        }
        return sum;
    }

    totalWeight(token: Token): number {
        const weight = this.totalSeen(token);
        return weight > 0 ? weight : this.minTokenWeight;
    }

    categories(): readonly Category[] {
        if (!this.sortedCategories) {
            this.sortedCategories = Object.freeze(
                Array.from(this.trainingCounts.keys()).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
            );
        }
        return this.sortedCategories;
    }

    trainingCount(category: Category): number {
        return this.trainingCounts.get(category) ?? 0;
    }

    totalTrainingEvents(): number {
        let sum = 0;
        for (const count of this.trainingCounts.values()) {
            sum += count;
        }
        return sum;
    }

    vocabularySize(): number {
        return this.tokenCategoryCounts.size;
    }

    snapshot(): ModelSnapshot {
        const tokenCategoryCounts = Object.fromEntries(
            Array.from(
                this.tokenCategoryCounts,
                ([token, counts]): [Token, Readonly<Record<Category, number>>] => [
                    token,
                    Object.freeze(Object.fromEntries(counts)),
                ]
            )
        );
        return Object.freeze({
            tokenCategoryCounts: Object.freeze(tokenCategoryCounts),
            trainingCounts: Object.freeze(Object.fromEntries(this.trainingCounts)),
        });
    }
}
