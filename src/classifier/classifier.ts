import { EmptyInputError, InvalidOptionError, NoMatchError } from './errors.js';
import { FrequencyModel } from '../model/frequency-model.js';
import type { FrequencyView } from '../model/frequency-table.js';
import { hasEvidence, pickBest, score, scoreAll, textProb } from '../model/estimator.js';
import { collectTokens, Tokenizer, type TextTokenizer, type TokenizerOptions } from '../nlp/tokenizer.js';
import { getLogger } from '../utils/logger.js';
import {
    DEFAULT_CONFIG,
    type Category,
    type Classification,
    type ModelSnapshot,
    type ModelStats,
    type ProbabilityReport,
    type TextClassifier,
    type Token,
} from '../types/index.js';

export interface ClassifierOptions {
    /** Custom tokenizer; replaces the default streaming tokenizer */
    tokenizer?: TextTokenizer;
    /** Options for the default tokenizer (ignored with a custom one) */
    tokenizerOptions?: TokenizerOptions;
    /** Total weight given to tokens never seen in training */
    minTokenWeight?: number;
}

/**
 * Naive-Bayes-style text classifier over in-memory word frequencies.
 *
 * `train` is an exclusive writer; `classify`, `getProb` and the inspection
 * methods are shared readers that each see one consistent model state.
 */
export class Classifier implements TextClassifier {
    private readonly model: FrequencyModel;
    private readonly tokenizer: TextTokenizer;

    constructor(options: ClassifierOptions = {}) {
        const minTokenWeight = options.minTokenWeight ?? DEFAULT_CONFIG.minTokenWeight;
        if (!(minTokenWeight > 0) || !Number.isFinite(minTokenWeight)) {
            throw new InvalidOptionError('minTokenWeight', `expected a positive number, got ${minTokenWeight}`);
        }

        this.model = new FrequencyModel({ minTokenWeight });
        this.tokenizer = options.tokenizer ?? new Tokenizer(options.tokenizerOptions);
    }

    /**
     * Record every token of `document` under `category`, then count one
     * training event for it. Empty documents and categories are accepted.
     */
    async train(document: string, category: Category): Promise<void> {
        const recorded = await this.model.write(async (writer) => {
            // Tokenize fully first so a failing stream records nothing
            const tokens = await this.tokens(document);
            for (const token of tokens) {
                writer.record(token, category);
            }
            writer.recordCategory(category);
            return tokens.length;
        });

        getLogger().debug({ category, tokens: recorded }, 'Trained document');
    }

    /**
     * Pick the best-scoring category for `document`.
     *
     * @throws EmptyInputError when `document` is ''
     * @throws NoMatchError when no category scored above 0 or no token of the
     *   document was seen in training
     */
    async classify(document: string): Promise<Classification> {
        if (document === '') {
            throw new EmptyInputError();
        }

        const result = await this.model.read(async (view) => {
            const tokens = await this.tokens(document);
            if (!hasEvidence(view, tokens)) return null;
            return pickBest(scoreAll(view, tokens));
        });

        if (!result) {
            throw new NoMatchError();
        }

        getLogger().debug({ category: result.category, confidence: result.score }, 'Classified document');
        return { category: result.category, confidence: result.score };
    }

    /**
     * Positive scores of every category plus the best one ('' if none).
     *
     * Scores follow the formula alone. A document with no token seen in
     * training (only stopwords, say) still gets prior-based scores and a
     * non-empty `best`, where `classify` throws `NoMatchError`.
     */
    async getProb(document: string): Promise<ProbabilityReport> {
        return this.model.read(async (view) => {
            const tokens = await this.tokens(document);
            const all = scoreAll(view, tokens);

            const scores = new Map<Category, number>();
            for (const [category, value] of all) {
                if (value > 0) scores.set(category, value);
            }

            return { scores, best: pickBest(all)?.category ?? '' };
        });
    }

    /**
     * Score of `document` against a single category (uniform prior applied).
     */
    async score(document: string, category: Category): Promise<number> {
        return this.withTokens(document, (view, tokens) => score(view, tokens, category));
    }

    /**
     * Document likelihood for a single category, without the prior.
     */
    async textProb(document: string, category: Category): Promise<number> {
        return this.withTokens(document, (view, tokens) => textProb(view, tokens, category));
    }

    async trainingCount(category: Category): Promise<number> {
        return this.model.read((view) => view.trainingCount(category));
    }

    async countInCategory(token: Token, category: Category): Promise<number> {
        return this.model.read((view) => view.countInCategory(token, category));
    }

    async categories(): Promise<Category[]> {
        return this.model.read((view) => [...view.categories()]);
    }

    async stats(): Promise<ModelStats> {
        return this.model.read((view) => ({
            categories: view.categories().length,
            vocabulary: view.vocabularySize(),
            trainingEvents: view.totalTrainingEvents(),
        }));
    }

    async snapshot(): Promise<ModelSnapshot> {
        return this.model.read((view) => view.snapshot());
    }

    private tokens(document: string): Promise<Token[]> {
        return collectTokens(this.tokenizer.tokenize(document));
    }

    private withTokens<T>(document: string, fn: (view: FrequencyView, tokens: Token[]) => T): Promise<T> {
        return this.model.read(async (view) => fn(view, await this.tokens(document)));
    }
}
