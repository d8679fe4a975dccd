/**
 * Normalized unit of text produced by the tokenizer pipeline.
 */
export type Token = string;

/**
 * Opaque classification label. The empty string is a legal category.
 */
export type Category = string;

/** Filter stage predicate: a word is kept only if every predicate returns true. */
export type Predicate = (word: string) => boolean;

/** Transform stage function, applied to every surviving word in order. */
export type Mapper = (word: string) => string;

/**
 * Outcome of a successful classification.
 */
export interface Classification {
    category: Category;
    /** Raw score of the winning category, not a calibrated probability */
    confidence: number;
}

/**
 * Per-category scores of a document.
 */
export interface ProbabilityReport {
    /** Category → score, restricted to scores > 0 */
    scores: Map<Category, number>;
    /** Best-scoring category, or '' when nothing scored above 0 */
    best: Category;
}

/**
 * Aggregate figures about a trained model.
 */
export interface ModelStats {
    categories: number;
    vocabulary: number;
    trainingEvents: number;
}

/**
 * Plain copy of both frequency maps.
 */
export interface ModelSnapshot {
    tokenCategoryCounts: Readonly<Record<Token, Readonly<Record<Category, number>>>>;
    trainingCounts: Readonly<Record<Category, number>>;
}

/**
 * Capability set of a trainable text classifier.
 */
export interface TextClassifier {
    train(document: string, category: Category): Promise<void>;
    classify(document: string): Promise<Classification>;
}
