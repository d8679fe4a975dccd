/**
 * Barrel export for all shared types.
 */
export { DEFAULT_CONFIG } from './config.js';
export type { TextClassConfig, TokenizerConfig, LogLevel } from './config.js';
export type {
    Token,
    Category,
    Predicate,
    Mapper,
    Classification,
    ProbabilityReport,
    ModelStats,
    ModelSnapshot,
    TextClassifier,
} from './classifier.js';
