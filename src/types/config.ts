/**
 * Log level options.
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

/**
 * Tokenizer pipeline capacities.
 */
export interface TokenizerConfig {
    /** Capacity of the source (scan) stage queue */
    bufferSize: number;
    /** Capacity of each filter/transform stage queue */
    relayBufferSize: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface TextClassConfig {
    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // Tokenizer
    tokenizer: TokenizerConfig;

    /** Floor for a token's total weight when it was never seen in training */
    minTokenWeight: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: TextClassConfig = {
    logLevel: 'info',
    jsonLogs: false,
    tokenizer: {
        bufferSize: 100,
        relayBufferSize: 50,
    },
    minTokenWeight: 0.001,
};
