import { isNotStopWord } from './stopwords.js';
import { createTokenStream, type TokenStream } from './pipeline.js';
import { InvalidOptionError } from '../classifier/errors.js';
import { DEFAULT_CONFIG, type Mapper, type Predicate, type Token } from '../types/index.js';

/**
 * Anything that turns text into a token stream.
 */
export interface TextTokenizer {
    tokenize(text: string, signal?: AbortSignal): TokenStream;
}

export interface TokenizerOptions {
    /** Capacity of the scan stage queue (default 100) */
    bufferSize?: number;
    /** Capacity of the filter and transform stage queues (default 50) */
    relayBufferSize?: number;
    /** Replaces the default `[isNotStopWord]` filter list */
    filters?: Predicate[];
    /** Replaces the default `[lowercase]` transform list */
    transforms?: Mapper[];
}

export const lowercase: Mapper = (word) => word.toLowerCase();

function requirePositiveInteger(option: string, value: number): number {
    if (!Number.isInteger(value) || value < 1) {
        throw new InvalidOptionError(option, `expected a positive integer, got ${value}`);
    }
    return value;
}

/**
 * Streaming whitespace tokenizer.
 * - Split on whitespace (punctuation stays attached)
 * - Drop words failing any filter (default: stopwords)
 * - Apply every transform in order (default: lowercase)
 */
export class Tokenizer implements TextTokenizer {
    readonly bufferSize: number;
    readonly relayBufferSize: number;
    readonly filters: readonly Predicate[];
    readonly transforms: readonly Mapper[];

    constructor(options: TokenizerOptions = {}) {
        this.bufferSize = requirePositiveInteger(
            'bufferSize',
            options.bufferSize ?? DEFAULT_CONFIG.tokenizer.bufferSize
        );
        this.relayBufferSize = requirePositiveInteger(
            'relayBufferSize',
            options.relayBufferSize ?? DEFAULT_CONFIG.tokenizer.relayBufferSize
        );
        this.filters = [...(options.filters ?? [isNotStopWord])];
        this.transforms = [...(options.transforms ?? [lowercase])];
    }

    tokenize(text: string, signal?: AbortSignal): TokenStream {
        return createTokenStream(text, {
            bufferSize: this.bufferSize,
            relayBufferSize: this.relayBufferSize,
            filters: this.filters,
            transforms: this.transforms,
            signal,
        });
    }

    /**
     * Drain a fresh stream for `text` into an array.
     */
    async collect(text: string): Promise<Token[]> {
        return collectTokens(this.tokenize(text));
    }
}

export async function collectTokens(stream: AsyncIterable<Token>): Promise<Token[]> {
    const tokens: Token[] = [];
    for await (const token of stream) {
        tokens.push(token);
    }
    return tokens;
}

/**
 * Count how often each token occurs in `text`.
 */
export async function wordCounts(
    text: string,
    tokenizer: TextTokenizer = new Tokenizer()
): Promise<Map<Token, number>> {
    const counts = new Map<Token, number>();
    for await (const token of tokenizer.tokenize(text)) {
        counts.set(token, (counts.get(token) ?? 0) + 1);
    }
    return counts;
}
