import { BoundedChannel } from './channel.js';
import { PipelineCancelledError } from '../classifier/errors.js';
import type { Mapper, Predicate, Token } from '../types/index.js';

/** Whitespace-delimited words (NEL included); punctuation stays attached */
const WORD_PATTERN = /[^\s\u0085]+/gu;

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Source stage: emits the words of `text` one at a time.
 */
export async function scanStage(text: string, output: BoundedChannel<string>): Promise<void> {
    try {
        for (const match of text.matchAll(WORD_PATTERN)) {
            const [word] = match;
            if (word !== undefined) await output.send(word);
        }
        output.close();
    } catch (error) {
        output.close(toError(error));
    }
}

/**
 * Drops every word that fails any predicate. A throwing predicate fails
 * both neighbours so no stage is left waiting on the other.
 */
export async function filterStage(
    input: BoundedChannel<string>,
    output: BoundedChannel<string>,
    predicates: readonly Predicate[]
): Promise<void> {
    try {
        for await (const word of input) {
            if (predicates.every((keep) => keep(word))) {
                await output.send(word);
            }
        }
        output.close();
    } catch (error) {
        const failure = toError(error);
        output.close(failure);
        input.close(failure);
    }
}

/**
 * Applies every transform, in order, to each word.
 */
export async function mapStage(
    input: BoundedChannel<string>,
    output: BoundedChannel<string>,
    transforms: readonly Mapper[]
): Promise<void> {
    try {
        for await (const word of input) {
            await output.send(transforms.reduce((value, transform) => transform(value), word));
        }
        output.close();
    } catch (error) {
        const failure = toError(error);
        output.close(failure);
        input.close(failure);
    }
}

export interface PipelineOptions {
    bufferSize: number;
    relayBufferSize: number;
    filters: readonly Predicate[];
    transforms: readonly Mapper[];
    signal?: AbortSignal;
}

/**
 * Lazy, finite, single-use sequence of tokens.
 *
 * Leaving a `for await` loop early, calling `cancel()`, or aborting the signal
 * given to the tokenizer stops every stage; `cancel()` resolves once all of
 * them have exited.
 */
export class TokenStream implements AsyncIterable<Token> {
    private consumed = false;

    constructor(
        private readonly output: BoundedChannel<Token>,
        private readonly controller: AbortController,
        private readonly stages: Promise<void>
    ) {}

    get cancelled(): boolean {
        return this.controller.signal.aborted;
    }

    /** Resolves when every stage has exited */
    settled(): Promise<void> {
        return this.stages;
    }

    async cancel(): Promise<void> {
        this.controller.abort();
        await this.stages;
    }

    [Symbol.asyncIterator](): AsyncIterator<Token, undefined> {
        if (this.consumed) {
            throw new Error('Token stream can only be consumed once; call tokenize() again');
        }
        this.consumed = true;

        return {
            next: async () => {
                const result = await this.output.receive();
                if (result.done) await this.stages;
                return result;
            },
            return: async () => {
                await this.cancel();
                return { value: undefined, done: true };
            },
        };
    }
}

/**
 * Wire scan → filter → transform stages over bounded channels and start them.
 */
export function createTokenStream(text: string, options: PipelineOptions): TokenStream {
    const controller = new AbortController();
    const source = new BoundedChannel<string>(options.bufferSize);
    const filtered = new BoundedChannel<string>(options.relayBufferSize);
    const tokens = new BoundedChannel<Token>(options.relayBufferSize);

    if (text === '') {
        tokens.close();
        return new TokenStream(tokens, controller, Promise.resolve());
    }

    const channels = [source, filtered, tokens];
    controller.signal.addEventListener(
        'abort',
        () => {
            const reason = new PipelineCancelledError();
            for (const channel of channels) channel.close(reason);
        },
        { once: true }
    );

    const external = options.signal;
    const forwardAbort = (): void => controller.abort();
    if (external?.aborted) {
        controller.abort();
    } else {
        external?.addEventListener('abort', forwardAbort, { once: true });
    }

    const stages = Promise.all([
        scanStage(text, source),
        filterStage(source, filtered, options.filters),
        mapStage(filtered, tokens, options.transforms),
    ]).then(() => {
        external?.removeEventListener('abort', forwardAbort);
    });

    return new TokenStream(tokens, controller, stages);
}
