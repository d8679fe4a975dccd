import { describe, it, expect } from 'vitest';
import { Tokenizer, collectTokens, wordCounts } from '../nlp/tokenizer.js';
import { InvalidOptionError, PipelineCancelledError } from '../classifier/errors.js';

function words(count: number): string {
    return Array.from({ length: count }, (_, i) => `w${i}`).join(' ');
}

describe('Tokenizer', () => {
    describe('defaults', () => {
        const tokenizer = new Tokenizer();

        it('should split on whitespace and lowercase', async () => {
            expect(await tokenizer.collect('A b A')).toEqual(['a', 'b', 'a']);
        });

        it('should count repeated tokens', async () => {
            const counts = await wordCounts('A b A');
            expect(counts).toEqual(new Map([['a', 2], ['b', 1]]));
        });

        it('should drop stopwords case-insensitively', async () => {
            expect(await tokenizer.collect('the и cat')).toEqual(['the', 'cat']);
            expect(await tokenizer.collect('И собака')).toEqual(['собака']);
        });

        it('should keep attached punctuation', async () => {
            expect(await tokenizer.collect('Кот, сидит!')).toEqual(['кот,', 'сидит!']);
        });

        it('should treat any run of whitespace as a separator', async () => {
            expect(await tokenizer.collect('  a\tb\n\nd  ')).toEqual(['a', 'b', 'd']);
        });

        it('should split on the next-line control character', async () => {
            expect(await tokenizer.collect('a\u0085b')).toEqual(['a', 'b']);
        });

        it('should yield nothing for empty input', async () => {
            expect(await tokenizer.collect('')).toEqual([]);
            expect(await tokenizer.collect('   ')).toEqual([]);
        });

        it('should close an empty stream immediately', async () => {
            const iterator = tokenizer.tokenize('')[Symbol.asyncIterator]();
            expect(await iterator.next()).toEqual({ value: undefined, done: true });
        });

        it('should use the default capacities', () => {
            expect(tokenizer.bufferSize).toBe(100);
            expect(tokenizer.relayBufferSize).toBe(50);
        });
    });

    describe('configuration', () => {
        it('should apply filters to the raw word, before transforms', async () => {
            const tokenizer = new Tokenizer({ filters: [(word) => word !== 'Skip'] });
            expect(await tokenizer.collect('Skip skip')).toEqual(['skip']);
        });

        it('should drop a word failing any filter', async () => {
            const tokenizer = new Tokenizer({
                filters: [(word) => word.length > 1, (word) => !word.startsWith('x')],
            });
            expect(await tokenizer.collect('a bb xx cc')).toEqual(['bb', 'cc']);
        });

        it('should apply transforms in order', async () => {
            const tokenizer = new Tokenizer({
                transforms: [(word) => `${word}!`, (word) => word.toUpperCase()],
            });
            expect(await tokenizer.collect('a')).toEqual(['A!']);
        });

        it('should keep stopwords and case with empty filter and transform lists', async () => {
            const tokenizer = new Tokenizer({ filters: [], transforms: [] });
            expect(await tokenizer.collect('И Кот')).toEqual(['И', 'Кот']);
        });

        it('should reject invalid buffer sizes', () => {
            expect(() => new Tokenizer({ bufferSize: 0 })).toThrow(InvalidOptionError);
            expect(() => new Tokenizer({ relayBufferSize: 1.5 })).toThrow(/relayBufferSize/);
        });

        it('should preserve order through minimal queues', async () => {
            const tokenizer = new Tokenizer({ bufferSize: 1, relayBufferSize: 1, filters: [] });
            const tokens = await tokenizer.collect(words(200));
            expect(tokens).toHaveLength(200);
            expect(tokens[0]).toBe('w0');
            expect(tokens[199]).toBe('w199');
            expect(tokens.join(' ')).toBe(words(200));
        });
    });

    describe('streaming', () => {
        it('should hand out early tokens before the whole text is scanned', async () => {
            let filtered = 0;
            const tokenizer = new Tokenizer({
                bufferSize: 1,
                relayBufferSize: 1,
                filters: [
                    () => {
                        filtered++;
                        return true;
                    },
                ],
            });
            const stream = tokenizer.tokenize(words(1000));

            for await (const token of stream) {
                expect(token).toBe('w0');
                break;
            }

            expect(filtered).toBeLessThan(20);
        });

        it('should not be consumable twice', async () => {
            const stream = new Tokenizer().tokenize('a b');
            expect(await collectTokens(stream)).toEqual(['a', 'b']);
            await expect(collectTokens(stream)).rejects.toThrow('only be consumed once');
        });

        it('should surface a throwing transform to the consumer', async () => {
            const tokenizer = new Tokenizer({
                transforms: [
                    () => {
                        throw new Error('boom');
                    },
                ],
            });
            const stream = tokenizer.tokenize(words(10));
            await expect(collectTokens(stream)).rejects.toThrow('boom');
            await expect(stream.settled()).resolves.toBeUndefined();
        });
    });

    describe('cancellation', () => {
        const tokenizer = new Tokenizer({ bufferSize: 1, relayBufferSize: 1, filters: [] });

        it('should release every stage when the consumer breaks early', async () => {
            const stream = tokenizer.tokenize(words(1000));
            const seen: string[] = [];
            for await (const token of stream) {
                seen.push(token);
                if (seen.length === 3) break;
            }

            expect(seen).toEqual(['w0', 'w1', 'w2']);
            expect(stream.cancelled).toBe(true);
            await expect(stream.settled()).resolves.toBeUndefined();
        });

        it('should fail reads after cancel()', async () => {
            const stream = tokenizer.tokenize(words(1000));
            await stream.cancel();
            await expect(collectTokens(stream)).rejects.toBeInstanceOf(PipelineCancelledError);
        });

        it('should stop when an external signal aborts', async () => {
            const controller = new AbortController();
            const stream = tokenizer.tokenize(words(1000), controller.signal);
            const iterator = stream[Symbol.asyncIterator]();

            expect(await iterator.next()).toEqual({ value: 'w0', done: false });
            controller.abort();
            await stream.settled();
            await expect(iterator.next()).rejects.toBeInstanceOf(PipelineCancelledError);
        });

        it('should not start with an already aborted signal', async () => {
            const controller = new AbortController();
            controller.abort();
            const stream = tokenizer.tokenize('a b c', controller.signal);
            await expect(collectTokens(stream)).rejects.toBeInstanceOf(PipelineCancelledError);
            await expect(stream.settled()).resolves.toBeUndefined();
        });
    });
});
