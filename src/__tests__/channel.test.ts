import { describe, it, expect } from 'vitest';
import { BoundedChannel } from '../nlp/channel.js';
import { InvalidOptionError } from '../classifier/errors.js';

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('BoundedChannel', () => {
    it('should reject a non-positive capacity', () => {
        expect(() => new BoundedChannel<string>(0)).toThrow(InvalidOptionError);
        expect(() => new BoundedChannel<string>(2.5)).toThrow(InvalidOptionError);
    });

    it('should deliver values in order', async () => {
        const channel = new BoundedChannel<number>(4);
        await channel.send(1);
        await channel.send(2);
        channel.close();

        const received: number[] = [];
        for await (const value of channel) received.push(value);
        expect(received).toEqual([1, 2]);
    });

    it('should suspend a writer while the buffer is full', async () => {
        const channel = new BoundedChannel<number>(2);
        await channel.send(1);
        await channel.send(2);

        let delivered = false;
        const blocked = channel.send(3).then(() => {
            delivered = true;
        });

        await tick();
        expect(delivered).toBe(false);
        expect(channel.length).toBe(3);

        expect(await channel.receive()).toEqual({ value: 1, done: false });
        await blocked;
        expect(delivered).toBe(true);
        expect(await channel.receive()).toEqual({ value: 2, done: false });
        expect(await channel.receive()).toEqual({ value: 3, done: false });
    });

    it('should wake a waiting reader on send', async () => {
        const channel = new BoundedChannel<string>(1);
        const pending = channel.receive();
        await channel.send('x');
        expect(await pending).toEqual({ value: 'x', done: false });
    });

    it('should drain buffered values before reporting done', async () => {
        const channel = new BoundedChannel<string>(2);
        await channel.send('a');
        channel.close();

        expect(await channel.receive()).toEqual({ value: 'a', done: false });
        expect(await channel.receive()).toEqual({ value: undefined, done: true });
        expect(channel.isClosed).toBe(true);
    });

    it('should finish waiting readers on close', async () => {
        const channel = new BoundedChannel<string>(1);
        const pending = channel.receive();
        channel.close();
        expect(await pending).toEqual({ value: undefined, done: true });
    });

    it('should refuse sends after close', async () => {
        const channel = new BoundedChannel<string>(1);
        channel.close();
        await expect(channel.send('late')).rejects.toThrow('closed channel');
    });

    it('should fail pending writers and readers when closed with an error', async () => {
        const full = new BoundedChannel<string>(1);
        await full.send('a');
        const writer = full.send('b');
        const failure = new Error('stop');
        full.close(failure);
        await expect(writer).rejects.toBe(failure);
        await expect(full.receive()).rejects.toBe(failure);

        const empty = new BoundedChannel<string>(1);
        const reader = empty.receive();
        empty.close(failure);
        await expect(reader).rejects.toBe(failure);
    });

    it('should let an error close override a plain close', async () => {
        const channel = new BoundedChannel<string>(2);
        await channel.send('a');
        channel.close();
        const failure = new Error('cancelled');
        channel.close(failure);
        await expect(channel.receive()).rejects.toBe(failure);
    });
});
