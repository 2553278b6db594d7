import { describe, test, expect } from '@jest/globals';
import { WorkerPool } from '../src/internal/dispatch/pool';
import { sleep } from './utils';

describe('WorkerPool', () => {
    test('never runs more than size calls at once', async () => {
        const pool = new WorkerPool(2);
        let peak = 0;

        const futures = [0, 1, 2, 3, 4].map((i) => pool.submit(async () => {
            peak = Math.max(peak, pool.inFlight());
            await sleep(10);
            return i * 10;
        }));

        expect(futures.some((f) => f.isDone())).toBe(false);
        await expect(Promise.all(futures.map((f) => f.get()))).resolves.toEqual([0, 10, 20, 30, 40]);
        expect(peak).toBe(2);
        expect(pool.inFlight()).toBe(0);
        expect(futures.every((f) => f.isDone())).toBe(true);
    });

    test('futures can be awaited directly', async () => {
        const pool = new WorkerPool(1);
        await expect(Promise.resolve(pool.submit(async () => 'value'))).resolves.toBe('value');
        expect(await pool.submit(async () => 7)).toBe(7);
    });

    test('a failed call rejects only its own future', async () => {
        const pool = new WorkerPool(1);
        const bad = pool.submit(async () => {
            throw new Error('boom');
        });
        const good = pool.submit(async () => 'fine');

        await expect(bad.get()).rejects.toThrow('boom');
        await expect(good.get()).resolves.toBe('fine');
    });

    test('an ignored failure settles quietly', async () => {
        const pool = new WorkerPool(1);
        const ignored = pool.submit(async () => {
            throw new Error('nobody listens');
        });

        await sleep(10);
        expect(ignored.isDone()).toBe(true);
        expect(pool.inFlight()).toBe(0);
    });
});
