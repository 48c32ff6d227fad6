import { describe, it, expect } from 'vitest';
import { attempt } from '@logosdx/utils';

import { FileLock } from '../../../src/core/logger/lock.js';

describe('logger: FileLock', () => {

    it('should run holders one at a time in request order', async () => {

        const lock = new FileLock();
        const events: string[] = [];

        const slow = lock.run(async () => {

            events.push('slow:start');
            await new Promise((resolve) => setTimeout(resolve, 20));
            events.push('slow:end');

        });

        const fast = lock.run(async () => {

            events.push('fast:start');
            events.push('fast:end');

        });

        await Promise.all([slow, fast]);

        expect(events).toEqual(['slow:start', 'slow:end', 'fast:start', 'fast:end']);

    });

    it('should return the holder result', async () => {

        const lock = new FileLock();

        await expect(lock.run(async () => 42)).resolves.toBe(42);

    });

    it('should release the lock when a holder rejects', async () => {

        const lock = new FileLock();

        const [, err] = await attempt(() => lock.run(async () => {

            throw new Error('boom');

        }));

        expect(err?.message).toBe('boom');
        expect(lock.isHeld).toBe(false);
        await expect(lock.run(async () => 'next')).resolves.toBe('next');

    });

    it('should report holders and waiters', async () => {

        const lock = new FileLock();
        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {

            release = resolve;

        });

        const first = lock.run(() => gate);
        const second = lock.run(async () => undefined);

        await Promise.resolve();
        await Promise.resolve();

        expect(lock.isHeld).toBe(true);
        expect(lock.waiting).toBe(1);

        release();
        await Promise.all([first, second]);

        expect(lock.isHeld).toBe(false);
        expect(lock.waiting).toBe(0);

    });

});
