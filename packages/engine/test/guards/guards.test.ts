import { describe, it, expect, beforeEach } from 'vitest';

import { createGuard, MutexGuard, NoopGuard } from '@/guards';

function deferred() {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });

  return { promise, release: () => release() };
}

const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('createGuard()', () => {
  it('should pick the guard matching the thread safety flag', () => {
    expect(createGuard(true)).toBeInstanceOf(MutexGuard);
    expect(createGuard(false)).toBeInstanceOf(NoopGuard);
    expect(createGuard(true).threadSafe).toBe(true);
    expect(createGuard(false).threadSafe).toBe(false);
  });
});

describe('MutexGuard', () => {
  let guard: MutexGuard;

  beforeEach(() => {
    guard = new MutexGuard();
  });

  describe('.runExclusive()', () => {
    it('should hold the lock across awaited work', async () => {
      const events: string[] = [];
      const gate = deferred();

      const first = guard.runExclusive(async () => {
        events.push('first:start');
        await gate.promise;
        events.push('first:end');
        return 1;
      });
      const second = guard.runExclusive(() => {
        events.push('second');
        return 2;
      });

      await flush();
      expect(events).toEqual(['first:start']);
      expect(guard.isLocked).toBe(true);

      gate.release();
      await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
      expect(events).toEqual(['first:start', 'first:end', 'second']);
      expect(guard.isLocked).toBe(false);
    });

    it('should release the lock if the function throws', async () => {
      await expect(
        guard.runExclusive(() => {
          throw new Error('failed');
        }),
      ).rejects.toThrow('failed');

      expect(guard.isLocked).toBe(false);
      await expect(guard.runExclusive(() => 'next')).resolves.toBe('next');
    });

    it('should be reentrant for the holder', async () => {
      const result = await guard.runExclusive(async () => {
        const inner = await guard.runExclusive(async () => 'inner');
        return `outer(${inner})`;
      });

      expect(result).toBe('outer(inner)');
    });

    it('should make work left running by a former holder wait for the lock', async () => {
      const events: string[] = [];
      const gate = deferred();
      let detached: Promise<void> = Promise.resolve();

      await guard.runExclusive(() => {
        detached = sleep(5).then(() =>
          guard.runExclusive(() => {
            events.push('detached');
          }),
        );
      });

      const holder = guard.runExclusive(async () => {
        events.push('holder:start');
        await gate.promise;
        events.push('holder:end');
      });

      await sleep(20);
      expect(events).toEqual(['holder:start']);

      gate.release();
      await Promise.all([holder, detached]);
      expect(events).toEqual(['holder:start', 'holder:end', 'detached']);
    });

    it('should not let other guards piggyback on the lock', async () => {
      const other = new MutexGuard();
      const events: string[] = [];
      const gate = deferred();

      const holder = other.runExclusive(async () => {
        await gate.promise;
        events.push('other');
      });
      const nested = guard.runExclusive(() => other.runExclusive(() => events.push('nested')));

      await flush();
      expect(events).toEqual([]);

      gate.release();
      await Promise.all([holder, nested]);
      expect(events).toEqual(['other', 'nested']);
    });
  });
});

describe('NoopGuard', () => {
  it('should run functions concurrently', async () => {
    const guard = new NoopGuard();
    const events: string[] = [];
    const gate = deferred();

    const first = guard.runExclusive(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = guard.runExclusive(() => {
      events.push('second');
    });

    await flush();
    expect(events).toEqual(['first:start', 'second']);

    gate.release();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'second', 'first:end']);
  });
});
