import { describe, it, expect, beforeEach } from 'vitest';

import { KeyBuilder } from '@/keys/key-builder';
import type { CacheKey } from '@/types/cache';
import { KeyConstructionError } from '@/utils/errors';

function hashOf(key: CacheKey): string {
  if (key.kind !== 'hashable') throw new Error(`Expected a hashable key, got ${key.kind}`);
  return key.hash;
}

describe('KeyBuilder', () => {
  let builder: KeyBuilder;

  beforeEach(() => {
    builder = new KeyBuilder();
  });

  describe('.build()', () => {
    it('should build hashable keys for primitive arguments', () => {
      const key = builder.build([1, 'a', true, null, undefined, 2n]);

      expect(key.kind).toBe('hashable');
      expect(key.kind === 'hashable' && key.canonical.args).toEqual([
        ['number', '1'],
        ['string', 'a'],
        ['boolean', 'true'],
        ['null', ''],
        ['undefined', 'undefined'],
        ['bigint', '2'],
      ]);
    });

    it('should build the same hash for equal calls', () => {
      expect(hashOf(builder.build([1, 'a']))).toBe(hashOf(builder.build([1, 'a'])));
    });

    it('should keep arguments of different types apart', () => {
      const hashes = [builder.build([3]), builder.build(['3']), builder.build([3n])].map(hashOf);

      expect(new Set(hashes).size).toBe(3);
      expect(hashOf(builder.build([true]))).not.toBe(hashOf(builder.build([1])));
    });

    it('should treat 3 and 3.0 as the same number', () => {
      expect(hashOf(builder.build([3]))).toBe(hashOf(builder.build([3.0])));
    });

    it('should ignore the order of keyword arguments', () => {
      const first = builder.build([1], { b: 2, a: 1 });
      const second = builder.build([1], { a: 1, b: 2 });

      expect(hashOf(first)).toBe(hashOf(second));
      expect(first.kind === 'hashable' && first.canonical.kwargs).toEqual([
        ['a', ['number', '1']],
        ['b', ['number', '2']],
      ]);
    });

    it('should keep positional and keyword arguments apart', () => {
      expect(hashOf(builder.build([1, 'a', 2]))).not.toBe(hashOf(builder.build([1], { a: 2 })));
    });

    it('should hash dates and registered symbols', () => {
      const date = builder.build([new Date(0)]);
      const symbol = builder.build([Symbol.for('memo')]);

      expect(date.kind === 'hashable' && date.canonical.args).toEqual([['date', '0']]);
      expect(symbol.kind === 'hashable' && symbol.canonical.args).toEqual([['symbol', 'memo']]);
      expect(hashOf(date)).toBe(hashOf(builder.build([new Date(0)])));
    });

    it('should keep the raw call on the key', () => {
      const list = [1, 2];
      const key = builder.build([list, 'x'], { flag: true });

      expect(key.call.args[0]).toBe(list);
      expect(key.call.kwargs).toEqual({ flag: true });
    });

    it('should build structural keys for containers', () => {
      for (const value of [[1, 2], { a: 1 }, new Map([[1, 2]]), new Set([1]), Symbol('local')]) {
        expect(builder.build([value]).kind).toBe('structural');
      }
    });

    it('should snapshot structural arguments', () => {
      const list = [1, 2];
      const key = builder.build([list]);
      list.push(3);

      expect(key.kind === 'structural' && key.snapshot).toEqual({ args: [[1, 2]], kwargs: [] });
    });

    it('should make the whole key structural if any argument is structural', () => {
      expect(builder.build([1, 'a'], { list: [1] }).kind).toBe('structural');
    });

    it('should handle self referencing arguments', () => {
      const cyclic: Record<string, unknown> = { a: 1 };
      cyclic.self = cyclic;

      expect(builder.build([cyclic]).kind).toBe('structural');
    });

    it('should reject arguments without any notion of equality', () => {
      const unsupported = [() => 1, Promise.resolve(1), new WeakMap(), new WeakSet(), [1, () => 1], { nested: { fn: () => 1 } }];

      for (const value of unsupported) {
        expect(() => builder.build([value])).toThrow(KeyConstructionError);
      }
    });

    it('should reject unsupported keyword arguments', () => {
      expect(() => builder.build([], { callback: () => 1 })).toThrow(KeyConstructionError);
    });

    it('should reject arguments whose properties can not be read', () => {
      const unreadable = {
        get value(): number {
          throw new Error('getter failed');
        },
      };

      let error: unknown;
      try {
        builder.build([{ nested: unreadable }]);
      } catch (err) {
        error = err;
      }

      expect(error).toBeInstanceOf(KeyConstructionError);
      expect(error).toHaveProperty('detail', 'Arguments can not be inspected: Error: getter failed');
    });
  });

  describe('custom key maker', () => {
    it('should derive the key from the key maker only', () => {
      builder = new KeyBuilder((args) => args[0]);

      expect(builder.usesCustomKey).toBe(true);
      expect(hashOf(builder.build([1, 'a']))).toBe(hashOf(builder.build([1, 'b'])));
      expect(hashOf(builder.build([1, 'a']))).not.toBe(hashOf(builder.build([2, 'a'])));
    });

    it('should probe the value returned by the key maker', () => {
      builder = new KeyBuilder((args, kwargs) => ({ id: args[0], ...kwargs }));

      expect(builder.build([1], { x: 1 }).kind).toBe('structural');
    });

    it('should turn key maker failures into key construction errors', () => {
      builder = new KeyBuilder(() => {
        throw new Error('broken');
      });

      expect(() => builder.build([1])).toThrow(KeyConstructionError);
    });
  });
});
