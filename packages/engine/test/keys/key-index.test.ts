import { describe, it, expect, beforeEach } from 'vitest';

import { KeyBuilder } from '@/keys/key-builder';
import { isSameKey, KeyIndex } from '@/keys/key-index';

const keys = new KeyBuilder();

describe('KeyIndex', () => {
  let index: KeyIndex;

  beforeEach(() => {
    index = new KeyIndex();
  });

  it('should derive ids of hashable keys from their hash', () => {
    const key = keys.build([1]);

    expect(key.kind === 'hashable' && index.idOf(key)).toBe(key.kind === 'hashable' && `h.${key.hash}`);
    expect(index.register(key)).toBe(index.idOf(key));
    expect(index.structuralCount).toBe(0);
  });

  it('should only resolve registered structural keys', () => {
    expect(index.idOf(keys.build([[1]]))).toBeUndefined();

    const id = index.register(keys.build([[1]]));
    expect(id).toBe('s.1');
    expect(index.idOf(keys.build([[1]]))).toBe('s.1');
    expect(index.register(keys.build([[1]]))).toBe('s.1');
    expect(index.register(keys.build([[2]]))).toBe('s.2');
  });

  it('should forget released structural keys', () => {
    const id = index.register(keys.build([{ a: 1 }]));
    index.release(id);

    expect(index.idOf(keys.build([{ a: 1 }]))).toBeUndefined();
    expect(index.structuralCount).toBe(0);
  });

  it('should never reuse structural ids after a clear', () => {
    index.register(keys.build([[1]]));
    index.clear();

    expect(index.register(keys.build([[1]]))).toBe('s.2');
  });
});

describe('isSameKey()', () => {
  it('should compare keys of the same kind by value', () => {
    expect(isSameKey(keys.build([1], { a: 'x' }), keys.build([1], { a: 'x' }))).toBe(true);
    expect(isSameKey(keys.build([1]), keys.build(['1']))).toBe(false);
    expect(isSameKey(keys.build([{ a: [1] }]), keys.build([{ a: [1] }]))).toBe(true);
    expect(isSameKey(keys.build([{ a: [1] }]), keys.build([{ a: [2] }]))).toBe(false);
  });

  it('should never match keys of different kinds', () => {
    expect(isSameKey(keys.build([1]), keys.build([[1]]))).toBe(false);
    expect(isSameKey(keys.build([[1]]), keys.build([1]))).toBe(false);
  });
});
