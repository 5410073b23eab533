import { cloneDeep, isPlainObject, sortBy, toPairs } from 'lodash-es';
import objectHash from 'object-hash';
import type { Logger } from 'winston';

import type { CallArguments, KeyMaker } from '@memokit/types';

import type { CacheKey, CanonicalCall, CanonicalValue } from '@/types/cache';
import { KeyConstructionError } from '@/utils/errors';
import { componentLogger } from '@/utils/logger';

type Capability = 'hashable' | 'structural';

interface KeyParts {
  args: readonly unknown[];
  kwargs: [name: string, value: unknown][];
}

/**
 * Determines how a value can take part in a cache key. Containers are walked to reject values without any
 * notion of equality, no matter how deeply they are nested.
 * @throws {KeyConstructionError} If the value supports neither hashing nor equality.
 */
function probe(value: unknown, seen: Set<object>): Capability {
  if (value === null || value === undefined) return 'hashable';
  if (typeof value === 'function')
    throw new KeyConstructionError({ detail: `Function ${value.name || '<anonymous>'} has no value equality` });
  if (typeof value === 'symbol') return Symbol.keyFor(value) === undefined ? 'structural' : 'hashable';
  if (typeof value !== 'object') return 'hashable';
  if (value instanceof Date) return 'hashable';

  if (value instanceof Promise || value instanceof WeakMap || value instanceof WeakSet || value instanceof WeakRef)
    throw new KeyConstructionError({ detail: `${value.constructor.name} has no value equality` });

  if (seen.has(value)) return 'structural';
  seen.add(value);

  if (Array.isArray(value)) value.forEach((item) => probe(item, seen));
  else if (isPlainObject(value)) Object.values(value).forEach((item) => probe(item, seen));

  return 'structural';
}

function canonicalize(value: unknown): CanonicalValue {
  if (value === null) return ['null', ''];
  if (value instanceof Date) return ['date', String(value.getTime())];
  if (typeof value === 'symbol') return ['symbol', Symbol.keyFor(value) ?? ''];

  return [typeof value, String(value)];
}

/**
 * Derives cache keys from calls. Calls made of primitives get a hashable key, every other call gets a
 * structural key holding a deep snapshot of its arguments.
 */
export class KeyBuilder {
  protected _keyMaker: KeyMaker | undefined;

  protected _logger: Logger;

  constructor(keyMaker?: KeyMaker) {
    this._keyMaker = keyMaker;
    this._logger = componentLogger('KeyBuilder');
  }

  get usesCustomKey(): boolean {
    return this._keyMaker !== undefined;
  }

  /**
   * Builds the key for a single call. Keyword arguments are sorted by name, so the order in which they are
   * passed never changes the key.
   * @param args - Positional arguments.
   * @param kwargs - Keyword arguments.
   * @throws {KeyConstructionError} If no key can be built from the arguments.
   */
  build(args: readonly unknown[], kwargs: Readonly<Record<string, unknown>> = {}): CacheKey {
    const call: CallArguments = this._inspect(() => ({ args: [...args], kwargs: { ...kwargs } }));
    const parts = this._split(call);

    const values = [...parts.args, ...parts.kwargs.map(([, value]) => value)];
    const capabilities = this._inspect(() => values.map((value) => probe(value, new Set())));

    if (capabilities.every((capability) => capability === 'hashable')) {
      const canonical: CanonicalCall = {
        args: parts.args.map(canonicalize),
        kwargs: parts.kwargs.map(([name, value]): [string, CanonicalValue] => [name, canonicalize(value)]),
      };

      return { kind: 'hashable', hash: objectHash(canonical), canonical, call };
    }

    this._logger.debug('Call contains unhashable arguments, building structural key');
    return { kind: 'structural', snapshot: this._inspect(() => cloneDeep(parts)), call };
  }

  /**
   * Runs a step reading the arguments. Anything thrown by the arguments themselves, such as a failing
   * getter, becomes a `KeyConstructionError`.
   */
  private _inspect<R>(read: () => R): R {
    try {
      return read();
    } catch (err) {
      if (err instanceof KeyConstructionError) throw err;

      this._logger.warn('Arguments can not be inspected', err);
      throw new KeyConstructionError({ detail: `Arguments can not be inspected: ${String(err)}` });
    }
  }

  private _split(call: CallArguments): KeyParts {
    if (this._keyMaker === undefined)
      return { args: call.args, kwargs: sortBy(toPairs(call.kwargs), ([name]) => name) };

    try {
      return { args: [this._keyMaker(call.args, call.kwargs)], kwargs: [] };
    } catch (err) {
      this._logger.warn('Custom key maker failed', err);
      throw new KeyConstructionError({ detail: `Custom key maker failed: ${String(err)}` });
    }
  }
}
