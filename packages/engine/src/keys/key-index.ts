import { isEqual } from 'lodash-es';

import type { CacheKey, StructuralKey } from '@/types/cache';

/**
 * Checks whether two keys identify the same call. Hashable keys are compared by their canonical form, so
 * keys with colliding hashes are told apart.
 */
export function isSameKey(a: CacheKey, b: CacheKey): boolean {
  if (a.kind === 'hashable') return b.kind === 'hashable' && a.hash === b.hash && isEqual(a.canonical, b.canonical);

  return b.kind === 'structural' && isEqual(a.snapshot, b.snapshot);
}

/**
 * Maps cache keys to the ids stores use internally. To prevent duplicates between both kinds of keys,
 * hashable ids are prefixed with a `h`, while structural ids use a `s`.
 */
export class KeyIndex {
  protected _structural: { id: string; key: StructuralKey }[] = [];

  protected _sequence: number = 0;

  get structuralCount(): number {
    return this._structural.length;
  }

  /**
   * Resolves the id of a key. Structural keys are compared against every registered structural key, so this
   * is O(m) for them.
   * @returns The id or `undefined` if a structural key has not been registered.
   */
  idOf(key: CacheKey): string | undefined {
    if (key.kind === 'hashable') return `h.${key.hash}`;

    return this._structural.find(({ key: registered }) => isSameKey(registered, key))?.id;
  }

  /**
   * Registers a key and returns its id. Registering a key twice returns the same id.
   */
  register(key: CacheKey): string {
    const existing = this.idOf(key);
    if (existing !== undefined) return existing;
    if (key.kind === 'hashable') return `h.${key.hash}`;

    this._sequence += 1;
    const id = `s.${this._sequence}`;
    this._structural.push({ id, key });
    return id;
  }

  release(id: string): void {
    if (!id.startsWith('s.')) return;

    const index = this._structural.findIndex((registered) => registered.id === id);
    if (index !== -1) this._structural.splice(index, 1);
  }

  clear(): void {
    this._structural = [];
  }
}
