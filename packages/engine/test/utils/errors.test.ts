import { describe, it, expect } from 'vitest';

import { ConfigurationError, InvariantViolationError, KeyConstructionError, MemokitError } from '@/utils/errors';

describe('MemokitError', () => {
  it('should fall back to the default message', () => {
    const error = new ConfigurationError();

    expect(error.message).toBe('Invalid cache configuration');
    expect(error.detail).toBeUndefined();
    expect(error.name).toBe('ConfigurationError');
  });

  it('should keep the given message and detail', () => {
    const error = new KeyConstructionError({ message: 'No key', detail: 'Function f has no value equality' });

    expect(error.message).toBe('No key');
    expect(error.detail).toBe('Function f has no value equality');
  });

  it('should be recognizable as a cache error', () => {
    const error = new InvariantViolationError({ detail: 'Full store has no entry to evict' });

    expect(error).toBeInstanceOf(MemokitError);
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('Cache invariant violated');
  });
});
