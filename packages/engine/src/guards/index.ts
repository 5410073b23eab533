import type { ConcurrencyGuard } from '@/guards/base';
import { MutexGuard } from '@/guards/mutex';
import { NoopGuard } from '@/guards/noop';

export function createGuard(threadSafe: boolean): ConcurrencyGuard {
  return threadSafe ? new MutexGuard() : new NoopGuard();
}

export type { ConcurrencyGuard };
export { MutexGuard, NoopGuard };
