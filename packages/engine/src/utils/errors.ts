import { merge } from 'lodash-es';

interface ErrorProps {
  message?: string;
  detail?: string;
}

export class MemokitError extends Error {
  detail?: string;

  constructor(props?: ErrorProps, defaultMessage: string = 'Internal cache error') {
    const mergedProps = merge(
      {},
      {
        message: defaultMessage,
        detail: undefined,
      },
      props,
    );

    super(mergedProps.message);

    this.name = new.target.name;
    this.detail = mergedProps.detail;
  }
}

/**
 * Thrown when a cache is created with invalid options.
 */
export class ConfigurationError extends MemokitError {
  constructor(props?: ErrorProps) {
    super(props, 'Invalid cache configuration');
  }
}

/**
 * Thrown when no cache key can be derived from the arguments of a call. Never reaches the caller, the call
 * is executed without the cache instead.
 */
export class KeyConstructionError extends MemokitError {
  constructor(props?: ErrorProps) {
    super(props, 'Arguments can not be used as a cache key');
  }
}

/**
 * Thrown when the internal bookkeeping of a store is inconsistent.
 */
export class InvariantViolationError extends MemokitError {
  constructor(props?: ErrorProps) {
    super(props, 'Cache invariant violated');
  }
}
