export class RequestAbortedError extends Error {
  constructor(message = 'Request aborted') {
    super(message);
    this.name = 'RequestAbortedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Run the operation, rejecting as soon as the signal fires. An already-aborted
 * signal means the operation is never started. Work already sent to the
 * database is not cancelled; statement_timeout bounds it server-side.
 */
export function withAbort<T>(
  operation: () => Promise<T>,
  signal?: AbortSignal,
  abortError: () => Error = () => new RequestAbortedError()
): Promise<T> {
  if (!signal) {
    return operation();
  }
  if (signal.aborted) {
    return Promise.reject(abortError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(abortError());
    };
    signal.addEventListener('abort', onAbort, { once: true });

    operation().then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class OperationTimeoutError extends Error {
  constructor(ms: number) {
    super(`Operation timed out after ${ms}ms`);
    this.name = 'OperationTimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Helper to add timeout to an operation.
 */
export function withTimeout<T>(operation: () => Promise<T>, ms: number): Promise<T> {
  return withAbort(operation, AbortSignal.timeout(ms), () => new OperationTimeoutError(ms));
}
