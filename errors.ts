/**
 * Thrown by `get` and `delete` when the key has no entry.
 */
export class KeyNotFoundError extends Error {
  constructor(public readonly key: string) {
    super(`Key not found: ${JSON.stringify(key)}`);
    this.name = 'KeyNotFoundError';
  }

  static isKeyNotFoundError(error: unknown): error is KeyNotFoundError {
    return (
      error instanceof KeyNotFoundError ||
      (error instanceof Error && error.name === 'KeyNotFoundError')
    );
  }
}

/**
 * Thrown when a full table has no larger prime capacity left to grow into.
 */
export class CapacityExhaustedError extends Error {
  constructor(public readonly capacity: number) {
    super(`Cannot grow table beyond ${capacity} slots: prime capacities exhausted`);
    this.name = 'CapacityExhaustedError';
  }
}
