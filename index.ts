/**
 * Public API: the linear probing table, its set wrapper and their errors.
 */
export { LinearProbeTable, MIN_CAPACITY, DEFAULT_TABLE_SIZE, DEFAULT_HASH_BASE, HASH_SEED } from './linear-probe-table';
export { LinearProbeSet } from './linear-probe-set';
export { KeyNotFoundError, CapacityExhaustedError } from './errors';
export { PRIMES, parsePrimes, loadPrimes } from './primes';
export { formatValue, formatEntry } from './display';
export type { Entry } from './types';
