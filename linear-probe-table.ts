import { PRIMES, parsePrimes } from './primes';
import { KeyNotFoundError, CapacityExhaustedError } from './errors';
import { formatEntry } from './display';
import type { Entry, Slot, InsertionProbe, LookupProbe, Full, Missing } from './types';

export const MIN_CAPACITY = 1;
export const DEFAULT_TABLE_SIZE = 17;
export const DEFAULT_HASH_BASE = 31;
export const HASH_SEED = 31415;

const FULL: Full = { kind: 'full' };
const MISSING: Missing = { kind: 'missing' };

function createSlots<T>(size: number): Slot<T>[] {
  return new Array<Slot<T>>(size).fill(undefined);
}

/**
 * String-keyed hash table with linear probing.
 *
 * Deletion rehashes the remainder of the primary cluster rather than leaving
 * tombstones, so the probe chain from a key's hash position to its slot never
 * contains an empty slot. When an insertion finds the table full, the table
 * is rebuilt at the next capacity from the prime schedule.
 */
export class LinearProbeTable<T> {
  private slots: Slot<T>[];
  private count = 0;
  private nextPrime = 0;
  private readonly primes: readonly number[];

  /**
   * @param capacity requested slot count, raised to {@link MIN_CAPACITY}
   * @param primes growth schedule; each growth moves to the next entry
   */
  constructor(capacity: number = DEFAULT_TABLE_SIZE, primes: readonly number[] = PRIMES) {
    if (!Number.isInteger(capacity)) throw new RangeError(`Invalid table capacity: ${capacity}`);
    this.primes = primes === PRIMES ? PRIMES : parsePrimes(primes);
    this.slots = createSlots(Math.max(MIN_CAPACITY, capacity));
    // Positioned from the requested size, not the clamped one.
    while (this.nextPrime < this.primes.length && this.primes[this.nextPrime] <= capacity) this.nextPrime++;
  }

  static from<T>(entries: Iterable<readonly [string, T]>, capacity?: number): LinearProbeTable<T> {
    const table = new LinearProbeTable<T>(capacity);
    for (const [key, value] of entries) table.set(key, value);
    return table;
  }

  get size(): number { return this.count; }
  get length(): number { return this.count; }
  get capacity(): number { return this.slots.length; }

  isEmpty(): boolean { return this.count === 0; }
  isFull(): boolean { return this.count === this.slots.length; }

  /** Home position of `key`, in `[0, capacity)`. */
  hash(key: string): number {
    const size = this.slots.length;
    let value = 0;
    let a = HASH_SEED;
    for (let i = 0; i < key.length; i++) {
      value = (key.charCodeAt(i) + a * value) % size;
      if (size > 1) a = (a * DEFAULT_HASH_BASE) % (size - 1);
    }
    return value;
  }

  private probe(key: string, forInsertion: true): InsertionProbe;
  private probe(key: string, forInsertion: false): LookupProbe;
  private probe(key: string, forInsertion: boolean): InsertionProbe | LookupProbe {
    if (forInsertion && this.isFull()) return FULL;

    const size = this.slots.length;
    let position = this.hash(key);
    for (let i = 0; i < size; i++) {
      const slot = this.slots[position];
      if (slot === undefined) return forInsertion ? { kind: 'vacant', position } : MISSING;
      if (slot[0] === key) return { kind: 'hit', position };
      position = (position + 1) % size;
    }

    if (forInsertion) {
      throw new Error(`No free slot for ${JSON.stringify(key)} although ${this.count} of ${size} slots are in use`);
    }
    return MISSING;
  }

  has(key: string): boolean {
    return this.probe(key, false).kind === 'hit';
  }

  get(key: string): T {
    const found = this.probe(key, false);
    if (found.kind === 'missing') throw new KeyNotFoundError(key);
    const slot = this.slots[found.position];
    if (slot === undefined) throw new KeyNotFoundError(key);
    return slot[1];
  }

  set(key: string, value: T): this {
    // Growth always lands on a capacity above the current count, so a second
    // pass cannot see a full table.
    for (let attempt = 0; attempt < 2; attempt++) {
      const target = this.probe(key, true);
      switch (target.kind) {
        case 'full':
          this.grow();
          continue;
        case 'vacant':
          this.count++;
          this.slots[target.position] = [key, value];
          return this;
        case 'hit':
          this.slots[target.position] = [key, value];
          return this;
      }
    }
    throw new Error(`Table still full after growing to ${this.capacity} slots`);
  }

  insert(key: string, value: T): this {
    return this.set(key, value);
  }

  /**
   * Removes `key`, then rehashes every entry in the rest of its cluster so
   * nothing past the freed slot becomes unreachable.
   *
   * Best case O(K) for a key of length K, worst case O(K + N) when the whole
   * table is one cluster.
   */
  delete(key: string): void {
    const found = this.probe(key, false);
    if (found.kind === 'missing') throw new KeyNotFoundError(key);

    const size = this.slots.length;
    this.slots[found.position] = undefined;
    this.count--;

    let position = (found.position + 1) % size;
    for (let entry = this.slots[position]; entry !== undefined; entry = this.slots[position]) {
      this.slots[position] = undefined;
      this.count--;
      this.set(entry[0], entry[1]);
      position = (position + 1) % size;
    }
  }

  private grow(): void {
    if (this.nextPrime >= this.primes.length) throw new CapacityExhaustedError(this.capacity);

    const old = this.slots;
    this.slots = createSlots(this.primes[this.nextPrime]);
    this.nextPrime++;
    this.count = 0;
    for (const entry of old) {
      if (entry !== undefined) this.set(entry[0], entry[1]);
    }
  }

  *entries(): Generator<Entry<T>> {
    for (const slot of this.slots) {
      if (slot !== undefined) yield slot;
    }
  }

  *keys(): Generator<string> {
    for (const [key] of this.entries()) yield key;
  }

  *values(): Generator<T> {
    for (const [, value] of this.entries()) yield value;
  }

  [Symbol.iterator](): Generator<Entry<T>> {
    return this.entries();
  }

  forEach(fn: (value: T, key: string) => void): void {
    for (const [key, value] of this.entries()) fn(value, key);
  }

  /** One `(key,value)` line per entry, in slot order. */
  toDisplayForm(): string {
    const lines: string[] = [];
    for (const [key, value] of this.entries()) lines.push(formatEntry(key, value));
    return lines.join('\n');
  }

  toString(): string {
    return this.toDisplayForm();
  }
}
