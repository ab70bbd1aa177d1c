import { LinearProbeTable } from './linear-probe-table';

// Members are keyed by their string form and kept as the entry value.
export class LinearProbeSet<T extends string | number> {
  private _table: LinearProbeTable<T>;

  constructor(table?: LinearProbeTable<T>) {
    this._table = table ?? new LinearProbeTable<T>();
  }

  add(value: T): LinearProbeSet<T> {
    const key = String(value);
    if (!this._table.has(key)) this._table.set(key, value);
    return this;
  }

  has(value: T): boolean {
    return this._table.has(String(value));
  }

  delete(value: T): boolean {
    const key = String(value);
    if (!this._table.has(key)) return false;
    this._table.delete(key);
    return true;
  }

  get size(): number { return this._table.size; }

  values(): Generator<T> {
    return this._table.values();
  }

  forEach(fn: (value: T) => void): void {
    for (const v of this.values()) fn(v);
  }

  addMany(values: Iterable<T>): LinearProbeSet<T> {
    for (const v of values) this.add(v);
    return this;
  }
}
