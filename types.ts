// Shared type definitions
export type Entry<T> = readonly [key: string, value: T];
export type Slot<T> = Entry<T> | undefined;

export type Hit = { kind: 'hit'; position: number };
export type Vacant = { kind: 'vacant'; position: number };
export type Full = { kind: 'full' };
export type Missing = { kind: 'missing' };

export type ProbeOutcome = Hit | Vacant | Full | Missing;
export type InsertionProbe = Hit | Vacant | Full;
export type LookupProbe = Hit | Missing;
