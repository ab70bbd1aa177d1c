// Text rendering of table entries for diagnostics

export function formatValue(v: unknown): string {
  if (v === null || typeof v !== 'object') return String(v);
  try {
    return JSON.stringify(v) ?? String(v);
  } catch {
    // circular structures
    return String(v);
  }
}

export function formatEntry(key: string, value: unknown): string {
  return `(${key},${formatValue(value)})`;
}
