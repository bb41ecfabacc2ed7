/**
 * Canonical JSON encoding and content hashing.
 * Object keys are sorted, Maps become sorted entry lists, Sets sorted arrays
 * and typed arrays plain arrays, so equal content always encodes to the same
 * string.
 */
import { createHash } from 'node:crypto';

function normalize(value: unknown): unknown {
  if (value === undefined) return undefined;
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map(v => normalize(v) ?? null);
  if (
    value instanceof Float64Array || value instanceof Float32Array ||
    value instanceof Int32Array || value instanceof Uint32Array ||
    value instanceof Int16Array || value instanceof Uint16Array ||
    value instanceof Int8Array || value instanceof Uint8Array
  ) {
    return Array.from(value, v => normalize(v));
  }
  if (value instanceof Map) {
    return [...value.entries()]
      .map(([k, v]) => [String(k), normalize(v)] as const)
      .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
  }
  if (value instanceof Set) {
    return [...value].map(v => normalize(v)).sort();
  }
  if (typeof value === 'object') {
    const entries: [string, unknown][] = Object.entries(value);
    entries.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
    const out: Record<string, unknown> = {};
    for (const [key, raw] of entries) {
      const v = normalize(raw);
      if (v !== undefined) out[key] = v;
    }
    return out;
  }
  return undefined;
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value) ?? null);
}

export function contentHash(value: unknown): string {
  return createHash('sha256').update(stableStringify(value)).digest('hex');
}
