// core/data-path.ts
// Dot-path navigation and structural copies over nested data trees

import type { DataTree, PathSegment } from '../types/index.js';

/**
 * Type guard for plain string-keyed objects
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve a dot-separated path (`items.0.description`).
 * Numeric segments index arrays. Anything unresolvable yields null.
 */
export function getNestedValue(data: unknown, path: string): unknown {
  if (path === '') return data ?? null;

  let current: unknown = data;
  for (const segment of path.split('.')) {
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) return null;
      const index = Number(segment);
      if (index >= current.length) return null;
      current = current[index];
    } else if (isRecord(current)) {
      if (!Object.prototype.hasOwnProperty.call(current, segment)) return null;
      current = current[segment];
    } else {
      return null;
    }
  }

  return current ?? null;
}

/**
 * Parse a JSON pointer (`/items/0`) into path segments
 */
export function parsePointer(pointer: string): PathSegment[] {
  if (pointer === '') return [];
  return pointer
    .split('/')
    .slice(1)
    .map(token => token.replace(/~1/g, '/').replace(/~0/g, '~'))
    .map(token => (/^\d+$/.test(token) ? Number(token) : token));
}

/**
 * Copy `data` with `value` placed at `segments`.
 * Only the containers along the path are copied; the input is never mutated.
 */
export function withValueAt(data: DataTree, segments: readonly PathSegment[], value: unknown): DataTree {
  const updated = setIn(data, segments, value);
  return isRecord(updated) ? updated : data;
}

function setIn(node: unknown, segments: readonly PathSegment[], value: unknown): unknown {
  if (segments.length === 0) return value;

  const [head, ...rest] = segments;

  if (Array.isArray(node) && typeof head === 'number') {
    const copy = [...node];
    copy[head] = setIn(node[head], rest, value);
    return copy;
  }

  const base = isRecord(node) ? node : {};
  const key = String(head);
  return { ...base, [key]: setIn(base[key], rest, value) };
}
