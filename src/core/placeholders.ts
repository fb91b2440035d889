// core/placeholders.ts
// ${path} placeholder substitution for template ids and section paths

import { UnresolvedPlaceholderError } from '../types/index.js';
import { getNestedValue } from './data-path.js';
import { valueToString } from './formatter.js';

const PLACEHOLDER = /\$\{([^}]+)\}/g;

export function hasPlaceholders(text: string): boolean {
  return text.includes('${');
}

/**
 * Replace each `${a.b}` with the value at that dot path in `variables`.
 * A placeholder whose value is missing or empty throws.
 */
export function resolvePlaceholders(text: string, variables: unknown): string {
  return text.replace(PLACEHOLDER, (_match, rawPath: string) => {
    const path = rawPath.trim();
    const value = valueToString(getNestedValue(variables, path));
    if (value === '') {
      throw new UnresolvedPlaceholderError(path, text);
    }
    return value;
  });
}
