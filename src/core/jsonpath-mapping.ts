// core/jsonpath-mapping.ts
// JSONPath mapping via jsonpath-plus, with clean-syntax normalization

import { JSONPath } from 'jsonpath-plus';
import type { PathSegment } from '../types/index.js';
import { BaseMappingStrategy } from './mapping-strategy.js';
import { isRecord, parsePointer } from './data-path.js';
import { valueToString } from './formatter.js';

// list[type='X'] -> list[?(@.type=='X')]
const CLEAN_FILTER = /\[\s*([A-Za-z_][\w.]*)\s*=\s*(['"])(.*?)\2\s*\]/g;

// recursive descent, wildcard, filter, union or slice
const INDEFINITE = /\.\.|\*|\[\?|\[[^\]]*[,:][^\]]*\]/;

/**
 * Normalize clean path syntax to a rooted JSONPath expression
 */
export function normalizeJsonPath(expression: string): string {
  let path = expression.trim();
  if (!path.startsWith('$')) {
    path = path.startsWith('[') ? `$${path}` : `$.${path}`;
  }
  return path.replace(
    CLEAN_FILTER,
    (_match, field: string, quote: string, value: string) => `[?(@.${field}==${quote}${value}${quote})]`
  );
}

export function isIndefinitePath(path: string): boolean {
  return INDEFINITE.test(path);
}

/**
 * Split `left == right` at an `==` outside brackets, parentheses and quotes
 */
export function splitTopLevelEquality(expression: string): [string, string] | null {
  let depth = 0;
  let quote: string | null = null;

  for (let i = 0; i < expression.length - 1; i++) {
    const ch = expression[i];
    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === '\'' || ch === '"') quote = ch;
    else if (ch === '[' || ch === '(') depth++;
    else if (ch === ']' || ch === ')') depth--;
    else if (depth === 0 && ch === '=' && expression[i + 1] === '=') {
      return [expression.slice(0, i).trim(), expression.slice(i + 2).trim()];
    }
  }

  return null;
}

function unquote(literal: string): string {
  const match = literal.match(/^(['"])(.*)\1$/);
  return match ? match[2] : literal;
}

type JsonDocument = Record<string, unknown> | unknown[];

function asDocument(context: unknown): JsonDocument | null {
  return isRecord(context) || Array.isArray(context) ? context : null;
}

export class JsonPathMappingStrategy extends BaseMappingStrategy {
  readonly type = 'jsonpath' as const;

  protected async resolve(context: unknown, expression: string): Promise<unknown> {
    const equality = splitTopLevelEquality(expression);
    if (equality) {
      const [left, right] = equality;
      return valueToString(this.query(context, left)) === unquote(right);
    }
    return this.query(context, expression);
  }

  private query(context: unknown, expression: string): unknown {
    const json = asDocument(context);
    if (!json) return null;

    const path = normalizeJsonPath(expression);
    const matches: unknown = JSONPath({ path, json, wrap: true });
    if (!Array.isArray(matches)) return null;

    return isIndefinitePath(path) ? matches : matches[0] ?? null;
  }

  async locatePath(context: unknown, expression: string): Promise<PathSegment[] | null> {
    const json = asDocument(context);
    if (!json) return null;

    const path = normalizeJsonPath(expression);
    const pointers: unknown = JSONPath({ path, json, wrap: true, resultType: 'pointer' });
    if (!Array.isArray(pointers) || pointers.length !== 1 || typeof pointers[0] !== 'string') {
      return null;
    }
    return parsePointer(pointers[0]);
  }
}
