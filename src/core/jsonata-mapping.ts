// core/jsonata-mapping.ts
// JSONata mapping; expressions are compiled once and evaluated asynchronously

import jsonata from 'jsonata';
import type { PathSegment } from '../types/index.js';
import { BaseMappingStrategy } from './mapping-strategy.js';
import { isRecord } from './data-path.js';

const SIMPLE_PATH = /^[A-Za-z_][\w]*(\.[A-Za-z_][\w]*)*$/;

export class JsonataMappingStrategy extends BaseMappingStrategy {
  readonly type = 'jsonata' as const;

  private readonly compiled = new Map<string, jsonata.Expression>();

  private compile(expression: string): jsonata.Expression {
    let compiled = this.compiled.get(expression);
    if (!compiled) {
      compiled = jsonata(expression);
      this.compiled.set(expression, compiled);
    }
    return compiled;
  }

  protected async resolve(context: unknown, expression: string): Promise<unknown> {
    const result: unknown = await this.compile(expression.trim()).evaluate(context);
    return result ?? null;
  }

  /**
   * Only plain navigation (`order.items`) through objects has a location;
   * JSONata maps over arrays along the way, which no single path can express
   */
  async locatePath(context: unknown, expression: string): Promise<PathSegment[] | null> {
    const trimmed = expression.trim();
    if (!SIMPLE_PATH.test(trimmed)) return null;

    const segments = trimmed.split('.');
    let current: unknown = context;
    for (const segment of segments) {
      if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, segment)) return null;
      current = current[segment];
    }
    return segments;
  }
}
