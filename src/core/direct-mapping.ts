// core/direct-mapping.ts
// Positional dot-path mapping (`items.0.description`), no predicates

import type { PathSegment } from '../types/index.js';
import { BaseMappingStrategy } from './mapping-strategy.js';
import { getNestedValue } from './data-path.js';

export class DirectMappingStrategy extends BaseMappingStrategy {
  readonly type = 'direct' as const;

  protected async resolve(context: unknown, expression: string): Promise<unknown> {
    return getNestedValue(context, expression.trim());
  }

  async locatePath(_context: unknown, expression: string): Promise<PathSegment[] | null> {
    const trimmed = expression.trim();
    if (!trimmed) return null;
    return trimmed.split('.').map(segment => (/^\d+$/.test(segment) ? Number(segment) : segment));
  }
}
