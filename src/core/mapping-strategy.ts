// core/mapping-strategy.ts
// Field mapping strategy contract, shared error policy, and the tag registry

import type { FieldMap, FieldValues, MappingType, PathSegment } from '../types/index.js';
import { FieldMappingError, UnsupportedMappingTypeError } from '../types/index.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { valueToString } from './formatter.js';

export interface FieldMappingStrategy {
  readonly type: MappingType;
  supports(mappingType: string): boolean;
  /** Map every field; a failing field becomes "" */
  map(context: unknown, fieldMap: FieldMap): Promise<FieldValues>;
  /** Raw value of one expression, or null when it cannot be evaluated */
  evaluatePath(context: unknown, expression: string): Promise<unknown>;
  /** Evaluate `basePath` once and map `fieldMap` relative to the result */
  mapWithBasePath(context: unknown, basePath: string, fieldMap: FieldMap): Promise<FieldValues>;
  /** Concrete location of an expression's single match, when it has one */
  locatePath(context: unknown, expression: string): Promise<PathSegment[] | null>;
}

export abstract class BaseMappingStrategy implements FieldMappingStrategy {
  abstract readonly type: MappingType;

  constructor(protected readonly logger: Logger = silentLogger) {}

  supports(mappingType: string): boolean {
    return mappingType.toLowerCase() === this.type;
  }

  /**
   * Evaluate one expression. Throwing marks the field as failed.
   */
  protected abstract resolve(context: unknown, expression: string): Promise<unknown>;

  async map(context: unknown, fieldMap: FieldMap): Promise<FieldValues> {
    const result: FieldValues = {};

    for (const [field, expression] of Object.entries(fieldMap)) {
      try {
        result[field] = valueToString(await this.resolve(context, expression));
      } catch (error) {
        const failure = new FieldMappingError(field, expression, this.type, error);
        this.logger.warn(failure.message, { reason: failure.reason });
        result[field] = '';
      }
    }

    return result;
  }

  async evaluatePath(context: unknown, expression: string): Promise<unknown> {
    try {
      return (await this.resolve(context, expression)) ?? null;
    } catch (error) {
      this.logger.warn(`Failed to evaluate ${this.type} expression "${expression}"`, {
        reason: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async mapWithBasePath(context: unknown, basePath: string, fieldMap: FieldMap): Promise<FieldValues> {
    let base = await this.evaluatePath(context, basePath);
    if (Array.isArray(base) && base.length === 1) {
      base = base[0];
    }

    if (base === null || base === undefined) {
      this.logger.debug(`Base path "${basePath}" resolved to nothing`);
      return Object.fromEntries(Object.keys(fieldMap).map(field => [field, '']));
    }

    return this.map(base, fieldMap);
  }

  async locatePath(_context: unknown, _expression: string): Promise<PathSegment[] | null> {
    return null;
  }
}

/**
 * Strategies looked up by their mapping-type tag
 */
export class MappingStrategyRegistry {
  private readonly strategies = new Map<string, FieldMappingStrategy>();

  constructor(strategies: Iterable<FieldMappingStrategy> = []) {
    for (const strategy of strategies) {
      this.register(strategy);
    }
  }

  register(strategy: FieldMappingStrategy): void {
    this.strategies.set(strategy.type, strategy);
  }

  get(mappingType: string): FieldMappingStrategy {
    const strategy = this.strategies.get(mappingType.toLowerCase());
    if (!strategy) {
      throw new UnsupportedMappingTypeError(mappingType, this.types());
    }
    return strategy;
  }

  types(): string[] {
    return Array.from(this.strategies.keys());
  }
}
