// core/custom-mapping.ts
// "fn:arg1,arg2" transforms over values extracted by the other strategies

import type { PathSegment } from '../types/index.js';
import type { FieldMappingStrategy } from './mapping-strategy.js';
import { BaseMappingStrategy } from './mapping-strategy.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { DirectMappingStrategy } from './direct-mapping.js';
import { JsonPathMappingStrategy } from './jsonpath-mapping.js';
import { JsonataMappingStrategy } from './jsonata-mapping.js';
import { getTransform } from './formatter.js';

const STRATEGY_PREFIXES = ['direct', 'jsonpath', 'jsonata'] as const;
type ExtractionType = (typeof STRATEGY_PREFIXES)[number];

// MM/dd/yyyy, yyyy-MM-dd, "MMMM d yyyy"
const DATE_PATTERN_CHARS = /^[yYMdDHhmsEaZ\s/\-:]+$/;
const DATE_PATTERN_TOKEN = /([yYMdDHhms])\1/;

export interface CustomMappingDelegates {
  direct: FieldMappingStrategy;
  jsonpath: FieldMappingStrategy;
  jsonata: FieldMappingStrategy;
}

function splitPrefix(arg: string): [ExtractionType, string] | null {
  for (const prefix of STRATEGY_PREFIXES) {
    if (arg.startsWith(`${prefix}:`)) {
      return [prefix, arg.slice(prefix.length + 1)];
    }
  }
  return null;
}

/**
 * A quoted, numeric or date-pattern argument is used as written
 */
export function literalArgument(arg: string): string | null {
  if (arg.startsWith('\'') || arg.startsWith('"')) {
    return arg.replace(/^['"]|['"]$/g, '');
  }
  if (/^\d+$/.test(arg)) {
    return arg;
  }
  if (!arg.includes('.') && !arg.includes('[') && !splitPrefix(arg)) {
    if (arg.includes('/') || arg.includes('-') || (DATE_PATTERN_CHARS.test(arg) && DATE_PATTERN_TOKEN.test(arg))) {
      return arg;
    }
  }
  return null;
}

export class CustomMappingStrategy extends BaseMappingStrategy {
  readonly type = 'custom' as const;

  private readonly delegates: CustomMappingDelegates;

  constructor(logger: Logger = silentLogger, delegates?: CustomMappingDelegates) {
    super(logger);
    this.delegates = delegates ?? {
      direct: new DirectMappingStrategy(logger),
      jsonpath: new JsonPathMappingStrategy(logger),
      jsonata: new JsonataMappingStrategy(logger),
    };
  }

  protected async resolve(context: unknown, expression: string): Promise<unknown> {
    const trimmed = expression.trim();

    // Plain extraction, no transform
    if (!trimmed.includes(':')) {
      return this.extract(trimmed.includes('[') ? 'jsonpath' : 'direct', context, trimmed);
    }

    const prefixed = splitPrefix(trimmed);
    if (prefixed) {
      return this.extract(prefixed[0], context, prefixed[1]);
    }

    const colon = trimmed.indexOf(':');
    const name = trimmed.slice(0, colon).trim();
    const argsText = trimmed.slice(colon + 1);

    const transform = getTransform(name);
    if (!transform) {
      throw new Error(`Unknown custom transformation: ${name}`);
    }

    const args: string[] = [];
    for (const raw of argsText ? argsText.split(',') : []) {
      args.push(await this.resolveArgument(context, raw.trim()));
    }

    return transform(args);
  }

  private async resolveArgument(context: unknown, arg: string): Promise<string> {
    const literal = literalArgument(arg);
    if (literal !== null) return literal;

    const prefixed = splitPrefix(arg);
    if (prefixed) {
      return this.extract(prefixed[0], context, prefixed[1]);
    }
    return this.extract(arg.includes('[') ? 'jsonpath' : 'direct', context, arg);
  }

  private async extract(type: ExtractionType, context: unknown, expression: string): Promise<string> {
    const { value } = await this.delegates[type].map(context, { value: expression });
    return value ?? '';
  }

  evaluatePath(context: unknown, expression: string): Promise<unknown> {
    return this.delegates.jsonpath.evaluatePath(context, expression);
  }

  locatePath(context: unknown, expression: string): Promise<PathSegment[] | null> {
    return this.delegates.jsonpath.locatePath(context, expression);
  }
}
