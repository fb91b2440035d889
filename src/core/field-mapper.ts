// core/field-mapper.ts
// Resolves a section's field values from its mapping groups or single field map

import type {
  FieldMappingGroup,
  FieldValues,
  PageSection,
  RepeatingGroupConfig,
} from '../types/index.js';
import type { FieldMappingStrategy } from './mapping-strategy.js';
import { MappingStrategyRegistry } from './mapping-strategy.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { DirectMappingStrategy } from './direct-mapping.js';
import { JsonPathMappingStrategy } from './jsonpath-mapping.js';
import { JsonataMappingStrategy } from './jsonata-mapping.js';
import { CustomMappingStrategy } from './custom-mapping.js';

/**
 * Registry with the four built-in strategies sharing one logger
 */
export function createStrategyRegistry(logger: Logger = silentLogger): MappingStrategyRegistry {
  const direct = new DirectMappingStrategy(logger);
  const jsonpath = new JsonPathMappingStrategy(logger);
  const jsonata = new JsonataMappingStrategy(logger);
  const custom = new CustomMappingStrategy(logger, { direct, jsonpath, jsonata });
  return new MappingStrategyRegistry([direct, jsonpath, jsonata, custom]);
}

/**
 * Field name for one item of a repeating group, e.g. "child1_name" or "name_1"
 */
export function repeatingFieldName(config: RepeatingGroupConfig, field: string, index: number): string {
  const middle = config.indexPosition === 'after'
    ? `${field}${config.indexSeparator}${index}`
    : `${index}${config.indexSeparator}${field}`;
  return `${config.prefix}${middle}${config.suffix}`;
}

export class FieldMapper {
  constructor(
    private readonly strategies: MappingStrategyRegistry,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Groups in declaration order, later groups overwriting earlier keys;
   * otherwise the section's own mapping type and field map.
   */
  async resolveFields(section: PageSection, data: unknown): Promise<FieldValues> {
    if (section.fieldMappingGroups.length === 0) {
      return this.strategies.get(section.mappingType).map(data, section.fieldMappings);
    }

    const values: FieldValues = {};
    for (const group of section.fieldMappingGroups) {
      Object.assign(values, await this.mapGroup(group, data));
    }
    this.logger.debug('Resolved section fields', { sectionId: section.sectionId, fields: Object.keys(values).length });
    return values;
  }

  async mapGroup(group: FieldMappingGroup, data: unknown): Promise<FieldValues> {
    const strategy = this.strategies.get(group.mappingType);

    if (group.repeatingGroup) {
      return this.mapRepeatingGroup(group, group.repeatingGroup, strategy, data);
    }
    if (group.basePath) {
      return strategy.mapWithBasePath(data, group.basePath, group.fields);
    }
    return strategy.map(data, group.fields);
  }

  private async mapRepeatingGroup(
    group: FieldMappingGroup,
    config: RepeatingGroupConfig,
    strategy: FieldMappingStrategy,
    data: unknown
  ): Promise<FieldValues> {
    const values: FieldValues = {};

    if (!group.basePath) {
      this.logger.warn('Repeating group declared without basePath');
      return values;
    }

    const collection = await strategy.evaluatePath(data, group.basePath);
    if (!Array.isArray(collection)) {
      this.logger.warn(`Repeating group basePath "${group.basePath}" did not resolve to a list`);
      return values;
    }

    const count = Math.min(collection.length, config.maxItems ?? collection.length);
    for (let i = 0; i < count; i++) {
      const itemValues = await strategy.map(collection[i], config.fields);
      for (const [field, value] of Object.entries(itemValues)) {
        values[repeatingFieldName(config, field, config.startIndex + i)] = value;
      }
    }

    return values;
  }
}
