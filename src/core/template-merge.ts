// core/template-merge.ts
// Pure construction and inheritance merge of document templates

import type {
  DocumentTemplate,
  FieldMappingGroup,
  FieldMappingGroupDefinition,
  FooterTemplate,
  HeaderFooterConfig,
  HeaderFooterConfigDefinition,
  HeaderTemplate,
  MappingType,
  OverflowConfig,
  OverflowConfigDefinition,
  PageSection,
  RepeatingGroupConfig,
  RepeatingGroupDefinition,
  SectionDefinition,
  TemplateDefinition,
} from '../types/index.js';
import { TemplateParseError } from '../types/index.js';
import { assertUniqueSectionIds } from './template.js';

export const DEFAULT_MAPPING_TYPE: MappingType = 'jsonpath';
export const DEFAULT_ALIGNMENT = 'CENTER';
export const DEFAULT_MARGIN = 50;
export const DEFAULT_HEADER_FOOTER_FONT_SIZE = 10;
export const DEFAULT_PAGE_NUMBER_FORMAT = 'Page {page} of {total}';

// ============================================
// Value Object Construction
// ============================================

function buildRepeatingGroup(def: RepeatingGroupDefinition): RepeatingGroupConfig {
  return {
    prefix: def.prefix ?? '',
    suffix: def.suffix ?? '',
    startIndex: def.startIndex ?? 1,
    indexSeparator: def.indexSeparator ?? '',
    indexPosition: def.indexPosition ?? 'before',
    maxItems: def.maxItems,
    fields: { ...def.fields },
  };
}

function buildGroup(def: FieldMappingGroupDefinition): FieldMappingGroup {
  return {
    mappingType: def.mappingType ?? DEFAULT_MAPPING_TYPE,
    fields: { ...(def.fields ?? {}) },
    basePath: def.basePath,
    repeatingGroup: def.repeatingGroup ? buildRepeatingGroup(def.repeatingGroup) : undefined,
  };
}

function buildOverflow(def: OverflowConfigDefinition): OverflowConfig {
  return {
    arrayPath: def.arrayPath,
    mappingType: def.mappingType ?? DEFAULT_MAPPING_TYPE,
    maxItemsInMain: def.maxItemsInMain,
    itemsPerOverflowPage: def.itemsPerOverflowPage,
    addendumTemplatePath: def.addendumTemplatePath,
    overflowIndicatorField: def.overflowIndicatorField,
  };
}

/**
 * Build a section that has no parent counterpart.
 * type and templatePath are required here.
 */
export function buildSection(def: SectionDefinition, source: string): PageSection {
  if (!def.type || !def.templatePath) {
    throw new TemplateParseError(
      `Section "${def.sectionId}" must declare type and templatePath`,
      source,
      `Missing: ${[!def.type && 'type', !def.templatePath && 'templatePath'].filter(Boolean).join(', ')}`
    );
  }

  return {
    sectionId: def.sectionId,
    type: def.type,
    templatePath: def.templatePath,
    mappingType: def.mappingType ?? DEFAULT_MAPPING_TYPE,
    fieldMappings: { ...(def.fieldMappings ?? {}) },
    fieldMappingGroups: (def.fieldMappingGroups ?? []).map(buildGroup),
    viewModelType: def.viewModelType,
    condition: def.condition,
    overflowConfigs: (def.overflowConfigs ?? []).map(buildOverflow),
    order: def.order ?? 0,
  };
}

export function buildHeaderFooterConfig(def: HeaderFooterConfigDefinition): HeaderFooterConfig {
  const headers: HeaderTemplate[] = (def.headers ?? []).map(h => ({
    renderType: h.renderType,
    content: h.content,
    alignment: h.alignment ?? DEFAULT_ALIGNMENT,
    marginTop: h.marginTop ?? DEFAULT_MARGIN,
    fontSize: h.fontSize ?? DEFAULT_HEADER_FOOTER_FONT_SIZE,
    data: { ...(h.data ?? {}) },
  }));

  const footers: FooterTemplate[] = (def.footers ?? []).map(f => ({
    renderType: f.renderType,
    content: f.content,
    alignment: f.alignment ?? DEFAULT_ALIGNMENT,
    marginBottom: f.marginBottom ?? DEFAULT_MARGIN,
    fontSize: f.fontSize ?? DEFAULT_HEADER_FOOTER_FONT_SIZE,
    includePageNumbers: f.includePageNumbers ?? true,
    pageNumberFormat: f.pageNumberFormat ?? DEFAULT_PAGE_NUMBER_FORMAT,
    data: { ...(f.data ?? {}) },
  }));

  return { headers, footers, excludePages: [...(def.excludePages ?? [])] };
}

/**
 * Build a template with no parent
 */
export function buildTemplate(def: TemplateDefinition, source: string = def.templateId): DocumentTemplate {
  const sections = (def.sections ?? []).map(s => buildSection(s, source));
  return finalize({
    templateId: def.templateId,
    description: def.description,
    baseTemplateId: def.baseTemplateId,
    sections,
    headerFooterConfig: def.headerFooterConfig ? buildHeaderFooterConfig(def.headerFooterConfig) : undefined,
    metadata: { ...(def.metadata ?? {}) },
  }, source);
}

// ============================================
// Merge
// ============================================

/**
 * Overlay a child section on its parent counterpart.
 * Scalars present on the child win, field maps merge key-wise,
 * non-empty child groups and overflow configs replace the parent's.
 */
export function mergeSection(parent: PageSection, child: SectionDefinition): PageSection {
  return {
    sectionId: parent.sectionId,
    type: child.type ?? parent.type,
    templatePath: child.templatePath ?? parent.templatePath,
    mappingType: child.mappingType ?? parent.mappingType,
    fieldMappings: { ...parent.fieldMappings, ...(child.fieldMappings ?? {}) },
    fieldMappingGroups: child.fieldMappingGroups?.length
      ? child.fieldMappingGroups.map(buildGroup)
      : parent.fieldMappingGroups,
    viewModelType: child.viewModelType ?? parent.viewModelType,
    condition: child.condition ?? parent.condition,
    overflowConfigs: child.overflowConfigs?.length
      ? child.overflowConfigs.map(buildOverflow)
      : parent.overflowConfigs,
    order: child.order ?? parent.order,
  };
}

/**
 * Merge a child definition over a resolved parent. Pure: the parent is not touched.
 */
export function mergeTemplates(
  parent: DocumentTemplate,
  child: TemplateDefinition,
  source: string = child.templateId
): DocumentTemplate {
  const excluded = new Set(child.excludedSections ?? []);
  const overrides = child.sectionOverrides ?? {};
  const childSections = new Map((child.sections ?? []).map(s => [s.sectionId, s] as const));

  const sections: PageSection[] = [];

  for (const parentSection of parent.sections) {
    const id = parentSection.sectionId;
    if (excluded.has(id)) continue;

    const childSection = childSections.get(id);
    if (childSection) {
      sections.push(mergeSection(parentSection, childSection));
      childSections.delete(id);
    } else if (Object.prototype.hasOwnProperty.call(overrides, id)) {
      sections.push({ ...parentSection, templatePath: overrides[id] });
    } else {
      sections.push(parentSection);
    }
  }

  for (const def of childSections.values()) {
    if (excluded.has(def.sectionId)) continue;
    sections.push(buildSection(def, source));
  }

  return finalize({
    templateId: child.templateId,
    description: child.description ?? parent.description,
    baseTemplateId: child.baseTemplateId,
    sections,
    headerFooterConfig: child.headerFooterConfig
      ? buildHeaderFooterConfig(child.headerFooterConfig)
      : parent.headerFooterConfig,
    metadata: { ...parent.metadata, ...(child.metadata ?? {}) },
  }, source);
}

/**
 * Append a fragment's sections after the template's own
 */
export function appendFragment(
  template: DocumentTemplate,
  fragment: DocumentTemplate,
  source: string = template.templateId
): DocumentTemplate {
  return finalize({
    ...template,
    sections: [...template.sections, ...fragment.sections],
  }, source);
}

function finalize(template: DocumentTemplate, source: string): DocumentTemplate {
  assertUniqueSectionIds(template.sections.map(s => s.sectionId), source);
  // Array.prototype.sort is stable: ties keep insertion order
  const sections = [...template.sections].sort((a, b) => a.order - b.order);
  return deepFreeze({ ...template, sections });
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
