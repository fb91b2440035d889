// core/template.ts
// Template artifact (YAML/JSON) parsing and validation with AJV

import { parse as parseYaml } from 'yaml';
import type { DocumentTemplate, TemplateDefinition } from '../types/index.js';
import { TemplateParseError } from '../types/index.js';
import { formatValidationErrors, getTemplateValidator } from './schema-registry.js';

export type TemplateFormat = 'yaml' | 'json';

const validateTemplate = getTemplateValidator();

/**
 * Pick the parser for an artifact from its file name
 */
export function detectTemplateFormat(fileName: string): TemplateFormat {
  const lower = fileName.toLowerCase();
  if (lower.endsWith('.json')) return 'json';
  if (lower.endsWith('.yaml') || lower.endsWith('.yml')) return 'yaml';
  throw new TemplateParseError(
    `Unsupported template file extension: ${fileName}`,
    fileName,
    'Expected .yaml, .yml or .json'
  );
}

/**
 * Parse and validate a template artifact
 */
export function parseTemplate(
  content: string | Buffer,
  format: TemplateFormat,
  source: string
): TemplateDefinition {
  let json: unknown;

  try {
    json = format === 'json' ? JSON.parse(content.toString()) : parseYaml(content.toString());
  } catch (error) {
    throw new TemplateParseError(
      `Invalid ${format.toUpperCase()} in template`,
      source,
      error instanceof Error ? error.message : 'Parse error'
    );
  }

  if (!validateTemplate(json)) {
    throw new TemplateParseError(
      'Template validation failed',
      source,
      formatValidationErrors(validateTemplate.errors)
    );
  }

  assertUniqueSectionIds(json.sections?.map(s => s.sectionId) ?? [], source);
  return json;
}

/**
 * Fail on the first section id that appears twice
 */
export function assertUniqueSectionIds(ids: readonly string[], source: string): void {
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      throw new TemplateParseError(
        `Duplicate section id: ${id}`,
        source,
        'Section ids must be unique within a template'
      );
    }
    seen.add(id);
  }
}

/**
 * Get all artifact paths referenced by a resolved template
 * (section templates and addendum templates)
 */
export function getReferencedResources(template: DocumentTemplate): Set<string> {
  const resources = new Set<string>();

  for (const section of template.sections) {
    resources.add(section.templatePath);
    for (const overflow of section.overflowConfigs) {
      resources.add(overflow.addendumTemplatePath);
    }
  }

  return resources;
}

