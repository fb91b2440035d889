// core/schema-registry.ts
// Centralized AJV schema registry for validation

import { Ajv } from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import type { JobManifest, TemplateDefinition } from '../types/index.js';
import { DOCUMENT_TEMPLATE_V1_SCHEMA } from '../schemas/document-template-v1.js';
import { COMPOSER_JOB_V1_SCHEMA } from '../schemas/composer-job-v1.js';

// Create singleton AJV instance
const ajv = new Ajv({ strict: true, allErrors: true });

const templateSchema: SchemaObject = DOCUMENT_TEMPLATE_V1_SCHEMA;
const jobSchema: SchemaObject = COMPOSER_JOB_V1_SCHEMA;

// compile() also registers each schema under its $id
const templateValidator = ajv.compile<TemplateDefinition>(templateSchema);
const jobValidator = ajv.compile<JobManifest>(jobSchema);

/**
 * Get the singleton AJV instance
 */
export function getAjv(): Ajv {
  return ajv;
}

/**
 * Get compiled validator for document template schema
 */
export function getTemplateValidator(): ValidateFunction<TemplateDefinition> {
  return templateValidator;
}

/**
 * Get compiled validator for job manifest schema
 */
export function getJobValidator(): ValidateFunction<JobManifest> {
  return jobValidator;
}

/**
 * Format AJV errors as "path: message" pairs joined by "; "
 */
export function formatValidationErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? []).map(e => `${e.instancePath || 'root'}: ${e.message}`).join('; ');
}

export { DOCUMENT_TEMPLATE_V1_SCHEMA, COMPOSER_JOB_V1_SCHEMA };
