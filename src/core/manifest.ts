// core/manifest.ts
// Job manifest (job.json) validation with AJV

import type { JobManifest, TableInputSpec } from '../types/index.js';
import { JobBundleError } from '../types/index.js';
import { formatValidationErrors, getJobValidator } from './schema-registry.js';

export const JOB_MANIFEST_FILE = 'job.json';
export const SUPPORTED_JOB_SCHEMA = 'pdf-composer-job/v1';

const validateManifest = getJobValidator();

/**
 * Parse and validate job.json
 */
export function parseJobManifest(content: string | Buffer): JobManifest {
  let json: unknown;

  try {
    json = JSON.parse(content.toString());
  } catch (error) {
    throw new JobBundleError(
      `Invalid JSON in ${JOB_MANIFEST_FILE}`,
      JOB_MANIFEST_FILE,
      error instanceof Error ? error.message : 'Parse error'
    );
  }

  if (!validateManifest(json)) {
    throw new JobBundleError(
      'Job manifest validation failed',
      JOB_MANIFEST_FILE,
      formatValidationErrors(validateManifest.errors)
    );
  }

  return json;
}

/**
 * Table inputs as name -> spec
 */
export function getTableSpecs(manifest: JobManifest): Map<string, TableInputSpec> {
  return new Map(Object.entries(manifest.tables ?? {}));
}
