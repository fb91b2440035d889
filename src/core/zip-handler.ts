// core/zip-handler.ts
// Handle zip bundles containing a job manifest, a data file and CSV tables

import * as fs from 'fs/promises';
import JSZip from 'jszip';
import type { DataTree, JobManifest } from '../types/index.js';
import { JobBundleError } from '../types/index.js';
import { JOB_MANIFEST_FILE, getTableSpecs, parseJobManifest } from './manifest.js';
import { mergeTables, parseCsvTable, parseJsonData } from './datasource.js';

export interface JobPackage {
  manifest: JobManifest;
  data: DataTree;
}

export async function loadJobFromZip(zipPath: string): Promise<JobPackage> {
  let zipContent: Buffer;
  try {
    zipContent = await fs.readFile(zipPath);
  } catch (error) {
    throw new JobBundleError(
      `Cannot read job bundle: ${zipPath}`,
      zipPath,
      error instanceof Error ? error.message : String(error)
    );
  }
  return loadJobFromBuffer(zipContent);
}

export async function loadJobFromBuffer(buffer: Buffer | Uint8Array): Promise<JobPackage> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buffer);
  } catch (error) {
    throw new JobBundleError('Invalid zip archive', 'zip', error instanceof Error ? error.message : String(error));
  }

  const manifestFile = zip.file(JOB_MANIFEST_FILE);
  if (!manifestFile) {
    throw new JobBundleError(
      `${JOB_MANIFEST_FILE} not found in zip`,
      'zip',
      `Job zip must contain ${JOB_MANIFEST_FILE}`
    );
  }

  const manifest = parseJobManifest(await manifestFile.async('text'));

  let data: DataTree = {};
  if (manifest.data) {
    const dataFile = zip.file(manifest.data);
    if (!dataFile) {
      throw new JobBundleError(
        `Data file not found: ${manifest.data}`,
        'zip',
        `Data file "${manifest.data}" not found in zip`
      );
    }
    data = parseJsonData(await dataFile.async('text'), manifest.data);
  }

  const tables = new Map<string, Record<string, string>[]>();
  for (const [name, spec] of getTableSpecs(manifest)) {
    const file = zip.file(spec.path);
    if (!file) {
      throw new JobBundleError(
        `Input file not found: ${spec.path}`,
        'zip',
        `Table "${name}" at path "${spec.path}" not found in zip`
      );
    }

    const content = await file.async('nodebuffer');
    tables.set(name, parseCsvTable(content, spec.path, spec.options));
  }

  return { manifest, data: mergeTables(data, tables) };
}
