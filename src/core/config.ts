// core/config.ts
// Composer configuration: explicit overrides, then environment, then defaults

import * as path from 'path';
import { ComposerError } from '../types/index.js';
import type { LogLevel } from './logger.js';
import { isLogLevel, LOG_LEVELS } from './logger.js';

export interface ComposerConfig {
  templatesDir: string;
  resourcesDir: string;
  maxInheritanceDepth: number;
  preloadTemplateIds: string[];
  logLevel: LogLevel;
}

export interface ConfigOverrides {
  templatesDir?: string;
  resourcesDir?: string;
  maxInheritanceDepth?: number | string;
  preloadTemplateIds?: string[];
  logLevel?: string;
}

export const DEFAULT_TEMPLATES_DIR = './templates';
export const DEFAULT_MAX_INHERITANCE_DEPTH = 32;

function parseDepth(raw: number | string): number {
  const value = typeof raw === 'number' ? raw : Number(raw.trim());
  if (!Number.isInteger(value) || value < 1) {
    throw new ComposerError(
      `Invalid max inheritance depth: ${raw}`,
      'PDF_COMPOSER_MAX_DEPTH',
      'Expected a positive integer'
    );
  }
  return value;
}

function parseLevel(raw: string): LogLevel {
  const value = raw.trim().toLowerCase();
  if (!isLogLevel(value)) {
    throw new ComposerError(
      `Invalid log level: ${raw}`,
      'PDF_COMPOSER_LOG_LEVEL',
      `Expected one of: ${LOG_LEVELS.join(', ')}`
    );
  }
  return value;
}

function parseIdList(raw: string): string[] {
  return raw.split(',').map(id => id.trim()).filter(id => id.length > 0);
}

/**
 * Resolve configuration. Overrides (CLI flags) take priority over
 * PDF_COMPOSER_* environment variables.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ComposerConfig {
  const templatesDir = path.resolve(
    overrides.templatesDir ?? env.PDF_COMPOSER_TEMPLATES_DIR ?? DEFAULT_TEMPLATES_DIR
  );
  const resourcesDirRaw = overrides.resourcesDir ?? env.PDF_COMPOSER_RESOURCES_DIR;
  const depthRaw = overrides.maxInheritanceDepth ?? env.PDF_COMPOSER_MAX_DEPTH;
  const levelRaw = overrides.logLevel ?? env.PDF_COMPOSER_LOG_LEVEL;

  return {
    templatesDir,
    resourcesDir: resourcesDirRaw ? path.resolve(resourcesDirRaw) : templatesDir,
    maxInheritanceDepth: depthRaw === undefined ? DEFAULT_MAX_INHERITANCE_DEPTH : parseDepth(depthRaw),
    preloadTemplateIds: overrides.preloadTemplateIds ?? parseIdList(env.PDF_COMPOSER_PRELOAD ?? ''),
    logLevel: levelRaw === undefined ? 'info' : parseLevel(levelRaw),
  };
}
