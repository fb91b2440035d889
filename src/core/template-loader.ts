// core/template-loader.ts
// Resolves template ids to merged, frozen templates with a process-wide cache

import * as fs from 'fs/promises';
import * as path from 'path';
import type { DocumentTemplate, TemplateDefinition } from '../types/index.js';
import { ComposerError, CyclicInheritanceError, TemplateNotFoundError } from '../types/index.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { hasPlaceholders, resolvePlaceholders } from './placeholders.js';
import { detectTemplateFormat, parseTemplate } from './template.js';
import { appendFragment, buildTemplate, mergeTemplates } from './template-merge.js';
import { DEFAULT_MAX_INHERITANCE_DEPTH } from './config.js';

export interface TemplateLoaderOptions {
  templatesDir: string;
  /** Section artifacts (PDF forms, view templates); defaults to templatesDir */
  resourcesDir?: string;
  maxInheritanceDepth?: number;
  logger?: Logger;
}

interface Resolution {
  template: DocumentTemplate;
  /** true when a base or fragment id in the chain came from a placeholder */
  dynamic: boolean;
}

const TEMPLATE_EXTENSIONS = ['', '.yaml', '.yml', '.json'];

/**
 * Resolve `relative` inside `root`, refusing paths that escape it
 */
export function resolveInside(root: string, relative: string): string | null {
  const resolved = path.resolve(root, relative);
  const rel = path.relative(root, resolved);
  if (rel === '' || rel.startsWith('..') || path.isAbsolute(rel)) {
    return null;
  }
  return resolved;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');
}

export class TemplateLoader {
  readonly templatesDir: string;
  readonly resourcesDir: string;
  readonly maxInheritanceDepth: number;
  private readonly logger: Logger;

  private readonly resolved = new Map<string, DocumentTemplate>();
  private readonly definitions = new Map<string, Promise<TemplateDefinition>>();
  private readonly resources = new Map<string, Promise<Uint8Array>>();
  private generation = 0;
  private parses = 0;

  constructor(options: TemplateLoaderOptions) {
    this.templatesDir = path.resolve(options.templatesDir);
    this.resourcesDir = path.resolve(options.resourcesDir ?? options.templatesDir);
    this.maxInheritanceDepth = options.maxInheritanceDepth ?? DEFAULT_MAX_INHERITANCE_DEPTH;
    this.logger = options.logger ?? silentLogger;
  }

  /** Number of artifacts parsed since construction */
  get parseCount(): number {
    return this.parses;
  }

  /**
   * Load a template by id. `${path}` placeholders in the id (and in base or
   * fragment ids) are resolved from `variables`.
   */
  async load(templateId: string, variables: unknown = {}): Promise<DocumentTemplate> {
    const id = resolvePlaceholders(templateId, variables);
    const { template } = await this.resolve(id, variables, []);
    return template;
  }

  /**
   * Drop every cached template, definition and resource
   */
  clearCache(): void {
    this.generation += 1;
    this.resolved.clear();
    this.definitions.clear();
    this.resources.clear();
    this.logger.info('Template cache cleared');
  }

  /**
   * Read a section artifact relative to the resources directory (cached)
   */
  getResourceBytes(resourcePath: string): Promise<Uint8Array> {
    const cached = this.resources.get(resourcePath);
    if (cached) return cached;

    const pending: Promise<Uint8Array> = this.readResource(resourcePath).catch((error: unknown) => {
      if (this.resources.get(resourcePath) === pending) {
        this.resources.delete(resourcePath);
      }
      throw error;
    });
    this.resources.set(resourcePath, pending);
    return pending;
  }

  private async readResource(resourcePath: string): Promise<Uint8Array> {
    const fullPath = resolveInside(this.resourcesDir, resourcePath);
    if (!fullPath) {
      throw new ComposerError(
        `Resource path escapes resources directory: ${resourcePath}`,
        resourcePath,
        'PATH_TRAVERSAL'
      );
    }

    try {
      const bytes = await fs.readFile(fullPath);
      this.logger.debug('Loaded resource', { path: resourcePath, bytes: bytes.length });
      return new Uint8Array(bytes);
    } catch (error) {
      throw new ComposerError(
        `Resource not found: ${resourcePath}`,
        fullPath,
        error instanceof Error ? error.message : String(error)
      );
    }
  }

  private async resolve(id: string, variables: unknown, chain: readonly string[]): Promise<Resolution> {
    if (chain.includes(id)) {
      throw new CyclicInheritanceError([...chain, id]);
    }
    if (chain.length >= this.maxInheritanceDepth) {
      throw new CyclicInheritanceError([...chain, id], `MAX_DEPTH_EXCEEDED (${this.maxInheritanceDepth})`);
    }

    const cached = this.resolved.get(id);
    if (cached) {
      this.logger.debug('Template cache hit', { templateId: id });
      return { template: cached, dynamic: false };
    }

    const generation = this.generation;
    const nextChain = [...chain, id];
    const definition = await this.getDefinition(id);
    let dynamic = false;

    let template: DocumentTemplate;
    if (definition.baseTemplateId) {
      dynamic ||= hasPlaceholders(definition.baseTemplateId);
      const baseId = resolvePlaceholders(definition.baseTemplateId, variables);
      const base = await this.resolve(baseId, variables, nextChain);
      dynamic ||= base.dynamic;
      template = mergeTemplates(base.template, definition, id);
    } else {
      template = buildTemplate(definition, id);
    }

    for (const rawFragmentId of definition.includedFragments ?? []) {
      dynamic ||= hasPlaceholders(rawFragmentId);
      const fragmentId = resolvePlaceholders(rawFragmentId, variables);
      const fragment = await this.resolve(fragmentId, variables, nextChain);
      dynamic ||= fragment.dynamic;
      template = appendFragment(template, fragment.template, id);
    }

    if (dynamic || generation !== this.generation) {
      return { template, dynamic };
    }

    // Concurrent builders of the same id: the first one to settle wins
    const winner = this.resolved.get(id);
    if (winner) {
      return { template: winner, dynamic: false };
    }
    this.resolved.set(id, template);
    this.logger.info('Template resolved', { templateId: id, sections: template.sections.length });
    return { template, dynamic: false };
  }

  /**
   * Parse an artifact once; concurrent misses share the in-flight read
   */
  private getDefinition(id: string): Promise<TemplateDefinition> {
    const pending = this.definitions.get(id);
    if (pending) return pending;

    const promise: Promise<TemplateDefinition> = this.readDefinition(id).catch((error: unknown) => {
      if (this.definitions.get(id) === promise) {
        this.definitions.delete(id);
      }
      throw error;
    });
    this.definitions.set(id, promise);
    return promise;
  }

  private async readDefinition(id: string): Promise<TemplateDefinition> {
    const candidates = this.buildCandidatePaths(id);
    if (candidates.length === 0) {
      throw new TemplateNotFoundError(id, id, 'Template id escapes templates directory');
    }

    for (const candidate of candidates) {
      let content: string;
      try {
        const stats = await fs.stat(candidate);
        if (!stats.isFile()) continue;
        content = await fs.readFile(candidate, 'utf-8');
      } catch (error) {
        if (isMissing(error)) continue;
        throw new TemplateNotFoundError(id, candidate, error instanceof Error ? error.message : String(error));
      }

      this.logger.debug('Parsing template artifact', { templateId: id, path: candidate });
      this.parses += 1;
      return parseTemplate(content, detectTemplateFormat(candidate), candidate);
    }

    throw new TemplateNotFoundError(
      id,
      this.templatesDir,
      `Tried: ${candidates.map(c => path.relative(this.templatesDir, c)).join(', ')}`
    );
  }

  private buildCandidatePaths(id: string): string[] {
    const candidates: string[] = [];
    for (const extension of TEMPLATE_EXTENSIONS) {
      const candidate = resolveInside(this.templatesDir, `${id}${extension}`);
      if (candidate) candidates.push(candidate);
    }
    return candidates;
  }
}
