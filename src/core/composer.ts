// core/composer.ts
// Orchestrator that turns a template id plus request data into one PDF

import type {
  ComposeResult,
  ComposeState,
  DataTree,
  DocumentTemplate,
  OverflowConfig,
  PageSection,
  PathSegment,
  SectionTrace,
} from '../types/index.js';
import { ComposerError, SectionRenderError } from '../types/index.js';
import type { ComposerConfig } from './config.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { MappingStrategyRegistry } from './mapping-strategy.js';
import { FieldMapper, createStrategyRegistry } from './field-mapper.js';
import { TemplateLoader } from './template-loader.js';
import { RenderContext } from './render-context.js';
import { hasPlaceholders, resolvePlaceholders } from './placeholders.js';
import { overflowIndicatorKey, planOverflow } from './paginator.js';
import { withValueAt } from './data-path.js';
import type { ViewModelRegistry } from './view-model.js';
import { createViewModelRegistry } from './view-model.js';
import { FormFillRenderer, SectionRendererRegistry, TemplatedViewRenderer } from './section-renderer.js';
import { HeaderFooterCompositor, createHeaderFooterRegistry } from './header-footer.js';

export interface DocumentComposerOptions {
  loader: TemplateLoader;
  logger?: Logger;
  strategies?: MappingStrategyRegistry;
  viewModels?: ViewModelRegistry;
  headerFooter?: HeaderFooterCompositor;
}

interface PendingAddendum {
  config: OverflowConfig;
  segments: readonly PathSegment[];
  batches: unknown[][];
}

/**
 * false, null, undefined, "", "false" (any case) and [] skip a section
 */
export function isConditionMet(value: unknown): boolean {
  if (value === null || value === undefined || value === false) return false;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed !== '' && trimmed.toLowerCase() !== 'false';
  }
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

/**
 * Request-local copy of a section with placeholders in templatePath and condition resolved
 */
export function interpolateSection(section: PageSection, data: Readonly<DataTree>): PageSection {
  const templatePath = hasPlaceholders(section.templatePath)
    ? resolvePlaceholders(section.templatePath, data)
    : section.templatePath;
  const condition =
    section.condition !== undefined && hasPlaceholders(section.condition)
      ? resolvePlaceholders(section.condition, data)
      : section.condition;

  if (templatePath === section.templatePath && condition === section.condition) {
    return section;
  }
  return { ...section, templatePath, condition };
}

/**
 * `.pdf` addenda are form-fill pages; anything else is a templated view
 */
export function addendumSection(section: PageSection, config: OverflowConfig, pageNumber: number): PageSection {
  return {
    ...section,
    sectionId: `${section.sectionId}_addendum_${pageNumber}`,
    type: config.addendumTemplatePath.toLowerCase().endsWith('.pdf') ? 'form-fill' : 'templated-view',
    templatePath: config.addendumTemplatePath,
    viewModelType: undefined,
    condition: undefined,
    overflowConfigs: [],
  };
}

export class DocumentComposer {
  readonly loader: TemplateLoader;
  private readonly logger: Logger;
  private readonly strategies: MappingStrategyRegistry;
  private readonly renderers: SectionRendererRegistry;
  private readonly headerFooter: HeaderFooterCompositor;

  constructor(options: DocumentComposerOptions) {
    this.loader = options.loader;
    this.logger = options.logger ?? silentLogger;
    this.strategies = options.strategies ?? createStrategyRegistry(this.logger.child('mapping'));

    const fieldMapper = new FieldMapper(this.strategies, this.logger.child('fields'));
    const viewModels = options.viewModels ?? createViewModelRegistry(this.logger.child('view-model'));
    this.renderers = new SectionRendererRegistry([
      new FormFillRenderer(fieldMapper, this.logger.child('form-fill')),
      new TemplatedViewRenderer(viewModels, this.logger.child('templated-view')),
    ]);
    this.headerFooter =
      options.headerFooter ?? new HeaderFooterCompositor(createHeaderFooterRegistry(), this.logger.child('header-footer'));
  }

  static fromConfig(config: ComposerConfig, logger: Logger = silentLogger): DocumentComposer {
    const loader = new TemplateLoader({
      templatesDir: config.templatesDir,
      resourcesDir: config.resourcesDir,
      maxInheritanceDepth: config.maxInheritanceDepth,
      logger: logger.child('loader'),
    });
    return new DocumentComposer({ loader, logger });
  }

  /**
   * Render the template against `data` and return the PDF bytes
   */
  async generate(templateId: string, data: Readonly<DataTree> = {}): Promise<Uint8Array> {
    const result = await this.compose(templateId, data);
    return result.bytes;
  }

  /**
   * Same as generate, also reporting the state trace and per-section page counts
   */
  async compose(templateId: string, data: Readonly<DataTree> = {}): Promise<ComposeResult> {
    const trace: ComposeState[] = ['init'];

    try {
      const template = await this.loader.load(templateId, data);
      trace.push('template-resolved');

      const context = await RenderContext.create(template, data, this.loader);
      const sections: SectionTrace[] = [];

      for (const declared of template.sections) {
        context.currentSectionId = declared.sectionId;
        try {
          sections.push(await this.renderSection(template, declared, context, trace));
        } catch (error) {
          if (error instanceof SectionRenderError) throw error;
          // currentSectionId names the addendum when one of its pages failed
          throw new SectionRenderError(template.templateId, context.currentSectionId ?? declared.sectionId, error);
        }
      }
      context.currentSectionId = null;

      if (template.headerFooterConfig) {
        await this.headerFooter.apply(context.document, template.headerFooterConfig, data, await context.getFont());
      }
      trace.push('headers-footers-applied');

      const bytes = await context.document.save();
      trace.push('completed');

      const pageCount = context.document.getPageCount();
      this.logger.info('Document composed', { templateId: template.templateId, pages: pageCount });
      return { templateId: template.templateId, bytes, pageCount, sections, trace };
    } catch (error) {
      trace.push('failed');
      this.logger.error('Document composition failed', {
        templateId,
        reason: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof ComposerError) throw error;
      throw new ComposerError(
        `Failed to compose template "${templateId}"`,
        templateId,
        error instanceof Error ? error.message : String(error)
      );
    }
  }

  private async renderSection(
    template: DocumentTemplate,
    declared: PageSection,
    context: RenderContext,
    trace: ComposeState[]
  ): Promise<SectionTrace> {
    const data = context.data;
    const section = interpolateSection(declared, data);

    if (section.condition !== undefined) {
      const result = await this.strategies.get(section.mappingType).evaluatePath(data, section.condition);
      if (!isConditionMet(result)) {
        this.logger.debug('Section skipped by condition', { sectionId: section.sectionId, condition: section.condition });
        return { sectionId: section.sectionId, status: 'skipped', pages: 0, addendumPages: 0 };
      }
    }

    let mainData: DataTree = data;
    const addenda: PendingAddendum[] = [];

    for (const config of section.overflowConfigs) {
      const strategy = this.strategies.get(config.mappingType);
      const items = await strategy.evaluatePath(data, config.arrayPath);
      if (!Array.isArray(items)) {
        this.logger.debug('Overflow path is not a list', { sectionId: section.sectionId, arrayPath: config.arrayPath });
        continue;
      }

      const plan = planOverflow(items, config);
      if (plan.addendumBatches.length === 0) continue;

      const segments = await strategy.locatePath(data, config.arrayPath);
      if (!segments) {
        this.logger.warn(`Cannot locate overflow path "${config.arrayPath}", rendering without overflow`, {
          sectionId: section.sectionId,
        });
        continue;
      }

      mainData = withValueAt(mainData, segments, plan.mainPageItems);
      if (config.overflowIndicatorField) {
        context.metadata.set(overflowIndicatorKey(section.sectionId, config.overflowIndicatorField), 'true');
      }
      addenda.push({ config, segments, batches: plan.addendumBatches });
    }

    const pages = await this.renderers.get(section.type).render(section, mainData, context);
    context.advancePages(pages);
    trace.push('section-rendered');
    this.logger.debug('Section rendered', { sectionId: section.sectionId, pages, page: context.currentPage });

    let addendumPages = 0;
    for (const { config, segments, batches } of addenda) {
      for (let i = 0; i < batches.length; i++) {
        const batch = batches[i];
        const addendum = addendumSection(section, config, i + 1);
        context.currentSectionId = addendum.sectionId;
        const addendumData: DataTree = {
          ...withValueAt(data, segments, batch),
          overflowItems: batch,
          isAddendum: true,
          addendumPageNumber: i + 1,
          totalAddendumPages: batches.length,
        };
        const count = await this.renderers.get(addendum.type).render(addendum, addendumData, context);
        context.advancePages(count);
        addendumPages += count;
      }
    }

    if (addenda.length > 0) {
      trace.push('overflow-expanded');
      this.logger.info('Overflow expanded', {
        templateId: template.templateId,
        sectionId: section.sectionId,
        addendumPages,
      });
    }

    return { sectionId: section.sectionId, status: 'rendered', pages, addendumPages };
  }
}
