// core/section-renderer.ts
// Section renderers: AcroForm filling and Handlebars/SVG templated views

import {
  PDFCheckBox,
  PDFDocument,
  PDFDropdown,
  PDFRadioGroup,
  PDFTextField,
} from 'pdf-lib';
import type { PDFForm } from 'pdf-lib';
import type { DataTree, FieldValues, PageSection, SectionType } from '../types/index.js';
import { ComposerError } from '../types/index.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { RenderContext } from './render-context.js';
import type { FieldMapper } from './field-mapper.js';
import type { ViewModelRegistry } from './view-model.js';
import { readOverflowIndicators } from './paginator.js';
import { renderText } from './template-engine.js';
import { drawSvgPage, parseSvg } from './svg-engine.js';

export interface SectionRenderer {
  readonly type: SectionType;
  /**
   * Append the section's pages to the context's document.
   * Returns the number of pages appended.
   */
  render(section: PageSection, data: Readonly<DataTree>, context: RenderContext): Promise<number>;
}

const CHECKED_VALUES = new Set(['true', 'yes', '1', 'x', 'on']);

export function isCheckedValue(value: string): boolean {
  return CHECKED_VALUES.has(value.trim().toLowerCase());
}

/**
 * Write values into AcroForm fields; unknown or rejected fields are logged and skipped
 */
export function fillForm(form: PDFForm, values: FieldValues, logger: Logger = silentLogger): number {
  let filled = 0;

  for (const [name, value] of Object.entries(values)) {
    const field = form.getFieldMaybe(name);
    if (!field) {
      logger.warn(`Form field not found: ${name}`);
      continue;
    }

    try {
      if (field instanceof PDFTextField) {
        field.setText(value);
      } else if (field instanceof PDFCheckBox) {
        if (isCheckedValue(value)) field.check();
        else field.uncheck();
      } else if (field instanceof PDFDropdown || field instanceof PDFRadioGroup) {
        if (!field.getOptions().includes(value)) {
          if (value !== '') logger.warn(`Value "${value}" is not an option of field ${name}`);
          continue;
        }
        field.select(value);
      } else {
        logger.warn(`Unsupported form field type for ${name}: ${field.constructor.name}`);
        continue;
      }
      filled++;
    } catch (error) {
      logger.warn(`Failed to set form field ${name}`, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return filled;
}

export class FormFillRenderer implements SectionRenderer {
  readonly type = 'form-fill' as const;

  constructor(
    private readonly fieldMapper: FieldMapper,
    private readonly logger: Logger = silentLogger
  ) {}

  async render(section: PageSection, data: Readonly<DataTree>, context: RenderContext): Promise<number> {
    const bytes = await context.resources.getResourceBytes(section.templatePath);
    const source = await PDFDocument.load(bytes);

    const values = {
      ...(await this.fieldMapper.resolveFields(section, data)),
      ...readOverflowIndicators(context.metadata, section.sectionId),
    };

    const form = source.getForm();
    const filled = fillForm(form, values, this.logger);
    form.flatten();
    this.logger.debug('Filled form', { sectionId: section.sectionId, filled, mapped: Object.keys(values).length });

    const pages = await context.document.copyPages(source, source.getPageIndices());
    for (const page of pages) {
      context.document.addPage(page);
    }
    return pages.length;
  }
}

export class TemplatedViewRenderer implements SectionRenderer {
  readonly type = 'templated-view' as const;

  constructor(
    private readonly viewModels: ViewModelRegistry,
    private readonly logger: Logger = silentLogger
  ) {}

  async render(section: PageSection, data: Readonly<DataTree>, context: RenderContext): Promise<number> {
    const bytes = await context.resources.getResourceBytes(section.templatePath);
    const source = Buffer.from(bytes).toString('utf-8');

    const indicators = readOverflowIndicators(context.metadata, section.sectionId);
    const model = this.viewModels.build(section.viewModelType, { ...data, ...indicators });

    const svg = renderText(source, model, { escape: true });
    await drawSvgPage(parseSvg(svg), context);
    this.logger.debug('Rendered templated view', { sectionId: section.sectionId });
    return 1;
  }
}

/**
 * Renderers looked up by section type
 */
export class SectionRendererRegistry {
  private readonly renderers = new Map<string, SectionRenderer>();

  constructor(renderers: Iterable<SectionRenderer> = []) {
    for (const renderer of renderers) {
      this.register(renderer);
    }
  }

  register(renderer: SectionRenderer): void {
    this.renderers.set(renderer.type, renderer);
  }

  get(type: string): SectionRenderer {
    const renderer = this.renderers.get(type);
    if (!renderer) {
      throw new ComposerError(
        `No renderer for section type: ${type}`,
        'sections',
        `Available: ${Array.from(this.renderers.keys()).join(', ')}`
      );
    }
    return renderer;
  }
}
