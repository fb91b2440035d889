// core/header-footer.ts
// Header/footer compositing over the final page set

import { StandardFonts, rgb } from 'pdf-lib';
import type { PDFDocument, PDFFont, PDFPage } from 'pdf-lib';
import type {
  DataTree,
  FooterTemplate,
  HeaderFooterConfig,
  HeaderTemplate,
  PageRenderContext,
} from '../types/index.js';
import { UnsupportedRenderTypeError } from '../types/index.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { encodableText } from './render-context.js';
import { renderText } from './template-engine.js';
import { DEFAULT_MARGIN } from './template-merge.js';

export type Alignment = 'LEFT' | 'CENTER' | 'RIGHT';

/**
 * Header or footer entry with its placement resolved
 */
export interface DecorationItem {
  placement: 'header' | 'footer';
  renderType: string;
  content: string;
  alignment: string;
  /** Distance from the top edge (header) or bottom edge (footer) */
  margin: number;
  fontSize: number;
  includePageNumbers: boolean;
  pageNumberFormat: string;
  data: Readonly<Record<string, unknown>>;
}

export interface RenderedLine {
  text: string;
  alignment: string;
}

export interface PositionedLine {
  text: string;
  x: number;
  y: number;
}

export type HeaderFooterRenderer = (item: DecorationItem, context: PageRenderContext) => RenderedLine[];

export function toAlignment(value: string): Alignment {
  const upper = value.toUpperCase();
  return upper === 'CENTER' || upper === 'RIGHT' ? upper : 'LEFT';
}

/**
 * Position lines top-down from startY
 * Pure function - no side effects
 */
export function layoutLines(
  lines: readonly RenderedLine[],
  pageWidth: number,
  measure: (text: string) => number,
  startY: number,
  lineHeight = 12,
  margin = DEFAULT_MARGIN
): PositionedLine[] {
  return lines.map((line, i) => {
    const width = measure(line.text);
    let x = margin;
    switch (toAlignment(line.alignment)) {
      case 'CENTER':
        x = (pageWidth - width) / 2;
        break;
      case 'RIGHT':
        x = pageWidth - width - margin;
        break;
    }
    return { text: line.text, x, y: startY - i * lineHeight };
  });
}

export function substitutePageTokens(text: string, pageNumber: number, totalPages: number): string {
  return text.replace(/\{page\}/g, String(pageNumber)).replace(/\{total\}/g, String(totalPages));
}

function splitLines(text: string, alignment: string): RenderedLine[] {
  return text
    .split(/\r?\n/)
    .filter(line => line.trim().length > 0)
    .map(line => ({ text: line, alignment }));
}

const renderTemplate: HeaderFooterRenderer = (item, context) => {
  const model = {
    ...context.data,
    ...item.data,
    pageNumber: context.pageNumber,
    totalPages: context.totalPages,
  };
  return splitLines(renderText(item.content, model, { escape: false }), item.alignment);
};

const renderPlainText: HeaderFooterRenderer = (item, context) => {
  const lines = splitLines(substitutePageTokens(item.content, context.pageNumber, context.totalPages), item.alignment);
  if (item.placement === 'footer' && item.includePageNumbers) {
    lines.push({
      text: substitutePageTokens(item.pageNumberFormat, context.pageNumber, context.totalPages),
      alignment: 'RIGHT',
    });
  }
  return lines;
};

export class HeaderFooterRendererRegistry {
  private readonly renderers = new Map<string, HeaderFooterRenderer>();

  register(renderType: string, renderer: HeaderFooterRenderer): void {
    this.renderers.set(renderType.toLowerCase(), renderer);
  }

  get(renderType: string): HeaderFooterRenderer {
    const renderer = this.renderers.get(renderType.toLowerCase());
    if (!renderer) {
      throw new UnsupportedRenderTypeError(renderType, this.types());
    }
    return renderer;
  }

  types(): string[] {
    return Array.from(this.renderers.keys());
  }
}

export function createHeaderFooterRegistry(): HeaderFooterRendererRegistry {
  const registry = new HeaderFooterRendererRegistry();
  registry.register('template', renderTemplate);
  registry.register('text', renderPlainText);
  return registry;
}

function headerItem(header: HeaderTemplate): DecorationItem {
  return {
    placement: 'header',
    renderType: header.renderType,
    content: header.content,
    alignment: header.alignment,
    margin: header.marginTop,
    fontSize: header.fontSize,
    includePageNumbers: false,
    pageNumberFormat: '',
    data: header.data,
  };
}

function footerItem(footer: FooterTemplate): DecorationItem {
  return {
    placement: 'footer',
    renderType: footer.renderType,
    content: footer.content,
    alignment: footer.alignment,
    margin: footer.marginBottom,
    fontSize: footer.fontSize,
    includePageNumbers: footer.includePageNumbers,
    pageNumberFormat: footer.pageNumberFormat,
    data: footer.data,
  };
}

export class HeaderFooterCompositor {
  constructor(
    private readonly registry: HeaderFooterRendererRegistry = createHeaderFooterRegistry(),
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Draw headers then footers on every page not listed (0-based) in excludePages.
   * Every item's renderType must be registered; a failure while rendering one
   * item on one page is logged and the rest continue.
   * Returns the number of pages decorated.
   */
  async apply(
    document: PDFDocument,
    config: HeaderFooterConfig,
    data: Readonly<DataTree>,
    font?: PDFFont
  ): Promise<number> {
    const items = [...config.headers.map(headerItem), ...config.footers.map(footerItem)];
    if (items.length === 0) return 0;

    const resolved = items.map(item => ({ item, render: this.registry.get(item.renderType) }));
    const excluded = new Set(config.excludePages);
    const pages = document.getPages();
    const totalPages = pages.length;
    const pageFont = font ?? (await document.embedFont(StandardFonts.Helvetica));
    let decorated = 0;

    pages.forEach((page, index) => {
      if (excluded.has(index)) return;
      const context: PageRenderContext = { pageNumber: index + 1, totalPages, data };
      const { width, height } = page.getSize();

      for (const { item, render } of resolved) {
        try {
          this.draw(page, pageFont, item, render(item, context), width, height);
        } catch (error) {
          this.logger.warn(`Failed to render ${item.placement} on page ${index + 1}`, {
            renderType: item.renderType,
            reason: error instanceof Error ? error.message : String(error),
          });
        }
      }
      decorated++;
    });

    this.logger.debug('Applied headers and footers', { decorated, totalPages });
    return decorated;
  }

  private draw(
    page: PDFPage,
    font: PDFFont,
    item: DecorationItem,
    lines: RenderedLine[],
    width: number,
    height: number
  ): void {
    const size = item.fontSize;
    const lineHeight = size * 1.2;
    const safeLines = lines.map(line => ({ ...line, text: encodableText(font, line.text) }));
    // footer blocks grow upwards so the last line sits on the bottom margin
    const startY =
      item.placement === 'header' ? height - item.margin : item.margin + (safeLines.length - 1) * lineHeight;

    const positioned = layoutLines(safeLines, width, text => font.widthOfTextAtSize(text, size), startY, lineHeight);
    for (const line of positioned) {
      page.drawText(line.text, { x: line.x, y: line.y, size, font, color: rgb(0, 0, 0) });
    }
  }
}
