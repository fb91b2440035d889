// core/svg-engine.ts
// Draws SVG page descriptions onto PDF pages using @xmldom/xmldom + xpath + pdf-lib
// IMPORTANT: SVG is treated as XML, not HTML DOM

import { DOMParser } from '@xmldom/xmldom';
import xpath from 'xpath';
import { StandardFonts, rgb } from 'pdf-lib';
import type { Color, PDFFont, PDFPage } from 'pdf-lib';
import { ComposerError } from '../types/index.js';
import type { RenderContext } from './render-context.js';
import { encodableText } from './render-context.js';

export const DEFAULT_PAGE_WIDTH = 612;
export const DEFAULT_PAGE_HEIGHT = 792;
const DEFAULT_FONT_SIZE = 12;

export interface PageSize {
  width: number;
  height: number;
}

const DRAWABLE = "//*[local-name()='text' or local-name()='line' or local-name()='rect' or local-name()='image']";

export function parseSvg(content: string | Buffer): Document {
  const parser = new DOMParser({
    errorHandler: {
      warning: () => {},
      error: (msg: string) => {
        throw new ComposerError('SVG parse error', 'svg', msg);
      },
      fatalError: (msg: string) => {
        throw new ComposerError('SVG fatal parse error', 'svg', msg);
      },
    },
  });

  const doc = parser.parseFromString(content.toString(), 'image/svg+xml');

  if (!doc || !doc.documentElement || doc.documentElement.localName !== 'svg') {
    throw new ComposerError('Failed to parse SVG', 'svg', 'Document is empty or its root is not <svg>');
  }

  return doc;
}

function isElementNode(node: unknown): node is Element {
  return typeof node === 'object' && node !== null && 'nodeType' in node && node.nodeType === 1;
}

/**
 * Drawable elements in document order
 */
export function selectDrawables(doc: Document): Element[] {
  const result = xpath.select(DRAWABLE, doc);
  return Array.isArray(result) ? result.filter(isElementNode) : [];
}

function numberAttr(element: Element, name: string, fallback = 0): number {
  const raw = element.getAttribute(name);
  if (raw === null || raw.trim() === '') return fallback;
  const value = parseFloat(raw);
  return Number.isNaN(value) ? fallback : value;
}

export function getPageSize(doc: Document): PageSize {
  const root = doc.documentElement;
  return {
    width: numberAttr(root, 'width', DEFAULT_PAGE_WIDTH),
    height: numberAttr(root, 'height', DEFAULT_PAGE_HEIGHT),
  };
}

/**
 * #rgb / #rrggbb to a pdf-lib color; "none" and unknown values give null
 */
export function parseColor(value: string | null): Color | null {
  if (!value) return null;
  const hex = value.trim().match(/^#([0-9a-f]{3}|[0-9a-f]{6})$/i);
  if (!hex) return value.trim() === 'black' ? rgb(0, 0, 0) : null;

  const digits = hex[1].length === 3 ? hex[1].split('').map(d => d + d).join('') : hex[1];
  const channel = (offset: number) => parseInt(digits.slice(offset, offset + 2), 16) / 255;
  return rgb(channel(0), channel(2), channel(4));
}

export function resolveFontName(family: string | null, weight: string | null): StandardFonts {
  const bold = weight === 'bold' || Number(weight) >= 600;
  const lower = (family ?? '').toLowerCase();

  if (lower.includes('courier') || lower.includes('mono')) {
    return bold ? StandardFonts.CourierBold : StandardFonts.Courier;
  }
  if (lower.includes('times') || (lower.includes('serif') && !lower.includes('sans'))) {
    return bold ? StandardFonts.TimesRomanBold : StandardFonts.TimesRoman;
  }
  return bold ? StandardFonts.HelveticaBold : StandardFonts.Helvetica;
}

/**
 * x of the text origin for an SVG text-anchor
 */
export function anchoredX(x: number, width: number, anchor: string | null): number {
  if (anchor === 'middle') return x - width / 2;
  if (anchor === 'end') return x - width;
  return x;
}

async function drawText(page: PDFPage, element: Element, context: RenderContext, height: number): Promise<void> {
  const text = (element.textContent ?? '').replace(/\s+/g, ' ').trim();
  if (!text) return;

  const font: PDFFont = await context.getFont(
    resolveFontName(element.getAttribute('font-family'), element.getAttribute('font-weight'))
  );
  const size = numberAttr(element, 'font-size', DEFAULT_FONT_SIZE);
  const safe = encodableText(font, text);
  const width = font.widthOfTextAtSize(safe, size);

  page.drawText(safe, {
    x: anchoredX(numberAttr(element, 'x'), width, element.getAttribute('text-anchor')),
    y: height - numberAttr(element, 'y'),
    size,
    font,
    color: parseColor(element.getAttribute('fill')) ?? rgb(0, 0, 0),
  });
}

function drawLine(page: PDFPage, element: Element, height: number): void {
  page.drawLine({
    start: { x: numberAttr(element, 'x1'), y: height - numberAttr(element, 'y1') },
    end: { x: numberAttr(element, 'x2'), y: height - numberAttr(element, 'y2') },
    thickness: numberAttr(element, 'stroke-width', 1),
    color: parseColor(element.getAttribute('stroke')) ?? rgb(0, 0, 0),
  });
}

function drawRect(page: PDFPage, element: Element, height: number): void {
  const rectHeight = numberAttr(element, 'height');
  const fill = parseColor(element.getAttribute('fill'));
  const stroke = parseColor(element.getAttribute('stroke'));
  const outlineOnly = !fill && !stroke;

  page.drawRectangle({
    x: numberAttr(element, 'x'),
    y: height - numberAttr(element, 'y') - rectHeight,
    width: numberAttr(element, 'width'),
    height: rectHeight,
    color: fill ?? undefined,
    borderColor: stroke ?? (outlineOnly ? rgb(0, 0, 0) : undefined),
    borderWidth: stroke || outlineOnly ? numberAttr(element, 'stroke-width', 1) : 0,
  });
}

async function drawImage(page: PDFPage, element: Element, context: RenderContext, height: number): Promise<void> {
  const href = element.getAttribute('href') ?? element.getAttribute('xlink:href');
  if (!href) {
    throw new ComposerError('Image element without href', 'svg', '<image> needs href or xlink:href');
  }

  const image = await context.getImage(href);
  const imageHeight = numberAttr(element, 'height', image.height);
  page.drawImage(image, {
    x: numberAttr(element, 'x'),
    y: height - numberAttr(element, 'y') - imageHeight,
    width: numberAttr(element, 'width', image.width),
    height: imageHeight,
  });
}

/**
 * Append one page to the context's document and draw the SVG onto it
 */
export async function drawSvgPage(doc: Document, context: RenderContext): Promise<PDFPage> {
  const { width, height } = getPageSize(doc);
  const page = context.document.addPage([width, height]);

  for (const element of selectDrawables(doc)) {
    switch (element.localName) {
      case 'text':
        await drawText(page, element, context, height);
        break;
      case 'line':
        drawLine(page, element, height);
        break;
      case 'rect':
        drawRect(page, element, height);
        break;
      case 'image':
        await drawImage(page, element, context, height);
        break;
    }
  }

  return page;
}
