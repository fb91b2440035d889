// core/render-context.ts
// Per-request render state: output document, page counter, signals, resource caches

import { PDFDocument, StandardFonts } from 'pdf-lib';
import type { PDFFont, PDFImage } from 'pdf-lib';
import type { DataTree, DocumentTemplate } from '../types/index.js';
import { ComposerError } from '../types/index.js';

/**
 * Where section artifacts and images are read from (TemplateLoader implements this)
 */
export interface ResourceSource {
  getResourceBytes(resourcePath: string): Promise<Uint8Array>;
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47];
const JPEG_SIGNATURE = [0xff, 0xd8, 0xff];

function startsWith(bytes: Uint8Array, signature: readonly number[]): boolean {
  return signature.every((byte, i) => bytes[i] === byte);
}

const characterSets = new WeakMap<PDFFont, Set<number>>();

/**
 * Replace characters the font cannot encode with "?"
 */
export function encodableText(font: PDFFont, text: string): string {
  let supported = characterSets.get(font);
  if (!supported) {
    supported = new Set(font.getCharacterSet());
    characterSets.set(font, supported);
  }
  const charset = supported;
  return Array.from(text, ch => {
    const code = ch.codePointAt(0);
    return code !== undefined && charset.has(code) ? ch : '?';
  }).join('');
}

export class RenderContext {
  /** Cross-section signals, e.g. overflow:<sectionId>:<field> */
  readonly metadata = new Map<string, string>();
  currentSectionId: string | null = null;

  private pageCounter = 0;
  private readonly fonts = new Map<string, Promise<PDFFont>>();
  private readonly images = new Map<string, Promise<PDFImage>>();

  private constructor(
    readonly template: DocumentTemplate,
    readonly data: Readonly<DataTree>,
    readonly document: PDFDocument,
    readonly resources: ResourceSource
  ) {}

  static async create(
    template: DocumentTemplate,
    data: Readonly<DataTree>,
    resources: ResourceSource
  ): Promise<RenderContext> {
    const document = await PDFDocument.create();
    return new RenderContext(template, data, document, resources);
  }

  /** Pages emitted so far */
  get currentPage(): number {
    return this.pageCounter;
  }

  /**
   * Record pages appended to the output; the counter only moves forward
   */
  advancePages(count: number): number {
    if (count > 0) this.pageCounter += count;
    return this.pageCounter;
  }

  getFont(name: StandardFonts = StandardFonts.Helvetica): Promise<PDFFont> {
    let font = this.fonts.get(name);
    if (!font) {
      font = this.document.embedFont(name);
      this.fonts.set(name, font);
    }
    return font;
  }

  getImage(imagePath: string): Promise<PDFImage> {
    let image = this.images.get(imagePath);
    if (!image) {
      image = this.embedImage(imagePath);
      this.images.set(imagePath, image);
    }
    return image;
  }

  private async embedImage(imagePath: string): Promise<PDFImage> {
    const bytes = await this.resources.getResourceBytes(imagePath);
    if (startsWith(bytes, PNG_SIGNATURE)) return this.document.embedPng(bytes);
    if (startsWith(bytes, JPEG_SIGNATURE)) return this.document.embedJpg(bytes);
    throw new ComposerError(`Unsupported image format: ${imagePath}`, imagePath, 'Expected PNG or JPEG');
  }
}
