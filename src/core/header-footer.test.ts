import assert from 'node:assert/strict';
import test from 'node:test';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import { UnsupportedRenderTypeError } from '../types/index.js';
import type { DecorationItem } from './header-footer.js';
import {
  HeaderFooterCompositor,
  createHeaderFooterRegistry,
  layoutLines,
  substitutePageTokens,
} from './header-footer.js';
import type { Logger } from './logger.js';
import { buildHeaderFooterConfig } from './template-merge.js';

function recordingLogger(warnings: string[]): Logger {
  const logger: Logger = {
    debug() {},
    info() {},
    warn(message) {
      warnings.push(message);
    },
    error() {},
    child: () => logger,
  };
  return logger;
}

function item(overrides: Partial<DecorationItem>): DecorationItem {
  return {
    placement: 'footer',
    renderType: 'text',
    content: '',
    alignment: 'LEFT',
    margin: 50,
    fontSize: 10,
    includePageNumbers: false,
    pageNumberFormat: 'Page {page} of {total}',
    data: {},
    ...overrides,
  };
}

async function documentWithPages(count: number): Promise<PDFDocument> {
  const doc = await PDFDocument.create();
  for (let i = 0; i < count; i++) {
    doc.addPage([612, 792]);
  }
  return doc;
}

test('layoutLines aligns each line from its measured width', () => {
  const lines = layoutLines(
    [
      { text: 'L', alignment: 'LEFT' },
      { text: 'C', alignment: 'center' },
      { text: 'R', alignment: 'RIGHT' },
      { text: 'U', alignment: 'justify' },
    ],
    600,
    () => 100,
    700,
    12
  );

  assert.deepEqual(lines, [
    { text: 'L', x: 50, y: 700 },
    { text: 'C', x: 250, y: 688 },
    { text: 'R', x: 450, y: 676 },
    { text: 'U', x: 50, y: 664 },
  ]);
});

test('substitutePageTokens fills page and total', () => {
  assert.equal(substitutePageTokens('Page {page} of {total}', 2, 5), 'Page 2 of 5');
});

test('text renderer adds a right-aligned page number line to footers', () => {
  const render = createHeaderFooterRegistry().get('text');
  const lines = render(
    item({ content: 'Confidential\nDraft', includePageNumbers: true, pageNumberFormat: '{page}/{total}' }),
    { pageNumber: 1, totalPages: 3, data: {} }
  );

  assert.deepEqual(lines, [
    { text: 'Confidential', alignment: 'LEFT' },
    { text: 'Draft', alignment: 'LEFT' },
    { text: '1/3', alignment: 'RIGHT' },
  ]);
});

test('text renderer leaves headers without page number lines', () => {
  const render = createHeaderFooterRegistry().get('TEXT');
  const lines = render(
    item({ placement: 'header', content: 'Sheet {page}', includePageNumbers: true, alignment: 'CENTER' }),
    { pageNumber: 4, totalPages: 4, data: {} }
  );

  assert.deepEqual(lines, [{ text: 'Sheet 4', alignment: 'CENTER' }]);
});

test('template renderer merges item data over request data without escaping', () => {
  const render = createHeaderFooterRegistry().get('template');
  const context = { pageNumber: 2, totalPages: 4, data: { company: 'Smith & Sons', title: 'Report' } };

  assert.deepEqual(
    render(item({ content: '{{company}} - page {{pageNumber}} of {{totalPages}}' }), context),
    [{ text: 'Smith & Sons - page 2 of 4', alignment: 'LEFT' }]
  );
  assert.deepEqual(
    render(item({ content: '{{company}}: {{title}}', data: { company: 'Override Co' } }), context),
    [{ text: 'Override Co: Report', alignment: 'LEFT' }]
  );
});

test('registry rejects unknown render types', () => {
  assert.throws(
    () => createHeaderFooterRegistry().get('html'),
    (error: unknown) => error instanceof UnsupportedRenderTypeError && error.message === 'Unsupported render type: html'
  );
});

test('HeaderFooterCompositor skips excluded pages and logs failing items', async () => {
  const warnings: string[] = [];
  const registry = createHeaderFooterRegistry();
  registry.register('broken', () => {
    throw new Error('boom');
  });
  const compositor = new HeaderFooterCompositor(registry, recordingLogger(warnings));
  const doc = await documentWithPages(3);
  const config = buildHeaderFooterConfig({
    headers: [{ renderType: 'broken', content: 'x' }],
    footers: [{ renderType: 'text', content: 'Footer' }],
    excludePages: [0],
  });

  const decorated = await compositor.apply(doc, config, {});

  assert.equal(decorated, 2);
  assert.deepEqual(warnings, ['Failed to render header on page 2', 'Failed to render header on page 3']);
});

test('HeaderFooterCompositor rejects an unregistered render type before drawing', async () => {
  const warnings: string[] = [];
  const compositor = new HeaderFooterCompositor(createHeaderFooterRegistry(), recordingLogger(warnings));
  const doc = await documentWithPages(2);
  const config = buildHeaderFooterConfig({ footers: [{ renderType: 'html', content: '<b>x</b>' }] });

  await assert.rejects(compositor.apply(doc, config, {}), UnsupportedRenderTypeError);
  assert.deepEqual(warnings, []);
});

test('HeaderFooterCompositor draws with the font it is given', async () => {
  const doc = await documentWithPages(1);
  const font = await doc.embedFont(StandardFonts.Helvetica);
  const embedFont = doc.embedFont.bind(doc);
  let embeds = 0;
  doc.embedFont = (fontData, options) => {
    embeds++;
    return embedFont(fontData, options);
  };
  const config = buildHeaderFooterConfig({ footers: [{ renderType: 'text', content: 'Footer' }] });

  assert.equal(await new HeaderFooterCompositor().apply(doc, config, {}, font), 1);
  assert.equal(embeds, 0);

  await new HeaderFooterCompositor().apply(doc, config, {});
  assert.equal(embeds, 1);
});

test('HeaderFooterCompositor does nothing without headers or footers', async () => {
  const compositor = new HeaderFooterCompositor();
  const doc = await documentWithPages(2);

  assert.equal(await compositor.apply(doc, buildHeaderFooterConfig({}), {}), 0);
});
