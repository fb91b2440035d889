import assert from 'node:assert/strict';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import test from 'node:test';
import { PDFDocument } from 'pdf-lib';
import type { PageSection } from '../types/index.js';
import { SectionRenderError, TemplateNotFoundError, UnsupportedRenderTypeError } from '../types/index.js';
import { DocumentComposer, addendumSection, interpolateSection, isConditionMet } from './composer.js';
import { registerTransform } from './formatter.js';
import { TemplateLoader } from './template-loader.js';

const mainCalls: string[][] = [];
const addendumCalls: string[][] = [];
const invoiceCalls: string[][] = [];

registerTransform('recordMain', args => {
  mainCalls.push([...args]);
  return 'main';
});
registerTransform('recordAddendum', args => {
  addendumCalls.push([...args]);
  return 'addendum';
});
registerTransform('recordInvoice', args => {
  invoiceCalls.push([...args]);
  return 'invoice';
});

function svgPage(body: string): string {
  return `<svg xmlns="http://www.w3.org/2000/svg" width="612" height="792">${body}</svg>`;
}

async function formPdf(fieldNames: string[]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const page = doc.addPage([612, 792]);
  const form = doc.getForm();
  fieldNames.forEach((name, i) => {
    form.createTextField(name).addToPage(page, { x: 50, y: 700 - i * 40, width: 200, height: 24 });
  });
  return doc.save();
}

const REPORT_YAML = `
templateId: report
sections:
  - sectionId: cover
    type: templated-view
    templatePath: views/cover.svg
    order: 1
  - sectionId: details
    type: templated-view
    templatePath: views/details.svg
    overflowConfigs:
      - arrayPath: items
        maxItemsInMain: 5
        itemsPerOverflowPage: 10
        addendumTemplatePath: views/items.svg
        overflowIndicatorField: more
    order: 2
  - sectionId: notes
    type: templated-view
    templatePath: views/cover.svg
    condition: showNotes
    order: 3
headerFooterConfig:
  footers:
    - renderType: text
      content: Report
`;

const CLAIMS_YAML = `
templateId: claims
sections:
  - sectionId: claims
    type: form-fill
    templatePath: forms/\${form.version}.pdf
    fieldMappings:
      name: customer.name
    overflowConfigs:
      - arrayPath: claims
        maxItemsInMain: 1
        itemsPerOverflowPage: 2
        addendumTemplatePath: forms/addendum.pdf
        overflowIndicatorField: more
`;

const INVOICE_YAML = `
templateId: invoice
sections:
  - sectionId: summary
    type: templated-view
    templatePath: views/invoice.svg
    viewModelType: invoice
`;

const BROKEN_YAML = `
templateId: broken
sections:
  - sectionId: main
    type: form-fill
    templatePath: forms/none.pdf
`;

const ORDERS_YAML = `
templateId: orders
sections:
  - sectionId: details
    type: templated-view
    templatePath: views/details.svg
    overflowConfigs:
      - arrayPath: orders.items
        mappingType: jsonata
        maxItemsInMain: 1
        itemsPerOverflowPage: 2
        addendumTemplatePath: views/items.svg
        overflowIndicatorField: more
`;

const BAD_FOOTER_YAML = `
templateId: bad-footer
sections:
  - sectionId: cover
    type: templated-view
    templatePath: views/cover.svg
headerFooterConfig:
  footers:
    - renderType: bogus
      content: Footer
`;

const BROKEN_ADDENDUM_YAML = `
templateId: broken-addendum
sections:
  - sectionId: main
    type: form-fill
    templatePath: forms/main.pdf
    overflowConfigs:
      - arrayPath: claims
        maxItemsInMain: 0
        itemsPerOverflowPage: 5
        addendumTemplatePath: forms/gone.pdf
`;

async function createComposer(): Promise<DocumentComposer> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pdf-composer-compose-'));
  const templatesDir = path.join(dir, 'templates');
  const resourcesDir = path.join(dir, 'resources');
  await fs.mkdir(templatesDir, { recursive: true });
  await fs.mkdir(path.join(resourcesDir, 'views'), { recursive: true });
  await fs.mkdir(path.join(resourcesDir, 'forms'), { recursive: true });

  await fs.writeFile(path.join(templatesDir, 'report.yaml'), REPORT_YAML, 'utf-8');
  await fs.writeFile(path.join(templatesDir, 'claims.yaml'), CLAIMS_YAML, 'utf-8');
  await fs.writeFile(path.join(templatesDir, 'invoice.yaml'), INVOICE_YAML, 'utf-8');
  await fs.writeFile(path.join(templatesDir, 'broken.yaml'), BROKEN_YAML, 'utf-8');
  await fs.writeFile(path.join(templatesDir, 'orders.yaml'), ORDERS_YAML, 'utf-8');
  await fs.writeFile(path.join(templatesDir, 'bad-footer.yaml'), BAD_FOOTER_YAML, 'utf-8');
  await fs.writeFile(path.join(templatesDir, 'broken-addendum.yaml'), BROKEN_ADDENDUM_YAML, 'utf-8');

  const views: Record<string, string> = {
    'cover.svg': svgPage('<text x="50" y="50" font-size="18">{{customer.name}}</text>'),
    'details.svg': svgPage('<text x="50" y="50">{{format "recordMain" items more}}</text>'),
    'items.svg': svgPage(
      '<text x="50" y="50">{{format "recordAddendum" addendumPageNumber totalAddendumPages overflowItems}}</text>'
    ),
    'invoice.svg': svgPage('<text x="50" y="50">{{format "recordInvoice" totalAmount showDiscountMessage}}</text>'),
  };
  for (const [name, content] of Object.entries(views)) {
    await fs.writeFile(path.join(resourcesDir, 'views', name), content, 'utf-8');
  }
  await fs.writeFile(path.join(resourcesDir, 'forms', 'main.pdf'), await formPdf(['name', 'more']));
  await fs.writeFile(path.join(resourcesDir, 'forms', 'addendum.pdf'), await formPdf(['name']));

  return new DocumentComposer({ loader: new TemplateLoader({ templatesDir, resourcesDir }) });
}

function names(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `item-${i + 1}`);
}

test('compose splits overflowing items into addendum pages', async () => {
  mainCalls.length = 0;
  addendumCalls.length = 0;
  const composer = await createComposer();
  const items = names(23);
  const data = { customer: { name: 'Acme & Co' }, items };

  const result = await composer.compose('report', data);

  assert.equal(result.pageCount, 4);
  assert.deepEqual(result.trace, [
    'init',
    'template-resolved',
    'section-rendered',
    'section-rendered',
    'overflow-expanded',
    'headers-footers-applied',
    'completed',
  ]);
  assert.deepEqual(result.sections, [
    { sectionId: 'cover', status: 'rendered', pages: 1, addendumPages: 0 },
    { sectionId: 'details', status: 'rendered', pages: 1, addendumPages: 2 },
    { sectionId: 'notes', status: 'skipped', pages: 0, addendumPages: 0 },
  ]);

  assert.deepEqual(mainCalls, [[items.slice(0, 5).join(', '), 'true']]);
  assert.deepEqual(addendumCalls, [
    ['1', '2', items.slice(5, 15).join(', ')],
    ['2', '2', items.slice(15).join(', ')],
  ]);

  // the request data is untouched
  assert.equal(data.items.length, 23);

  const saved = await PDFDocument.load(result.bytes);
  assert.equal(saved.getPageCount(), 4);
});

test('compose renders every item on the main page when nothing overflows', async () => {
  mainCalls.length = 0;
  addendumCalls.length = 0;
  const composer = await createComposer();
  const items = names(3);

  const result = await composer.compose('report', { customer: { name: 'Acme' }, items, showNotes: true });

  assert.equal(result.pageCount, 3);
  assert.deepEqual(result.sections.map(s => s.status), ['rendered', 'rendered', 'rendered']);
  assert.equal(result.trace.includes('overflow-expanded'), false);
  assert.deepEqual(mainCalls, [[items.join(', '), '']]);
  assert.deepEqual(addendumCalls, []);
});

test('compose fills forms and uses .pdf addenda as form pages', async () => {
  const composer = await createComposer();

  const result = await composer.compose('claims', {
    form: { version: 'main' },
    customer: { name: 'Kim' },
    claims: [{ id: 1 }, { id: 2 }, { id: 3 }, { id: 4 }],
  });

  assert.equal(result.pageCount, 3);
  assert.deepEqual(result.sections, [{ sectionId: 'claims', status: 'rendered', pages: 1, addendumPages: 2 }]);
});

test('compose builds the view model named by the section', async () => {
  invoiceCalls.length = 0;
  const composer = await createComposer();

  await composer.generate('invoice', {
    invoiceNumber: 'INV-1',
    items: [
      { description: 'Desk', unitPrice: 600, quantity: 2 },
      { description: 'Lamp', unitPrice: 25, quantity: 1.9 },
    ],
  });

  assert.deepEqual(invoiceCalls, [['1225', 'true']]);
});

test('generate returns PDF bytes', async () => {
  const composer = await createComposer();
  const bytes = await composer.generate('report', { customer: { name: 'Acme' }, items: [] });

  assert.equal(Buffer.from(bytes.slice(0, 5)).toString('latin1'), '%PDF-');
});

test('compose wraps renderer failures with the template and section id', async () => {
  const composer = await createComposer();

  await assert.rejects(
    composer.compose('broken', {}),
    (error: unknown) =>
      error instanceof SectionRenderError &&
      error.message === 'Failed to render section "main" of template "broken"' &&
      error.path === 'broken#main' &&
      error.reason === 'Resource not found: forms/none.pdf'
  );
});

test('compose names the addendum whose artifact failed', async () => {
  const composer = await createComposer();

  await assert.rejects(
    composer.compose('broken-addendum', { claims: [{ id: 1 }] }),
    (error: unknown) =>
      error instanceof SectionRenderError &&
      error.sectionId === 'main_addendum_1' &&
      error.path === 'broken-addendum#main_addendum_1' &&
      error.reason === 'Resource not found: forms/gone.pdf'
  );
});

test('compose rejects a header/footer render type with no renderer', async () => {
  const composer = await createComposer();

  await assert.rejects(
    composer.compose('bad-footer', { customer: { name: 'Acme' } }),
    (error: unknown) =>
      error instanceof UnsupportedRenderTypeError && error.message === 'Unsupported render type: bogus'
  );
});

test('compose keeps data intact when the overflow path crosses an array', async () => {
  mainCalls.length = 0;
  addendumCalls.length = 0;
  const composer = await createComposer();
  const data = { orders: [{ items: ['a', 'b'] }, { items: ['c'] }], items: ['x'] };

  const result = await composer.compose('orders', data);

  assert.equal(result.pageCount, 1);
  assert.deepEqual(result.sections, [{ sectionId: 'details', status: 'rendered', pages: 1, addendumPages: 0 }]);
  assert.equal(result.trace.includes('overflow-expanded'), false);
  assert.deepEqual(mainCalls, [['x', '']]);
  assert.deepEqual(addendumCalls, []);
  assert.deepEqual(data.orders[0].items, ['a', 'b']);
});

test('compose propagates a missing template', async () => {
  const composer = await createComposer();
  await assert.rejects(composer.generate('nope', {}), TemplateNotFoundError);
});

test('isConditionMet treats false, null, blank, "false" and [] as unmet', () => {
  for (const value of [false, null, undefined, '', '  ', 'FALSE', []]) {
    assert.equal(isConditionMet(value), false);
  }
  for (const value of [true, 'yes', 0, [1], {}]) {
    assert.equal(isConditionMet(value), true);
  }
});

const section: PageSection = {
  sectionId: 'details',
  type: 'form-fill',
  templatePath: 'forms/${kind}.pdf',
  mappingType: 'jsonpath',
  fieldMappings: { name: 'customer.name' },
  fieldMappingGroups: [],
  viewModelType: 'invoice',
  condition: 'flags.${kind}',
  overflowConfigs: [],
  order: 0,
};

test('interpolateSection resolves placeholders into a copy', () => {
  const resolved = interpolateSection(section, { kind: 'w2' });

  assert.equal(resolved.templatePath, 'forms/w2.pdf');
  assert.equal(resolved.condition, 'flags.w2');
  assert.equal(section.templatePath, 'forms/${kind}.pdf');

  const plain = { ...section, templatePath: 'a.pdf', condition: undefined };
  assert.equal(interpolateSection(plain, {}), plain);
});

test('addendumSection picks the renderer from the addendum extension', () => {
  const config = {
    arrayPath: 'items',
    mappingType: 'jsonpath' as const,
    maxItemsInMain: 1,
    itemsPerOverflowPage: 2,
    addendumTemplatePath: 'forms/MORE.PDF',
  };

  const addendum = addendumSection(section, config, 2);
  assert.equal(addendum.sectionId, 'details_addendum_2');
  assert.equal(addendum.type, 'form-fill');
  assert.equal(addendum.templatePath, 'forms/MORE.PDF');
  assert.equal(addendum.viewModelType, undefined);
  assert.deepEqual(addendum.fieldMappings, { name: 'customer.name' });

  assert.equal(addendumSection(section, { ...config, addendumTemplatePath: 'views/more.svg' }, 1).type, 'templated-view');
});
