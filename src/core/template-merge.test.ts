import assert from 'node:assert/strict';
import test from 'node:test';
import type { TemplateDefinition } from '../types/index.js';
import { TemplateParseError } from '../types/index.js';
import {
  appendFragment,
  buildHeaderFooterConfig,
  buildSection,
  buildTemplate,
  mergeSection,
  mergeTemplates,
} from './template-merge.js';

const parentDef: TemplateDefinition = {
  templateId: 'base',
  description: 'Base form',
  sections: [
    {
      sectionId: 's1',
      type: 'form-fill',
      templatePath: 'a.pdf',
      fieldMappings: { x: 'p.x', y: 'p.y' },
      condition: 'p.c',
      order: 1,
    },
    { sectionId: 's2', type: 'form-fill', templatePath: 'b.pdf', order: 2 },
    { sectionId: 's3', type: 'form-fill', templatePath: 'c.pdf', order: 3 },
  ],
  headerFooterConfig: { footers: [{ renderType: 'text', content: 'Confidential' }] },
  metadata: { a: 1, b: 1 },
};

test('buildTemplate applies defaults and freezes the result', () => {
  const template = buildTemplate({
    templateId: 'plain',
    sections: [{ sectionId: 's1', type: 'form-fill', templatePath: 'a.pdf' }],
  });

  assert.equal(template.sections[0].mappingType, 'jsonpath');
  assert.equal(template.sections[0].order, 0);
  assert.deepEqual(template.sections[0].overflowConfigs, []);
  assert.equal(Object.isFrozen(template), true);
  assert.equal(Object.isFrozen(template.sections[0]), true);
  assert.equal(Object.isFrozen(template.sections[0].fieldMappings), true);
});

test('buildSection requires type and templatePath', () => {
  assert.throws(
    () => buildSection({ sectionId: 'x', type: 'form-fill' }, 'child.yaml'),
    (error: unknown) =>
      error instanceof TemplateParseError &&
      error.message === 'Section "x" must declare type and templatePath' &&
      error.reason === 'Missing: templatePath' &&
      error.path === 'child.yaml'
  );
});

test('mergeTemplates overlays, excludes, overrides and appends child sections', () => {
  const parent = buildTemplate(parentDef);
  const merged = mergeTemplates(parent, {
    templateId: 'child',
    baseTemplateId: 'base',
    excludedSections: ['s3'],
    sectionOverrides: { s2: 'b2.pdf' },
    sections: [
      { sectionId: 's1', templatePath: 'a2.pdf', fieldMappings: { y: 'c.y', z: 'c.z' } },
      { sectionId: 's4', type: 'templated-view', templatePath: 'd.svg', order: 2 },
    ],
    metadata: { b: 2 },
  });

  assert.deepEqual(merged.sections.map(s => s.sectionId), ['s1', 's2', 's4']);

  const s1 = merged.sections[0];
  assert.equal(s1.templatePath, 'a2.pdf');
  assert.equal(s1.type, 'form-fill');
  assert.equal(s1.condition, 'p.c');
  assert.equal(s1.order, 1);
  assert.deepEqual(s1.fieldMappings, { x: 'p.x', y: 'c.y', z: 'c.z' });

  assert.equal(merged.sections[1].templatePath, 'b2.pdf');
  assert.equal(merged.templateId, 'child');
  assert.equal(merged.description, 'Base form');
  assert.equal(merged.headerFooterConfig, parent.headerFooterConfig);
  assert.deepEqual(merged.metadata, { a: 1, b: 2 });

  // the parent is untouched
  assert.equal(parent.sections[0].templatePath, 'a.pdf');
  assert.equal(parent.sections.length, 3);
});

test('mergeTemplates uses the child header/footer config when present', () => {
  const parent = buildTemplate(parentDef);
  const merged = mergeTemplates(parent, {
    templateId: 'child',
    headerFooterConfig: { headers: [{ renderType: 'template', content: '{{title}}' }] },
  });

  assert.equal(merged.headerFooterConfig?.headers.length, 1);
  assert.equal(merged.headerFooterConfig?.footers.length, 0);
});

test('mergeSection keeps parent groups and overflow when the child gives none', () => {
  const parent = buildSection(
    {
      sectionId: 's1',
      type: 'form-fill',
      templatePath: 'a.pdf',
      fieldMappingGroups: [{ fields: { a: 'a' } }],
      overflowConfigs: [
        { arrayPath: 'items', maxItemsInMain: 2, itemsPerOverflowPage: 5, addendumTemplatePath: 'more.pdf' },
      ],
    },
    'base'
  );

  const kept = mergeSection(parent, { sectionId: 's1', overflowConfigs: [], fieldMappingGroups: [] });
  assert.equal(kept.overflowConfigs, parent.overflowConfigs);
  assert.equal(kept.fieldMappingGroups, parent.fieldMappingGroups);

  const replaced = mergeSection(parent, {
    sectionId: 's1',
    overflowConfigs: [
      { arrayPath: 'rows', maxItemsInMain: 1, itemsPerOverflowPage: 3, addendumTemplatePath: 'rows.svg' },
    ],
  });
  assert.deepEqual(replaced.overflowConfigs.map(o => o.arrayPath), ['rows']);
  assert.equal(replaced.overflowConfigs[0].mappingType, 'jsonpath');
});

test('appendFragment adds sections and rejects duplicate ids', () => {
  const template = buildTemplate(parentDef);
  const fragment = buildTemplate({
    templateId: 'signature',
    sections: [{ sectionId: 'sig', type: 'templated-view', templatePath: 'sig.svg', order: 10 }],
  });

  const combined = appendFragment(template, fragment);
  assert.deepEqual(combined.sections.map(s => s.sectionId), ['s1', 's2', 's3', 'sig']);

  assert.throws(() => appendFragment(template, template), TemplateParseError);
});

test('buildHeaderFooterConfig fills in defaults', () => {
  const config = buildHeaderFooterConfig({ footers: [{ renderType: 'text', content: 'x' }] });
  assert.deepEqual(config, {
    headers: [],
    footers: [
      {
        renderType: 'text',
        content: 'x',
        alignment: 'CENTER',
        marginBottom: 50,
        fontSize: 10,
        includePageNumbers: true,
        pageNumberFormat: 'Page {page} of {total}',
        data: {},
      },
    ],
    excludePages: [],
  });
});
