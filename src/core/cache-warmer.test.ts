import assert from 'node:assert/strict';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import test from 'node:test';
import type { Logger } from './logger.js';
import { warmTemplateCache } from './cache-warmer.js';
import { TemplateLoader } from './template-loader.js';

test('warmTemplateCache loads templates and prefetches static artifacts', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pdf-composer-warm-'));
  await fs.mkdir(path.join(dir, 'forms'));
  await fs.writeFile(path.join(dir, 'forms', 'a.pdf'), 'stub');
  await fs.writeFile(
    path.join(dir, 'a.yaml'),
    [
      'templateId: a',
      'sections:',
      '  - sectionId: main',
      '    type: form-fill',
      '    templatePath: forms/a.pdf',
      '    overflowConfigs:',
      '      - arrayPath: items',
      '        maxItemsInMain: 2',
      '        itemsPerOverflowPage: 4',
      '        addendumTemplatePath: views/more.svg',
      '',
    ].join('\n'),
    'utf-8'
  );
  await fs.writeFile(
    path.join(dir, 'dyn.yaml'),
    'templateId: dyn\nsections:\n  - { sectionId: s, type: form-fill, templatePath: "forms/${kind}.pdf" }\n',
    'utf-8'
  );

  const warnings: string[] = [];
  const logger: Logger = {
    debug() {},
    info() {},
    warn(message) {
      warnings.push(message);
    },
    error() {},
    child: () => logger,
  };
  const loader = new TemplateLoader({ templatesDir: dir });

  const report = await warmTemplateCache(loader, ['a', 'dyn', 'missing'], logger);

  assert.deepEqual(report, { loaded: ['a', 'dyn'], failed: ['missing'], resources: 1 });
  assert.deepEqual(warnings, ['Failed to prefetch resource views/more.svg', 'Failed to warm template missing']);
  assert.equal(loader.parseCount, 2);
});
