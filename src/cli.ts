#!/usr/bin/env node
// cli.ts
// CLI entry point for pdfcompose

import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { DataTree } from './types/index.js';
import { ComposerError } from './types/index.js';
import type { ComposerConfig } from './core/config.js';
import { loadConfig } from './core/config.js';
import type { Logger } from './core/logger.js';
import { LOG_LEVELS, createLogger } from './core/logger.js';
import { DocumentComposer } from './core/composer.js';
import { warmTemplateCache } from './core/cache-warmer.js';
import { loadJobFromZip } from './core/zip-handler.js';
import { mergeTables, parseCsvTable, parseJsonData } from './core/datasource.js';

interface GlobalOptions {
  templates?: string;
  resources?: string;
  logLevel?: string;
}

interface RenderOptions {
  data?: string;
  table: string[];
  job?: string;
  output?: string;
}

const program = new Command();

program
  .name('pdfcompose')
  .description('Compose PDF documents from layered templates and request data')
  .version('0.1.0')
  .option('--templates <path>', 'Templates directory (PDF_COMPOSER_TEMPLATES_DIR)')
  .option('--resources <path>', 'Section artifacts directory (PDF_COMPOSER_RESOURCES_DIR)')
  .option('--log-level <level>', `Log level: ${LOG_LEVELS.join(', ')} (PDF_COMPOSER_LOG_LEVEL)`);

function setup(): { config: ComposerConfig; logger: Logger } {
  const globals = program.opts<GlobalOptions>();
  const config = loadConfig({
    templatesDir: globals.templates,
    resourcesDir: globals.resources,
    logLevel: globals.logLevel,
  });
  return { config, logger: createLogger('pdfcompose', { level: config.logLevel }) };
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * "name=file.csv" -> [name, file]
 */
function parseTableArg(arg: string): [string, string] {
  const separator = arg.indexOf('=');
  if (separator <= 0 || separator === arg.length - 1) {
    throw new ComposerError(`Invalid table argument: ${arg}`, '--table', 'Expected name=file.csv');
  }
  return [arg.slice(0, separator), arg.slice(separator + 1)];
}

async function readRequestData(options: RenderOptions): Promise<DataTree> {
  const data = options.data ? parseJsonData(await fs.readFile(options.data), options.data) : {};

  const tables = new Map<string, Record<string, string>[]>();
  for (const arg of options.table) {
    const [name, file] = parseTableArg(arg);
    tables.set(name, parseCsvTable(await fs.readFile(file), file));
  }
  return mergeTables(data, tables);
}

program
  .command('render')
  .description('Render a template (or a job bundle) to PDF')
  .argument('[templateId]', 'Template id under the templates directory')
  .option('-d, --data <path>', 'JSON data file')
  .option('-t, --table <name=file>', 'CSV table added to the data under <name> (repeatable)', collect, [])
  .option('-j, --job <path>', 'Job bundle zip (job.json + data + tables)')
  .option('-o, --output <path>', 'Output PDF path')
  .action(async (templateArg: string | undefined, options: RenderOptions) => {
    try {
      const { config, logger } = setup();
      const composer = DocumentComposer.fromConfig(config, logger);

      let templateId: string;
      let data: DataTree;
      if (options.job) {
        console.log(`Processing job: ${options.job}`);
        const job = await loadJobFromZip(options.job);
        templateId = job.manifest.templateId;
        data = job.data;
      } else if (templateArg) {
        templateId = templateArg;
        data = await readRequestData(options);
      } else {
        throw new ComposerError('Missing template id', 'render', 'Pass <templateId> or --job <bundle.zip>');
      }

      const result = await composer.compose(templateId, data);
      const outputPath = options.output ?? `${result.templateId.replace(/[\\/:]/g, '_')}.pdf`;
      await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
      await fs.writeFile(outputPath, result.bytes);

      for (const section of result.sections) {
        const extra = section.addendumPages > 0 ? ` + ${section.addendumPages} addendum` : '';
        console.log(`  ${section.sectionId}: ${section.status} (${section.pages} pages${extra})`);
      }
      console.log(`Rendered ${result.pageCount} pages`);
      console.log(`Written: ${outputPath}`);
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('resolve')
  .description('Print the merged template as JSON')
  .argument('<templateId>', 'Template id under the templates directory')
  .action(async (templateId: string) => {
    try {
      const { config, logger } = setup();
      const composer = DocumentComposer.fromConfig(config, logger);
      const template = await composer.loader.load(templateId);
      console.log(JSON.stringify(template, null, 2));
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('warm')
  .description('Preload templates and their artifacts (defaults to PDF_COMPOSER_PRELOAD)')
  .argument('[templateIds...]', 'Template ids to warm')
  .action(async (templateIds: string[]) => {
    try {
      const { config, logger } = setup();
      const ids = templateIds.length > 0 ? templateIds : config.preloadTemplateIds;
      if (ids.length === 0) {
        console.log('No templates to warm');
        return;
      }

      const composer = DocumentComposer.fromConfig(config, logger);
      const report = await warmTemplateCache(composer.loader, ids, logger);
      console.log(`Warmed ${report.loaded.length}/${ids.length} templates (${report.resources} resources)`);
      for (const id of report.failed) {
        console.log(`  failed: ${id}`);
      }
    } catch (error) {
      handleError(error);
    }
  });

function handleError(error: unknown): void {
  if (error instanceof ComposerError) {
    console.error(`\nError: ${error.message}`);
    if (error.path) console.error(`  Path: ${error.path}`);
    if (error.reason) console.error(`  Reason: ${error.reason}`);
  } else if (error instanceof Error) {
    console.error(`\nError: ${error.message}`);
    console.error(error.stack);
  } else {
    console.error('\nUnknown error:', error);
  }
  process.exit(1);
}

await program.parseAsync();
