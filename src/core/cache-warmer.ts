// core/cache-warmer.ts
// Startup preloading of templates and their section artifacts

import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { TemplateLoader } from './template-loader.js';
import { getReferencedResources } from './template.js';
import { hasPlaceholders } from './placeholders.js';

export interface WarmReport {
  loaded: string[];
  failed: string[];
  resources: number;
}

/**
 * Load each template and prefetch the artifacts it references.
 * Failures are logged and skipped.
 */
export async function warmTemplateCache(
  loader: TemplateLoader,
  templateIds: readonly string[],
  logger: Logger = silentLogger
): Promise<WarmReport> {
  const report: WarmReport = { loaded: [], failed: [], resources: 0 };

  for (const templateId of templateIds) {
    try {
      const template = await loader.load(templateId);
      report.loaded.push(templateId);

      for (const resource of getReferencedResources(template)) {
        // request-dependent paths cannot be prefetched
        if (hasPlaceholders(resource)) continue;
        try {
          await loader.getResourceBytes(resource);
          report.resources++;
        } catch (error) {
          logger.warn(`Failed to prefetch resource ${resource}`, {
            templateId,
            reason: error instanceof Error ? error.message : String(error),
          });
        }
      }
    } catch (error) {
      report.failed.push(templateId);
      logger.warn(`Failed to warm template ${templateId}`, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  logger.info('Template cache warmed', {
    loaded: report.loaded.length,
    failed: report.failed.length,
    resources: report.resources,
  });
  return report;
}
