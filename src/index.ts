// index.ts
// Main exports for pdf-composer

export * from './types/index.js';
export * from './core/config.js';
export * from './core/logger.js';
export * from './core/schema-registry.js';
export * from './core/template.js';
export * from './core/template-merge.js';
export * from './core/template-loader.js';
export * from './core/placeholders.js';
export * from './core/data-path.js';
export * from './core/formatter.js';
export * from './core/mapping-strategy.js';
export * from './core/direct-mapping.js';
export * from './core/jsonpath-mapping.js';
export * from './core/jsonata-mapping.js';
export * from './core/custom-mapping.js';
export * from './core/field-mapper.js';
export * from './core/paginator.js';
export * from './core/render-context.js';
export * from './core/template-engine.js';
export * from './core/svg-engine.js';
export * from './core/view-model.js';
export * from './core/section-renderer.js';
export * from './core/header-footer.js';
export * from './core/composer.js';
export * from './core/cache-warmer.js';
export * from './core/datasource.js';
export * from './core/manifest.js';
export * from './core/zip-handler.js';
