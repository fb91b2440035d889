// core/template-engine.ts
// Handlebars text rendering for templated views and header/footer content

import Handlebars from 'handlebars';
import { getTransform, valueToString } from './formatter.js';

export interface RenderTextOptions {
  /** XML/HTML-escape substituted values (on for SVG views, off for plain text) */
  escape?: boolean;
}

const engine = Handlebars.create();

engine.registerHelper('join', (items: unknown, separator: unknown) => {
  if (!Array.isArray(items)) {
    return '';
  }
  const normalizedSeparator = typeof separator === 'string' ? separator : ', ';
  return items
    .map(item => valueToString(item).trim())
    .filter(value => value.length > 0)
    .join(normalizedSeparator);
});

engine.registerHelper('add', (a: unknown, b: unknown) => Number(a) + Number(b));

engine.registerHelper('eq', (a: unknown, b: unknown) => a === b);

// {{format "formatCurrency" total}}; the trailing argument is Handlebars' options hash
engine.registerHelper('format', (name: unknown, ...rest: unknown[]) => {
  const args = rest.slice(0, -1).map(valueToString);
  const transform = typeof name === 'string' ? getTransform(name) : undefined;
  return transform ? transform(args) : args[0] ?? '';
});

const compiled = new Map<string, Handlebars.TemplateDelegate>();

/**
 * Render a Handlebars template against a model
 */
export function renderText(source: string, model: unknown, options: RenderTextOptions = {}): string {
  const escape = options.escape ?? true;
  const key = `${escape ? 'e' : 'n'}:${source}`;

  let template = compiled.get(key);
  if (!template) {
    template = engine.compile(source, { noEscape: !escape, strict: false });
    compiled.set(key, template);
  }
  return template(model);
}
