import Handlebars from 'handlebars';
import { toTemplateContext } from '../domain/index.js';
import type { Event, FieldName, TemplateContext } from '../domain/index.js';

/**
 * Renders one notification field for one event.
 * Implementations must be side-effect free; an empty string means "blank".
 */
export interface TemplateResolver {
  resolve(event: Event, field: FieldName): string;
}

type CompiledTemplate = (context: TemplateContext) => string;

/**
 * Handlebars-backed resolver over a fixed set of field templates.
 *
 * Output is not HTML-escaped: the rendered values go into query
 * parameters, never into markup. Templates compile lazily and are cached,
 * so a broken template only fails the events that reach it.
 */
export class HandlebarsTemplateResolver implements TemplateResolver {
  private readonly hbs = Handlebars.create();
  private readonly compiled = new Map<FieldName, CompiledTemplate>();

  constructor(private readonly templates: Readonly<Record<FieldName, string>>) {}

  resolve(event: Event, field: FieldName): string {
    return this.template(field)(toTemplateContext(event));
  }

  private template(field: FieldName): CompiledTemplate {
    let compiled = this.compiled.get(field);
    if (!compiled) {
      compiled = this.hbs.compile(this.templates[field], { noEscape: true });
      this.compiled.set(field, compiled);
    }
    return compiled;
  }
}
