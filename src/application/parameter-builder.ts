import { OPTIONAL_FIELDS, FIELD_MAX_LENGTH, FIELD_NAMES } from '../domain/index.js';
import type { Event, PushoverParams, RenderedFields } from '../domain/index.js';
import type { TemplateResolver } from './template-resolver.js';

/** The value itself, or undefined when it is empty or whitespace only. */
export function presence(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

/** Renders every field for one event. */
export function renderFields(resolver: TemplateResolver, event: Event): Partial<RenderedFields> {
  const rendered: Partial<RenderedFields> = {};
  for (const field of FIELD_NAMES) {
    rendered[field] = resolver.resolve(event, field);
  }
  return rendered;
}

/** `"true"` and `"1"` turn HTML on; any other non-blank value turns it off. */
export function normalizeHtmlFlag(value: string): '1' | '0' {
  return value === 'true' || value === '1' ? '1' : '0';
}

/**
 * Builds the request parameters from rendered fields.
 *
 * Returns null when any required field is blank: the event is skipped
 * and no request is sent. Blank optional fields are left out.
 * Truncation is a plain index cut, so it may split a surrogate pair.
 */
export function buildParameters(rendered: Partial<RenderedFields>): PushoverParams | null {
  const token = presence(rendered.token);
  const user = presence(rendered.user);
  const message = presence(rendered.message);
  if (token === undefined || user === undefined || message === undefined) return null;

  const params: PushoverParams = { token, user, message };

  for (const field of OPTIONAL_FIELDS) {
    const value = presence(rendered[field]);
    if (value === undefined) continue;

    const max = FIELD_MAX_LENGTH[field];
    params[field] = max !== undefined ? value.slice(0, max) : value;
  }

  const html = presence(rendered.html);
  if (html !== undefined) {
    params.html = normalizeHtmlFlag(html);
  }

  return params;
}
