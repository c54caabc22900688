export { toTemplateContext } from './event.js';
export type { Event, EventPayload, EventMetadata, EventEnvelope, TemplateContext } from './event.js';
export { REQUIRED_FIELDS, OPTIONAL_FIELDS, FIELD_NAMES, FIELD_MAX_LENGTH } from './fields.js';
export type { RequiredField, OptionalField, FieldName, RenderedFields, PushoverParams } from './fields.js';
