/**
 * Field specs for a Pushover message.
 *
 * Each field is rendered from its own template. Required fields gate the
 * whole request; optional fields are dropped when blank.
 */

export const REQUIRED_FIELDS = ['token', 'user', 'message'] as const;

export const OPTIONAL_FIELDS = [
  'device',
  'title',
  'url',
  'url_title',
  'priority',
  'timestamp',
  'sound',
  'retry',
  'expire',
] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];
export type OptionalField = (typeof OPTIONAL_FIELDS)[number];

/** Every templated field, including the two that get special handling. */
export type FieldName = RequiredField | OptionalField | 'html' | 'image_url';

export const FIELD_NAMES: readonly FieldName[] = [
  ...REQUIRED_FIELDS,
  ...OPTIONAL_FIELDS,
  'html',
  'image_url',
];

/** Hard length caps applied before transmission. */
export const FIELD_MAX_LENGTH: Partial<Record<OptionalField, number>> = {
  url: 512,
  url_title: 100,
};

/** Rendered template output, keyed by field. */
export type RenderedFields = Record<FieldName, string>;

/**
 * Query parameters sent to the Pushover API.
 * `image_url` never appears here; it drives the attachment instead.
 */
export type PushoverParams = Record<RequiredField, string> &
  Partial<Record<OptionalField | 'html', string>>;
