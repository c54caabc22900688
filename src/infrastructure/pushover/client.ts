import type { Logger } from 'pino';
import type { PushoverParams } from '../../domain/index.js';
import type { ImageAttachment } from './attachment.js';

export const PUSHOVER_API_URL = 'https://api.pushover.net/1/messages.json';

export interface DispatchResult {
  status: number;
  body: string;
}

function queryEntries(params: PushoverParams): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) entries[key] = value;
  }
  return entries;
}

/** Sent parameters with the application token removed, for logging. */
export function redactParams(params: PushoverParams): Record<string, string> {
  const summary = queryEntries(params);
  delete summary['token'];
  return summary;
}

/**
 * Multipart uploads carry the message in the query string already
 * percent-encoded, so a literal `%` is spelled out first.
 */
export function sanitizeMultipartMessage(message: string): string {
  return message.replaceAll('%', ' percent');
}

/** Sniffs JPEG, PNG and GIF signatures; anything else keeps the fallback. */
export function detectMimeType(bytes: Uint8Array, fallback: string): string {
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return 'image/jpeg';
  }
  if (
    bytes.length >= 8 &&
    bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4e && bytes[3] === 0x47 &&
    bytes[4] === 0x0d && bytes[5] === 0x0a && bytes[6] === 0x1a && bytes[7] === 0x0a
  ) {
    return 'image/png';
  }
  if (bytes.length >= 6) {
    const header = String.fromCharCode(...bytes.subarray(0, 6));
    if (header === 'GIF87a' || header === 'GIF89a') return 'image/gif';
  }
  return fallback;
}

function simpleQuery(params: PushoverParams): string {
  return new URLSearchParams(queryEntries(params)).toString();
}

function multipartQuery(params: PushoverParams, encodedMessage: string): string {
  const rest = queryEntries(params);
  delete rest['message'];
  const query = new URLSearchParams(rest).toString();
  const message = `message=${encodedMessage}`;
  return query === '' ? message : `${query}&${message}`;
}

async function postMultipart(
  params: PushoverParams,
  attachment: ImageAttachment,
  log: Logger,
): Promise<Response> {
  const encodedMessage = encodeURIComponent(sanitizeMultipartMessage(params.message));
  const bytes = await attachment.bytes();
  const type = detectMimeType(new Uint8Array(bytes), attachment.contentType);

  const form = new FormData();
  form.append(
    'attachment',
    new Blob([bytes], { type }),
    attachment.filename,
  );

  log.info('Sending request with attachment');
  return fetch(`${PUSHOVER_API_URL}?${multipartQuery(params, encodedMessage)}`, {
    method: 'POST',
    body: form,
  });
}

async function postSimple(params: PushoverParams, log: Logger): Promise<Response> {
  log.info('Sending request without attachment');
  return fetch(`${PUSHOVER_API_URL}?${simpleQuery(params)}`, { method: 'POST' });
}

/**
 * Sends one notification and logs the response.
 *
 * The attachment, when given, is closed on every path out of this call.
 * Transport errors propagate; nothing is retried.
 */
export async function sendNotification(
  params: PushoverParams,
  attachment: ImageAttachment | null,
  log: Logger,
): Promise<DispatchResult> {
  try {
    const response = attachment
      ? await postMultipart(params, attachment, log)
      : await postSimple(params, log);
    const body = await response.text();

    log.info({ status: response.status }, `Response status: ${response.status}`);
    log.info({ body }, `Response body: ${body}`);
    log.info({ params: redactParams(params) }, 'Sent the following notification');

    return { status: response.status, body };
  } finally {
    await attachment?.close();
  }
}
