import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { Event, FieldName } from '../src/domain/index.js';
import type { TemplateResolver } from '../src/application/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** Event factory; the payload doubles as the rendered field values. */
export function makeEvent(id: string, payload: Record<string, unknown> = {}): Event {
  return {
    event_id: id,
    event_type: 'alert.raised',
    source: 'monitor',
    timestamp: '2026-02-19T12:00:00Z',
    payload,
    metadata: {},
  };
}

/** Resolver that reads each field straight from the event payload. */
export class PayloadResolver implements TemplateResolver {
  resolve(event: Event, field: FieldName): string {
    const value = event.payload[field];
    return value === undefined || value === null ? '' : String(value);
  }
}

/** The URL and init of the nth call to a stubbed fetch. */
export function fetchCall(mock: Mock, index: number): { url: URL; init: RequestInit | undefined } {
  const call = mock.mock.calls[index];
  if (!call) throw new Error(`fetch call #${index} was not made`);
  const init: RequestInit | undefined = call[1];
  return { url: new URL(String(call[0])), init };
}

export function apiResponse(status = 200, body = '{"status":1,"request":"req-1"}'): Response {
  return new Response(body, { status });
}

export function imageResponse(bytes: Uint8Array, contentType: string): Response {
  return new Response(bytes, { headers: { 'content-type': contentType } });
}

/** PNG signature followed by zero padding up to `length`. */
export function pngBytes(length = 16): Uint8Array {
  const bytes = new Uint8Array(length);
  bytes.set([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
  return bytes;
}

/** A body that yields one chunk, then errors mid-download. */
export function failingBody(): ReadableStream<Uint8Array> {
  let sent = false;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (!sent) {
        sent = true;
        controller.enqueue(pngBytes());
        return;
      }
      controller.error(new Error('body stream reset'));
    },
  });
}
