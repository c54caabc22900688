import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PushoverAgent } from '../../src/application/pushover-agent.js';
import { AgentLiveness } from '../../src/application/liveness.js';
import { parseAgentOptions } from '../../src/application/agent-options.js';
import type { TemplateResolver } from '../../src/application/template-resolver.js';
import {
  PayloadResolver,
  apiResponse,
  failingBody,
  fakeLogger,
  fetchCall,
  imageResponse,
  makeEvent,
  pngBytes,
} from '../helpers.js';

const required = { token: 'T', user: 'U', message: 'hi' };

describe('PushoverAgent', () => {
  let log: ReturnType<typeof fakeLogger>;
  let mockFetch: ReturnType<typeof vi.fn>;
  let agent: PushoverAgent;

  beforeEach(() => {
    log = fakeLogger();
    mockFetch = vi.fn();
    vi.stubGlobal('fetch', mockFetch);
    agent = new PushoverAgent(new PayloadResolver(), log, new AgentLiveness(1));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends a simple-mode POST with only the required parameters', async () => {
    mockFetch.mockResolvedValueOnce(apiResponse());

    const summary = await agent.receive([makeEvent('e-1', required)]);

    expect(summary).toEqual({ sent: 1, skipped: 0, failed: 0 });
    expect(mockFetch).toHaveBeenCalledOnce();
    const { url, init } = fetchCall(mockFetch, 0);
    expect(`${url.origin}${url.pathname}`).toBe('https://api.pushover.net/1/messages.json');
    expect(Object.fromEntries(url.searchParams)).toEqual({ token: 'T', user: 'U', message: 'hi' });
    expect(init).toEqual({ method: 'POST' });
  });

  it.each(['token', 'user', 'message'])('issues no request when %s is blank', async (field) => {
    const summary = await agent.receive([makeEvent('e-1', { ...required, [field]: '' })]);

    expect(summary).toEqual({ sent: 0, skipped: 1, failed: 0 });
    expect(mockFetch).not.toHaveBeenCalled();
    expect(log.error).not.toHaveBeenCalled();
  });

  it('keeps processing after a transport failure in the middle of a batch', async () => {
    mockFetch
      .mockResolvedValueOnce(apiResponse())
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(apiResponse());

    const summary = await agent.receive([
      makeEvent('e-1', { ...required, message: 'first' }),
      makeEvent('e-2', { ...required, message: 'second' }),
      makeEvent('e-3', { ...required, message: 'third' }),
    ]);

    expect(summary).toEqual({ sent: 2, skipped: 0, failed: 1 });
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(fetchCall(mockFetch, 2).url.searchParams.get('message')).toBe('third');
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error), event_id: 'e-2' }),
      'Failed to process event',
    );
  });

  it('isolates a rendering failure to its own event', async () => {
    const resolver: TemplateResolver = {
      resolve: (event, field) => {
        if (event.event_id === 'e-1') throw new Error('template exploded');
        return new PayloadResolver().resolve(event, field);
      },
    };
    agent = new PushoverAgent(resolver, log, new AgentLiveness(1));
    mockFetch.mockResolvedValueOnce(apiResponse());

    const summary = await agent.receive([makeEvent('e-1', required), makeEvent('e-2', required)]);

    expect(summary).toEqual({ sent: 1, skipped: 0, failed: 1 });
    expect(mockFetch).toHaveBeenCalledOnce();
  });

  it('attaches a fetched image and sends multipart', async () => {
    mockFetch.mockImplementation(async (input: string) =>
      input.startsWith('https://img.example.com/')
        ? imageResponse(pngBytes(), 'image/png')
        : apiResponse(),
    );

    await agent.receive([
      makeEvent('e-1', { ...required, message: '50% off', image_url: 'https://img.example.com/sale.png' }),
    ]);

    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(mockFetch.mock.calls[0]).toEqual(['https://img.example.com/sale.png']);
    const { url, init } = fetchCall(mockFetch, 1);
    expect(url.searchParams.get('message')).toBe('50 percent off');
    expect(init?.body).toBeInstanceOf(FormData);
  });

  it('still sends without the image when the download fails', async () => {
    mockFetch
      .mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND img.example.com'))
      .mockResolvedValueOnce(apiResponse());

    const summary = await agent.receive([
      makeEvent('e-1', { ...required, message: '50% off', image_url: 'https://img.example.com/a.png' }),
    ]);

    expect(summary).toEqual({ sent: 1, skipped: 0, failed: 0 });
    const { url, init } = fetchCall(mockFetch, 1);
    expect(url.searchParams.get('message')).toBe('50% off');
    expect(init).toEqual({ method: 'POST' });
  });

  it('still sends without the image when the body breaks mid-download', async () => {
    mockFetch
      .mockResolvedValueOnce(
        new Response(failingBody(), {
          headers: { 'content-type': 'image/png', 'content-length': '1000' },
        }),
      )
      .mockResolvedValueOnce(apiResponse());

    const summary = await agent.receive([
      makeEvent('e-1', { ...required, image_url: 'https://img.example.com/a.png' }),
    ]);

    expect(summary).toEqual({ sent: 1, skipped: 0, failed: 0 });
    expect(mockFetch).toHaveBeenCalledTimes(2);
    const { url, init } = fetchCall(mockFetch, 1);
    expect(url.searchParams.get('message')).toBe('hi');
    expect(init).toEqual({ method: 'POST' });
  });

  it('is working after a successful batch', async () => {
    mockFetch.mockResolvedValueOnce(apiResponse());
    await agent.receive([makeEvent('e-1', required)]);
    expect(agent.isWorking()).toBe(true);
  });

  it('is not working after a failed event', async () => {
    mockFetch.mockRejectedValueOnce(new Error('ECONNRESET'));
    await agent.receive([makeEvent('e-1', required)]);
    expect(agent.isWorking()).toBe(false);
  });

  it('treats a non-2xx API response as an error for liveness', async () => {
    mockFetch.mockResolvedValueOnce(apiResponse(400, '{"user":"invalid","status":0}'));

    const summary = await agent.receive([makeEvent('e-1', required)]);

    expect(summary).toEqual({ sent: 1, skipped: 0, failed: 0 });
    expect(agent.isWorking()).toBe(false);
    expect(log.warn).toHaveBeenCalledWith(
      { event_id: 'e-1', status: 400 },
      'Pushover API rejected notification',
    );
  });

  describe('prepare', () => {
    it('renders parameters from configured templates without sending', () => {
      const configured = PushoverAgent.fromOptions(
        parseAgentOptions({ token: 'test-token', user: 'test-user', html: 'true' }),
        log,
      );

      const prepared = configured.prepare(
        makeEvent('e-1', { message: 'Backup done', image_url: 'https://img.example.com/b.gif' }),
      );

      expect(prepared).toEqual({
        params: { token: 'test-token', user: 'test-user', message: 'Backup done', html: '1' },
        imageUrl: 'https://img.example.com/b.gif',
      });
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('returns null when the message renders blank', () => {
      const configured = PushoverAgent.fromOptions(
        parseAgentOptions({ token: 'test-token', user: 'test-user' }),
        log,
      );
      expect(configured.prepare(makeEvent('e-1', {}))).toBeNull();
    });
  });
});
