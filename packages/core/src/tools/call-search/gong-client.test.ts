import { describe, it, expect, vi } from 'vitest';
import { buildAuthorizationHeader, createGongClient } from './gong-client.js';
import { RateLimitExhaustedError, UpstreamHttpError } from '@findr/shared/src/utils/errors.js';
import type { CallSearchSettings } from '@findr/schemas/src/tool-config.schema.js';

const settings: CallSearchSettings = {
  credentials: { mode: 'bearer', token: 'test-token' },
  baseUrl: 'https://gong.test',
  maxRateLimitRetries: 3,
};

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('buildAuthorizationHeader', () => {
  it('should base64-encode key and secret for basic auth', () => {
    expect(
      buildAuthorizationHeader({ mode: 'basic', accessKey: 'test-key', accessKeySecret: 'test-secret' }),
    ).toBe('Basic dGVzdC1rZXk6dGVzdC1zZWNyZXQ=');
  });

  it('should use the token for bearer auth', () => {
    expect(buildAuthorizationHeader({ mode: 'bearer', token: 'test-token' })).toBe(
      'Bearer test-token',
    );
  });
});

describe('GongClient', () => {
  describe('searchCalls', () => {
    it('should POST the search request with auth headers', async () => {
      const fetchFn = vi.fn().mockResolvedValue(json({ calls: [], records: {} }));
      const client = createGongClient(settings, { fetch: fetchFn });

      await client.searchCalls({ filter: { keywords: 'pricing' }, limit: 5 });

      expect(fetchFn).toHaveBeenCalledTimes(1);
      const [url, init] = fetchFn.mock.calls[0] ?? [];
      expect(url).toBe('https://gong.test/v2/calls/search');
      expect(init.method).toBe('POST');
      expect(init.headers).toMatchObject({ Authorization: 'Bearer test-token' });
      expect(JSON.parse(String(init.body))).toEqual({ filter: { keywords: 'pricing' }, limit: 5 });
    });

    it('should parse calls and cursor', async () => {
      const fetchFn = vi.fn().mockResolvedValue(
        json({ calls: [{ metaData: { id: 42, title: 'Kickoff' } }], records: { cursor: 'next' } }),
      );
      const client = createGongClient(settings, { fetch: fetchFn });

      const response = await client.searchCalls({ filter: { keywords: 'kickoff' }, limit: 5 });

      expect(response.calls?.[0]?.metaData.id).toBe('42');
      expect(response.records?.cursor).toBe('next');
    });

    it('should raise UpstreamHttpError on a server error', async () => {
      const fetchFn = vi
        .fn()
        .mockResolvedValue(new Response('boom', { status: 500, statusText: 'Internal Server Error' }));
      const client = createGongClient(settings, { fetch: fetchFn });

      await expect(
        client.searchCalls({ filter: { keywords: 'pricing' }, limit: 5 }),
      ).rejects.toBeInstanceOf(UpstreamHttpError);
    });

    it('should raise RateLimitExhaustedError after the retry cap', async () => {
      const fetchFn = vi
        .fn()
        .mockImplementation(() => Promise.resolve(new Response('', { status: 429 })));
      const sleep = vi.fn().mockResolvedValue(undefined);
      const client = createGongClient(settings, { fetch: fetchFn, sleep });

      await expect(
        client.searchCalls({ filter: { keywords: 'pricing' }, limit: 5 }),
      ).rejects.toBeInstanceOf(RateLimitExhaustedError);
      expect(fetchFn).toHaveBeenCalledTimes(4);
    });
  });

  describe('getTranscript', () => {
    it('should GET the transcript for the call', async () => {
      const fetchFn = vi
        .fn()
        .mockResolvedValue(json({ transcript: [{ speakerName: 'Ada', text: 'Hello' }] }));
      const client = createGongClient(settings, { fetch: fetchFn });

      const result = await client.getTranscript('call-1');

      expect(fetchFn.mock.calls[0]?.[0]).toBe('https://gong.test/v2/calls/call-1/transcript');
      expect(result).toEqual({
        available: true,
        segments: [{ speakerName: 'Ada', text: 'Hello' }],
      });
    });

    it('should report an unavailable transcript on a non-success status', async () => {
      const fetchFn = vi.fn().mockResolvedValue(new Response('missing', { status: 404 }));
      const client = createGongClient(settings, { fetch: fetchFn });

      expect(await client.getTranscript('call-1')).toEqual({ available: false, status: 404 });
    });

    it('should wait for Retry-After and retry a rate-limited transcript', async () => {
      const fetchFn = vi
        .fn()
        .mockResolvedValueOnce(new Response('', { status: 429, headers: { 'Retry-After': '2' } }))
        .mockResolvedValueOnce(json({ transcript: [{ speakerName: 'Ada', text: 'Hello' }] }));
      const sleep = vi.fn().mockResolvedValue(undefined);
      const onRateLimited = vi.fn();
      const client = createGongClient(settings, { fetch: fetchFn, sleep, onRateLimited });

      const result = await client.getTranscript('call-1');

      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(2000);
      expect(onRateLimited).toHaveBeenCalledWith('transcript', 1, 2000);
      expect(fetchFn).toHaveBeenCalledTimes(2);
      expect(fetchFn.mock.calls[1]?.[0]).toBe('https://gong.test/v2/calls/call-1/transcript');
      expect(result).toEqual({
        available: true,
        segments: [{ speakerName: 'Ada', text: 'Hello' }],
      });
    });

    it('should report an unavailable transcript once the retry cap is spent', async () => {
      const fetchFn = vi
        .fn()
        .mockImplementation(() => Promise.resolve(new Response('', { status: 429 })));
      const sleep = vi.fn().mockResolvedValue(undefined);
      const client = createGongClient(settings, { fetch: fetchFn, sleep });

      expect(await client.getTranscript('call-1')).toEqual({ available: false, status: 429 });
      expect(fetchFn).toHaveBeenCalledTimes(4);
      expect(sleep).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledWith(1000);
    });

    it('should treat a body without transcript as empty', async () => {
      const fetchFn = vi.fn().mockResolvedValue(json({}));
      const client = createGongClient(settings, { fetch: fetchFn });

      expect(await client.getTranscript('call-1')).toEqual({ available: true, segments: [] });
    });
  });
});
