/**
 * YouTube Client Tests
 *
 * Exercises the search request and response mapping against a stubbed
 * fetch; nothing leaves the process.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { YouTubeClient } from '../../integrations/youtube/YouTubeClient.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const SEARCH_RESPONSE = {
  items: [
    { id: { kind: 'youtube#video', videoId: 'abc123' }, snippet: { title: 'Learn React in 1 Hour' } },
    { id: { kind: 'youtube#channel' }, snippet: { title: 'Some Channel' } },
    { id: { kind: 'youtube#video', videoId: 'def456' }, snippet: { title: 'React Hooks Explained' } },
  ],
};

describe('YouTubeClient', () => {
  let fetchMock: jest.Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = jest.fn<typeof fetch>();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('configuration', () => {
    it('should return no resources without an API key', async () => {
      const client = new YouTubeClient({}, fetchMock);

      await expect(client.lookup('React', 3)).resolves.toEqual([]);
      expect(client.isConfigured()).toBe(false);
      expect(fetchMock).not.toHaveBeenCalled();
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('should reject a negative result count even without a key', async () => {
      const client = new YouTubeClient({}, fetchMock);

      await expect(client.lookup('React', -1)).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
    });

    it('should skip the request when zero results are asked for', async () => {
      const client = new YouTubeClient({ apiKey: 'test-key' }, fetchMock);

      await expect(client.lookup('React', 0)).resolves.toEqual([]);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('search', () => {
    it('should search for beginner tutorials', async () => {
      fetchMock.mockResolvedValue(jsonResponse(SEARCH_RESPONSE));
      const client = new YouTubeClient({ apiKey: 'test-key' }, fetchMock);

      await client.lookup('React', 2);

      const url = new URL(String(fetchMock.mock.calls[0][0]));
      expect(url.origin + url.pathname).toBe('https://www.googleapis.com/youtube/v3/search');
      expect(url.searchParams.get('q')).toBe('React tutorial for beginners');
      expect(url.searchParams.get('type')).toBe('video');
      expect(url.searchParams.get('part')).toBe('snippet');
      expect(url.searchParams.get('maxResults')).toBe('2');
      expect(url.searchParams.get('relevanceLanguage')).toBe('en');
      expect(url.searchParams.get('key')).toBe('test-key');
    });

    it('should forward the abort signal', async () => {
      fetchMock.mockResolvedValue(jsonResponse(SEARCH_RESPONSE));
      const client = new YouTubeClient({ apiKey: 'test-key' }, fetchMock);
      const controller = new AbortController();

      await client.lookup('React', 2, controller.signal);

      expect(fetchMock.mock.calls[0][1]?.signal).toBe(controller.signal);
    });

    it('should map videos to watch links and skip non-video items', async () => {
      fetchMock.mockResolvedValue(jsonResponse(SEARCH_RESPONSE));
      const client = new YouTubeClient({ apiKey: 'test-key' }, fetchMock);

      const links = await client.lookup('React', 3);

      expect(links).toEqual([
        { title: 'Learn React in 1 Hour', url: 'https://www.youtube.com/watch?v=abc123' },
        { title: 'React Hooks Explained', url: 'https://www.youtube.com/watch?v=def456' },
      ]);
    });

    it('should cap results at the requested count', async () => {
      fetchMock.mockResolvedValue(jsonResponse(SEARCH_RESPONSE));
      const client = new YouTubeClient({ apiKey: 'test-key' }, fetchMock);

      const links = await client.lookup('React', 1);

      expect(links).toEqual([{ title: 'Learn React in 1 Hour', url: 'https://www.youtube.com/watch?v=abc123' }]);
    });

    it('should use a custom query template', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ items: [] }));
      const client = new YouTubeClient({ apiKey: 'test-key', queryTemplate: 'learn {skill} fast' }, fetchMock);

      await expect(client.lookup('SQL', 3)).resolves.toEqual([]);

      const url = new URL(String(fetchMock.mock.calls[0][0]));
      expect(url.searchParams.get('q')).toBe('learn SQL fast');
    });
  });

  describe('errors', () => {
    it('should raise an HTTP error for non-2xx responses', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ error: { message: 'quota exceeded' } }, 403));
      const client = new YouTubeClient({ apiKey: 'test-key' }, fetchMock);

      await expect(client.lookup('React', 3)).rejects.toMatchObject({
        name: 'ResourceLookupError',
        code: 'HTTP_ERROR',
        details: { status: 403 },
      });
    });

    it('should raise on an unexpected response shape', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ items: 'nope' }));
      const client = new YouTubeClient({ apiKey: 'test-key' }, fetchMock);

      await expect(client.lookup('React', 3)).rejects.toMatchObject({ code: 'MALFORMED_RESPONSE' });
    });
  });
});
