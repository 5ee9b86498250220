/**
 * Resource Resolver Tests
 *
 * Tests the null resolver and the lookup timeout wrapper.
 */

import { describe, it, expect, jest } from '@jest/globals';
import {
  lookupWithTimeout,
  NullResourceResolver,
  ResourceLookupError,
  type ResourceLink,
  type ResourceResolver,
} from '../../integrations/resources/ResourceResolver.js';

describe('NullResourceResolver', () => {
  it('should always return no resources', async () => {
    await expect(new NullResourceResolver().lookup('Python', 3)).resolves.toEqual([]);
  });

  it('should reject a negative result count', async () => {
    await expect(new NullResourceResolver().lookup('Python', -1)).rejects.toMatchObject({
      name: 'ResourceLookupError',
      code: 'INVALID_ARGUMENT',
    });
  });

  it('should reject a fractional result count', async () => {
    await expect(new NullResourceResolver().lookup('Python', 1.5)).rejects.toBeInstanceOf(ResourceLookupError);
  });
});

describe('lookupWithTimeout', () => {
  it('should pass through results that arrive in time', async () => {
    const links: ResourceLink[] = [{ title: 'Docs', url: 'https://example.com/docs' }];
    const lookup = jest.fn<ResourceResolver['lookup']>().mockResolvedValue(links);

    await expect(lookupWithTimeout({ lookup }, 'SQL', 2, 1000)).resolves.toEqual(links);
    expect(lookup.mock.calls[0][0]).toBe('SQL');
    expect(lookup.mock.calls[0][1]).toBe(2);
  });

  it('should reject with a timeout error and abort the lookup', async () => {
    let received: AbortSignal | undefined;
    const resolver: ResourceResolver = {
      lookup: (_skill, _max, signal) => {
        received = signal;
        return new Promise<ResourceLink[]>(() => undefined);
      },
    };

    await expect(lookupWithTimeout(resolver, 'SQL', 2, 10)).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'Resource lookup timed out after 10ms',
    });
    expect(received?.aborted).toBe(true);
  });

  it('should propagate resolver errors', async () => {
    const resolver: ResourceResolver = {
      lookup: async () => {
        throw new Error('boom');
      },
    };

    await expect(lookupWithTimeout(resolver, 'SQL', 2, 1000)).rejects.toThrow('boom');
  });
});
