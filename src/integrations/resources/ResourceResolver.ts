/**
 * Resource Resolver - External learning-resource lookup contract
 *
 * The roadmap builder only ever talks to this interface. Network-backed
 * implementations (see YouTubeClient) live outside the domain layer, and
 * tests pass in-memory fakes.
 */

// =============================================================================
// TYPES
// =============================================================================

export interface ResourceLink {
  title: string;
  url: string;
}

export interface ResourceResolver {
  /**
   * Up to `maxResults` resources for a canonical skill name. Implementations
   * should return [] when they are not configured rather than throwing.
   */
  lookup(skillName: string, maxResults: number, signal?: AbortSignal): Promise<ResourceLink[]>;
}

// =============================================================================
// ERRORS
// =============================================================================

export type ResourceLookupErrorCode = 'INVALID_ARGUMENT' | 'HTTP_ERROR' | 'TIMEOUT' | 'MALFORMED_RESPONSE';

export class ResourceLookupError extends Error {
  constructor(
    message: string,
    public code: ResourceLookupErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ResourceLookupError';
  }
}

export function assertValidMaxResults(maxResults: number): void {
  if (!Number.isInteger(maxResults) || maxResults < 0) {
    throw new ResourceLookupError(
      `maxResults must be a non-negative integer, got ${maxResults}`,
      'INVALID_ARGUMENT',
      { maxResults }
    );
  }
}

// =============================================================================
// IMPLEMENTATIONS
// =============================================================================

/**
 * Used when no external lookup service is configured.
 */
export class NullResourceResolver implements ResourceResolver {
  async lookup(_skillName: string, maxResults: number): Promise<ResourceLink[]> {
    assertValidMaxResults(maxResults);
    return [];
  }
}

// =============================================================================
// TIMEOUT
// =============================================================================

/**
 * Run one lookup with a deadline. The resolver receives an AbortSignal it
 * can hand to fetch; the returned promise rejects with a TIMEOUT
 * ResourceLookupError either way once the deadline passes.
 */
export async function lookupWithTimeout(
  resolver: ResourceResolver,
  skillName: string,
  maxResults: number,
  timeoutMs: number
): Promise<ResourceLink[]> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new ResourceLookupError(`Resource lookup timed out after ${timeoutMs}ms`, 'TIMEOUT', {
          skillName,
          timeoutMs,
        })
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([resolver.lookup(skillName, maxResults, controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
