/**
 * YouTube Resource Resolver
 *
 * Finds tutorial videos for a skill through the YouTube Data API search
 * endpoint. Used as the external fallback when the curated catalog has
 * nothing for a skill.
 *
 * Quota: each search.list call costs 100 units of the daily 10,000.
 */

import {
  assertValidMaxResults,
  ResourceLookupError,
  type ResourceLink,
  type ResourceResolver,
} from '../resources/ResourceResolver.js';
import { youTubeSearchResponseSchema, type YouTubeConfig } from './types.js';

type FetchFn = typeof fetch;

const DEFAULT_CONFIG: Required<Omit<YouTubeConfig, 'apiKey'>> = {
  baseUrl: 'https://www.googleapis.com/youtube/v3',
  queryTemplate: '{skill} tutorial for beginners',
  relevanceLanguage: 'en',
};

// Search caps maxResults at 50
const MAX_RESULTS_PER_SEARCH = 50;

// =============================================================================
// YOUTUBE CLIENT
// =============================================================================

export class YouTubeClient implements ResourceResolver {
  private config: YouTubeConfig & typeof DEFAULT_CONFIG;
  private fetchFn: FetchFn;

  constructor(config: YouTubeConfig = {}, fetchFn: FetchFn = fetch) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.fetchFn = fetchFn;
  }

  isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  async lookup(skillName: string, maxResults: number, signal?: AbortSignal): Promise<ResourceLink[]> {
    assertValidMaxResults(maxResults);

    if (!this.config.apiKey) {
      console.warn('[YouTubeClient] API key is not configured. Skipping external resource lookup.');
      return [];
    }
    if (maxResults === 0) return [];

    const params = new URLSearchParams({
      q: this.config.queryTemplate.replace('{skill}', skillName),
      part: 'snippet',
      type: 'video',
      maxResults: String(Math.min(maxResults, MAX_RESULTS_PER_SEARCH)),
      relevanceLanguage: this.config.relevanceLanguage,
      key: this.config.apiKey,
    });

    console.log(`[YouTubeClient] Searching tutorials for "${skillName}"`);

    const response = await this.fetchFn(`${this.config.baseUrl}/search?${params.toString()}`, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal,
    });

    if (!response.ok) {
      const errorBody = await response.text();
      console.error(`[YouTubeClient] API error: ${response.status}`, errorBody);
      throw new ResourceLookupError(`YouTube API error: ${response.status} ${response.statusText}`, 'HTTP_ERROR', {
        status: response.status,
      });
    }

    const parsed = youTubeSearchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ResourceLookupError('Unexpected YouTube search response', 'MALFORMED_RESPONSE', {
        issues: parsed.error.issues,
      });
    }

    const links: ResourceLink[] = [];
    for (const item of parsed.data.items) {
      if (!item.id.videoId || !item.snippet) continue;
      links.push({
        title: item.snippet.title,
        url: `https://www.youtube.com/watch?v=${item.id.videoId}`,
      });
    }

    return links.slice(0, maxResults);
  }
}
