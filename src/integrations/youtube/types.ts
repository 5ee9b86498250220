/**
 * YouTube Data API v3 types (search.list subset)
 *
 * API Docs: https://developers.google.com/youtube/v3/docs/search/list
 */

import { z } from 'zod';

export interface YouTubeConfig {
  apiKey?: string;
  baseUrl?: string;
  queryTemplate?: string; // "{skill}" is replaced with the skill name
  relevanceLanguage?: string;
}

export const youTubeSearchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.object({
          kind: z.string().optional(),
          videoId: z.string().optional(),
        }),
        snippet: z
          .object({
            title: z.string(),
          })
          .optional(),
      })
    )
    .default([]),
});

export type YouTubeSearchResponse = z.infer<typeof youTubeSearchResponseSchema>;
