// src/core/suites/youtube/types.ts
import { z } from 'zod';

const ThumbnailsSchema = z.record(z.object({ url: z.string() }));

export const SnippetSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  publishedAt: z.string().optional(),
  channelId: z.string().optional(),
  channelTitle: z.string().optional(),
  tags: z.array(z.string()).optional(),
  thumbnails: ThumbnailsSchema.optional(),
});

export type Snippet = z.infer<typeof SnippetSchema>;

export const VideoListResponseSchema = z.object({
  items: z.array(
    z.object({
      id: z.string(),
      snippet: SnippetSchema.optional(),
      player: z.object({ embedHtml: z.string().optional() }).optional(),
      status: z.object({ embeddable: z.boolean().optional() }).optional(),
    })
  ),
});

export type VideoListItem = z.infer<typeof VideoListResponseSchema>['items'][number];

export const SearchListResponseSchema = z.object({
  nextPageToken: z.string().optional(),
  pageInfo: z
    .object({
      totalResults: z.number().optional(),
      resultsPerPage: z.number().optional(),
    })
    .optional(),
  items: z.array(
    z.object({
      id: z.object({ videoId: z.string().optional() }),
      snippet: SnippetSchema.optional(),
    })
  ),
});

export type SearchListItem = z.infer<typeof SearchListResponseSchema>['items'][number];

/** One page of search results plus the URL it was fetched from. */
export type YouTubeSearchPage = z.infer<typeof SearchListResponseSchema> & {
  requestUrl: string;
};
