// src/core/export/json.ts
import type { VidError } from '../errors.js';
import type { VideoRecord } from '../video/record.js';
import type { VideoFeed } from '../iterate/feed.js';
import type { VideoSearch } from '../iterate/search.js';
import type { ExportedVideo, FailedResult, ListingResult, VideoResult } from './types.js';

export function exportVideo(video: VideoRecord): ExportedVideo {
  const { publishedAt, ...rest } = video.toJSON();
  return {
    ...rest,
    publishedAt: publishedAt?.toISOString(),
    missingFields: video.missingFields,
  };
}

export function buildVideoResult(video: VideoRecord): VideoResult {
  return { status: 'success', video: exportVideo(video) };
}

export function buildFeedResult(feed: VideoFeed<unknown, unknown>, videos: VideoRecord[]): ListingResult {
  return {
    status: 'success',
    kind: 'feed',
    meta: {
      url: feed.url,
      title: feed.title,
      description: feed.description,
      webpage: feed.webpage,
      guid: feed.guid,
      entryCount: feed.entryCount,
      lastModified: feed.lastModified?.toISOString(),
      etag: feed.etag,
    },
    pagesFetched: feed.pagesFetched,
    videos: videos.map(exportVideo),
  };
}

export function buildSearchResult(search: VideoSearch<unknown, unknown>, videos: VideoRecord[]): ListingResult {
  return {
    status: 'success',
    kind: 'search',
    meta: {
      query: search.query,
      orderBy: search.orderBy,
      totalResults: search.totalResults,
      time: search.time,
    },
    pagesFetched: search.pagesFetched,
    videos: videos.map(exportVideo),
  };
}

export function buildErrorResult(error: VidError): FailedResult {
  return {
    status: 'failed',
    error: {
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      suggestion: error.suggestion,
    },
  };
}

export function formatJsonOutput(result: unknown): string {
  return JSON.stringify(result, null, 2);
}
