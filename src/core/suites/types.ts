// src/core/suites/types.ts
import type { VideoData, VideoField } from '../types/index.js';
import type { VideoRecord } from '../video/record.js';
import type { VideoFeed } from '../iterate/feed.js';
import type { VideoSearch } from '../iterate/search.js';

/** Marker returned by a suite for a capability it does not implement. */
export const UNSUPPORTED = Symbol('unsupported');
export type Unsupported = typeof UNSUPPORTED;

export type MaybeSupported<T> = T | Unsupported;

export function isUnsupported<T>(value: MaybeSupported<T>): value is Unsupported {
  return value === UNSUPPORTED;
}

/** Single-video capabilities: URL classification and the three strategies. */
export interface VideoCapabilities {
  readonly name: string;

  readonly oembedFields: ReadonlySet<VideoField>;
  readonly apiFields: ReadonlySet<VideoField>;
  readonly scrapeFields: ReadonlySet<VideoField>;

  handlesVideoUrl(url: string): MaybeSupported<boolean>;
  getVideo(url: string, fields?: readonly string[]): VideoRecord;

  getOembedUrl(video: VideoRecord): MaybeSupported<string>;
  parseOembedResponse(body: string): MaybeSupported<VideoData>;
  getApiUrl(video: VideoRecord): MaybeSupported<string>;
  parseApiResponse(body: string): MaybeSupported<VideoData>;
  getScrapeUrl(video: VideoRecord): MaybeSupported<string>;
  parseScrapeResponse(body: string): MaybeSupported<VideoData>;
}

export interface FeedCapabilities<TResponse, TEntry> {
  handlesFeedUrl(url: string): MaybeSupported<boolean>;

  getFeedResponse(feed: VideoFeed<TResponse, TEntry>, url: string): Promise<MaybeSupported<TResponse>>;
  getFeedTitle(feed: VideoFeed<TResponse, TEntry>, response: TResponse): string | undefined;
  getFeedDescription(feed: VideoFeed<TResponse, TEntry>, response: TResponse): string | undefined;
  getFeedWebpage(feed: VideoFeed<TResponse, TEntry>, response: TResponse): string | undefined;
  getFeedGuid(feed: VideoFeed<TResponse, TEntry>, response: TResponse): string | undefined;
  getFeedLastModified(feed: VideoFeed<TResponse, TEntry>, response: TResponse): Date | undefined;
  getFeedEtag(feed: VideoFeed<TResponse, TEntry>, response: TResponse): string | undefined;
  getFeedEntryCount(feed: VideoFeed<TResponse, TEntry>, response: TResponse): number | undefined;
  getFeedEntries(feed: VideoFeed<TResponse, TEntry>, response: TResponse): MaybeSupported<TEntry[]>;
  parseFeedEntry(feed: VideoFeed<TResponse, TEntry>, entry: TEntry): MaybeSupported<VideoData>;
  getNextFeedPageUrl(feed: VideoFeed<TResponse, TEntry>, response: TResponse): string | null;
}

export interface SearchCapabilities<TResponse, TResult> {
  getSearchUrl(search: VideoSearch<TResponse, TResult>): MaybeSupported<string>;
  getSearchResponse(search: VideoSearch<TResponse, TResult>, url: string): Promise<MaybeSupported<TResponse>>;
  getSearchTotalResults(search: VideoSearch<TResponse, TResult>, response: TResponse): number | undefined;
  /** Seconds the provider reports it spent on the query. */
  getSearchTime(search: VideoSearch<TResponse, TResult>, response: TResponse): number | undefined;
  getSearchResults(search: VideoSearch<TResponse, TResult>, response: TResponse): MaybeSupported<TResult[]>;
  parseSearchResult(search: VideoSearch<TResponse, TResult>, result: TResult): MaybeSupported<VideoData>;
  getNextSearchPageUrl(search: VideoSearch<TResponse, TResult>, response: TResponse): string | null;
}

/**
 * The full contract a provider suite implements. Most suites extend
 * `BaseSuite` and override only what their provider needs.
 */
export interface Suite<TFeedResponse, TFeedEntry, TSearchResponse, TSearchResult>
  extends VideoCapabilities,
    FeedCapabilities<TFeedResponse, TFeedEntry>,
    SearchCapabilities<TSearchResponse, TSearchResult> {}

// Capability methods are declared with method syntax, so a concrete suite is
// assignable here whatever its response types.
export type AnySuite = Suite<unknown, unknown, unknown, unknown>;
