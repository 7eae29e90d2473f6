// src/core/suites/base.ts
import { z } from 'zod';
import type { VideoData, VideoField } from '../types/index.js';
import { VideoRecord } from '../video/record.js';
import { emptyFeedDocument, parseDate, parseFeedXml, type FeedDocument, type FeedEntry } from '../feeds/xml.js';
import type { VideoFeed } from '../iterate/feed.js';
import type { PaginatedIterator } from '../iterate/iterator.js';
import type { Fetcher } from '../http/client.js';
import type { VideoSearch } from '../iterate/search.js';
import { parseFailed } from '../errors.js';
import { UNSUPPORTED, type MaybeSupported, type Suite } from './types.js';

const OEMBED_FIELDS: ReadonlySet<VideoField> = new Set<VideoField>([
  'title', 'user', 'userUrl', 'thumbnailUrl', 'embedCode',
]);

export const NO_FIELDS: ReadonlySet<VideoField> = new Set<VideoField>();

export const OembedResponseSchema = z.object({
  title: z.string().optional(),
  author_name: z.string().optional(),
  author_url: z.string().optional(),
  thumbnail_url: z.string().optional(),
  html: z.string().optional(),
});

/** A feed, or a search whose pages are feeds. */
export type FeedListing = PaginatedIterator<FeedDocument, FeedEntry>;

export interface FeedValidators {
  etag?: string;
  lastModified?: Date;
}

export function parseJsonBody<T extends z.ZodTypeAny>(schema: T, body: string, what: string): z.infer<T> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw parseFailed(`${what} is not valid JSON`, error);
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    throw parseFailed(`${what} has an unexpected shape`, result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return result.data;
}

/**
 * Default behaviour shared by every suite. Subclasses set the URL patterns
 * and an oEmbed endpoint, declare the fields their API and scrape can
 * supply, and override the URL builders and parsers for the strategies
 * they support. Anything left at its default reports `UNSUPPORTED`.
 *
 * Feeds default to RSS/Atom read from the feed URL. Entry parsing is left
 * to the suite, since providers put video data in different places.
 */
export abstract class BaseSuite<TSearchResponse = unknown, TSearchResult = unknown>
  implements Suite<FeedDocument, FeedEntry, TSearchResponse, TSearchResult>
{
  abstract readonly name: string;

  protected readonly videoPattern?: RegExp;
  protected readonly feedPattern?: RegExp;
  protected readonly oembedEndpoint?: string;

  /** Fields commonly present in oEmbed responses; empty without an endpoint. */
  get oembedFields(): ReadonlySet<VideoField> {
    return this.oembedEndpoint === undefined ? NO_FIELDS : OEMBED_FIELDS;
  }

  get apiFields(): ReadonlySet<VideoField> {
    return NO_FIELDS;
  }

  get scrapeFields(): ReadonlySet<VideoField> {
    return NO_FIELDS;
  }

  handlesVideoUrl(url: string): MaybeSupported<boolean> {
    return this.videoPattern ? this.videoPattern.test(url) : UNSUPPORTED;
  }

  handlesFeedUrl(url: string): MaybeSupported<boolean> {
    return this.feedPattern ? this.feedPattern.test(url) : UNSUPPORTED;
  }

  getVideo(url: string, fields?: readonly string[]): VideoRecord {
    return new VideoRecord(url, this, fields);
  }

  getOembedUrl(video: VideoRecord): MaybeSupported<string> {
    if (this.oembedEndpoint === undefined) {
      return UNSUPPORTED;
    }
    return `${this.oembedEndpoint}?${new URLSearchParams({ url: video.url })}`;
  }

  parseOembedResponse(body: string): MaybeSupported<VideoData> {
    const parsed = parseJsonBody(OembedResponseSchema, body, 'oEmbed response');
    return {
      title: parsed.title,
      user: parsed.author_name,
      userUrl: parsed.author_url,
      thumbnailUrl: parsed.thumbnail_url,
      embedCode: parsed.html,
    };
  }

  getApiUrl(_video: VideoRecord): MaybeSupported<string> {
    return UNSUPPORTED;
  }

  parseApiResponse(_body: string): MaybeSupported<VideoData> {
    return UNSUPPORTED;
  }

  getScrapeUrl(_video: VideoRecord): MaybeSupported<string> {
    return UNSUPPORTED;
  }

  parseScrapeResponse(_body: string): MaybeSupported<VideoData> {
    return UNSUPPORTED;
  }

  async getFeedResponse(feed: VideoFeed<FeedDocument, FeedEntry>, url: string): Promise<MaybeSupported<FeedDocument>> {
    // Validators go with the first page only.
    const validators = feed.pagesFetched === 0 ? { etag: feed.etag, lastModified: feed.lastModified } : {};
    return this.fetchFeedDocument(feed.fetcher, url, validators);
  }

  /**
   * GETs and parses an RSS/Atom document. With validators the request is
   * conditional, and a 304 answer becomes an empty document that keeps them.
   */
  protected async fetchFeedDocument(fetcher: Fetcher, url: string, validators: FeedValidators = {}): Promise<FeedDocument> {
    const headers: Record<string, string> = {};
    if (validators.etag) {
      headers['If-None-Match'] = validators.etag;
    }
    if (validators.lastModified) {
      headers['If-Modified-Since'] = validators.lastModified.toUTCString();
    }

    const response = await fetcher.get(url, { headers, acceptStatus: [304] });
    if (response.status === 304) {
      return emptyFeedDocument(validators.etag, validators.lastModified);
    }

    const doc = parseFeedXml(response.body);
    return {
      ...doc,
      updated: doc.updated ?? parseDate(response.headers['last-modified']),
      etag: response.headers['etag'],
    };
  }

  getFeedTitle(_feed: VideoFeed<FeedDocument, FeedEntry>, response: FeedDocument): string | undefined {
    return response.title;
  }

  getFeedDescription(_feed: VideoFeed<FeedDocument, FeedEntry>, response: FeedDocument): string | undefined {
    return response.subtitle;
  }

  getFeedWebpage(_feed: VideoFeed<FeedDocument, FeedEntry>, response: FeedDocument): string | undefined {
    return response.link;
  }

  getFeedGuid(_feed: VideoFeed<FeedDocument, FeedEntry>, response: FeedDocument): string | undefined {
    return response.id;
  }

  getFeedLastModified(_feed: VideoFeed<FeedDocument, FeedEntry>, response: FeedDocument): Date | undefined {
    return response.updated;
  }

  getFeedEtag(_feed: VideoFeed<FeedDocument, FeedEntry>, response: FeedDocument): string | undefined {
    return response.etag;
  }

  getFeedEntryCount(_feed: VideoFeed<FeedDocument, FeedEntry>, _response: FeedDocument): number | undefined {
    return undefined;
  }

  getFeedEntries(_listing: FeedListing, response: FeedDocument): MaybeSupported<FeedEntry[]> {
    return response.entries;
  }

  parseFeedEntry(_listing: FeedListing, _entry: FeedEntry): MaybeSupported<VideoData> {
    return UNSUPPORTED;
  }

  /** The Atom `rel="next"` link, when the feed is paged. */
  getNextFeedPageUrl(_listing: FeedListing, response: FeedDocument): string | null {
    return response.next ?? null;
  }

  getSearchUrl(_search: VideoSearch<TSearchResponse, TSearchResult>): MaybeSupported<string> {
    return UNSUPPORTED;
  }

  async getSearchResponse(
    _search: VideoSearch<TSearchResponse, TSearchResult>,
    _url: string
  ): Promise<MaybeSupported<TSearchResponse>> {
    return UNSUPPORTED;
  }

  getSearchTotalResults(_search: VideoSearch<TSearchResponse, TSearchResult>, _response: TSearchResponse): number | undefined {
    return undefined;
  }

  getSearchTime(_search: VideoSearch<TSearchResponse, TSearchResult>, _response: TSearchResponse): number | undefined {
    return undefined;
  }

  getSearchResults(_search: VideoSearch<TSearchResponse, TSearchResult>, _response: TSearchResponse): MaybeSupported<TSearchResult[]> {
    return UNSUPPORTED;
  }

  parseSearchResult(_search: VideoSearch<TSearchResponse, TSearchResult>, _result: TSearchResult): MaybeSupported<VideoData> {
    return UNSUPPORTED;
  }

  getNextSearchPageUrl(_search: VideoSearch<TSearchResponse, TSearchResult>, _response: TSearchResponse): string | null {
    return null;
  }

  protected cleanText(text: string): string {
    return text
      .replace(/[ \t]+/g, ' ')
      .replace(/\n[ \t]+\n/g, '\n\n')
      .replace(/\n{3,}/g, '\n\n')
      .replace(/^ | $/gm, '')
      .trim();
  }
}
