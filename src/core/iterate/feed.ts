// src/core/iterate/feed.ts
import { PaginatedIterator, type IteratorOptions } from './iterator.js';
import type { FeedCapabilities, MaybeSupported, VideoCapabilities } from '../suites/types.js';
import type { VideoData } from '../types/index.js';
import type { VideoRecord } from '../video/record.js';
import type { Fetcher } from '../http/client.js';

export interface FeedOptions extends IteratorOptions {
  /** Sent as If-Modified-Since on the first request. */
  lastModified?: Date;
  /** Sent as If-None-Match on the first request. */
  etag?: string;
}

export type FeedSuite<TResponse, TEntry> = VideoCapabilities & FeedCapabilities<TResponse, TEntry>;

/**
 * A list of videos found at a URL: an RSS/Atom feed, an API listing or a
 * scraped page, whichever the suite understands.
 *
 * The metadata fields stay unset until the first page has been fetched;
 * `lastModified` and `etag` start out as the values given in the options.
 */
export class VideoFeed<TResponse, TEntry> extends PaginatedIterator<TResponse, TEntry> {
  readonly url: string;
  readonly suite: FeedSuite<TResponse, TEntry>;

  title?: string;
  description?: string;
  webpage?: string;
  guid?: string;
  entryCount?: number;
  lastModified?: Date;
  etag?: string;

  constructor(url: string, suite: FeedSuite<TResponse, TEntry>, fetcher: Fetcher, options: FeedOptions = {}) {
    super(fetcher, options);
    this.url = url;
    this.suite = suite;
    this.lastModified = options.lastModified;
    this.etag = options.etag;
  }

  protected get logTag(): string {
    return 'Feed';
  }

  protected getFirstUrl(): MaybeSupported<string> {
    return this.url;
  }

  protected getUrlResponse(url: string): Promise<MaybeSupported<TResponse>> {
    return this.suite.getFeedResponse(this, url);
  }

  protected handleFirstResponse(response: TResponse): void {
    super.handleFirstResponse(response);
    this.title = this.suite.getFeedTitle(this, response);
    this.entryCount = this.suite.getFeedEntryCount(this, response);
    this.description = this.suite.getFeedDescription(this, response);
    this.webpage = this.suite.getFeedWebpage(this, response);
    this.guid = this.suite.getFeedGuid(this, response);
    this.lastModified = this.suite.getFeedLastModified(this, response);
    this.etag = this.suite.getFeedEtag(this, response);
  }

  protected getResponseItems(response: TResponse): MaybeSupported<TEntry[]> {
    return this.suite.getFeedEntries(this, response);
  }

  protected getItemData(entry: TEntry): MaybeSupported<VideoData> {
    return this.suite.parseFeedEntry(this, entry);
  }

  protected getNextUrl(response: TResponse): string | null {
    return this.suite.getNextFeedPageUrl(this, response);
  }

  protected createVideo(link: string): VideoRecord {
    return this.suite.getVideo(link, this.fields);
  }
}
