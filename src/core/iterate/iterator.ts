// src/core/iterate/iterator.ts
import { ErrorCode, VidError, parseFailed } from '../errors.js';
import { isUnsupported, type MaybeSupported } from '../suites/types.js';
import type { VideoData } from '../types/index.js';
import type { VideoRecord } from '../video/record.js';
import type { Fetcher } from '../http/client.js';

export type IteratorState = 'init' | 'fetching' | 'emitting' | 'done';

export interface IteratorOptions {
  /** Requested fields for every record the iterator creates. */
  fields?: readonly string[];
  /** Continue onto later pages once the current one is exhausted. */
  crawl?: boolean;
  maxResults?: number;
  verbose?: boolean;
}

/**
 * Page-by-page walk over a remote listing that yields one `VideoRecord` per
 * item. Feeds and searches differ only in how the hooks below reach their
 * suite.
 *
 * Pages are fetched one at a time and only when the consumer asks for more
 * records than the current page holds, so stopping a `for await` loop stops
 * all fetching. An iterator can be consumed once.
 */
export abstract class PaginatedIterator<TResponse, TItem> implements AsyncIterable<VideoRecord> {
  readonly fields?: readonly string[];
  readonly crawl: boolean;
  readonly maxResults?: number;
  readonly fetcher: Fetcher;
  protected readonly verbose: boolean;

  private _state: IteratorState = 'init';
  private _emitted = 0;
  private _pagesFetched = 0;
  private started = false;
  protected firstResponseFetched = false;

  constructor(fetcher: Fetcher, options: IteratorOptions = {}) {
    this.fetcher = fetcher;
    this.fields = options.fields;
    this.crawl = options.crawl ?? false;
    this.maxResults = options.maxResults;
    this.verbose = options.verbose ?? false;
  }

  get state(): IteratorState {
    return this._state;
  }

  get emittedCount(): number {
    return this._emitted;
  }

  get pagesFetched(): number {
    return this._pagesFetched;
  }

  protected abstract get logTag(): string;
  protected abstract getFirstUrl(): MaybeSupported<string>;
  protected abstract getUrlResponse(url: string): Promise<MaybeSupported<TResponse>>;
  protected abstract getResponseItems(response: TResponse): MaybeSupported<TItem[]>;
  protected abstract getItemData(item: TItem): MaybeSupported<VideoData>;
  protected abstract getNextUrl(response: TResponse): string | null;
  protected abstract createVideo(link: string): VideoRecord;

  /** Reads the listing's metadata. Runs once, on the first page. */
  protected handleFirstResponse(_response: TResponse): void {
    this.firstResponseFetched = true;
  }

  [Symbol.asyncIterator](): AsyncGenerator<VideoRecord, void, undefined> {
    if (this.started) {
      throw new VidError(
        ErrorCode.ITERATOR_CONSUMED,
        'This iterator has already been consumed',
        false,
        'Create a new feed or search to iterate again'
      );
    }
    this.started = true;
    return this.run();
  }

  /** Collects every record into an array. */
  async toArray(): Promise<VideoRecord[]> {
    const videos: VideoRecord[] = [];
    for await (const video of this) {
      videos.push(video);
    }
    return videos;
  }

  private async *run(): AsyncGenerator<VideoRecord, void, undefined> {
    try {
      if (this.maxResults !== undefined && this.maxResults <= 0) {
        return;
      }

      const firstUrl = this.getFirstUrl();
      if (isUnsupported(firstUrl)) {
        this.log('suite cannot build a first page URL; nothing to iterate');
        return;
      }

      let url: string | null = firstUrl;

      while (url !== null) {
        this._state = 'fetching';
        this.log(`fetching page ${this._pagesFetched + 1}: ${url}`);
        const response = await this.getUrlResponse(url);
        this._pagesFetched++;
        if (isUnsupported(response)) {
          return;
        }
        if (!this.firstResponseFetched) {
          this.handleFirstResponse(response);
        }

        const items = this.getResponseItems(response);
        if (isUnsupported(items)) {
          return;
        }

        this._state = 'emitting';
        for (const item of items) {
          const data = this.getItemData(item);
          if (isUnsupported(data)) {
            return;
          }
          const video = this.materialize(data);
          this._emitted++;
          yield video;
          if (this.maxResults !== undefined && this._emitted >= this.maxResults) {
            return;
          }
        }

        // Crawl on only past a non-empty page and only if the suite can
        // compute where the next one lives.
        url = this.crawl && items.length > 0 ? this.getNextUrl(response) : null;
      }
    } finally {
      this._state = 'done';
    }
  }

  private materialize(data: VideoData): VideoRecord {
    if (!data.link) {
      throw parseFailed(`${this.logTag} item has no link`);
    }
    const video = this.createVideo(data.link);
    video.apply(data);
    return video;
  }

  protected log(message: string): void {
    if (this.verbose) {
      console.log(`[${this.logTag}] ${message}`);
    }
  }
}
