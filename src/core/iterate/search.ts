// src/core/iterate/search.ts
import { PaginatedIterator, type IteratorOptions } from './iterator.js';
import { searchStringFromTerms, termsFromSearchString, type SearchOrder } from '../search/terms.js';
import type { MaybeSupported, SearchCapabilities, VideoCapabilities } from '../suites/types.js';
import type { VideoData } from '../types/index.js';
import type { VideoRecord } from '../video/record.js';
import type { Fetcher } from '../http/client.js';

export interface SearchOptions extends IteratorOptions {
  /** Provider default ordering when unset. */
  orderBy?: SearchOrder;
}

export type SearchSuite<TResponse, TResult> = VideoCapabilities & SearchCapabilities<TResponse, TResult>;

/**
 * A search against one suite. Iterating runs the query and yields a record
 * per result; `totalResults` and `time` are filled from the first page when
 * the suite reports them.
 */
export class VideoSearch<TResponse, TResult> extends PaginatedIterator<TResponse, TResult> {
  readonly rawQuery: string;
  readonly includeTerms: string[];
  readonly excludeTerms: string[];
  /** Normalized form of `rawQuery`. */
  readonly query: string;
  readonly orderBy?: SearchOrder;
  readonly suite: SearchSuite<TResponse, TResult>;

  totalResults?: number;
  time?: number;

  constructor(query: string, suite: SearchSuite<TResponse, TResult>, fetcher: Fetcher, options: SearchOptions = {}) {
    super(fetcher, options);
    const { include, exclude } = termsFromSearchString(query);
    this.rawQuery = query;
    this.includeTerms = include;
    this.excludeTerms = exclude;
    this.query = searchStringFromTerms(include, exclude);
    this.orderBy = options.orderBy;
    this.suite = suite;
  }

  protected get logTag(): string {
    return 'Search';
  }

  protected getFirstUrl(): MaybeSupported<string> {
    return this.suite.getSearchUrl(this);
  }

  protected getUrlResponse(url: string): Promise<MaybeSupported<TResponse>> {
    return this.suite.getSearchResponse(this, url);
  }

  protected handleFirstResponse(response: TResponse): void {
    super.handleFirstResponse(response);
    this.totalResults = this.suite.getSearchTotalResults(this, response);
    this.time = this.suite.getSearchTime(this, response);
  }

  protected getResponseItems(response: TResponse): MaybeSupported<TResult[]> {
    return this.suite.getSearchResults(this, response);
  }

  protected getItemData(result: TResult): MaybeSupported<VideoData> {
    return this.suite.parseSearchResult(this, result);
  }

  protected getNextUrl(response: TResponse): string | null {
    return this.suite.getNextSearchPageUrl(this, response);
  }

  protected createVideo(link: string): VideoRecord {
    return this.suite.getVideo(link, this.fields);
  }
}
