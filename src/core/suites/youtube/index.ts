// src/core/suites/youtube/index.ts
import * as cheerio from 'cheerio';
import { BaseSuite, NO_FIELDS, parseJsonBody, type FeedListing } from '../base.js';
import { UNSUPPORTED, type MaybeSupported } from '../types.js';
import type { VideoData, VideoField } from '../../types/index.js';
import type { VideoRecord } from '../../video/record.js';
import type { FeedEntry } from '../../feeds/xml.js';
import type { VideoSearch } from '../../iterate/search.js';
import type { SearchOrder } from '../../search/terms.js';
import { parseFailed } from '../../errors.js';
import {
  YOUTUBE_API_BASE,
  YOUTUBE_OEMBED_ENDPOINT,
  YOUTUBE_SEARCH_PAGE_SIZE,
} from '../../config/constants.js';
import { YouTubeParser, videoIdFromUrl, watchUrl } from './parser.js';
import {
  SearchListResponseSchema,
  VideoListResponseSchema,
  type SearchListItem,
  type YouTubeSearchPage,
} from './types.js';

export interface YouTubeSuiteOptions {
  /** YouTube Data API key. Without one the API strategy and search are unavailable. */
  apiKey?: string;
}

const API_FIELDS: ReadonlySet<VideoField> = new Set<VideoField>([
  'title', 'description', 'publishedAt', 'thumbnailUrl', 'user', 'userUrl',
  'tags', 'embedCode', 'isEmbeddable', 'link',
]);

const SCRAPE_FIELDS: ReadonlySet<VideoField> = new Set<VideoField>([
  'title', 'description', 'publishedAt', 'thumbnailUrl', 'user', 'userUrl',
  'tags', 'link',
]);

const SEARCH_ORDERS: Record<string, string> = {
  latest: 'date',
  relevant: 'relevance',
  popular: 'viewCount',
};

export class YouTubeSuite extends BaseSuite<YouTubeSearchPage, SearchListItem> {
  readonly name = 'youtube';

  protected readonly videoPattern =
    /^https?:\/\/(?:(?:www|m)\.)?(?:youtube\.com\/watch\?(?:[^#]*&)?v=[\w-]{11}|youtu\.be\/[\w-]{11})(?![\w-])/i;
  protected readonly feedPattern =
    /^https?:\/\/(?:www\.)?youtube\.com\/feeds\/videos\.xml\?(?:channel_id|playlist_id|user)=/i;
  protected readonly oembedEndpoint = YOUTUBE_OEMBED_ENDPOINT;

  private readonly apiKey?: string;
  private parser = new YouTubeParser();

  constructor(options: YouTubeSuiteOptions = {}) {
    super();
    this.apiKey = options.apiKey;
  }

  get apiFields(): ReadonlySet<VideoField> {
    return this.apiKey ? API_FIELDS : NO_FIELDS;
  }

  get scrapeFields(): ReadonlySet<VideoField> {
    return SCRAPE_FIELDS;
  }

  getApiUrl(video: VideoRecord): MaybeSupported<string> {
    const videoId = videoIdFromUrl(video.url);
    if (!this.apiKey || !videoId) {
      return UNSUPPORTED;
    }
    const params = new URLSearchParams({
      part: 'snippet,player,status',
      id: videoId,
      key: this.apiKey,
    });
    return `${YOUTUBE_API_BASE}/videos?${params}`;
  }

  parseApiResponse(body: string): MaybeSupported<VideoData> {
    const response = parseJsonBody(VideoListResponseSchema, body, 'YouTube video response');
    const item = response.items[0];
    if (!item) {
      throw parseFailed('YouTube video response contains no video');
    }
    return this.parser.parseApiVideo(item);
  }

  getScrapeUrl(video: VideoRecord): MaybeSupported<string> {
    const videoId = videoIdFromUrl(video.url);
    return videoId ? watchUrl(videoId) : UNSUPPORTED;
  }

  parseScrapeResponse(body: string): MaybeSupported<VideoData> {
    const data = this.parser.parseWatchPage(cheerio.load(body));
    if (data.description) {
      data.description = this.cleanText(data.description);
    }
    return data;
  }

  parseFeedEntry(_listing: FeedListing, entry: FeedEntry): MaybeSupported<VideoData> {
    return this.parser.parseFeedEntry(entry);
  }

  getSearchUrl(search: VideoSearch<YouTubeSearchPage, SearchListItem>): MaybeSupported<string> {
    if (!this.apiKey || !search.query) {
      return UNSUPPORTED;
    }
    const pageSize = Math.min(search.maxResults ?? YOUTUBE_SEARCH_PAGE_SIZE, YOUTUBE_SEARCH_PAGE_SIZE);
    const params = new URLSearchParams({
      part: 'snippet',
      type: 'video',
      q: search.query,
      maxResults: String(pageSize),
      key: this.apiKey,
    });
    const order = this.searchOrder(search.orderBy);
    if (order) {
      params.set('order', order);
    }
    return `${YOUTUBE_API_BASE}/search?${params}`;
  }

  async getSearchResponse(
    search: VideoSearch<YouTubeSearchPage, SearchListItem>,
    url: string
  ): Promise<MaybeSupported<YouTubeSearchPage>> {
    const response = await search.fetcher.get(url);
    const page = parseJsonBody(SearchListResponseSchema, response.body, 'YouTube search response');
    return { ...page, requestUrl: url };
  }

  getSearchTotalResults(_search: VideoSearch<YouTubeSearchPage, SearchListItem>, response: YouTubeSearchPage): number | undefined {
    return response.pageInfo?.totalResults;
  }

  getSearchResults(_search: VideoSearch<YouTubeSearchPage, SearchListItem>, response: YouTubeSearchPage): MaybeSupported<SearchListItem[]> {
    return response.items;
  }

  parseSearchResult(_search: VideoSearch<YouTubeSearchPage, SearchListItem>, result: SearchListItem): MaybeSupported<VideoData> {
    return this.parser.parseSearchItem(result);
  }

  getNextSearchPageUrl(_search: VideoSearch<YouTubeSearchPage, SearchListItem>, response: YouTubeSearchPage): string | null {
    if (!response.nextPageToken) {
      return null;
    }
    const next = new URL(response.requestUrl);
    next.searchParams.set('pageToken', response.nextPageToken);
    return next.toString();
  }

  // YouTube has a single direction per ordering, so a leading '-' is ignored.
  private searchOrder(orderBy: SearchOrder | undefined): string | undefined {
    if (!orderBy) {
      return undefined;
    }
    return SEARCH_ORDERS[orderBy.replace(/^-/, '')];
  }
}
