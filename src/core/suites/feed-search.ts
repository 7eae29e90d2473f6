// src/core/suites/feed-search.ts
import { BaseSuite } from './base.js';
import type { MaybeSupported } from './types.js';
import type { FeedDocument, FeedEntry } from '../feeds/xml.js';
import type { VideoSearch } from '../iterate/search.js';
import type { VideoData } from '../types/index.js';

/**
 * Base for providers whose search results come back as an RSS/Atom feed.
 * Subclasses only build the search URL; pages are read, split into entries
 * and parsed exactly like the suite's feeds.
 */
export abstract class FeedSearchSuite extends BaseSuite<FeedDocument, FeedEntry> {
  async getSearchResponse(
    search: VideoSearch<FeedDocument, FeedEntry>,
    url: string
  ): Promise<MaybeSupported<FeedDocument>> {
    return this.fetchFeedDocument(search.fetcher, url);
  }

  getSearchResults(search: VideoSearch<FeedDocument, FeedEntry>, response: FeedDocument): MaybeSupported<FeedEntry[]> {
    return this.getFeedEntries(search, response);
  }

  parseSearchResult(search: VideoSearch<FeedDocument, FeedEntry>, result: FeedEntry): MaybeSupported<VideoData> {
    return this.parseFeedEntry(search, result);
  }

  getNextSearchPageUrl(search: VideoSearch<FeedDocument, FeedEntry>, response: FeedDocument): string | null {
    return this.getNextFeedPageUrl(search, response);
  }
}
