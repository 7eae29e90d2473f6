// src/index.ts
export { VidOrchestrator, type OrchestratorOptions, type VideoOptions, type FeedRequest } from './core/orchestrator.js';
export { VideoRecord } from './core/video/record.js';
export { SuiteRegistry, createDefaultRegistry } from './core/suites/registry.js';
export { BaseSuite, parseJsonBody, type FeedListing } from './core/suites/base.js';
export { FeedSearchSuite } from './core/suites/feed-search.js';
export { YouTubeSuite, type YouTubeSuiteOptions } from './core/suites/youtube/index.js';
export {
  UNSUPPORTED,
  isUnsupported,
  type AnySuite,
  type FeedCapabilities,
  type MaybeSupported,
  type SearchCapabilities,
  type Suite,
  type Unsupported,
  type VideoCapabilities,
} from './core/suites/types.js';
export { FieldResolutionPlanner, STRATEGY_COMBINATIONS, selectStrategies } from './core/resolve/planner.js';
export { PaginatedIterator, type IteratorOptions, type IteratorState } from './core/iterate/iterator.js';
export { VideoFeed, type FeedOptions } from './core/iterate/feed.js';
export { VideoSearch, type SearchOptions } from './core/iterate/search.js';
export { HttpClient, type Fetcher, type HttpResponse, type RequestOptions } from './core/http/client.js';
export { parseFeedXml, type FeedDocument, type FeedEntry } from './core/feeds/xml.js';
export { searchStringFromTerms, termsFromSearchString, type SearchOrder } from './core/search/terms.js';
export { ErrorCode, VidError } from './core/errors.js';
export { VIDEO_FIELDS, type Strategy, type VideoData, type VideoField, type VideoFields } from './core/types/index.js';
