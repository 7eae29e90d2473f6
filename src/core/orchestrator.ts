// src/core/orchestrator.ts
import { HttpClient, type Fetcher } from './http/client.js';
import { FieldResolutionPlanner } from './resolve/planner.js';
import { SuiteRegistry, createDefaultRegistry } from './suites/registry.js';
import { isUnsupported, type AnySuite } from './suites/types.js';
import { VideoFeed, type FeedOptions } from './iterate/feed.js';
import { VideoSearch, type SearchOptions } from './iterate/search.js';
import type { VideoRecord } from './video/record.js';
import { ErrorCode, VidError, unresolvableUrl } from './errors.js';
import { isValidUrl, normalizeUrl } from './utils/url.js';

export interface OrchestratorOptions {
  registry?: SuiteRegistry;
  fetcher?: Fetcher;
  timeout?: number;
  youtubeApiKey?: string;
  verbose?: boolean;
}

export interface VideoOptions {
  /** Suite to use instead of looking one up; it must still claim the URL. */
  suite?: AnySuite;
  fields?: readonly string[];
}

export type FeedRequest = FeedOptions & { suite?: AnySuite };

/**
 * Entry point tying a suite registry to one fetcher. Each call returns its
 * own record or iterator; nothing is shared between them but the fetcher.
 */
export class VidOrchestrator {
  readonly registry: SuiteRegistry;
  private fetcher: Fetcher;
  private planner: FieldResolutionPlanner;
  private verbose: boolean;

  constructor(options: OrchestratorOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.registry = options.registry
      ?? createDefaultRegistry({ youtube: { apiKey: options.youtubeApiKey } });
    this.fetcher = options.fetcher
      ?? new HttpClient({ timeout: options.timeout, verbose: this.verbose });
    this.planner = new FieldResolutionPlanner(this.fetcher, { verbose: this.verbose });
  }

  /** Creates an unloaded record for `url`. */
  video(url: string, options: VideoOptions = {}): VideoRecord {
    const normalizedUrl = this.validateUrl(url);
    const suite = options.suite ?? this.registry.resolveForVideoUrl(normalizedUrl);
    if (options.suite) {
      const handles = options.suite.handlesVideoUrl(normalizedUrl);
      if (isUnsupported(handles) || !handles) {
        throw unresolvableUrl(normalizedUrl, 'video');
      }
    }
    return suite.getVideo(normalizedUrl, options.fields);
  }

  /** Creates a record for `url` and fills its requested fields. */
  async loadVideo(url: string, options: VideoOptions = {}): Promise<VideoRecord> {
    return this.planner.load(this.video(url, options));
  }

  /** Fills whatever is still missing on `video`, even if it was loaded before. */
  async resolveMissingFields(video: VideoRecord): Promise<VideoRecord> {
    return this.planner.resolve(video);
  }

  feed(url: string, options: FeedRequest = {}): VideoFeed<unknown, unknown> {
    const normalizedUrl = this.validateUrl(url);
    const { suite: explicitSuite, ...feedOptions } = options;
    const suite = explicitSuite ?? this.registry.resolveForFeedUrl(normalizedUrl);
    if (explicitSuite) {
      const handles = explicitSuite.handlesFeedUrl(normalizedUrl);
      if (isUnsupported(handles) || !handles) {
        throw unresolvableUrl(normalizedUrl, 'feed');
      }
    }
    return new VideoFeed(normalizedUrl, suite, this.fetcher, {
      verbose: this.verbose,
      ...feedOptions,
    });
  }

  search(query: string, suite: AnySuite | string, options: SearchOptions = {}): VideoSearch<unknown, unknown> {
    const target = typeof suite === 'string' ? this.registry.get(suite) : suite;
    if (!target) {
      throw new VidError(
        ErrorCode.UNKNOWN_SUITE,
        `No suite registered under the name: ${String(suite)}`,
        false,
        `Registered suites: ${this.registry.suites.map(s => s.name).join(', ')}`
      );
    }
    return new VideoSearch(query, target, this.fetcher, {
      verbose: this.verbose,
      ...options,
    });
  }

  private validateUrl(url: string): string {
    if (!isValidUrl(url)) {
      throw new VidError(ErrorCode.INVALID_URL, `Invalid URL: ${url}`);
    }
    return normalizeUrl(url);
  }
}
