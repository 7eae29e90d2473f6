// src/core/resolve/planner.ts
import type { Strategy, VideoData, VideoField } from '../types/index.js';
import type { VideoRecord } from '../video/record.js';
import type { Fetcher } from '../http/client.js';
import { isUnsupported, type MaybeSupported, type VideoCapabilities } from '../suites/types.js';

export type StrategyCoverage = Record<Strategy, ReadonlySet<VideoField>>;

/**
 * Candidate combinations in priority order: single strategies, then pairs,
 * then all three. Position in this list breaks every tie.
 */
export const STRATEGY_COMBINATIONS: readonly (readonly Strategy[])[] = [
  ['oembed'],
  ['api'],
  ['scrape'],
  ['oembed', 'api'],
  ['oembed', 'scrape'],
  ['api', 'scrape'],
  ['oembed', 'api', 'scrape'],
];

export interface PlannerOptions {
  verbose?: boolean;
}

export function coverageOf(suite: VideoCapabilities): StrategyCoverage {
  return {
    oembed: suite.oembedFields,
    api: suite.apiFields,
    scrape: suite.scrapeFields,
  };
}

/**
 * Picks the strategies to run for `missing`.
 *
 * The first combination covering every missing field wins outright.
 * Failing that, combinations are bucketed by how many fields they would
 * leave missing (only those that leave fewer than now), and the first
 * entry of the lowest bucket is chosen. Returns `null` when no combination
 * helps at all.
 */
export function selectStrategies(
  missing: ReadonlySet<VideoField>,
  coverage: StrategyCoverage
): readonly Strategy[] | null {
  if (missing.size === 0) {
    return null;
  }

  const buckets = new Map<number, (readonly Strategy[])[]>();
  for (const combination of STRATEGY_COMBINATIONS) {
    const covered = new Set<VideoField>();
    for (const strategy of combination) {
      coverage[strategy].forEach(field => covered.add(field));
    }

    let remaining = 0;
    missing.forEach(field => {
      if (!covered.has(field)) {
        remaining++;
      }
    });

    if (remaining === 0) {
      return combination;
    }
    if (remaining < missing.size) {
      const bucket = buckets.get(remaining) ?? [];
      bucket.push(combination);
      buckets.set(remaining, bucket);
    }
  }

  for (let remaining = 1; remaining < missing.size; remaining++) {
    const bucket = buckets.get(remaining);
    if (bucket) {
      return bucket[0];
    }
  }
  return null;
}

/**
 * Fills a record's missing fields with as few remote calls as the suite's
 * declared coverage allows. Calls run one after another in combination
 * order; a failed fetch or parse aborts the resolution, leaving whatever
 * was merged before it in place.
 */
export class FieldResolutionPlanner {
  constructor(
    private fetcher: Fetcher,
    private options: PlannerOptions = {}
  ) {}

  /** Runs the cheapest useful combination. No-op when nothing is missing. */
  async resolve(video: VideoRecord): Promise<VideoRecord> {
    const missing = new Set(video.missingFields);
    if (missing.size === 0) {
      return video;
    }

    const strategies = selectStrategies(missing, coverageOf(video.suite));
    if (!strategies) {
      this.log(`${video.url}: ${video.suite.name} cannot supply ${[...missing].join(', ')}`);
      return video;
    }

    this.log(`${video.url}: missing ${[...missing].join(', ')} -> ${strategies.join(' + ')}`);
    for (const strategy of strategies) {
      await this.runStrategy(video, strategy);
    }
    return video;
  }

  /** Resolves the record once; later calls do nothing. */
  async load(video: VideoRecord): Promise<VideoRecord> {
    if (!video.isLoaded()) {
      await this.resolve(video);
      video.markLoaded();
    }
    return video;
  }

  private async runStrategy(video: VideoRecord, strategy: Strategy): Promise<void> {
    const url = this.strategyUrl(video, strategy);
    if (isUnsupported(url)) {
      this.log(`${video.url}: ${strategy} URL unsupported by ${video.suite.name}, skipping`);
      return;
    }

    const response = await this.fetcher.get(url);
    const data = this.parseStrategyResponse(video, strategy, response.body);
    if (isUnsupported(data)) {
      this.log(`${video.url}: ${strategy} parsing unsupported by ${video.suite.name}, skipping`);
      return;
    }

    const applied = video.apply(data);
    this.log(`${video.url}: ${strategy} supplied ${applied.length > 0 ? applied.join(', ') : 'nothing new'}`);
  }

  private strategyUrl(video: VideoRecord, strategy: Strategy): MaybeSupported<string> {
    switch (strategy) {
      case 'oembed':
        return video.suite.getOembedUrl(video);
      case 'api':
        return video.suite.getApiUrl(video);
      case 'scrape':
        return video.suite.getScrapeUrl(video);
    }
  }

  private parseStrategyResponse(video: VideoRecord, strategy: Strategy, body: string): MaybeSupported<VideoData> {
    switch (strategy) {
      case 'oembed':
        return video.suite.parseOembedResponse(body);
      case 'api':
        return video.suite.parseApiResponse(body);
      case 'scrape':
        return video.suite.parseScrapeResponse(body);
    }
  }

  private log(message: string): void {
    if (this.options.verbose) {
      console.log(`[Resolve] ${message}`);
    }
  }
}
