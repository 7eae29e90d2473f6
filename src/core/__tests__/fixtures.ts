// src/core/__tests__/fixtures.ts
import { z } from 'zod';
import { BaseSuite, NO_FIELDS, parseJsonBody, type FeedListing } from '../suites/base.js';
import type { MaybeSupported } from '../suites/types.js';
import type { Fetcher, HttpResponse, RequestOptions } from '../http/client.js';
import type { FeedEntry } from '../feeds/xml.js';
import type { VideoSearch } from '../iterate/search.js';
import type { VideoData, VideoField } from '../types/index.js';
import type { VideoRecord } from '../video/record.js';
import { ErrorCode, VidError } from '../errors.js';

/** In-process stand-in for the network. Unknown URLs answer 404. */
export class FakeFetcher implements Fetcher {
  readonly requests: Array<{ url: string; options?: RequestOptions }> = [];
  private routes = new Map<string, HttpResponse | Error>();

  respond(url: string, body: string, init: { status?: number; headers?: Record<string, string> } = {}): this {
    this.routes.set(url, { url, status: init.status ?? 200, headers: init.headers ?? {}, body });
    return this;
  }

  fail(url: string, error: Error): this {
    this.routes.set(url, error);
    return this;
  }

  get urls(): string[] {
    return this.requests.map(request => request.url);
  }

  async get(url: string, options?: RequestOptions): Promise<HttpResponse> {
    this.requests.push({ url, options });
    const route = this.routes.get(url);
    if (route === undefined) {
      throw new VidError(ErrorCode.FETCH_FAILED, `HTTP 404: Not Found (${url})`, false, undefined, { url, status: 404 });
    }
    if (route instanceof Error) {
      throw route;
    }
    return route;
  }
}

export interface StubCoverage {
  oembed?: VideoField[];
  api?: VideoField[];
  scrape?: VideoField[];
}

const StubPayloadSchema = z.record(z.union([z.string(), z.boolean(), z.array(z.string())]));

function stubData(body: string): VideoData {
  const payload = parseJsonBody(StubPayloadSchema, body, 'stub response');
  const data: VideoData = {};
  for (const [key, value] of Object.entries(payload)) {
    if (key === 'title' && typeof value === 'string') data.title = value;
    if (key === 'description' && typeof value === 'string') data.description = value;
    if (key === 'thumbnailUrl' && typeof value === 'string') data.thumbnailUrl = value;
    if (key === 'fileUrl' && typeof value === 'string') data.fileUrl = value;
    if (key === 'user' && typeof value === 'string') data.user = value;
    if (key === 'embedCode' && typeof value === 'string') data.embedCode = value;
    if (key === 'link' && typeof value === 'string') data.link = value;
    if (key === 'tags' && Array.isArray(value)) data.tags = value;
  }
  return data;
}

export const STUB_OEMBED = 'https://stub.test/oembed';

export function stubUrl(strategy: 'api' | 'scrape', video: VideoRecord): string {
  return `https://stub.test/${strategy}?v=${encodeURIComponent(video.url)}`;
}

export function oembedUrl(videoUrl: string): string {
  return `${STUB_OEMBED}?${new URLSearchParams({ url: videoUrl })}`;
}

/**
 * Suite with configurable coverage. Every strategy answers a flat JSON
 * object of field values.
 */
export class StubSuite extends BaseSuite {
  readonly name: string;
  protected readonly videoPattern = /^https:\/\/stub\.test\/v\//;
  protected readonly feedPattern = /^https:\/\/stub\.test\/feed/;
  protected readonly oembedEndpoint = STUB_OEMBED;

  private coverage: StubCoverage;

  constructor(coverage: StubCoverage = {}, name = 'stub') {
    super();
    this.coverage = coverage;
    this.name = name;
  }

  get oembedFields(): ReadonlySet<VideoField> {
    return this.coverage.oembed ? new Set(this.coverage.oembed) : NO_FIELDS;
  }

  get apiFields(): ReadonlySet<VideoField> {
    return this.coverage.api ? new Set(this.coverage.api) : NO_FIELDS;
  }

  get scrapeFields(): ReadonlySet<VideoField> {
    return this.coverage.scrape ? new Set(this.coverage.scrape) : NO_FIELDS;
  }

  parseOembedResponse(body: string): MaybeSupported<VideoData> {
    return stubData(body);
  }

  getApiUrl(video: VideoRecord): MaybeSupported<string> {
    return stubUrl('api', video);
  }

  parseApiResponse(body: string): MaybeSupported<VideoData> {
    return stubData(body);
  }

  getScrapeUrl(video: VideoRecord): MaybeSupported<string> {
    return stubUrl('scrape', video);
  }

  parseScrapeResponse(body: string): MaybeSupported<VideoData> {
    return stubData(body);
  }

  parseFeedEntry(_listing: FeedListing, entry: FeedEntry): MaybeSupported<VideoData> {
    return { title: entry.title, link: entry.link, description: entry.summary };
  }
}

export function atomPage(options: {
  title?: string;
  links: string[];
  next?: string;
  updated?: string;
}): string {
  const entries = options.links
    .map((link, i) => `<entry><id>${link}</id><title>Video ${i + 1}</title><link href="${link}"/></entry>`)
    .join('');
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<feed xmlns="http://www.w3.org/2005/Atom">',
    `<title>${options.title ?? 'Stub feed'}</title>`,
    '<id>urn:stub:feed</id>',
    options.updated ? `<updated>${options.updated}</updated>` : '',
    '<link rel="alternate" href="https://stub.test/channel"/>',
    options.next ? `<link rel="next" href="${options.next.replace(/&/g, '&amp;')}"/>` : '',
    entries,
    '</feed>',
  ].join('');
}

/** Registers `pageCount` Atom pages of `perPage` videos, chained by rel="next". */
export function registerFeedPages(fetcher: FakeFetcher, pageCount: number, perPage: number, base = 'https://stub.test/feed'): string[] {
  const pageUrls = Array.from({ length: pageCount }, (_, i) => (i === 0 ? base : `${base}?page=${i + 1}`));
  pageUrls.forEach((url, page) => {
    const links = Array.from({ length: perPage }, (_, i) => `https://stub.test/v/${page * perPage + i + 1}`);
    fetcher.respond(url, atomPage({ title: `Page ${page + 1}`, links, next: pageUrls[page + 1] }));
  });
  return pageUrls;
}

const SearchPageSchema = z.object({
  total: z.number().optional(),
  took: z.number().optional(),
  next: z.string().optional(),
  results: z.array(z.object({ link: z.string().optional(), title: z.string().optional() })),
});

export type StubSearchPage = z.infer<typeof SearchPageSchema>;
export type StubSearchResult = StubSearchPage['results'][number];

export class StubSearchSuite extends BaseSuite<StubSearchPage, StubSearchResult> {
  readonly name = 'stub-search';
  protected readonly videoPattern = /^https:\/\/stub\.test\/v\//;

  getSearchUrl(search: VideoSearch<StubSearchPage, StubSearchResult>): MaybeSupported<string> {
    const params = new URLSearchParams({ q: search.query });
    if (search.orderBy) {
      params.set('order', search.orderBy);
    }
    return `https://stub.test/search?${params}`;
  }

  async getSearchResponse(
    search: VideoSearch<StubSearchPage, StubSearchResult>,
    url: string
  ): Promise<MaybeSupported<StubSearchPage>> {
    const response = await search.fetcher.get(url);
    return parseJsonBody(SearchPageSchema, response.body, 'stub search page');
  }

  getSearchTotalResults(_search: VideoSearch<StubSearchPage, StubSearchResult>, response: StubSearchPage): number | undefined {
    return response.total;
  }

  getSearchTime(_search: VideoSearch<StubSearchPage, StubSearchResult>, response: StubSearchPage): number | undefined {
    return response.took;
  }

  getSearchResults(_search: VideoSearch<StubSearchPage, StubSearchResult>, response: StubSearchPage): MaybeSupported<StubSearchResult[]> {
    return response.results;
  }

  parseSearchResult(_search: VideoSearch<StubSearchPage, StubSearchResult>, result: StubSearchResult): MaybeSupported<VideoData> {
    return { link: result.link, title: result.title };
  }

  getNextSearchPageUrl(_search: VideoSearch<StubSearchPage, StubSearchResult>, response: StubSearchPage): string | null {
    return response.next ?? null;
  }
}
