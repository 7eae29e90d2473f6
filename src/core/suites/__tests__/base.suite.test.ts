// src/core/suites/__tests__/base.suite.test.ts
import { describe, it, expect } from '@jest/globals';
import { BaseSuite, parseJsonBody } from '../base.js';
import { UNSUPPORTED, isUnsupported } from '../types.js';
import { z } from 'zod';
import { ErrorCode } from '../../errors.js';
import { VideoFeed } from '../../iterate/feed.js';
import { FakeFetcher } from '../../__tests__/fixtures.js';

class MinimalSuite extends BaseSuite {
  readonly name = 'minimal';
}

class EmbedSuite extends BaseSuite {
  readonly name = 'embed';
  protected readonly videoPattern = /^https:\/\/embed\.test\//;
  protected readonly oembedEndpoint = 'https://embed.test/oembed';
}

describe('BaseSuite', () => {
  it('should report every capability as unsupported by default', () => {
    const suite = new MinimalSuite();
    const video = suite.getVideo('https://minimal.test/v/1');

    expect(suite.handlesVideoUrl('https://minimal.test/v/1')).toBe(UNSUPPORTED);
    expect(suite.handlesFeedUrl('https://minimal.test/feed')).toBe(UNSUPPORTED);
    expect(suite.getOembedUrl(video)).toBe(UNSUPPORTED);
    expect(suite.getApiUrl(video)).toBe(UNSUPPORTED);
    expect(suite.getScrapeUrl(video)).toBe(UNSUPPORTED);
    expect(suite.parseApiResponse('{}')).toBe(UNSUPPORTED);
    expect(suite.parseScrapeResponse('<html></html>')).toBe(UNSUPPORTED);
  });

  it('should declare no coverage without an oEmbed endpoint', () => {
    const suite = new MinimalSuite();

    expect(suite.oembedFields.size).toBe(0);
    expect(suite.apiFields.size).toBe(0);
    expect(suite.scrapeFields.size).toBe(0);
  });

  it('should declare the common oEmbed fields with an endpoint', () => {
    expect([...new EmbedSuite().oembedFields]).toEqual(['title', 'user', 'userUrl', 'thumbnailUrl', 'embedCode']);
  });

  it('should classify URLs by its pattern', () => {
    const suite = new EmbedSuite();

    expect(suite.handlesVideoUrl('https://embed.test/movie')).toBe(true);
    expect(suite.handlesVideoUrl('https://other.test/movie')).toBe(false);
  });

  it('should build the oEmbed URL from the endpoint', () => {
    const suite = new EmbedSuite();
    const video = suite.getVideo('https://embed.test/movie?id=1');

    expect(suite.getOembedUrl(video)).toBe('https://embed.test/oembed?url=https%3A%2F%2Fembed.test%2Fmovie%3Fid%3D1');
  });

  it('should map oEmbed keys onto video fields', () => {
    const data = new EmbedSuite().parseOembedResponse(JSON.stringify({
      type: 'video',
      title: 'Movie',
      author_name: 'Uploader',
      author_url: 'https://embed.test/u/uploader',
      thumbnail_url: 'https://embed.test/t.jpg',
      html: '<iframe></iframe>',
    }));

    expect(data).toEqual({
      title: 'Movie',
      user: 'Uploader',
      userUrl: 'https://embed.test/u/uploader',
      thumbnailUrl: 'https://embed.test/t.jpg',
      embedCode: '<iframe></iframe>',
    });
  });

  it('should create records bound to itself', () => {
    const suite = new EmbedSuite();
    const video = suite.getVideo('https://embed.test/movie', ['title']);

    expect(video.suite).toBe(suite);
    expect(video.fields).toEqual(['title']);
  });

  it('should take the next feed page from the Atom next link', () => {
    const suite = new MinimalSuite();
    const feed = new VideoFeed('https://minimal.test/feed', suite, new FakeFetcher());

    expect(suite.getNextFeedPageUrl(feed, { entries: [], next: 'https://minimal.test/feed?page=2' })).toBe(
      'https://minimal.test/feed?page=2'
    );
    expect(suite.getNextFeedPageUrl(feed, { entries: [] })).toBeNull();
  });

  it('should narrow with isUnsupported', () => {
    const value = new MinimalSuite().getApiUrl(new MinimalSuite().getVideo('https://minimal.test/v/1'));

    expect(isUnsupported(value)).toBe(true);
  });
});

describe('parseJsonBody', () => {
  const schema = z.object({ count: z.number() });

  it('should return the validated value', () => {
    expect(parseJsonBody(schema, '{"count":3}', 'counter')).toEqual({ count: 3 });
  });

  it('should reject invalid JSON', () => {
    expect(() => parseJsonBody(schema, '{', 'counter')).toThrow(
      expect.objectContaining({ code: ErrorCode.PARSE_FAILED })
    );
  });

  it('should describe a shape mismatch', () => {
    expect(() => parseJsonBody(schema, '{"count":"3"}', 'counter')).toThrow(
      'counter has an unexpected shape: count: Expected number, received string'
    );
  });
});
