// src/core/suites/__tests__/registry.test.ts
import { describe, it, expect } from '@jest/globals';
import { SuiteRegistry, createDefaultRegistry } from '../registry.js';
import { BaseSuite } from '../base.js';
import { YouTubeSuite } from '../youtube/index.js';
import { ErrorCode } from '../../errors.js';
import { FakeFetcher, StubSuite } from '../../__tests__/fixtures.js';

class UnclassifiedSuite extends BaseSuite {
  readonly name = 'unclassified';
}

describe('SuiteRegistry', () => {
  it('should resolve the first suite that claims a URL', () => {
    const first = new StubSuite({}, 'first');
    const second = new StubSuite({}, 'second');
    const registry = new SuiteRegistry([first, second]);

    expect(registry.resolveForVideoUrl('https://stub.test/v/1')).toBe(first);
    expect(registry.resolveForFeedUrl('https://stub.test/feed')).toBe(first);
  });

  it('should raise UNRESOLVABLE_URL without fetching anything', () => {
    const fetcher = new FakeFetcher();
    const registry = new SuiteRegistry([new StubSuite()]);

    expect(() => registry.resolveForVideoUrl('https://elsewhere.test/v/1')).toThrow(
      expect.objectContaining({ code: ErrorCode.UNRESOLVABLE_URL })
    );
    expect(fetcher.requests).toHaveLength(0);
  });

  it('should report the URL kind in the error', () => {
    const registry = new SuiteRegistry();

    expect(() => registry.resolveForFeedUrl('https://stub.test/nothing')).toThrow(
      'No suite handles feed URL: https://stub.test/nothing'
    );
  });

  it('should pass over suites without a classifier', () => {
    const stub = new StubSuite();
    const registry = new SuiteRegistry([new UnclassifiedSuite(), stub]);

    expect(registry.resolveForVideoUrl('https://stub.test/v/1')).toBe(stub);
  });

  it('should ignore a second registration of the same instance', () => {
    const stub = new StubSuite();
    const registry = new SuiteRegistry([stub]);

    registry.register(stub);

    expect(registry.suites).toEqual([stub]);
  });

  it('should unregister a suite', () => {
    const stub = new StubSuite();
    const other = new StubSuite({}, 'other');
    const registry = new SuiteRegistry([stub, other]);

    registry.unregister(stub);

    expect(registry.suites).toEqual([other]);
    expect(registry.resolveForVideoUrl('https://stub.test/v/1')).toBe(other);
  });

  it('should look suites up by name', () => {
    const stub = new StubSuite({}, 'named');
    const registry = new SuiteRegistry([stub]);

    expect(registry.get('named')).toBe(stub);
    expect(registry.get('missing')).toBeUndefined();
  });

  it('should return a copy of its suites', () => {
    const registry = new SuiteRegistry([new StubSuite()]);

    const suites = registry.suites;

    expect(suites).not.toBe(registry.suites);
    expect(suites).toHaveLength(1);
  });
});

describe('createDefaultRegistry', () => {
  it('should register the YouTube suite', () => {
    const registry = createDefaultRegistry();

    expect(registry.suites).toHaveLength(1);
    expect(registry.get('youtube')).toBeInstanceOf(YouTubeSuite);
    expect(registry.resolveForVideoUrl('https://youtu.be/AbCdEfGhIjK').name).toBe('youtube');
  });
});
