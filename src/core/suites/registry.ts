// src/core/suites/registry.ts
import { unresolvableUrl } from '../errors.js';
import { isUnsupported, type AnySuite, type MaybeSupported } from './types.js';
import { YouTubeSuite, type YouTubeSuiteOptions } from './youtube/index.js';

/**
 * Ordered set of suites. Lookups scan in registration order and the first
 * suite that claims a URL wins.
 */
export class SuiteRegistry {
  private entries: AnySuite[] = [];

  constructor(suites: AnySuite[] = []) {
    suites.forEach(suite => this.register(suite));
  }

  get suites(): readonly AnySuite[] {
    return [...this.entries];
  }

  /** Adds a suite unless this instance is already registered. */
  register(suite: AnySuite): void {
    if (!this.entries.includes(suite)) {
      this.entries.push(suite);
    }
  }

  unregister(suite: AnySuite): void {
    this.entries = this.entries.filter(entry => entry !== suite);
  }

  get(name: string): AnySuite | undefined {
    return this.entries.find(suite => suite.name === name);
  }

  resolveForVideoUrl(url: string): AnySuite {
    const suite = this.find(suite => suite.handlesVideoUrl(url));
    if (!suite) {
      throw unresolvableUrl(url, 'video');
    }
    return suite;
  }

  resolveForFeedUrl(url: string): AnySuite {
    const suite = this.find(suite => suite.handlesFeedUrl(url));
    if (!suite) {
      throw unresolvableUrl(url, 'feed');
    }
    return suite;
  }

  // Suites without the classifier are passed over.
  private find(classify: (suite: AnySuite) => MaybeSupported<boolean>): AnySuite | undefined {
    return this.entries.find(suite => {
      const handles = classify(suite);
      return !isUnsupported(handles) && handles;
    });
  }
}

export interface DefaultRegistryOptions {
  youtube?: YouTubeSuiteOptions;
}

export function createDefaultRegistry(options: DefaultRegistryOptions = {}): SuiteRegistry {
  return new SuiteRegistry([new YouTubeSuite(options.youtube)]);
}
