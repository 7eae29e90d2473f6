// src/core/video/record.ts
import { VIDEO_FIELDS, isVideoField } from '../types/index.js';
import type { VideoData, VideoField, VideoFields } from '../types/index.js';
import type { AnySuite } from '../suites/types.js';

/**
 * One video's metadata plus its fetch status.
 *
 * Fields start unset and are written at most once: whichever strategy or
 * feed item supplies a value first keeps it. Only the requested `fields`
 * are ever stored.
 */
export class VideoRecord {
  readonly url: string;
  readonly suite: AnySuite;
  readonly fields: readonly VideoField[];

  private data: Partial<VideoFields> = {};
  private loaded = false;

  constructor(url: string, suite: AnySuite, fields?: readonly string[]) {
    this.url = url;
    this.suite = suite;
    this.fields = fields === undefined
      ? [...VIDEO_FIELDS]
      : VIDEO_FIELDS.filter(field => fields.includes(field));
  }

  /** Requested fields which do not hold a value yet. */
  get missingFields(): VideoField[] {
    return this.fields.filter(field => this.data[field] === undefined);
  }

  get<K extends VideoField>(field: K): VideoFields[K] | undefined {
    return this.data[field];
  }

  has(field: VideoField): boolean {
    return this.data[field] !== undefined;
  }

  /**
   * Merges `data` into the record and returns the fields that were written.
   * Unrequested fields, already-set fields and empty values are skipped.
   */
  apply(data: VideoData): VideoField[] {
    const applied: VideoField[] = [];
    for (const [name, value] of Object.entries(data)) {
      if (!isVideoField(name) || value === undefined || value === null) {
        continue;
      }
      if (!this.fields.includes(name) || this.data[name] !== undefined) {
        continue;
      }
      this.assign(name, data);
      applied.push(name);
    }
    return applied;
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  markLoaded(): void {
    this.loaded = true;
  }

  toJSON(): Partial<VideoFields> & { url: string; suite: string } {
    return { url: this.url, suite: this.suite.name, ...this.data };
  }

  private assign<K extends VideoField>(field: K, data: VideoData): void {
    const value = data[field];
    if (value !== undefined && value !== null) {
      this.data[field] = value;
    }
  }
}
