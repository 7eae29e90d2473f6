// src/core/export/types.ts
import type { ErrorCode } from '../errors.js';
import type { VideoFields } from '../types/index.js';

export type ExportedVideo = Partial<Omit<VideoFields, 'publishedAt'>> & {
  url: string;
  suite: string;
  publishedAt?: string;
  missingFields: string[];
};

export interface ExportError {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  suggestion?: string;
}

export interface VideoResult {
  status: 'success';
  video: ExportedVideo;
}

export interface ListingResult {
  status: 'success';
  kind: 'feed' | 'search';
  meta: Record<string, string | number | undefined>;
  pagesFetched: number;
  videos: ExportedVideo[];
}

export interface FailedResult {
  status: 'failed';
  error: ExportError;
}

export type ExportResult = VideoResult | ListingResult | FailedResult;
