// src/cli/options.ts
import { InvalidArgumentError } from 'commander';
import { VidOrchestrator } from '../core/orchestrator.js';
import { VidError } from '../core/errors.js';
import { VIDEO_FIELDS, isVideoField, type VideoField } from '../core/types/index.js';
import { isSearchOrder, type SearchOrder } from '../core/search/terms.js';
import { YOUTUBE_API_KEY_ENV } from '../core/config/constants.js';
import { buildErrorResult, formatJsonOutput } from '../core/export/json.js';

export interface CommonCliOptions {
  fields?: VideoField[];
  timeout?: number;
  youtubeApiKey?: string;
  json: boolean;
  verbose: boolean;
}

export function parseFields(value: string): VideoField[] {
  const names = value.split(',').map(name => name.trim()).filter(name => name.length > 0);
  const unknown = names.filter(name => !isVideoField(name));
  if (unknown.length > 0) {
    throw new InvalidArgumentError(
      `Unknown field(s): ${unknown.join(', ')}. Valid fields: ${VIDEO_FIELDS.join(', ')}`
    );
  }
  return names.filter(isVideoField);
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got: ${value}`);
  }
  return parsed;
}

export function parseDateOption(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`Expected a date (e.g. an HTTP Last-Modified value), got: ${value}`);
  }
  return date;
}

export function parseOrderBy(value: string): SearchOrder {
  if (isSearchOrder(value)) {
    return value;
  }
  throw new InvalidArgumentError(
    `Invalid order: ${value}. Use relevant, latest or popular (optionally prefixed with -)`
  );
}

export function createOrchestrator(options: CommonCliOptions): VidOrchestrator {
  return new VidOrchestrator({
    timeout: options.timeout,
    youtubeApiKey: options.youtubeApiKey ?? process.env[YOUTUBE_API_KEY_ENV],
    verbose: options.verbose,
  });
}

/** Prints a failure and exits with status 1. */
export function reportFailure(error: unknown, json: boolean): void {
  if (json && error instanceof VidError) {
    console.log(formatJsonOutput(buildErrorResult(error)));
  } else {
    console.error('Error:', error instanceof Error ? error.message : error);
    if (error instanceof VidError && error.suggestion) {
      console.error('Hint:', error.suggestion);
    }
  }
  process.exit(1);
}
