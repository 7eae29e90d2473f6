// src/cli/commands/feed.ts
import { Command } from 'commander';
import { buildFeedResult, formatJsonOutput } from '../../core/export/json.js';
import type { VideoRecord } from '../../core/video/record.js';
import {
  createOrchestrator,
  parseDateOption,
  parseFields,
  parsePositiveInt,
  reportFailure,
  type CommonCliOptions,
} from '../options.js';
import { printVideo } from './video.js';

interface FeedCommandOptions extends CommonCliOptions {
  crawl: boolean;
  maxResults?: number;
  etag?: string;
  lastModified?: Date;
}

export function registerFeedCommand(program: Command): void {
  program
    .command('feed <url>')
    .description('List the videos of a feed')
    .option('--crawl', 'Follow the feed onto later pages', false)
    .option('--max-results <n>', 'Stop after this many videos', parsePositiveInt)
    .option('--etag <etag>', 'ETag from a previous fetch')
    .option('--last-modified <date>', 'Last-Modified date from a previous fetch', parseDateOption)
    .option('--fields <list>', 'Comma-separated fields to keep', parseFields)
    .option('--timeout <ms>', 'Timeout per remote call in milliseconds', parsePositiveInt)
    .option('--youtube-api-key <key>', 'YouTube Data API key (default: $YOUTUBE_API_KEY)')
    .option('--json', 'Output JSON to stdout', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (url: string, options: FeedCommandOptions) => {
      try {
        const feed = createOrchestrator(options).feed(url, {
          crawl: options.crawl,
          maxResults: options.maxResults,
          fields: options.fields,
          etag: options.etag,
          lastModified: options.lastModified,
        });

        const videos: VideoRecord[] = [];
        for await (const video of feed) {
          videos.push(video);
          if (!options.json) {
            printVideo(video);
          }
        }

        if (options.json) {
          console.log(formatJsonOutput(buildFeedResult(feed, videos)));
        } else {
          console.log(`\n${feed.title ?? url}: ${videos.length} video(s), ${feed.pagesFetched} page(s)`);
        }
      } catch (error) {
        reportFailure(error, options.json);
      }
    });
}
