// src/cli/commands/search.ts
import { Command } from 'commander';
import { buildSearchResult, formatJsonOutput } from '../../core/export/json.js';
import type { VideoRecord } from '../../core/video/record.js';
import type { SearchOrder } from '../../core/search/terms.js';
import {
  createOrchestrator,
  parseFields,
  parseOrderBy,
  parsePositiveInt,
  reportFailure,
  type CommonCliOptions,
} from '../options.js';
import { printVideo } from './video.js';

interface SearchCommandOptions extends CommonCliOptions {
  suite: string;
  orderBy?: SearchOrder;
  crawl: boolean;
  maxResults?: number;
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search <query>')
    .description('Search a suite for videos')
    .option('--suite <name>', 'Suite to search', 'youtube')
    .option('--order-by <order>', 'relevant|latest|popular, optionally prefixed with -', parseOrderBy)
    .option('--crawl', 'Follow results onto later pages', false)
    .option('--max-results <n>', 'Stop after this many videos', parsePositiveInt)
    .option('--fields <list>', 'Comma-separated fields to keep', parseFields)
    .option('--timeout <ms>', 'Timeout per remote call in milliseconds', parsePositiveInt)
    .option('--youtube-api-key <key>', 'YouTube Data API key (default: $YOUTUBE_API_KEY)')
    .option('--json', 'Output JSON to stdout', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (query: string, options: SearchCommandOptions) => {
      try {
        const search = createOrchestrator(options).search(query, options.suite, {
          orderBy: options.orderBy,
          crawl: options.crawl,
          maxResults: options.maxResults,
          fields: options.fields,
        });

        const videos: VideoRecord[] = [];
        for await (const video of search) {
          videos.push(video);
          if (!options.json) {
            printVideo(video);
          }
        }

        if (options.json) {
          console.log(formatJsonOutput(buildSearchResult(search, videos)));
        } else {
          const total = search.totalResults !== undefined ? ` of ~${search.totalResults}` : '';
          console.log(`\n"${search.query}": ${videos.length}${total} video(s)`);
        }
      } catch (error) {
        reportFailure(error, options.json);
      }
    });
}
