// src/cli/commands/video.ts
import { Command } from 'commander';
import { BatchRunner } from '../../core/batch/runner.js';
import { buildVideoResult, formatJsonOutput } from '../../core/export/json.js';
import type { VideoRecord } from '../../core/video/record.js';
import { VIDEO_FIELDS } from '../../core/types/index.js';
import {
  createOrchestrator,
  parseFields,
  parsePositiveInt,
  reportFailure,
  type CommonCliOptions,
} from '../options.js';

interface VideoCommandOptions extends CommonCliOptions {
  file?: string;
  stdin?: boolean;
  jsonl: boolean;
  continueOnError?: boolean;
}

export function printVideo(video: VideoRecord): void {
  console.log(`${video.get('title') ?? '(untitled)'}`);
  console.log(`  url: ${video.url}`);
  for (const field of video.fields) {
    const value = video.get(field);
    if (field === 'title' || value === undefined) {
      continue;
    }
    const text = value instanceof Date ? value.toISOString() : Array.isArray(value) ? value.join(', ') : String(value);
    console.log(`  ${field}: ${text}`);
  }
  if (video.missingFields.length > 0) {
    console.log(`  missing: ${video.missingFields.join(', ')}`);
  }
}

export function registerVideoCommand(program: Command): void {
  program
    .command('video')
    .description('Fetch metadata for a video URL')
    .argument('[url]', 'Video URL (optional if using --file or --stdin)')
    .option('--fields <list>', `Comma-separated fields to fetch (${VIDEO_FIELDS.join(',')})`, parseFields)
    .option('--timeout <ms>', 'Timeout per remote call in milliseconds', parsePositiveInt)
    .option('--youtube-api-key <key>', 'YouTube Data API key (default: $YOUTUBE_API_KEY)')
    .option('--file <path>', 'Read video URLs from file')
    .option('--stdin', 'Read video URLs from stdin')
    .option('--jsonl', 'Output JSONL stream (batch mode)', false)
    .option('--continue-on-error', 'Continue on failure (batch mode)')
    .option('--json', 'Output JSON to stdout', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (url: string | undefined, options: VideoCommandOptions) => {
      const hasFile = Boolean(options.file) || Boolean(options.stdin);

      if (!url && !hasFile) {
        console.error('Error: URL argument or --file/--stdin is required');
        process.exit(1);
        return;
      }

      const orchestrator = createOrchestrator(options);

      if (url && !hasFile) {
        try {
          const video = await orchestrator.loadVideo(url, { fields: options.fields });
          if (options.json) {
            console.log(formatJsonOutput(buildVideoResult(video)));
          } else {
            printVideo(video);
          }
        } catch (error) {
          reportFailure(error, options.json);
        }
        return;
      }

      try {
        await new BatchRunner(orchestrator).run({
          source: options.file ? 'file' : 'stdin',
          filePath: options.file,
          continueOnError: options.continueOnError ?? false,
          jsonl: options.jsonl,
          fields: options.fields,
        });
      } catch (error) {
        reportFailure(error, false);
      }
    });
}
