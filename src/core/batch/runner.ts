// src/core/batch/runner.ts
import { readFile } from 'node:fs/promises';
import { VidOrchestrator } from '../orchestrator.js';
import { ErrorCode, VidError } from '../errors.js';
import { buildErrorResult, buildVideoResult } from '../export/json.js';
import type { ExportResult } from '../export/types.js';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export interface BatchOptions {
  source: 'file' | 'stdin';
  filePath?: string;
  continueOnError: boolean;
  jsonl: boolean;
  fields?: string[];
}

export interface BatchSummary {
  total: number;
  success: number;
  failed: number;
  duration: number;
  failures: Array<{ url: string; error: string }>;
}

/** Loads a list of video URLs one after another. */
export class BatchRunner {
  constructor(private orchestrator: VidOrchestrator) {}

  async run(options: BatchOptions): Promise<BatchSummary> {
    const urls = await this.parseUrls(options.source, options.filePath);

    if (urls.length === 0) {
      return { total: 0, success: 0, failed: 0, duration: 0, failures: [] };
    }

    const startTime = Date.now();
    const failures: Array<{ url: string; error: string }> = [];
    let successCount = 0;

    for (const url of urls) {
      try {
        const result = await this.processUrl(url, options);
        if (options.jsonl) {
          this.printJsonl(result);
        }
        if (result.status === 'success') {
          successCount++;
          console.log(`✓ ${url}`);
        } else {
          failures.push({ url, error: result.error.message });
          console.log(`✗ ${url} (${result.error.code})`);
        }
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        failures.push({ url, error: errorMsg });
        console.log(`✗ ${url} (${errorMsg})`);

        if (!options.continueOnError) {
          throw error;
        }
      }
    }

    const summary: BatchSummary = {
      total: urls.length,
      success: successCount,
      failed: failures.length,
      duration: Date.now() - startTime,
      failures,
    };

    this.printSummary(summary);
    return summary;
  }

  async parseUrls(source: 'file' | 'stdin', filePath?: string): Promise<string[]> {
    let content: string;

    if (source === 'file') {
      if (!filePath) {
        throw new VidError(
          ErrorCode.INVALID_OPTION,
          'File path is required when source is "file"'
        );
      }
      content = await readFile(filePath, 'utf-8');
    } else {
      content = await readStdin();
    }

    return content
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('#'));
  }

  private async processUrl(url: string, options: BatchOptions): Promise<ExportResult> {
    try {
      const video = await this.orchestrator.loadVideo(url, { fields: options.fields });
      return buildVideoResult(video);
    } catch (error) {
      if (error instanceof VidError) {
        return buildErrorResult(error);
      }
      throw error;
    }
  }

  private printJsonl(result: ExportResult): void {
    console.log(JSON.stringify(result));
  }

  private printSummary(summary: BatchSummary): void {
    console.log('\n' + '━'.repeat(50));
    console.log(
      `Summary: ${summary.success} success, ${summary.failed} failed, ${(summary.duration / 1000).toFixed(1)}s`
    );

    if (summary.failures.length > 0) {
      console.log('\nFailed URLs:');
      summary.failures.forEach(({ url, error }) => {
        console.log(`  - ${url}: ${error}`);
      });
    }
  }
}
