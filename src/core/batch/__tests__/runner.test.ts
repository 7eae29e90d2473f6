// src/core/batch/__tests__/runner.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BatchRunner } from '../runner.js';
import { VidOrchestrator } from '../../orchestrator.js';
import { SuiteRegistry } from '../../suites/registry.js';
import { ErrorCode } from '../../errors.js';
import { FakeFetcher, StubSuite, oembedUrl } from '../../__tests__/fixtures.js';

const GOOD = 'https://stub.test/v/1';
const UNCLAIMED = 'https://elsewhere.test/v/2';

describe('BatchRunner', () => {
  let dir: string;
  let fetcher: FakeFetcher;
  let runner: BatchRunner;
  let logSpy: jest.SpiedFunction<typeof console.log>;

  async function urlFile(content: string): Promise<string> {
    const path = join(dir, 'urls.txt');
    await writeFile(path, content, 'utf-8');
    return path;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'vidscout-batch-'));
    fetcher = new FakeFetcher();
    fetcher.respond(oembedUrl(GOOD), JSON.stringify({ title: 'Good' }));
    const orchestrator = new VidOrchestrator({
      registry: new SuiteRegistry([new StubSuite({ oembed: ['title'] })]),
      fetcher,
    });
    runner = new BatchRunner(orchestrator);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('parseUrls', () => {
    it('should skip blank lines and comments', async () => {
      const path = await urlFile(`# list\n${GOOD}\n\n   \n  ${UNCLAIMED}  \n#${GOOD}\n`);

      expect(await runner.parseUrls('file', path)).toEqual([GOOD, UNCLAIMED]);
    });

    it('should require a file path for file input', async () => {
      await expect(runner.parseUrls('file')).rejects.toMatchObject({ code: ErrorCode.INVALID_OPTION });
    });
  });

  it('should count successes and failures', async () => {
    const path = await urlFile(`${GOOD}\n${UNCLAIMED}\n`);

    const summary = await runner.run({ source: 'file', filePath: path, continueOnError: false, jsonl: false, fields: ['title'] });

    expect(summary.total).toBe(2);
    expect(summary.success).toBe(1);
    expect(summary.failed).toBe(1);
    expect(summary.failures).toEqual([{ url: UNCLAIMED, error: `No suite handles video URL: ${UNCLAIMED}` }]);
    expect(logSpy).toHaveBeenCalledWith(`✓ ${GOOD}`);
    expect(logSpy).toHaveBeenCalledWith(`✗ ${UNCLAIMED} (unresolvable_url)`);
  });

  it('should print one JSON line per URL in jsonl mode', async () => {
    const path = await urlFile(`${GOOD}\n`);

    await runner.run({ source: 'file', filePath: path, continueOnError: false, jsonl: true, fields: ['title'] });

    expect(logSpy).toHaveBeenCalledWith(JSON.stringify({
      status: 'success',
      video: { url: GOOD, suite: 'stub', title: 'Good', missingFields: [] },
    }));
  });

  it('should return an empty summary for an empty list', async () => {
    const path = await urlFile('# nothing here\n');

    const summary = await runner.run({ source: 'file', filePath: path, continueOnError: false, jsonl: false });

    expect(summary).toEqual({ total: 0, success: 0, failed: 0, duration: 0, failures: [] });
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should stop on an unexpected error unless told to continue', async () => {
    const other = 'https://stub.test/v/3';
    fetcher.fail(oembedUrl(other), new Error('boom'));
    const path = await urlFile(`${other}\n${GOOD}\n`);

    await expect(
      runner.run({ source: 'file', filePath: path, continueOnError: false, jsonl: false })
    ).rejects.toThrow('boom');
    expect(fetcher.urls).toEqual([oembedUrl(other)]);
  });

  it('should continue past an unexpected error when asked', async () => {
    const other = 'https://stub.test/v/3';
    fetcher.fail(oembedUrl(other), new Error('boom'));
    const path = await urlFile(`${other}\n${GOOD}\n`);

    const summary = await runner.run({ source: 'file', filePath: path, continueOnError: true, jsonl: false, fields: ['title'] });

    expect(summary.success).toBe(1);
    expect(summary.failures).toEqual([{ url: other, error: 'boom' }]);
  });
});
