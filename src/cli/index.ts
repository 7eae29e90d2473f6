#!/usr/bin/env node

import { Command } from 'commander';
import { registerVideoCommand } from './commands/video.js';
import { registerFeedCommand } from './commands/feed.js';
import { registerSearchCommand } from './commands/search.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('vidscout')
    .description('Video metadata from oEmbed, provider APIs, page scrapes and feeds')
    .version('0.1.0');

  registerVideoCommand(program);
  registerFeedCommand(program);
  registerSearchCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
