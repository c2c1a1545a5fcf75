#!/usr/bin/env node

import { Command } from 'commander';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { init } from './commands/init.js';
import { validate } from './commands/validate.js';
import { list } from './commands/list.js';
import { show } from './commands/show.js';
import { forget } from './commands/forget.js';
import { VERSION } from './version.js';

function fail(err: unknown): never {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('repolock')
    .description('Inspect and maintain the repolock lockfile')
    .version(VERSION);

  program
    .command('init')
    .description('Write the default lockfile if none exists')
    .action(async () => {
      try {
        await init();
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('validate')
    .description('Check lock.json against every lockfile invariant')
    .option('--quiet', 'Suppress output, exit code only')
    .option('--json', 'Output result as JSON')
    .action(async (options) => {
      try {
        const result = await validate(options);
        process.exit(result.valid ? 0 : 1);
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('list')
    .description('List profiles, marking the active one')
    .option('--json', 'Output as JSON')
    .action(async (options) => {
      try {
        await list(options);
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('show [profile]')
    .description('Show the repos selected by a profile (default: active profile)')
    .option('--json', 'Output as JSON')
    .action(async (profile, options) => {
      try {
        await show(profile, options);
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('forget <path>')
    .description('Remove a repos entry and every profile reference to it')
    .action(async (path) => {
      try {
        await forget(path);
      } catch (err) {
        fail(err);
      }
    });

  return program;
}

// Only parse when run as CLI entry point (ESM check with symlink resolution)
const selfUrl = import.meta.url;
let isDirectRun = false;
try {
  if (process.argv[1]) {
    isDirectRun = selfUrl === pathToFileURL(realpathSync(process.argv[1])).href;
  }
} catch {
  // Non-standard invocation (missing/virtual argv path) — default to not parsing
}
if (isDirectRun) {
  await buildProgram().parseAsync();
}
