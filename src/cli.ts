#!/usr/bin/env node
import yargs from 'yargs';
// eslint-disable-next-line import/no-unresolved
import { hideBin } from 'yargs/helpers';

import { DEFAULT_CONFIG_FILE } from './config';
import { main } from './main';

/**
 * Keeps the string entries of a repeatable option
 */
function toStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return typeof value === 'string' ? [value] : [];
}

/**
 * Setup CLI with yargs
 */
const cli = yargs(hideBin(process.argv))
  .scriptName('comment-trim')
  .command(
    '$0 [paths..]',
    'Strip trivial // comments from source files, keeping doc and marker comments',
    (y) =>
      y
        .positional('paths', {
          type: 'string',
          array: true,
          default: ['src'],
          description: 'Files or directories to process',
        })
        .option('dry-run', {
          alias: 'n',
          type: 'boolean',
          default: false,
          description: 'Show what would be changed without modifying files',
        })
        .option('exclude', {
          alias: 'e',
          type: 'string',
          array: true,
          default: [],
          description: 'Skip files whose path contains this text (repeatable)',
        })
        .option('ext', {
          type: 'string',
          array: true,
          description: 'File extensions to process (default: .rs)',
        })
        .option('config', {
          alias: 'f',
          type: 'string',
          description: `Path to a JSON config file (default: ${DEFAULT_CONFIG_FILE} when present)`,
        })
        .option('skip-missing', {
          type: 'boolean',
          default: false,
          description: 'Warn about missing paths instead of failing',
        })
        .option('progress', {
          alias: 'p',
          type: 'boolean',
          default: false,
          description: 'Show a progress bar instead of per-file lines',
        })
        .option('verbose', {
          alias: 'v',
          type: 'boolean',
          default: false,
          description: 'Enable verbose logging',
        }),
    async (argv) => {
      const paths = toStringList(argv.paths);
      const ext = toStringList(argv.ext);
      const exitCode = await main({
        paths: paths.length > 0 ? paths : ['src'],
        dryRun: argv.dryRun,
        exclude: toStringList(argv.exclude),
        ext: ext.length > 0 ? ext : undefined,
        config: argv.config,
        skipMissing: argv.skipMissing,
        progress: argv.progress,
        verbose: argv.verbose,
      });
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    },
  )
  .example('$0', 'Strip comments from every .rs file under ./src')
  .example(
    '$0 --dry-run crates/core src/main.rs',
    'Preview the changes for a directory and a single file',
  )
  .example(
    '$0 -e generated -e tests/fixtures src',
    'Skip generated code and test fixtures',
  )
  .help()
  .alias('help', 'h')
  .version()
  .alias('version', 'V');

// Run the CLI
cli.parseAsync().catch((error) => {
  console.error('CLI Error:', error);
  process.exit(1);
});
