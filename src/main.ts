import cliProgress from 'cli-progress';

import type { OnFileCallback, OnProgressCallback } from './comment-stripper';
import { CommentStripper } from './comment-stripper';
import {
  DEFAULT_CONFIG_FILE,
  loadConfigFile,
  normalizeExtension,
} from './config';
import { formatFileResult } from './run-summary';
import type { Logger, LogLevel } from './utils/logger';
import { createLogger, isLogLevel } from './utils/logger';

/**
 * CLI arguments interface
 */
export interface CliArgs {
  paths: string[];
  dryRun: boolean;
  exclude: string[];
  ext?: string[];
  config?: string; // Explicit config file, must exist when given
  skipMissing: boolean;
  progress: boolean;
  verbose: boolean;
}

/** Environment variable that overrides the log level picked by `--verbose` */
export const LOG_LEVEL_ENV = 'COMMENT_TRIM_LOG_LEVEL';

export function resolveLogLevel(
  verbose: boolean,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const override = env[LOG_LEVEL_ENV];
  if (override !== undefined) {
    if (isLogLevel(override)) {
      return override;
    }
    console.warn(`Ignoring invalid ${LOG_LEVEL_ENV}=${override}`);
  }
  return verbose ? 'debug' : 'info';
}

/**
 * Progress bar over the files of a run
 */
function createProgressReporter(logger: Logger): OnProgressCallback {
  let bar: cliProgress.SingleBar | undefined;

  return ({ description, current, total }) => {
    if (!bar) {
      logger.info(description);
      bar = new cliProgress.SingleBar(
        {
          clearOnComplete: true,
        },
        cliProgress.Presets.shades_classic,
      );
      bar.start(total, current);
    } else {
      bar.update(current);
    }

    if (total === current) {
      bar.stop();
    }
  };
}

/**
 * Runs the CLI and resolves to the process exit code
 */
export async function main(
  args: CliArgs,
  logger: Logger = createLogger(resolveLogLevel(args.verbose)),
): Promise<number> {
  try {
    logger.debug('Loading configuration...');

    const configPath = args.config ?? DEFAULT_CONFIG_FILE;
    const fileConfig = await loadConfigFile(
      configPath,
      args.config !== undefined,
    );

    if (Object.keys(fileConfig).length > 0) {
      logger.debug(`Config loaded successfully from: ${configPath}`);
    }

    // Errors are held back while the bar is drawn and printed after it stops
    const showProgress = args.progress && logger.level !== 'silent';
    const deferredErrors: string[] = [];
    const stripperLogger: Logger = showProgress
      ? { ...logger, error: (message) => deferredErrors.push(message) }
      : logger;

    const stripper = new CommentStripper({
      config: {
        ...fileConfig,
        exclude: [...(fileConfig.exclude ?? []), ...args.exclude],
        ...(args.ext && args.ext.length > 0
          ? { extensions: args.ext.map(normalizeExtension) }
          : {}),
      },
      dryRun: args.dryRun,
      skipMissing: args.skipMissing,
      logger: stripperLogger,
    });

    const { files } = await stripper.collectFiles(args.paths);

    logger.info(
      `🚀 Processing ${files.length} ${files.length === 1 ? 'file' : 'files'} (${stripper.config.extensions.join(', ')})...`,
    );
    if (args.dryRun) {
      logger.info('(DRY RUN - no files will be modified)');
    }

    const startTime = Date.now();
    const onFile: OnFileCallback = (result) => {
      const line = formatFileResult(result, args.dryRun);
      if (result.status === 'modified' && !showProgress) {
        logger.info(line);
      } else if (result.status !== 'failed') {
        logger.debug(line);
      }
    };

    const stats = await stripper.processFiles(files, {
      onFile,
      onProgress: showProgress ? createProgressReporter(logger) : undefined,
    });

    for (const message of deferredErrors) {
      logger.error(message);
    }

    const duration = ((Date.now() - startTime) / 1000).toFixed(2);
    logger.info('');
    logger.info(stats.formatSummary());
    logger.debug(`Completed in ${duration}s`);

    return 0;
  } catch (error) {
    logger.error(
      `❌ Error: ${error instanceof Error ? error.message : String(error)}`,
    );
    return 1;
  }
}
