import fs from 'node:fs/promises';
import path from 'node:path';

import stripJsonComments from 'strip-json-comments';

import type { ClassifierOptions } from './comment-classifier';
import { DEFAULT_CLASSIFIER_OPTIONS } from './comment-classifier';

/**
 * Settings for a comment stripping run
 */
export interface CommentTrimConfig extends ClassifierOptions {
  /** File extensions to process, default `['.rs']` */
  extensions: string[];
  /** Files whose path contains any of these substrings are skipped */
  exclude: string[];
}

export const DEFAULT_CONFIG: CommentTrimConfig = {
  ...DEFAULT_CLASSIFIER_OPTIONS,
  extensions: ['.rs'],
  exclude: [],
};

/** Config file picked up from the working directory when present */
export const DEFAULT_CONFIG_FILE = 'comment-trim.config.json';

const STRING_LIST_FIELDS = [
  'extensions',
  'exclude',
  'markers',
  'trivialPhrases',
] as const;
const COUNT_FIELDS = ['shortCommentLength', 'headerLines'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === 'string')
  );
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Normalizes an extension to its dotted form: `rs` becomes `.rs`.
 */
export function normalizeExtension(extension: string): string {
  return extension.startsWith('.') ? extension : `.${extension}`;
}

/**
 * Validates a parsed config object field by field.
 * Unknown fields are ignored.
 */
export function parseConfig(raw: unknown): Partial<CommentTrimConfig> {
  if (!isRecord(raw)) {
    throw new Error('Config must be a JSON object');
  }

  const config: Partial<CommentTrimConfig> = {};

  for (const field of STRING_LIST_FIELDS) {
    const value = raw[field];
    if (value === undefined) {
      continue;
    }
    if (!isStringList(value)) {
      throw new Error(`Invalid field: ${field} (must be an array of strings)`);
    }
    config[field] = value;
  }

  for (const field of COUNT_FIELDS) {
    const value = raw[field];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw new Error(
        `Invalid field: ${field} (must be a non-negative integer)`,
      );
    }
    config[field] = value;
  }

  if (config.extensions) {
    config.extensions = config.extensions.map(normalizeExtension);
  }

  return config;
}

/**
 * Load and validate a configuration file. The file may contain comments.
 *
 * @param configPath - Path of the JSON config file
 * @param required - Whether a missing file is an error; when `false` a
 * missing file yields an empty config
 */
export async function loadConfigFile(
  configPath: string,
  required: boolean,
): Promise<Partial<CommentTrimConfig>> {
  const resolvedPath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      if (!required) {
        return {};
      }
      throw new Error(`Config file not found: ${configPath}`);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(stripJsonComments(content));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${error.message}`);
    }
    throw error;
  }

  try {
    return parseConfig(raw);
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`${error.message} in ${configPath}`);
    }
    throw error;
  }
}

/**
 * Merges config layers over the defaults, later layers winning field by field.
 */
export function resolveConfig(
  ...layers: Partial<CommentTrimConfig>[]
): CommentTrimConfig {
  const config: CommentTrimConfig = { ...DEFAULT_CONFIG };
  for (const layer of layers) {
    for (const field of STRING_LIST_FIELDS) {
      const value = layer[field];
      if (value !== undefined) {
        config[field] = [...value];
      }
    }
    for (const field of COUNT_FIELDS) {
      const value = layer[field];
      if (value !== undefined) {
        config[field] = value;
      }
    }
  }
  config.extensions = config.extensions.map(normalizeExtension);
  return config;
}
