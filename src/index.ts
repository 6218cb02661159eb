export type {
  Classification,
  ClassifierOptions,
  LineClassifier,
  LineDecision,
  LineScan,
  ScanState,
} from './comment-classifier';
export {
  classifyLine,
  createClassifier,
  DEFAULT_CLASSIFIER_OPTIONS,
  INITIAL_SCAN_STATE,
  scanLine,
} from './comment-classifier';
export type {
  CollectedFiles,
  CommentStripperOptions,
  OnFileCallback,
  OnProgressCallback,
  ProgressInfo,
  RunHooks,
} from './comment-stripper';
export { CommentStripper } from './comment-stripper';
export type { CommentTrimConfig } from './config';
export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  loadConfigFile,
  parseConfig,
  resolveConfig,
} from './config';
export type { TransformResult } from './line-transformer';
export { transformSource } from './line-transformer';
export type { FileResult, FileStatus } from './run-summary';
export { formatFileResult, RunStatistics } from './run-summary';
export type { Logger, LogLevel } from './utils/logger';
export { createLogger } from './utils/logger';
