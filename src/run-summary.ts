export type FileStatus = 'unchanged' | 'modified' | 'failed';

/**
 * Outcome of processing one file
 */
export interface FileResult {
  path: string;
  /** `modified` also covers files a dry run would modify */
  status: FileStatus;
  removedComments: number;
  linesRemoved: number;
  /** Error message of a failed read or write */
  error?: string;
}

const DRY_RUN_PREFIX = '[DRY RUN] ';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Formats the progress line of a single file
 *
 * @example
 * formatFileResult({ path: 'src/a.rs', status: 'modified', removedComments: 2, linesRemoved: 1 }, true)
 * // => '[DRY RUN] Would modify src/a.rs: removed 2 comments (-1 lines)'
 */
export function formatFileResult(result: FileResult, dryRun: boolean): string {
  switch (result.status) {
    case 'modified': {
      const action = dryRun ? `${DRY_RUN_PREFIX}Would modify` : 'Modified';
      return `${action} ${result.path}: removed ${plural(result.removedComments, 'comment')} (-${result.linesRemoved} lines)`;
    }
    case 'failed':
      return `Failed ${result.path}: ${result.error ?? 'unknown error'}`;
    case 'unchanged':
      return `Unchanged ${result.path}`;
  }
}

/**
 * Totals of a run, accumulated file by file
 */
export class RunStatistics {
  public filesScanned = 0;
  public filesModified = 0;
  public filesFailed = 0;
  public commentsRemoved = 0;
  public linesRemoved = 0;

  constructor(public readonly dryRun: boolean = false) {}

  public record(result: FileResult): void {
    this.filesScanned++;
    switch (result.status) {
      case 'modified':
        this.filesModified++;
        this.commentsRemoved += result.removedComments;
        this.linesRemoved += result.linesRemoved;
        break;
      case 'failed':
        this.filesFailed++;
        break;
      case 'unchanged':
        break;
    }
  }

  /**
   * Renders the final report
   */
  public formatSummary(): string {
    const would = this.dryRun ? 'that would be ' : '';
    const lines = [
      `${this.dryRun ? DRY_RUN_PREFIX : ''}Summary:`,
      `  Files scanned: ${this.filesScanned}`,
      `  Files ${would}modified: ${this.filesModified}`,
      `  Comments ${would}removed: ${this.commentsRemoved}`,
      `  Lines ${would}removed: ${this.linesRemoved}`,
    ];
    if (this.filesFailed > 0) {
      lines.push(`  Files failed: ${this.filesFailed}`);
    }
    if (this.dryRun && this.filesModified > 0) {
      lines.push('', 'Run without --dry-run to apply changes.');
    }
    return lines.join('\n');
  }
}
