import type { ClassifierOptions, ScanState } from './comment-classifier';
import {
  createClassifier,
  DEFAULT_CLASSIFIER_OPTIONS,
  INITIAL_SCAN_STATE,
} from './comment-classifier';

/**
 * Result of stripping comments from one source text
 */
export interface TransformResult {
  /** The rewritten text */
  content: string;
  /** Number of truncated or dropped comments */
  removedComments: number;
  /** Input line count minus output line count */
  linesRemoved: number;
  /** Whether any comment was removed */
  changed: boolean;
}

const BOM = '\uFEFF';

function isBlank(line: string | undefined): boolean {
  return line === '' || line === '\r';
}

/**
 * Collapses a run of empty lines at the end of the output to a single one.
 * The last element keeps the text after the final newline, so the line
 * before it is removed and the file's own line ending survives.
 */
function collapseTrailingBlankLines(lines: string[]): void {
  while (
    lines.length > 1 &&
    isBlank(lines[lines.length - 1]) &&
    isBlank(lines[lines.length - 2])
  ) {
    lines.splice(lines.length - 2, 1);
  }
}

/**
 * Strips removable `//` comments from a source text, line by line.
 *
 * Lines ending in `\r` keep their line ending when truncated, and a
 * leading byte order mark is kept even when the first line is dropped.
 *
 * @example
 * ```typescript
 * const { content, removedComments } = transformSource(
 *   'let x = 5; // set x\n/// Computes the checksum.\n',
 * );
 * // content === 'let x = 5;\n/// Computes the checksum.\n'
 * // removedComments === 1
 * ```
 */
export function transformSource(
  content: string,
  options: ClassifierOptions = DEFAULT_CLASSIFIER_OPTIONS,
): TransformResult {
  const classify = createClassifier(options);
  const bom = content.startsWith(BOM) ? BOM : '';
  const input = content.slice(bom.length).split('\n');
  const output: string[] = [];
  let state: ScanState = INITIAL_SCAN_STATE;
  let removedComments = 0;

  for (const raw of input) {
    const eol = raw.endsWith('\r') ? '\r' : '';
    const line = eol ? raw.slice(0, -1) : raw;
    const classification = classify(line, state);
    state = classification.state;

    switch (classification.decision) {
      case 'preserve':
        output.push(raw);
        break;
      case 'truncate':
        output.push(classification.text + eol);
        removedComments++;
        break;
      case 'drop':
        removedComments++;
        break;
    }
  }

  collapseTrailingBlankLines(output);

  return {
    content: bom + output.join('\n'),
    removedComments,
    linesRemoved: input.length - output.length,
    changed: removedComments > 0,
  };
}
