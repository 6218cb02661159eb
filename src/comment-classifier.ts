/**
 * What to do with a single source line
 * - `preserve`: emit the line unchanged
 * - `truncate`: emit only the code in front of the comment
 * - `drop`: emit nothing
 */
export type LineDecision = 'preserve' | 'truncate' | 'drop';

/**
 * State carried from one line to the next while folding over a file
 */
export interface ScanState {
  /** A block comment opened on an earlier line is still open */
  inBlockComment: boolean;
  /** The leading file header has ended */
  headerDone: boolean;
  /** Zero-based index of the line about to be classified */
  lineIndex: number;
}

export interface Classification {
  decision: LineDecision;
  /** The text to emit, the code prefix for `truncate` decisions */
  text: string;
  /** State for the next line */
  state: ScanState;
}

/**
 * Tunable constants of the classifier
 */
export interface ClassifierOptions {
  /** Keywords that mark a comment as worth keeping, matched case-insensitively */
  markers: string[];
  /** Substrings that make a standalone comment trivial */
  trivialPhrases: string[];
  /** Standalone comments shorter than this are trivial, default `15` */
  shortCommentLength: number;
  /** Blank lines within this many leading lines belong to the header, default `5` */
  headerLines: number;
}

export const DEFAULT_CLASSIFIER_OPTIONS: ClassifierOptions = {
  markers: ['TODO', 'FIXME', 'NOTE', 'SAFETY', 'HACK', 'XXX'],
  trivialPhrases: [
    'update',
    'set',
    'get',
    'return',
    'create',
    'init',
    'check',
    'validate',
    'handle',
    'process',
    'load',
  ],
  shortCommentLength: 15,
  headerLines: 5,
};

export const INITIAL_SCAN_STATE: ScanState = {
  inBlockComment: false,
  headerDone: false,
  lineIndex: 0,
};

const DOC_COMMENT_PATTERNS: readonly RegExp[] = [/^\s*\/\/!/, /^\s*\/\/\//];

/**
 * Result of scanning one line for comment tokens
 */
export interface LineScan {
  /** Index of the first `//` outside strings and block comments, `-1` if none */
  commentIndex: number;
  /** Whether a block comment is open at the end of the scanned part */
  inBlockComment: boolean;
  /** Whether the line ended inside a string literal */
  inString: boolean;
}

/**
 * Scans a line from left to right, skipping string literals and block
 * comments, and stops at the first `//`.
 *
 * `"` and `'` both delimit literals and a backslash escapes the next
 * character. Raw strings are treated like ordinary ones.
 *
 * @example
 * scanLine('let url = "http://x"; // link', false).commentIndex // => 22
 * scanLine('/* open', false).inBlockComment // => true
 */
export function scanLine(line: string, inBlockComment: boolean): LineScan {
  let inBlock = inBlockComment;
  let quote: string | undefined;
  let i = 0;

  while (i < line.length) {
    const ch = line[i];

    if (inBlock) {
      if (line.startsWith('*/', i)) {
        inBlock = false;
        i += 2;
      } else {
        i++;
      }
      continue;
    }

    if (quote) {
      if (ch === '\\') {
        i += 2;
        continue;
      }
      if (ch === quote) {
        quote = undefined;
      }
      i++;
      continue;
    }

    if (line.startsWith('//', i)) {
      return { commentIndex: i, inBlockComment: false, inString: false };
    }
    if (line.startsWith('/*', i)) {
      inBlock = true;
      i += 2;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    }
    i++;
  }

  return {
    commentIndex: -1,
    inBlockComment: inBlock,
    inString: quote !== undefined,
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export type LineClassifier = (line: string, state: ScanState) => Classification;

/**
 * Builds a line classifier for the given options.
 *
 * Rules are applied in priority order: doc and marker comments, lines
 * inside a block comment, the file header, then the first `//` outside
 * strings. A code prefix makes the comment a trailing one and the line is
 * truncated. A standalone comment is dropped only when it is short or
 * contains a trivial phrase. Anything the scan cannot settle is preserved.
 */
export function createClassifier(
  options: ClassifierOptions = DEFAULT_CLASSIFIER_OPTIONS,
): LineClassifier {
  const markers = options.markers.filter((marker) => marker.length > 0);
  const markerAlternation = markers.map(escapeRegExp).join('|');
  const preservePatterns = [...DOC_COMMENT_PATTERNS];
  let markerBody: RegExp | undefined;
  if (markers.length > 0) {
    preservePatterns.push(
      new RegExp(`^\\s*//\\s*(?:${markerAlternation})`, 'i'),
    );
    markerBody = new RegExp(`^\\s*(?:${markerAlternation})`, 'i');
  }
  const trivialPhrases = options.trivialPhrases
    .map((phrase) => phrase.toLowerCase())
    .filter((phrase) => phrase.length > 0);

  return (line, state) => {
    const scan = scanLine(line, state.inBlockComment);
    const trimmed = line.trim();

    // Header lines are judged outside block comments only, so the body of a
    // leading license block never ends the header.
    let headerDone = state.headerDone;
    let isHeader = false;
    if (!headerDone && !state.inBlockComment) {
      isHeader =
        trimmed.startsWith('/*') ||
        trimmed.startsWith('*') ||
        (trimmed === '' && state.lineIndex < options.headerLines);
      headerDone = !isHeader;
    }

    const next: ScanState = {
      inBlockComment: scan.inBlockComment,
      headerDone,
      lineIndex: state.lineIndex + 1,
    };
    const preserve: Classification = {
      decision: 'preserve',
      text: line,
      state: next,
    };

    if (preservePatterns.some((pattern) => pattern.test(line))) {
      return preserve;
    }
    if (state.inBlockComment || isHeader) {
      return preserve;
    }
    if (scan.commentIndex < 0) {
      return preserve;
    }

    const afterToken = line[scan.commentIndex + 2];
    if (afterToken === '/' || afterToken === '!') {
      return preserve;
    }

    const body = line.slice(scan.commentIndex + 2);
    if (markerBody?.test(body)) {
      return preserve;
    }

    const code = line.slice(0, scan.commentIndex);
    if (code.trim() !== '') {
      return { decision: 'truncate', text: code.trimEnd(), state: next };
    }

    const text = body.trim().toLowerCase();
    if (
      text.length < options.shortCommentLength ||
      trivialPhrases.some((phrase) => text.includes(phrase))
    ) {
      return { decision: 'drop', text: '', state: next };
    }

    return preserve;
  };
}

/**
 * Classifies a single line with a one-off classifier.
 * Prefer {@link createClassifier} when classifying many lines.
 */
export function classifyLine(
  line: string,
  state: ScanState = INITIAL_SCAN_STATE,
  options: ClassifierOptions = DEFAULT_CLASSIFIER_OPTIONS,
): Classification {
  return createClassifier(options)(line, state);
}
