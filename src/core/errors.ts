export type HudLayoutErrorCode =
  | 'RON_SYNTAX'
  | 'LAYOUT_DECODE'
  | 'LAYOUT_VALIDATION'
  | 'LAYOUT_FILE';

export class HudLayoutError extends Error {
  readonly code: HudLayoutErrorCode;

  constructor(code: HudLayoutErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HudLayoutError';
    this.code = code;
  }
}

export class RonSyntaxError extends HudLayoutError {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super('RON_SYNTAX', `${message} at ${line}:${column}`);
    this.name = 'RonSyntaxError';
    this.line = line;
    this.column = column;
  }
}

export type DecodeIssue = {
  /** Dotted path into the document, e.g. `children.2.transform.anchor`. */
  path: string;
  message: string;
};

export class LayoutDecodeError extends HudLayoutError {
  readonly issues: DecodeIssue[];

  constructor(issues: DecodeIssue[]) {
    const first = issues[0];
    const summary = first ? `${first.path || '<root>'}: ${first.message}` : 'unknown error';
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : '';
    super('LAYOUT_DECODE', `Invalid layout: ${summary}${more}`);
    this.name = 'LayoutDecodeError';
    this.issues = issues;
  }
}

export type ValidationIssueCode =
  | 'DUPLICATE_ID'
  | 'ASSET_KIND_MISMATCH'
  | 'ASSET_USAGE_MISMATCH'
  | 'UNKNOWN_ASSET_EXTENSION'
  | 'MISSING_ASSET'
  | 'COLOR_OUT_OF_RANGE'
  | 'NEGATIVE_SIZE'
  | 'INVALID_FONT_SIZE'
  | 'NINE_SLICE_BOUNDS';

export interface ValidationIssue {
  code: ValidationIssueCode;
  /** Node path such as `children[2].children[0]`; empty for the root. */
  path: string;
  nodeId: string;
  message: string;
}

export class LayoutValidationError extends HudLayoutError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], source?: string) {
    const where = source ? ` in ${source}` : '';
    super(
      'LAYOUT_VALIDATION',
      `Layout${where} failed validation with ${issues.length} issue(s): ${issues
        .map((i) => i.code)
        .join(', ')}`,
    );
    this.name = 'LayoutValidationError';
    this.issues = issues;
  }
}

export class LayoutFileError extends HudLayoutError {
  readonly path: string;

  constructor(path: string, message: string, cause: unknown) {
    super('LAYOUT_FILE', `${message}: ${path}`, { cause });
    this.name = 'LayoutFileError';
    this.path = path;
  }
}
