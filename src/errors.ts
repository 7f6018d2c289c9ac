import type { TokenRange } from "./parser/syntaxTypes.js";

export enum RewriteErrorCode {
  ParseError = "parse_error",
  UnsupportedConstruct = "unsupported_construct",
  EditConflict = "edit_conflict",
  ForeignTokenStream = "foreign_token_stream",
}

export class SqlRewriteError extends Error {
  readonly code: RewriteErrorCode;

  constructor(code: RewriteErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SqlRewriteError";
    this.code = code;
  }
}

export interface SqlParsePosition {
  /** One-based line of the offending input. */
  readonly line: number;
  /** Zero-based column within that line. */
  readonly column: number;
  /** Index of the offending token, absent for lexer failures. */
  readonly tokenIndex?: number;
}

export class SqlParseError extends SqlRewriteError {
  readonly position: SqlParsePosition;

  constructor(reason: string, position: SqlParsePosition, near?: string) {
    super(RewriteErrorCode.ParseError, formatParseMessage(reason, position, near));
    this.name = "SqlParseError";
    this.position = position;
  }
}

function formatParseMessage(
  reason: string,
  position: SqlParsePosition,
  near: string | undefined
): string {
  return near
    ? `line ${position.line}:${position.column} near '${near}': ${reason}`
    : `line ${position.line}:${position.column}: ${reason}`;
}

export class UnsupportedConstructError extends SqlRewriteError {
  readonly stage: string;
  readonly kind: string;
  readonly range: TokenRange;

  constructor(stage: string, kind: string, range: TokenRange, reason: string) {
    super(RewriteErrorCode.UnsupportedConstruct, `${stage}: ${reason}`);
    this.name = "UnsupportedConstructError";
    this.stage = stage;
    this.kind = kind;
    this.range = range;
  }
}

/**
 * Two rules recorded Replace/Delete edits whose token ranges partially overlap.
 * This is a defect in the rule set, never a property of the input.
 */
export class EditConflictError extends SqlRewriteError {
  readonly first: TokenRange;
  readonly second: TokenRange;

  constructor(first: TokenRange, second: TokenRange) {
    super(
      RewriteErrorCode.EditConflict,
      `Edit on tokens ${first.start}..${first.stop} partially overlaps edit on tokens ${second.start}..${second.stop}`
    );
    this.name = "EditConflictError";
    this.first = first;
    this.second = second;
  }
}
