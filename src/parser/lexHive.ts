import { CommonToken, CommonTokenStream, ListTokenSource, Token } from "antlr4ng";

import { SqlParseError } from "../errors.js";
import { HiveTokenType, isKeywordText, isReservedText, isTriviaType } from "./tokens.js";

const THREE_CHAR_OPERATORS = ["<=>"];
const TWO_CHAR_OPERATORS = ["<=", ">=", "<>", "!=", "==", "||"];
const ONE_CHAR_OPERATORS = "=<>+-*/%~&|^!";
const PUNCTUATION = "()[],.;:";

const INTEGER_PATTERN = /^\d+$/;
const TYPED_NUMBER_PATTERN = /^\d+(?:L|S|Y|BD|D)$/i;
const EXPONENT_PATTERN = /^\d+E[+-]?\d+$/i;

/**
 * Tokenize Hive SQL into a filled antlr4ng token stream. Every character of the
 * input belongs to exactly one token; whitespace and comments travel on the
 * hidden channel.
 */
export function lexHive(sql: string): CommonTokenStream {
  const tokens = new HiveLexer(sql).tokenize();
  const stream = new CommonTokenStream(new ListTokenSource(tokens, "hive"));
  stream.fill();
  return stream;
}

interface Position {
  readonly line: number;
  readonly column: number;
}

class HiveLexer {
  private readonly input: string;
  private pos = 0;
  private line = 1;
  private column = 0;
  private readonly tokens: Token[] = [];
  /** Last main-channel token, for telling `t.1col` from `.5`. */
  private lastMain: Token | undefined;

  constructor(input: string) {
    this.input = input;
  }

  tokenize(): Token[] {
    while (!this.isAtEnd()) {
      this.scanToken();
    }
    const eof = CommonToken.fromType(Token.EOF, "");
    eof.start = this.pos;
    eof.stop = this.pos - 1;
    eof.line = this.line;
    eof.column = this.column;
    eof.tokenIndex = this.tokens.length;
    this.tokens.push(eof);
    return this.tokens;
  }

  private scanToken(): void {
    const start = this.pos;
    const origin = { line: this.line, column: this.column };
    const char = this.peek();

    if (isWhitespace(char)) {
      while (!this.isAtEnd() && isWhitespace(this.peek())) {
        this.advance();
      }
      this.emit(HiveTokenType.WS, start, origin);
      return;
    }

    if (char === "-" && this.peekAt(1) === "-") {
      while (!this.isAtEnd() && this.peek() !== "\n") {
        this.advance();
      }
      this.emit(HiveTokenType.SIMPLE_COMMENT, start, origin);
      return;
    }

    if (char === "/" && this.peekAt(1) === "*") {
      this.advanceBy(2);
      this.scanUntil("*/", "unterminated comment", start, origin);
      this.emit(HiveTokenType.BRACKETED_COMMENT, start, origin);
      return;
    }

    if (char === "'" || char === '"') {
      this.scanString(char, start, origin);
      this.emit(HiveTokenType.STRING, start, origin);
      return;
    }

    if (char === "`") {
      this.scanBackquotedIdentifier(start, origin);
      this.emit(HiveTokenType.BACKQUOTED_IDENTIFIER, start, origin);
      return;
    }

    if (isDigit(char) || (char === "." && isDigit(this.peekAt(1)) && !this.followsDereferenceBase())) {
      this.emit(this.scanNumberOrIdentifier(start), start, origin);
      return;
    }

    if (isWordStart(char)) {
      while (!this.isAtEnd() && isWordPart(this.peek())) {
        this.advance();
      }
      const word = this.input.slice(start, this.pos);
      this.emit(isKeywordText(word) ? HiveTokenType.KEYWORD : HiveTokenType.IDENTIFIER, start, origin);
      return;
    }

    const operator = [...THREE_CHAR_OPERATORS, ...TWO_CHAR_OPERATORS].find((candidate) =>
      this.input.startsWith(candidate, start)
    );
    if (operator) {
      this.advanceBy(operator.length);
      this.emit(HiveTokenType.OPERATOR, start, origin);
      return;
    }

    if (ONE_CHAR_OPERATORS.includes(char)) {
      this.advance();
      this.emit(HiveTokenType.OPERATOR, start, origin);
      return;
    }

    if (PUNCTUATION.includes(char)) {
      this.advance();
      this.emit(HiveTokenType.PUNCTUATION, start, origin);
      return;
    }

    throw new SqlParseError(`token recognition error at: '${char}'`, origin, char);
  }

  private scanUntil(terminator: string, reason: string, start: number, origin: Position): void {
    while (!this.isAtEnd()) {
      if (this.input.startsWith(terminator, this.pos)) {
        this.advanceBy(terminator.length);
        return;
      }
      this.advance();
    }
    throw new SqlParseError(reason, origin, this.input.slice(start, start + 10));
  }

  private scanString(quote: string, start: number, origin: Position): void {
    this.advance();
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === "\\") {
        this.advanceBy(2);
        continue;
      }
      this.advance();
      if (char === quote) {
        return;
      }
    }
    throw new SqlParseError("unterminated string literal", origin, this.input.slice(start, start + 10));
  }

  private scanBackquotedIdentifier(start: number, origin: Position): void {
    this.advance();
    while (!this.isAtEnd()) {
      const char = this.peek();
      this.advance();
      if (char !== "`") {
        continue;
      }
      if (this.peek() !== "`") {
        return;
      }
      this.advance();
    }
    throw new SqlParseError("unterminated quoted identifier", origin, this.input.slice(start, start + 10));
  }

  /**
   * Hive lets identifiers begin with a digit (`1var`), so a run of word
   * characters is only a number when the whole run reads as one.
   */
  private scanNumberOrIdentifier(start: number): number {
    if (this.peek() === ".") {
      return this.scanFraction();
    }

    while (!this.isAtEnd() && isWordPart(this.peek())) {
      this.advance();
    }
    const run = this.input.slice(start, this.pos);

    if (INTEGER_PATTERN.test(run) && this.peek() === "." && !isWordStart(this.peekAt(1))) {
      return this.scanFraction();
    }
    if (/^\d+E$/i.test(run) && (this.peek() === "+" || this.peek() === "-") && isDigit(this.peekAt(1))) {
      this.advance();
      this.skipDigits();
      return HiveTokenType.DECIMAL_VALUE;
    }
    if (INTEGER_PATTERN.test(run)) {
      return HiveTokenType.INTEGER_VALUE;
    }
    if (TYPED_NUMBER_PATTERN.test(run)) {
      return HiveTokenType.TYPED_NUMBER;
    }
    if (EXPONENT_PATTERN.test(run)) {
      return HiveTokenType.DECIMAL_VALUE;
    }
    return HiveTokenType.IDENTIFIER;
  }

  /** Consumes `.digits`, an optional exponent and an optional `BD`/`D` suffix. */
  private scanFraction(): number {
    this.advance();
    this.skipDigits();
    const exponentSign = this.peekAt(1) === "+" || this.peekAt(1) === "-";
    if (
      (this.peek() === "e" || this.peek() === "E") &&
      isDigit(this.peekAt(exponentSign ? 2 : 1))
    ) {
      this.advanceBy(exponentSign ? 2 : 1);
      this.skipDigits();
    }
    for (const suffix of ["BD", "D"]) {
      const candidate = this.input.slice(this.pos, this.pos + suffix.length);
      if (candidate.toUpperCase() === suffix && !isWordPart(this.peekAt(suffix.length))) {
        this.advanceBy(suffix.length);
        return HiveTokenType.TYPED_NUMBER;
      }
    }
    return HiveTokenType.DECIMAL_VALUE;
  }

  private skipDigits(): void {
    while (!this.isAtEnd() && isDigit(this.peek())) {
      this.advance();
    }
  }

  private emit(type: number, start: number, origin: Position): void {
    const token = CommonToken.fromType(type, this.input.slice(start, this.pos));
    token.channel = isTriviaType(type) ? Token.HIDDEN_CHANNEL : Token.DEFAULT_CHANNEL;
    token.start = start;
    token.stop = this.pos - 1;
    token.line = origin.line;
    token.column = origin.column;
    token.tokenIndex = this.tokens.length;
    this.tokens.push(token);
    if (token.channel === Token.DEFAULT_CHANNEL) {
      this.lastMain = token;
    }
  }

  /** After a name or a closing bracket a dot dereferences, so `.1col` is not a number. */
  private followsDereferenceBase(): boolean {
    const previous = this.lastMain;
    if (!previous) {
      return false;
    }
    switch (previous.type) {
      case HiveTokenType.IDENTIFIER:
      case HiveTokenType.BACKQUOTED_IDENTIFIER:
        return true;
      case HiveTokenType.KEYWORD:
        return !isReservedText(previous.text ?? "");
      case HiveTokenType.PUNCTUATION:
        return previous.text === ")" || previous.text === "]";
      default:
        return false;
    }
  }

  private isAtEnd(): boolean {
    return this.pos >= this.input.length;
  }

  private peek(): string {
    return this.input[this.pos] ?? "\0";
  }

  private peekAt(offset: number): string {
    return this.input[this.pos + offset] ?? "\0";
  }

  private advance(): void {
    if (this.input[this.pos] === "\n") {
      this.line += 1;
      this.column = 0;
    } else {
      this.column += 1;
    }
    this.pos += 1;
  }

  private advanceBy(count: number): void {
    for (let i = 0; i < count && !this.isAtEnd(); i += 1) {
      this.advance();
    }
  }
}

function isWhitespace(char: string): boolean {
  return char === " " || char === "\t" || char === "\n" || char === "\r" || char === "\f";
}

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9";
}

function isWordStart(char: string): boolean {
  return (char >= "a" && char <= "z") || (char >= "A" && char <= "Z") || char === "_" || char === "$";
}

function isWordPart(char: string): boolean {
  return isWordStart(char) || isDigit(char);
}
