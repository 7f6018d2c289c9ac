import { readFileSync } from "node:fs";

import { Token } from "antlr4ng";

/**
 * Lexical categories produced by the Hive lexer. Numbering follows the antlr4ng
 * convention: 0 is invalid and `Token.EOF` (-1) ends every stream.
 */
export const HiveTokenType = {
  KEYWORD: 1,
  IDENTIFIER: 2,
  BACKQUOTED_IDENTIFIER: 3,
  STRING: 4,
  INTEGER_VALUE: 5,
  DECIMAL_VALUE: 6,
  TYPED_NUMBER: 7,
  OPERATOR: 8,
  PUNCTUATION: 9,
  WS: 10,
  SIMPLE_COMMENT: 11,
  BRACKETED_COMMENT: 12,
  EOF: Token.EOF,
} as const;

export type HiveTokenType = (typeof HiveTokenType)[keyof typeof HiveTokenType];

const TOKEN_TYPE_NAMES = new Map<number, string>(
  Object.entries(HiveTokenType).map(([name, type]) => [type, name])
);

export function tokenTypeName(type: number): string {
  return TOKEN_TYPE_NAMES.get(type) ?? `TOKEN_${type}`;
}

interface KeywordTable {
  readonly keywords: ReadonlySet<string>;
  readonly reserved: ReadonlySet<string>;
}

// Resolves to <package>/grammar from both src/parser and dist/parser.
const KEYWORD_FILE = new URL("../../grammar/hive-keywords.json", import.meta.url);

let keywordTable: KeywordTable | undefined;

function loadKeywordTable(): KeywordTable {
  if (keywordTable) {
    return keywordTable;
  }
  const raw: unknown = JSON.parse(readFileSync(KEYWORD_FILE, "utf8"));
  if (!isRecord(raw)) {
    throw new Error(`Keyword table ${KEYWORD_FILE.pathname} must be a JSON object`);
  }
  const keywords = readWordList(raw, "keywords");
  const reserved = readWordList(raw, "reserved");
  for (const word of reserved) {
    if (!keywords.has(word)) {
      throw new Error(`Reserved word "${word}" is missing from the keyword list`);
    }
  }
  keywordTable = { keywords, reserved };
  return keywordTable;
}

function readWordList(raw: Record<string, unknown>, key: string): Set<string> {
  const value = raw[key];
  if (!Array.isArray(value)) {
    throw new Error(`Keyword table entry "${key}" must be an array`);
  }
  const words = new Set<string>();
  for (const entry of value) {
    if (typeof entry !== "string") {
      throw new Error(`Keyword table entry "${key}" must only contain strings`);
    }
    words.add(entry.toUpperCase());
  }
  return words;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Keyword recognition ignores case, as in Hive. */
export function isKeywordText(word: string): boolean {
  return loadKeywordTable().keywords.has(word.toUpperCase());
}

/** Reserved keywords never act as bare identifiers or implicit aliases. */
export function isReservedText(word: string): boolean {
  return loadKeywordTable().reserved.has(word.toUpperCase());
}

export function isTriviaType(type: number): boolean {
  return (
    type === HiveTokenType.WS ||
    type === HiveTokenType.SIMPLE_COMMENT ||
    type === HiveTokenType.BRACKETED_COMMENT
  );
}
