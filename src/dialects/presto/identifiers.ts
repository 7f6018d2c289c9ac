import { applied, defineRule, skipped } from "../../rewrite/stage.js";

const LEADING_DIGIT = /^[0-9]/;

/** Strips the backticks of a quoted identifier, undoing doubled backticks. */
export function unquoteBackticks(text: string): string {
  if (text.length < 2 || !text.startsWith("`") || !text.endsWith("`")) {
    return text;
  }
  return text.slice(1, -1).replace(/``/g, "`");
}

/** Delimits a name with double quotes, doubling the ones it contains. */
export function doubleQuote(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export const backquotedIdentifierRule = defineRule(
  "backquoted-identifier",
  "quotedIdentifier",
  "enter",
  (node, { ledger }) => {
    const { token } = node.fields;
    ledger.replace(token.tokenIndex, token.tokenIndex, doubleQuote(unquoteBackticks(token.text ?? "")));
    return applied;
  }
);

export const digitIdentifierRule = defineRule("digit-identifier", "unquotedIdentifier", "enter", (node, { ledger }) => {
  const text = node.fields.token.text ?? "";
  if (!LEADING_DIGIT.test(text)) {
    return skipped;
  }
  ledger.replace(node.fields.token.tokenIndex, node.fields.token.tokenIndex, doubleQuote(text));
  return applied;
});
