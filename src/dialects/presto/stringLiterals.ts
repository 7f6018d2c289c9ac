import { applied, defineRule, skipped } from "../../rewrite/stage.js";

/** `"abc"` becomes `'abc'`; the content between the quotes is kept as written. */
export const doubleQuotedStringRule = defineRule(
  "double-quoted-string",
  "stringLiteral",
  "exit",
  (node, { ledger }) => {
    let changed = false;
    for (const segment of node.fields.segments) {
      const text = segment.text ?? "";
      if (!text.startsWith('"')) {
        continue;
      }
      ledger.replace(segment.tokenIndex, segment.tokenIndex, `'${text.slice(1, -1)}'`);
      changed = true;
    }
    return changed ? applied : skipped;
  }
);
