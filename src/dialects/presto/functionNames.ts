import { applied, defineRule, skipped } from "../../rewrite/stage.js";
import { doubleQuote, unquoteBackticks } from "./identifiers.js";

/** `db.fn(x)` becomes `"db.fn"(x)`. */
export const dottedFunctionNameRule = defineRule(
  "dotted-function-name",
  "functionCall",
  "exit",
  (node, { tokens, ledger }) => {
    const { name } = node.fields;
    if (name.fields.parts.length < 2) {
      return skipped;
    }
    const text = name.fields.parts
      .map((part) => unquoteBackticks(tokens.textOf(part.start, part.stop)))
      .join(".");
    ledger.replace(name.start, name.stop, doubleQuote(text));
    return applied;
  }
);
