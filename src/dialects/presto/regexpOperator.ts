import { applied, defineRule, skipped, upperText } from "../../rewrite/stage.js";

const REGEX_OPERATORS = new Set(["RLIKE", "REGEXP"]);

/** `a [NOT] RLIKE|REGEXP p` becomes `[not ]regexp_like(a, p)`. */
export const regexpOperatorRule = defineRule("regexp-operator", "predicate", "enter", (node, { ledger }) => {
  const { left, negation, operator } = node.fields;
  if (!REGEX_OPERATORS.has(upperText(operator.text))) {
    return skipped;
  }

  ledger.insertBefore(node.start, negation ? "not regexp_like(" : "regexp_like(");
  // Anchored on the token after the left operand so that enclosing calls
  // opened by nested rules close first.
  ledger.insertBefore(left.stop + 1, ",");
  if (negation) {
    ledger.deleteToken(negation.tokenIndex);
  }
  ledger.deleteToken(operator.tokenIndex);
  ledger.insertAfter(node.stop, ")");
  return applied;
});
