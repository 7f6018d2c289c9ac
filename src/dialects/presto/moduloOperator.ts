import { applied, defineRule, skipped } from "../../rewrite/stage.js";

/** `a % b` becomes `mod(a, b)`. */
export const moduloOperatorRule = defineRule("modulo-operator", "arithmeticBinary", "enter", (node, { ledger }) => {
  const { left, operator } = node.fields;
  if (operator.text !== "%") {
    return skipped;
  }

  ledger.insertBefore(node.start, "mod(");
  ledger.insertBefore(left.stop + 1, ",");
  ledger.deleteToken(operator.tokenIndex);
  ledger.insertAfter(node.stop, ")");
  return applied;
});
