import { applied, defineRule, skipped, unsupported, upperText } from "../../rewrite/stage.js";

/** `array(1, 2)` becomes `array[1, 2]`. */
export const arrayConstructorRule = defineRule("array-constructor", "functionCall", "enter", (node, { tokens, ledger }) => {
  const { name, closeParen } = node.fields;
  const [only] = name.fields.parts;
  if (name.fields.parts.length !== 1 || !only || upperText(tokens.text(only.start)) !== "ARRAY") {
    return skipped;
  }

  const openParen = tokens.indexOf("(", name.stop + 1);
  if (openParen < 0 || openParen > closeParen.tokenIndex) {
    return unsupported("array constructor without an opening parenthesis");
  }
  ledger.replace(name.stop + 1, openParen, "[");
  ledger.replace(closeParen.tokenIndex, closeParen.tokenIndex, "]");
  return applied;
});
