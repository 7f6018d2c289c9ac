import { applied, defineRule, skipped, upperText } from "../../rewrite/stage.js";

export const stringTypeRule = defineRule("string-type", "primitiveType", "enter", (node, { ledger }) => {
  const { name } = node.fields;
  if (upperText(name.text) !== "STRING") {
    return skipped;
  }
  ledger.replace(name.tokenIndex, name.tokenIndex, "varchar");
  return applied;
});
