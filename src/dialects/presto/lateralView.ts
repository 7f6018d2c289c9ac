import { applied, defineRule, unsupported, upperText } from "../../rewrite/stage.js";

/**
 * `LATERAL VIEW explode(x) t AS c` becomes `cross join unnest(x) as t (c)`.
 * Only plain `explode` has an unnest counterpart.
 */
export const lateralViewRule = defineRule("lateral-view", "lateralView", "enter", (node, { tokens, ledger }) => {
  const { outer, udtf, closeParen, as, columnAliases } = node.fields;
  const udtfName = tokens.textOf(udtf.start, udtf.stop);
  if (outer) {
    return unsupported("Lateral View OUTER is not supported");
  }
  if (udtf.fields.parts.length !== 1 || upperText(udtfName) !== "EXPLODE") {
    return unsupported(`Lateral View query only supports UDTF explode, found ${udtfName}`);
  }

  ledger.replace(node.start, udtf.stop, "cross join unnest");
  ledger.insertAfter(closeParen.tokenIndex, " as");
  if (as) {
    ledger.deleteToken(as.tokenIndex);
  }
  const first = columnAliases[0];
  const last = columnAliases[columnAliases.length - 1];
  if (first && last) {
    ledger.insertBefore(first.start, "(");
    ledger.insertAfter(last.stop, ")");
  }
  return applied;
});
