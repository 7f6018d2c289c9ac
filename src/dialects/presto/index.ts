import { StageBuilder, type StageFactory } from "../../rewrite/stage.js";
import { arrayConstructorRule } from "./arrayConstructor.js";
import { dottedFunctionNameRule } from "./functionNames.js";
import { backquotedIdentifierRule, digitIdentifierRule } from "./identifiers.js";
import { lateralViewRule } from "./lateralView.js";
import { moduloOperatorRule } from "./moduloOperator.js";
import { queryOrganizationRule } from "./queryOrganization.js";
import { regexpOperatorRule } from "./regexpOperator.js";
import { doubleQuotedStringRule } from "./stringLiterals.js";
import { stringTypeRule } from "./stringType.js";

export { arrayConstructorRule } from "./arrayConstructor.js";
export { dottedFunctionNameRule } from "./functionNames.js";
export { backquotedIdentifierRule, digitIdentifierRule, doubleQuote, unquoteBackticks } from "./identifiers.js";
export { lateralViewRule } from "./lateralView.js";
export { moduloOperatorRule } from "./moduloOperator.js";
export { queryOrganizationRule } from "./queryOrganization.js";
export { regexpOperatorRule } from "./regexpOperator.js";
export { doubleQuotedStringRule } from "./stringLiterals.js";
export { stringTypeRule } from "./stringType.js";

export const HIVE_TO_PRESTO_STAGE = "HiveToPresto";

/** Every Hive-to-Presto rule in one pass over one parse. */
export const hiveToPrestoStage: StageFactory = (tokens) =>
  new StageBuilder(HIVE_TO_PRESTO_STAGE, tokens)
    .use(regexpOperatorRule)
    .use(moduloOperatorRule)
    .use(arrayConstructorRule)
    .use(stringTypeRule)
    .use(lateralViewRule)
    .use(backquotedIdentifierRule)
    .use(digitIdentifierRule)
    .use(queryOrganizationRule)
    .use(dottedFunctionNameRule)
    .use(doubleQuotedStringRule)
    .build();

export const hivePrestoPipeline: readonly StageFactory[] = [hiveToPrestoStage];
