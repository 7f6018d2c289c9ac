export {
  SqlRewriter,
  rewrite,
  rewriteDetailed,
  validateSql,
} from "./rewrite/pipeline.js";
export type {
  EditConflictPolicy,
  RewriteOptions,
  RewriteResult,
  StageReport,
  StageStatus,
  ValidationResult,
} from "./rewrite/pipeline.js";
export { EditLedger, isWhitespaceOnly } from "./rewrite/editLedger.js";
export type { BlankPredicate, Edit, EditLedgerOptions, RangeEdit } from "./rewrite/editLedger.js";
export { StageBuilder, applied, defineRule, skipped, unsupported } from "./rewrite/stage.js";
export type {
  NodeHandlers,
  Rule,
  RuleContext,
  RuleHandler,
  RulePhase,
  RuleResult,
  Stage,
  StageFactory,
  StageHandlers,
} from "./rewrite/stage.js";
export { walk } from "./rewrite/walker.js";
export type { WalkResult } from "./rewrite/walker.js";
export { lexHive } from "./parser/lexHive.js";
export { parseHive, parseHiveTokens } from "./parser/parseHive.js";
export type { ParsedHive } from "./parser/parseHive.js";
export { TokenView } from "./parser/tokenView.js";
export { HiveTokenType, tokenTypeName } from "./parser/tokens.js";
export { isNodeOfKind, isSyntaxNode } from "./parser/syntaxTypes.js";
export type {
  HiveSyntaxTree,
  NodeFieldMap,
  NodeKind,
  SyntaxElement,
  SyntaxNode,
  TokenRange,
} from "./parser/syntaxTypes.js";
export * from "./dialects/presto/index.js";
export {
  EditConflictError,
  RewriteErrorCode,
  SqlParseError,
  SqlRewriteError,
  UnsupportedConstructError,
} from "./errors.js";
export type { SqlParsePosition } from "./errors.js";
export { consoleLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
