import { hivePrestoPipeline } from "../dialects/presto/index.js";
import { EditConflictError, SqlParseError, UnsupportedConstructError } from "../errors.js";
import { consoleLogger, type Logger } from "../logger.js";
import { lexHive } from "../parser/lexHive.js";
import { parseHive, parseHiveTokens } from "../parser/parseHive.js";
import { TokenView } from "../parser/tokenView.js";
import { EditLedger, type BlankPredicate } from "./editLedger.js";
import type { StageFactory } from "./stage.js";
import { walk } from "./walker.js";

export type EditConflictPolicy = "throw" | "isolate";

export interface RewriteOptions {
  /** Receives stage warnings and timing; defaults to the console. */
  logger?: Logger;
  /** Whether a rule-set defect aborts the rewrite or only its stage. Default `"throw"`. */
  editConflicts?: EditConflictPolicy;
  /** Which trivia a token deletion may absorb. Defaults to whitespace. */
  isBlank?: BlankPredicate;
}

export type StageStatus = "rewritten" | "unchanged" | "failed";

export interface StageReport {
  readonly name: string;
  readonly status: StageStatus;
  /** Number of rule invocations that recorded edits. */
  readonly applied: number;
  readonly error?: Error;
}

export interface RewriteResult {
  readonly sql: string;
  readonly stages: readonly StageReport[];
}

export type ValidationResult = { readonly ok: true } | { readonly ok: false; readonly error: SqlParseError };

interface StageOutcome {
  readonly sql: string;
  readonly report: StageReport;
}

/**
 * Runs stages in order, each on a fresh parse of the previous stage's output.
 * A stage that cannot parse its input, or meets a construct it cannot
 * translate, passes its input through unchanged.
 */
export class SqlRewriter {
  private readonly logger: Logger;
  private readonly editConflicts: EditConflictPolicy;
  private readonly isBlank: BlankPredicate | undefined;

  constructor(options: RewriteOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
    this.editConflicts = options.editConflicts ?? "throw";
    this.isBlank = options.isBlank;
  }

  rewrite(sql: string, stages: readonly StageFactory[] = hivePrestoPipeline): string {
    return this.rewriteDetailed(sql, stages).sql;
  }

  rewriteDetailed(sql: string, stages: readonly StageFactory[] = hivePrestoPipeline): RewriteResult {
    const startedAt = Date.now();
    const reports: StageReport[] = [];
    let current = sql;
    for (const factory of stages) {
      const outcome = this.runStage(current, factory);
      reports.push(outcome.report);
      current = outcome.sql;
    }
    this.logger.debug(`sql rewrite time cost ${Date.now() - startedAt} ms`);
    return { sql: current, stages: reports };
  }

  private runStage(sql: string, factory: StageFactory): StageOutcome {
    let name = factory.name || "anonymous stage";
    try {
      const tokens = new TokenView(lexHive(sql));
      const stage = factory(tokens);
      name = stage.name;
      const root = parseHiveTokens(stage.tokens);
      const ledger = new EditLedger(stage.tokens, { isBlank: this.isBlank });
      const walked = walk(root, stage, { tokens: stage.tokens, ledger });
      if (!walked.ok) {
        return this.fail(name, sql, new UnsupportedConstructError(name, walked.kind, walked.range, walked.reason));
      }
      const output = ledger.materialize();
      return {
        sql: output,
        report: { name, status: output === sql ? "unchanged" : "rewritten", applied: walked.applied },
      };
    } catch (error) {
      if (error instanceof EditConflictError && this.editConflicts === "throw") {
        throw error;
      }
      return this.fail(name, sql, toError(error));
    }
  }

  private fail(name: string, sql: string, error: Error): StageOutcome {
    this.logger.warn(`${name} failed to rewrite sql`, error);
    return { sql, report: { name, status: "failed", applied: 0, error } };
  }
}

/** Rewrites Hive SQL with a one-off `SqlRewriter`. */
export function rewrite(
  sql: string,
  stages: readonly StageFactory[] = hivePrestoPipeline,
  options: RewriteOptions = {}
): string {
  return new SqlRewriter(options).rewrite(sql, stages);
}

export function rewriteDetailed(
  sql: string,
  stages: readonly StageFactory[] = hivePrestoPipeline,
  options: RewriteOptions = {}
): RewriteResult {
  return new SqlRewriter(options).rewriteDetailed(sql, stages);
}

/** Checks that `sql` is one statement of the supported Hive grammar. */
export function validateSql(sql: string): ValidationResult {
  try {
    parseHive(sql);
    return { ok: true };
  } catch (error) {
    if (error instanceof SqlParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}

function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}
