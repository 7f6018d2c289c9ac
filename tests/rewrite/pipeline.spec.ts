import { describe, expect, it, vi } from "vitest";

import {
  EditConflictError,
  SqlParseError,
  SqlRewriter,
  StageBuilder,
  UnsupportedConstructError,
  applied,
  defineRule,
  hiveToPrestoStage,
  rewrite,
  rewriteDetailed,
  silentLogger,
  unsupported,
  validateSql,
} from "../../src/index.js";
import type { Logger, Stage, StageFactory } from "../../src/index.js";

function spyLogger(): Logger & { warn: ReturnType<typeof vi.fn>; debug: ReturnType<typeof vi.fn> } {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

const refusingStage: StageFactory = (tokens) =>
  new StageBuilder("Refusing", tokens)
    .use(defineRule("refuse", "querySpecification", "enter", () => unsupported("always refuses")))
    .build();

const throwingStage: StageFactory = (tokens) =>
  new StageBuilder("Throwing", tokens)
    .use(
      defineRule("throw", "querySpecification", "enter", () => {
        throw new Error("kaput");
      })
    )
    .build();

const conflictingStage: StageFactory = (tokens) =>
  new StageBuilder("Conflicting", tokens)
    .use(
      defineRule("overlap", "querySpecification", "enter", (node, { ledger }) => {
        ledger.replace(node.start, node.start + 2, "x");
        ledger.replace(node.start + 1, node.start + 3, "y");
        return applied;
      })
    )
    .build();

describe("SqlRewriter", () => {
  it("rewrites with the Hive to Presto pipeline by default", () => {
    expect(new SqlRewriter({ logger: silentLogger }).rewrite("SELECT 7 % 2")).toBe("SELECT mod(7, 2)");
  });

  it("passes malformed input through unchanged", () => {
    const logger = spyLogger();

    expect(rewrite("SELECT FROM", undefined, { logger })).toBe("SELECT FROM");
    expect(logger.warn).toHaveBeenCalledWith("HiveToPresto failed to rewrite sql", expect.any(SqlParseError));
  });

  it("isolates a refusing stage", () => {
    const sql = "SELECT a FROM t WHERE a RLIKE 'x'";
    const expected = rewrite(sql, [hiveToPrestoStage], { logger: silentLogger });

    expect(rewrite(sql, [refusingStage, hiveToPrestoStage], { logger: silentLogger })).toBe(expected);
    expect(rewrite(sql, [hiveToPrestoStage, refusingStage], { logger: silentLogger })).toBe(expected);
  });

  it("isolates a stage whose rule throws", () => {
    const logger = spyLogger();

    expect(rewrite("SELECT 7 % 2", [throwingStage, hiveToPrestoStage], { logger })).toBe("SELECT mod(7, 2)");
    expect(logger.warn).toHaveBeenCalledWith("Throwing failed to rewrite sql", expect.any(Error));
  });

  it("names a stage by its factory when the factory itself fails", () => {
    function brokenStage(): Stage {
      throw new Error("no stage");
    }

    const result = rewriteDetailed("SELECT 1", [brokenStage], { logger: silentLogger });

    expect(result.sql).toBe("SELECT 1");
    expect(result.stages[0]?.name).toBe("brokenStage");
    expect(result.stages[0]?.status).toBe("failed");
  });

  it("rethrows edit conflicts by default", () => {
    expect(() => rewrite("SELECT a FROM t", [conflictingStage], { logger: silentLogger })).toThrow(
      EditConflictError
    );
  });

  it("can isolate edit conflicts instead", () => {
    expect(
      rewrite("SELECT a FROM t", [conflictingStage], { logger: silentLogger, editConflicts: "isolate" })
    ).toBe("SELECT a FROM t");
  });

  it("passes the blank predicate to the ledger", () => {
    const rewriter = new SqlRewriter({ logger: silentLogger, isBlank: () => true });

    expect(rewriter.rewrite("SELECT a FROM t WHERE a RLIKE/*c*/'x'")).toBe(
      "SELECT a FROM t WHERE regexp_like(a, 'x')"
    );
  });

  it("logs the time spent at debug level", () => {
    const logger = spyLogger();
    new SqlRewriter({ logger }).rewrite("SELECT 1");

    expect(logger.debug).toHaveBeenCalledTimes(1);
    expect(logger.debug.mock.calls[0]?.[0]).toMatch(/^sql rewrite time cost \d+ ms$/);
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe("rewriteDetailed", () => {
  it("reports the outcome of every stage", () => {
    const result = rewriteDetailed("SELECT 7 % 2", [refusingStage, hiveToPrestoStage], { logger: silentLogger });

    expect(result.sql).toBe("SELECT mod(7, 2)");
    expect(result.stages.map(({ name, status, applied: count }) => ({ name, status, count }))).toEqual([
      { name: "Refusing", status: "failed", count: 0 },
      { name: "HiveToPresto", status: "rewritten", count: 1 },
    ]);
    const failure = result.stages[0]?.error;
    expect(failure).toBeInstanceOf(UnsupportedConstructError);
    expect(failure?.message).toBe("Refusing: always refuses");
  });

  it("marks stages that found nothing to do", () => {
    const result = rewriteDetailed("SELECT a FROM t", undefined, { logger: silentLogger });

    expect(result.stages).toEqual([{ name: "HiveToPresto", status: "unchanged", applied: 0 }]);
  });
});

describe("validateSql", () => {
  it("accepts supported statements", () => {
    expect(validateSql("INSERT OVERWRITE TABLE t PARTITION (dt = '2024-01-01') SELECT a FROM s")).toEqual({
      ok: true,
    });
  });

  it("returns the parse error of invalid statements", () => {
    const result = validateSql("SELECT FROM");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.position.line).toBe(1);
      expect(result.error.position.column).toBe(7);
    }
  });
});
