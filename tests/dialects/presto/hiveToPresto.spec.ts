import { describe, expect, it, vi } from "vitest";

import { UnsupportedConstructError, hivePrestoPipeline, rewrite, silentLogger } from "../../../src/index.js";
import type { Logger } from "../../../src/index.js";

function toPresto(sql: string): string {
  return rewrite(sql, hivePrestoPipeline, { logger: silentLogger });
}

function spyLogger(): Logger & { warn: ReturnType<typeof vi.fn> } {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

describe("regexp operators", () => {
  it("turns RLIKE into regexp_like", () => {
    expect(toPresto("SELECT a FROM t WHERE a RLIKE '.*'")).toBe("SELECT a FROM t WHERE regexp_like(a, '.*')");
  });

  it("hoists the negation of NOT REGEXP", () => {
    expect(toPresto("SELECT a FROM t WHERE a NOT REGEXP 'x'")).toBe(
      "SELECT a FROM t WHERE not regexp_like(a, 'x')"
    );
  });

  it("leaves an outer NOT where it is", () => {
    expect(toPresto("SELECT a FROM t WHERE NOT a RLIKE 'x'")).toBe("SELECT a FROM t WHERE NOT regexp_like(a, 'x')");
  });

  it("wraps a rewritten left operand", () => {
    expect(toPresto("SELECT a FROM t WHERE a % 2 RLIKE '1'")).toBe(
      "SELECT a FROM t WHERE regexp_like(mod(a, 2), '1')"
    );
  });

  it("keeps a comment between operator and pattern", () => {
    expect(toPresto("SELECT a FROM t WHERE a RLIKE/*c*/'x'")).toBe("SELECT a FROM t WHERE regexp_like(a, /*c*/'x')");
  });
});

describe("modulo", () => {
  it("turns % into mod", () => {
    expect(toPresto("SELECT 7 % 2")).toBe("SELECT mod(7, 2)");
  });

  it("nests chained operators", () => {
    expect(toPresto("SELECT a % 2 % 3")).toBe("SELECT mod(mod(a, 2), 3)");
  });

  it("handles operands written without spaces", () => {
    expect(toPresto("SELECT 7%2")).toBe("SELECT mod(7,2)");
  });
});

describe("array constructor", () => {
  it("switches the call to brackets", () => {
    expect(toPresto("SELECT array(1, 2, 3)")).toBe("SELECT array[1, 2, 3]");
  });

  it("finds the parenthesis past trivia", () => {
    expect(toPresto("SELECT array (1)")).toBe("SELECT array[1]");
  });

  it("leaves other calls alone", () => {
    expect(toPresto("SELECT size(a) FROM t")).toBe("SELECT size(a) FROM t");
  });
});

describe("types", () => {
  it("maps STRING to varchar", () => {
    expect(toPresto("CREATE TABLE t (c STRING)")).toBe("CREATE TABLE t (c varchar)");
  });

  it("maps nested STRING types", () => {
    expect(toPresto("CREATE TABLE t (tags ARRAY<STRING>)")).toBe("CREATE TABLE t (tags ARRAY<varchar>)");
  });

  it("is a no-op on its own output", () => {
    const once = toPresto("SELECT CAST(a AS STRING) FROM t");

    expect(once).toBe("SELECT CAST(a AS varchar) FROM t");
    expect(toPresto(once)).toBe(once);
  });
});

describe("identifiers and literals", () => {
  it("switches backticks to double quotes", () => {
    expect(toPresto("SELECT `col` FROM t")).toBe('SELECT "col" FROM t');
  });

  it("quotes identifiers that start with a digit", () => {
    expect(toPresto("SELECT 1col FROM t")).toBe('SELECT "1col" FROM t');
  });

  it("quotes digit-led parts of qualified names", () => {
    expect(toPresto("SELECT t.1col FROM t")).toBe('SELECT t."1col" FROM t');
    expect(toPresto("SELECT a.1b, 2c.x FROM t")).toBe('SELECT a."1b", "2c".x FROM t');
  });

  it("doubles double quotes inside backticked names", () => {
    expect(toPresto('SELECT `a"b` FROM t')).toBe('SELECT "a""b" FROM t');
  });

  it("quotes dotted function names as one name", () => {
    expect(toPresto("SELECT db.fn(a) FROM t")).toBe('SELECT "db.fn"(a) FROM t');
  });

  it("unquotes backticked parts of dotted function names", () => {
    expect(toPresto("SELECT `db`.`fn`(x) FROM t")).toBe('SELECT "db.fn"(x) FROM t');
  });

  it("switches double-quoted strings to single quotes", () => {
    expect(toPresto('SELECT "abc" FROM t')).toBe("SELECT 'abc' FROM t");
  });

  it("requotes only the double-quoted segments of a string sequence", () => {
    expect(toPresto("SELECT 'a' \"b\" FROM t")).toBe("SELECT 'a' 'b' FROM t");
  });
});

describe("query organization", () => {
  it("turns SORT BY into ORDER BY", () => {
    expect(toPresto("SELECT * FROM t SORT BY a")).toBe("SELECT * FROM t order BY a");
  });

  it("removes CLUSTER BY", () => {
    expect(toPresto("SELECT * FROM t CLUSTER BY a")).toBe("SELECT * FROM t");
  });

  it("removes DISTRIBUTE BY next to SORT BY", () => {
    expect(toPresto("SELECT * FROM t DISTRIBUTE BY a SORT BY b")).toBe("SELECT * FROM t order BY b");
  });

  it("drops rewrites inside a removed clause", () => {
    expect(toPresto("SELECT * FROM t CLUSTER BY a % 2")).toBe("SELECT * FROM t");
  });

  it("removes CLUSTER BY inside a subquery", () => {
    expect(toPresto("SELECT * FROM (SELECT `a` FROM t CLUSTER BY a % 2) s")).toBe(
      'SELECT * FROM (SELECT "a" FROM t) s'
    );
  });
});

describe("lateral view", () => {
  it("becomes a cross join unnest", () => {
    expect(toPresto("SELECT a FROM t LATERAL VIEW explode(b) t2 AS c")).toBe(
      "SELECT a FROM t cross join unnest(b) as t2 (c)"
    );
  });

  it("parenthesizes several column aliases", () => {
    expect(toPresto("SELECT k, v FROM t LATERAL VIEW explode(m) x k, v")).toBe(
      "SELECT k, v FROM t cross join unnest(m) as x (k, v)"
    );
  });

  it("refuses UDTFs other than explode", () => {
    const logger = spyLogger();
    const sql = "SELECT a FROM t LATERAL VIEW posexplode(b) t2 AS p, c";

    expect(rewrite(sql, hivePrestoPipeline, { logger })).toBe(sql);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    const [message, error] = logger.warn.mock.calls[0] ?? [];
    expect(message).toBe("HiveToPresto failed to rewrite sql");
    expect(error).toBeInstanceOf(UnsupportedConstructError);
    expect(error instanceof Error ? error.message : "").toBe(
      "HiveToPresto: Lateral View query only supports UDTF explode, found posexplode"
    );
  });

  it("refuses LATERAL VIEW OUTER", () => {
    const sql = "SELECT a FROM t LATERAL VIEW OUTER explode(b) t2 AS c";

    expect(toPresto(sql)).toBe(sql);
  });
});

describe("whole statements", () => {
  it("keeps untouched text byte for byte", () => {
    const sql = "select  a /* keep */ from t\nwhere a rlike 'x' -- trailing";

    expect(toPresto(sql)).toBe("select  a /* keep */ from t\nwhere regexp_like(a, 'x') -- trailing");
  });

  it("applies several rules in one pass", () => {
    expect(toPresto("SELECT `k`, array(a % 2) FROM t WHERE b NOT RLIKE \"y\" SORT BY k")).toBe(
      "SELECT \"k\", array[mod(a, 2)] FROM t WHERE not regexp_like(b, 'y') order BY k"
    );
  });
});
