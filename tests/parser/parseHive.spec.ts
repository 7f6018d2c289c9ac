import { describe, expect, it } from "vitest";

import { SqlParseError, isNodeOfKind, isSyntaxNode, parseHive } from "../../src/index.js";
import type { NodeKind, SyntaxNode } from "../../src/index.js";

function findFirst<K extends NodeKind>(node: SyntaxNode, kind: K): SyntaxNode<K> | undefined {
  if (isNodeOfKind(node, kind)) {
    return node;
  }
  for (const child of node.children) {
    if (!isSyntaxNode(child)) {
      continue;
    }
    const found = findFirst(child, kind);
    if (found) {
      return found;
    }
  }
  return undefined;
}

function expectNode<K extends NodeKind>(node: SyntaxNode, kind: K): SyntaxNode<K> {
  const found = findFirst(node, kind);
  if (!found) {
    throw new Error(`expected a ${kind} node`);
  }
  return found;
}

describe("parseHive", () => {
  it("parses a query with a regex predicate", () => {
    const { root, tokens } = parseHive("SELECT a FROM t WHERE a RLIKE '.*'");

    expect(root.fields.statement.kind).toBe("query");
    const spec = expectNode(root, "querySpecification");
    expect(spec.fields.items).toHaveLength(1);
    expect(spec.fields.from?.fields.relations[0]?.kind).toBe("tableReference");

    const predicate = expectNode(root, "predicate");
    expect(predicate.fields.operator.text).toBe("RLIKE");
    expect(predicate.fields.negation).toBeUndefined();
    expect(tokens.textOf(predicate.start, predicate.stop)).toBe("a RLIKE '.*'");
  });

  it("binds multiplication tighter than addition", () => {
    const { root } = parseHive("SELECT 1 + 2 * 3");
    const sum = expectNode(root, "arithmeticBinary");

    expect(sum.fields.operator.text).toBe("+");
    expect(sum.fields.right.kind).toBe("arithmeticBinary");
  });

  it("keeps main-channel tokens and nodes in source order", () => {
    const { root } = parseHive("SELECT 7 % 2");
    const modulo = expectNode(root, "arithmeticBinary");

    expect(modulo.start).toBe(2);
    expect(modulo.stop).toBe(6);
    expect(modulo.children.map((child) => (isSyntaxNode(child) ? child.kind : child.text))).toEqual([
      "numericLiteral",
      "%",
      "numericLiteral",
    ]);
  });

  it("distinguishes the negated predicate from an outer NOT", () => {
    const negated = expectNode(parseHive("SELECT a FROM t WHERE a NOT REGEXP 'x'").root, "predicate");
    expect(negated.fields.negation?.text).toBe("NOT");

    const outer = parseHive("SELECT a FROM t WHERE NOT a REGEXP 'x'").root;
    expect(expectNode(outer, "logicalNot").fields.operand.kind).toBe("predicate");
    expect(expectNode(outer, "predicate").fields.negation).toBeUndefined();
  });

  it("parses lateral views with their aliases", () => {
    const { root, tokens } = parseHive("SELECT a FROM t LATERAL VIEW explode(b) t2 AS c, d");
    const view = expectNode(root, "lateralView");

    expect(tokens.textOf(view.fields.udtf.start, view.fields.udtf.stop)).toBe("explode");
    expect(view.fields.outer).toBeUndefined();
    expect(view.fields.as?.text).toBe("AS");
    expect(view.fields.columnAliases.map((alias) => tokens.textOf(alias.start, alias.stop))).toEqual([
      "c",
      "d",
    ]);
  });

  it("parses table definitions with nested types", () => {
    const { root } = parseHive("CREATE TABLE t (c STRING, tags ARRAY<STRING>, m MAP<INT, DOUBLE>)");
    const table = expectNode(root, "createTable");

    expect(table.fields.columns.map((column) => column.fields.dataType.kind)).toEqual([
      "primitiveType",
      "arrayType",
      "mapType",
    ]);
  });

  it("collects query organization clauses", () => {
    const { root } = parseHive("SELECT a FROM t DISTRIBUTE BY a SORT BY a DESC LIMIT 10");
    const organization = expectNode(root, "queryOrganization");

    expect(organization.fields.distributeBy?.fields.keyword.text).toBe("DISTRIBUTE");
    expect(organization.fields.sortBy?.fields.items[0]?.kind).toBe("sortItem");
    expect(organization.fields.limit).toBeDefined();
    expect(organization.fields.clusterBy).toBeUndefined();
  });

  it("parses windowed calls, joins and subqueries", () => {
    const sql =
      "SELECT row_number() OVER (PARTITION BY a ORDER BY b ROWS BETWEEN UNBOUNDED PRECEDING AND CURRENT ROW) " +
      "FROM t LEFT OUTER JOIN (SELECT a FROM u) s ON t.a = s.a";
    const { root } = parseHive(sql);

    expect(expectNode(root, "windowFrame").fields.upper).toBeDefined();
    expect(expectNode(root, "join").fields.joinType.map((token) => token.text)).toEqual(["LEFT", "OUTER", "JOIN"]);
    expect(expectNode(root, "subqueryRelation").fields.alias).toBeDefined();
  });

  it("reports the offending token of invalid input", () => {
    let thrown: unknown;
    try {
      parseHive("SELECT FROM");
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(SqlParseError);
    if (!(thrown instanceof SqlParseError)) {
      return;
    }
    expect(thrown.message).toBe("line 1:7 near 'FROM': mismatched input 'FROM' expecting expression");
    expect(thrown.position).toEqual({ line: 1, column: 7, tokenIndex: 2 });
  });

  it("rejects trailing input", () => {
    expect(() => parseHive("SELECT a b c")).toThrow("extraneous input 'c' expecting <EOF>");
  });
});
