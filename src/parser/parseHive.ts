import { Token } from "antlr4ng";

import { SqlParseError } from "../errors.js";
import { lexHive } from "./lexHive.js";
import type {
  DataTypeNode,
  HiveSyntaxTree,
  IdentifierNode,
  NodeFieldMap,
  NodeKind,
  SyntaxElement,
  SyntaxNode,
} from "./syntaxTypes.js";
import { TokenView } from "./tokenView.js";
import { HiveTokenType, isReservedText } from "./tokens.js";

export interface ParsedHive extends HiveSyntaxTree {
  readonly tokens: TokenView;
}

/** Lex and parse one Hive statement. Throws `SqlParseError` on invalid input. */
export function parseHive(source: string): ParsedHive {
  const tokens = new TokenView(lexHive(source));
  return { tokens, root: parseHiveTokens(tokens) };
}

/** Parse an already lexed stream to the `singleStatement` production. */
export function parseHiveTokens(tokens: TokenView): SyntaxNode<"singleStatement"> {
  return new HiveParser(tokens).singleStatement();
}

const COMPARISON_OPERATORS = new Set(["=", "==", "<>", "!=", "<", "<=", ">", ">=", "<=>"]);
const PREDICATE_KEYWORDS = ["BETWEEN", "IN", "LIKE", "RLIKE", "REGEXP"];
const JOIN_KEYWORDS = ["JOIN", "INNER", "CROSS", "LEFT", "RIGHT", "FULL"];
const ORGANIZATION_KEYWORDS = ["ORDER", "CLUSTER", "DISTRIBUTE", "SORT", "LIMIT"];
const NUMERIC_TYPES = new Set<number>([
  HiveTokenType.INTEGER_VALUE,
  HiveTokenType.DECIMAL_VALUE,
  HiveTokenType.TYPED_NUMBER,
]);

interface Frame {
  readonly start: number;
  readonly children: SyntaxElement[];
}

/**
 * Recursive-descent parser for the Hive subset. Nodes are assembled on a frame
 * stack: every consumed token and finished node lands in the innermost open
 * frame, so `children` mirrors the source order without per-rule bookkeeping.
 */
class HiveParser {
  private readonly tokens: TokenView;

  /** Indices of main-channel tokens, `EOF` last. */
  private readonly main: number[] = [];

  private cursor = 0;

  private lastConsumed = -1;

  private readonly frames: Frame[] = [];

  constructor(tokens: TokenView) {
    this.tokens = tokens;
    for (let i = 0; i < tokens.size; i += 1) {
      if (!tokens.isTrivia(i)) {
        this.main.push(i);
      }
    }
  }

  singleStatement(): SyntaxNode<"singleStatement"> {
    const frame = this.begin();
    const statement = this.statement();
    while (this.acceptSymbol(";")) {
      continue;
    }
    if (this.peek().type !== Token.EOF) {
      throw this.error(`extraneous input '${this.peekText()}' expecting <EOF>`);
    }
    return this.end(frame, "singleStatement", { statement });
  }

  // ===== Statements =====

  private statement(): SyntaxNode {
    if (this.atKeyword("EXPLAIN")) {
      const frame = this.begin();
      this.consume();
      const statement = this.statement();
      return this.end(frame, "explain", { statement });
    }
    if (this.atKeyword("CREATE")) {
      return this.createTable();
    }
    if (this.atKeyword("INSERT")) {
      return this.insertInto();
    }
    return this.query();
  }

  private createTable(): SyntaxNode<"createTable"> {
    const frame = this.begin();
    this.expectKeyword("CREATE");
    this.acceptKeyword("TEMPORARY", "EXTERNAL");
    this.expectKeyword("TABLE");
    if (this.acceptKeyword("IF")) {
      this.expectKeyword("NOT");
      this.expectKeyword("EXISTS");
    }
    const name = this.qualifiedName();

    let columns: SyntaxNode<"columnDefinition">[] = [];
    if (this.acceptSymbol("(")) {
      columns = this.commaSeparated(() => this.columnDefinition());
      this.expectSymbol(")");
    }
    if (this.acceptKeyword("COMMENT")) {
      this.stringLiteral();
    }
    let partitionColumns: SyntaxNode<"columnDefinition">[] = [];
    if (this.acceptKeyword("PARTITIONED")) {
      this.expectKeyword("BY");
      this.expectSymbol("(");
      partitionColumns = this.commaSeparated(() => this.columnDefinition());
      this.expectSymbol(")");
    }
    if (this.acceptKeyword("STORED")) {
      this.expectKeyword("AS");
      this.identifier();
    }
    if (this.acceptKeyword("LOCATION")) {
      this.stringLiteral();
    }
    const query = this.acceptKeyword("AS") ? this.query() : undefined;
    return this.end(frame, "createTable", { name, columns, partitionColumns, query });
  }

  private columnDefinition(): SyntaxNode<"columnDefinition"> {
    const frame = this.begin();
    const name = this.identifier();
    const dataType = this.dataType();
    const comment = this.acceptKeyword("COMMENT") ? this.stringLiteral() : undefined;
    return this.end(frame, "columnDefinition", { name, dataType, comment });
  }

  private insertInto(): SyntaxNode<"insertInto"> {
    const frame = this.begin();
    this.expectKeyword("INSERT");
    const overwrite = this.acceptKeyword("OVERWRITE") !== undefined;
    if (!overwrite) {
      this.expectKeyword("INTO");
    }
    this.acceptKeyword("TABLE");
    const table = this.qualifiedName();
    const partition = this.atKeyword("PARTITION") ? this.partitionSpec() : undefined;
    const query = this.query();
    return this.end(frame, "insertInto", { overwrite, table, partition, query });
  }

  private partitionSpec(): SyntaxNode<"partitionSpec"> {
    const frame = this.begin();
    this.expectKeyword("PARTITION");
    this.expectSymbol("(");
    const entries = this.commaSeparated(() => {
      const entry = this.begin();
      const name = this.identifier();
      const value = this.acceptSymbol("=") ? this.valueExpression() : undefined;
      return this.end(entry, "partitionValue", { name, value });
    });
    this.expectSymbol(")");
    return this.end(frame, "partitionSpec", { entries });
  }

  // ===== Queries =====

  private query(): SyntaxNode<"query"> {
    const frame = this.begin();
    const ctes: SyntaxNode<"namedQuery">[] = [];
    if (this.acceptKeyword("WITH")) {
      ctes.push(...this.commaSeparated(() => this.namedQuery()));
    }
    const body = this.queryTerm();
    const organization = this.atKeyword(...ORGANIZATION_KEYWORDS)
      ? this.queryOrganization()
      : undefined;
    return this.end(frame, "query", { ctes, body, organization });
  }

  private namedQuery(): SyntaxNode<"namedQuery"> {
    const frame = this.begin();
    const name = this.identifier();
    this.acceptKeyword("AS");
    this.expectSymbol("(");
    const query = this.query();
    this.expectSymbol(")");
    return this.end(frame, "namedQuery", { name, query });
  }

  private queryTerm(): SyntaxNode {
    let left = this.queryPrimary();
    while (this.atKeyword("UNION", "EXCEPT", "INTERSECT")) {
      const frame = this.beginWith(left);
      const operator = this.consume();
      const quantifier = this.acceptKeyword("ALL", "DISTINCT");
      const right = this.queryPrimary();
      left = this.end(frame, "setOperation", { left, operator, quantifier, right });
    }
    return left;
  }

  private queryPrimary(): SyntaxNode {
    if (this.atSymbol("(")) {
      const frame = this.begin();
      this.consume();
      const query = this.query();
      this.expectSymbol(")");
      return this.end(frame, "parenthesizedQuery", { query });
    }
    if (this.atKeyword("SELECT")) {
      return this.querySpecification();
    }
    throw this.error(`mismatched input '${this.peekText()}' expecting SELECT`);
  }

  private querySpecification(): SyntaxNode<"querySpecification"> {
    const frame = this.begin();
    this.expectKeyword("SELECT");
    const quantifier = this.acceptKeyword("ALL", "DISTINCT");
    const items = this.commaSeparated(() => this.selectItem());
    const from = this.atKeyword("FROM") ? this.fromClause() : undefined;
    const where = this.acceptKeyword("WHERE") ? this.expression() : undefined;
    let groupBy: SyntaxNode[] = [];
    if (this.acceptKeyword("GROUP")) {
      this.expectKeyword("BY");
      groupBy = this.commaSeparated(() => this.expression());
    }
    const having = this.acceptKeyword("HAVING") ? this.expression() : undefined;
    return this.end(frame, "querySpecification", { quantifier, items, from, where, groupBy, having });
  }

  private selectItem(): SyntaxNode<"selectItem"> {
    const frame = this.begin();
    const expression = this.expression();
    const as = this.acceptKeyword("AS");
    let aliases: IdentifierNode[] = [];
    if (as && this.acceptSymbol("(")) {
      aliases = this.commaSeparated(() => this.identifier());
      this.expectSymbol(")");
    } else if (as || this.isIdentifierToken(this.peek())) {
      aliases = [this.identifier()];
    }
    return this.end(frame, "selectItem", { expression, as, aliases });
  }

  private fromClause(): SyntaxNode<"fromClause"> {
    const frame = this.begin();
    this.expectKeyword("FROM");
    const relations = this.commaSeparated(() => this.relation());
    const lateralViews: SyntaxNode<"lateralView">[] = [];
    while (this.atKeyword("LATERAL")) {
      lateralViews.push(this.lateralView());
    }
    return this.end(frame, "fromClause", { relations, lateralViews });
  }

  private relation(): SyntaxNode {
    let left = this.relationPrimary();
    while (this.atKeyword(...JOIN_KEYWORDS)) {
      const frame = this.beginWith(left);
      const joinType: Token[] = [];
      if (this.atKeyword("LEFT")) {
        joinType.push(this.consume());
        const modifier = this.acceptKeyword("OUTER", "SEMI", "ANTI");
        if (modifier) {
          joinType.push(modifier);
        }
      } else if (this.atKeyword("RIGHT", "FULL")) {
        joinType.push(this.consume());
        const modifier = this.acceptKeyword("OUTER");
        if (modifier) {
          joinType.push(modifier);
        }
      } else if (this.atKeyword("INNER", "CROSS")) {
        joinType.push(this.consume());
      }
      joinType.push(this.expectKeyword("JOIN"));
      const right = this.relationPrimary();
      let condition: SyntaxNode | undefined;
      let using: IdentifierNode[] = [];
      if (this.acceptKeyword("ON")) {
        condition = this.expression();
      } else if (this.acceptKeyword("USING")) {
        this.expectSymbol("(");
        using = this.commaSeparated(() => this.identifier());
        this.expectSymbol(")");
      }
      left = this.end(frame, "join", { left, joinType, right, condition, using });
    }
    return left;
  }

  private relationPrimary(): SyntaxNode {
    const frame = this.begin();
    if (this.atSymbol("(")) {
      this.consume();
      if (this.startsQuery(0)) {
        const query = this.query();
        this.expectSymbol(")");
        const alias = this.optionalTableAlias();
        return this.end(frame, "subqueryRelation", { query, alias });
      }
      const relation = this.relation();
      this.expectSymbol(")");
      return this.end(frame, "parenthesizedRelation", { relation });
    }

    const nameLength = this.qualifiedNameLength(0);
    if (nameLength === 0) {
      throw this.error(`mismatched input '${this.peekText()}' expecting table name`);
    }
    if (this.atSymbol("(", nameLength)) {
      const call = this.functionCall();
      const alias = this.optionalTableAlias();
      return this.end(frame, "tableFunction", { call, alias });
    }
    const name = this.qualifiedName();
    const alias = this.optionalTableAlias();
    return this.end(frame, "tableReference", { name, alias });
  }

  private optionalTableAlias(): SyntaxNode<"tableAlias"> | undefined {
    if (!this.atKeyword("AS") && !this.isIdentifierToken(this.peek())) {
      return undefined;
    }
    const frame = this.begin();
    const as = this.acceptKeyword("AS");
    const name = this.identifier();
    let columns: IdentifierNode[] = [];
    if (this.acceptSymbol("(")) {
      columns = this.commaSeparated(() => this.identifier());
      this.expectSymbol(")");
    }
    return this.end(frame, "tableAlias", { as, name, columns });
  }

  private lateralView(): SyntaxNode<"lateralView"> {
    const frame = this.begin();
    this.expectKeyword("LATERAL");
    this.expectKeyword("VIEW");
    const outer = this.acceptKeyword("OUTER");
    const udtf = this.qualifiedName();
    this.expectSymbol("(");
    const args = this.atSymbol(")") ? [] : this.commaSeparated(() => this.expression());
    const closeParen = this.expectSymbol(")");
    const tableName = this.identifier();
    const as = this.acceptKeyword("AS");
    let columnAliases: IdentifierNode[] = [];
    if (as || this.isIdentifierToken(this.peek())) {
      columnAliases = this.commaSeparated(() => this.identifier());
    }
    return this.end(frame, "lateralView", {
      outer,
      udtf,
      arguments: args,
      closeParen,
      tableName,
      as,
      columnAliases,
    });
  }

  private queryOrganization(): SyntaxNode<"queryOrganization"> {
    const frame = this.begin();
    const orderBy = this.atKeyword("ORDER") ? this.organizationClause(() => this.sortItem()) : undefined;
    const clusterBy = this.atKeyword("CLUSTER") ? this.organizationClause(() => this.expression()) : undefined;
    const distributeBy = this.atKeyword("DISTRIBUTE")
      ? this.organizationClause(() => this.expression())
      : undefined;
    const sortBy = this.atKeyword("SORT") ? this.organizationClause(() => this.sortItem()) : undefined;
    let limit: SyntaxNode<"organizationClause"> | undefined;
    if (this.atKeyword("LIMIT")) {
      const clause = this.begin();
      const keyword = this.consume();
      const items = [this.expression()];
      limit = this.end(clause, "organizationClause", { keyword, items });
    }
    return this.end(frame, "queryOrganization", { orderBy, clusterBy, distributeBy, sortBy, limit });
  }

  private organizationClause(item: () => SyntaxNode): SyntaxNode<"organizationClause"> {
    const frame = this.begin();
    const keyword = this.consume();
    this.expectKeyword("BY");
    const items = this.commaSeparated(item);
    return this.end(frame, "organizationClause", { keyword, items });
  }

  private sortItem(): SyntaxNode<"sortItem"> {
    const frame = this.begin();
    const expression = this.expression();
    const direction = this.acceptKeyword("ASC", "DESC");
    let nullOrder: Token | undefined;
    if (this.acceptKeyword("NULLS")) {
      nullOrder = this.expectKeyword("FIRST", "LAST");
    }
    return this.end(frame, "sortItem", { expression, direction, nullOrder });
  }

  // ===== Expressions =====

  private expression(): SyntaxNode {
    return this.orExpression();
  }

  private orExpression(): SyntaxNode {
    let left = this.andExpression();
    while (this.atKeyword("OR")) {
      const frame = this.beginWith(left);
      const operator = this.consume();
      const right = this.andExpression();
      left = this.end(frame, "logicalBinary", { left, operator, right });
    }
    return left;
  }

  private andExpression(): SyntaxNode {
    let left = this.notExpression();
    while (this.atKeyword("AND")) {
      const frame = this.beginWith(left);
      const operator = this.consume();
      const right = this.notExpression();
      left = this.end(frame, "logicalBinary", { left, operator, right });
    }
    return left;
  }

  private notExpression(): SyntaxNode {
    if (this.atKeyword("NOT")) {
      const frame = this.begin();
      const operator = this.consume();
      const operand = this.notExpression();
      return this.end(frame, "logicalNot", { operator, operand });
    }
    if (this.atKeyword("EXISTS") && this.atSymbol("(", 1)) {
      const frame = this.begin();
      this.consume();
      this.expectSymbol("(");
      const query = this.query();
      this.expectSymbol(")");
      return this.end(frame, "exists", { query });
    }
    return this.predicated();
  }

  /** A value expression optionally followed by one predicate. */
  private predicated(): SyntaxNode {
    const left = this.valueExpression();

    if (this.atKeyword("IS")) {
      const frame = this.beginWith(left);
      const operator = this.consume();
      const negation = this.acceptKeyword("NOT");
      const target = this.expectKeyword("NULL", "TRUE", "FALSE");
      return this.end(frame, "predicate", { left, negation, operator, operands: [], target });
    }

    const negated = this.atKeyword("NOT") && this.isKeyword(this.peek(1), ...PREDICATE_KEYWORDS);
    if (!negated && !this.atKeyword(...PREDICATE_KEYWORDS)) {
      return left;
    }

    const frame = this.beginWith(left);
    const negation = this.acceptKeyword("NOT");
    const operator = this.consume();
    const keyword = (operator.text ?? "").toUpperCase();
    let operands: SyntaxNode[];
    if (keyword === "BETWEEN") {
      const lower = this.valueExpression();
      this.expectKeyword("AND");
      operands = [lower, this.valueExpression()];
    } else if (keyword === "IN") {
      this.expectSymbol("(");
      operands = this.startsQuery(0) ? [this.query()] : this.commaSeparated(() => this.expression());
      this.expectSymbol(")");
    } else {
      operands = [this.valueExpression()];
    }
    return this.end(frame, "predicate", { left, negation, operator, operands });
  }

  private valueExpression(): SyntaxNode {
    let left = this.bitwiseOr();
    while (this.atOperator(COMPARISON_OPERATORS)) {
      const frame = this.beginWith(left);
      const operator = this.consume();
      const right = this.bitwiseOr();
      left = this.end(frame, "comparison", { left, operator, right });
    }
    return left;
  }

  private bitwiseOr(): SyntaxNode {
    return this.binaryLevel(new Set(["|"]), () => this.bitwiseXor());
  }

  private bitwiseXor(): SyntaxNode {
    return this.binaryLevel(new Set(["^"]), () => this.bitwiseAnd());
  }

  private bitwiseAnd(): SyntaxNode {
    return this.binaryLevel(new Set(["&"]), () => this.additive());
  }

  private additive(): SyntaxNode {
    return this.binaryLevel(new Set(["+", "-", "||"]), () => this.multiplicative());
  }

  private multiplicative(): SyntaxNode {
    return this.binaryLevel(new Set(["*", "/", "%"]), () => this.unary(), "DIV");
  }

  private binaryLevel(
    operators: ReadonlySet<string>,
    operand: () => SyntaxNode,
    keywordOperator?: string
  ): SyntaxNode {
    let left = operand();
    while (this.atOperator(operators) || (keywordOperator !== undefined && this.atKeyword(keywordOperator))) {
      const frame = this.beginWith(left);
      const operator = this.consume();
      const right = operand();
      left = this.end(frame, "arithmeticBinary", { left, operator, right });
    }
    return left;
  }

  private unary(): SyntaxNode {
    if (this.atOperator(new Set(["-", "+", "~", "!"]))) {
      const frame = this.begin();
      const operator = this.consume();
      const operand = this.unary();
      return this.end(frame, "arithmeticUnary", { operator, operand });
    }
    return this.postfix();
  }

  private postfix(): SyntaxNode {
    let base = this.primary();
    for (;;) {
      if (this.atSymbol("[")) {
        const frame = this.beginWith(base);
        this.consume();
        const index = this.expression();
        this.expectSymbol("]");
        base = this.end(frame, "subscript", { base, index });
      } else if (this.atSymbol(".") && this.isIdentifierToken(this.peek(1))) {
        const frame = this.beginWith(base);
        this.consume();
        const field = this.identifier();
        base = this.end(frame, "dereference", { base, field });
      } else {
        return base;
      }
    }
  }

  private primary(): SyntaxNode {
    const token = this.peek();

    if (this.atKeyword("CASE")) {
      return this.caseExpression();
    }
    if (this.atKeyword("CAST")) {
      const frame = this.begin();
      this.consume();
      this.expectSymbol("(");
      const expression = this.expression();
      this.expectKeyword("AS");
      const dataType = this.dataType();
      this.expectSymbol(")");
      return this.end(frame, "cast", { expression, dataType });
    }
    if (this.atSymbol("*")) {
      const frame = this.begin();
      this.consume();
      return this.end(frame, "star", {});
    }
    if (this.atSymbol("(")) {
      const frame = this.begin();
      this.consume();
      if (this.startsQuery(0)) {
        const query = this.query();
        this.expectSymbol(")");
        return this.end(frame, "subqueryExpression", { query });
      }
      const expression = this.expression();
      this.expectSymbol(")");
      return this.end(frame, "parenthesizedExpression", { expression });
    }
    if (this.atKeyword("NULL")) {
      const frame = this.begin();
      return this.end(frame, "nullLiteral", { token: this.consume() });
    }
    if (this.atKeyword("TRUE", "FALSE")) {
      const frame = this.begin();
      return this.end(frame, "booleanLiteral", { token: this.consume() });
    }
    if (NUMERIC_TYPES.has(token.type)) {
      const frame = this.begin();
      return this.end(frame, "numericLiteral", { token: this.consume() });
    }
    if (token.type === HiveTokenType.STRING) {
      return this.stringLiteral();
    }
    if (this.atKeyword("INTERVAL") && this.peek(1).type !== Token.EOF && !this.atSymbol("(", 1)) {
      const frame = this.begin();
      this.consume();
      const value = this.unary();
      const unit = this.identifier();
      return this.end(frame, "intervalLiteral", { value, unit });
    }
    if (this.atKeyword("DATE", "TIMESTAMP") && this.peek(1).type === HiveTokenType.STRING) {
      const frame = this.begin();
      const type = this.consume();
      const value = this.stringLiteral();
      return this.end(frame, "typedLiteral", { type, value });
    }

    const nameLength = this.qualifiedNameLength(0);
    if (nameLength > 0 && this.atSymbol("(", nameLength)) {
      return this.functionCall();
    }
    if (nameLength > 0 && this.atSymbol(".", nameLength) && this.atSymbol("*", nameLength + 1)) {
      const frame = this.begin();
      const qualifier = this.qualifiedName();
      this.expectSymbol(".");
      this.expectSymbol("*");
      return this.end(frame, "star", { qualifier });
    }
    if (nameLength > 0) {
      const frame = this.begin();
      const parts = [this.identifier()];
      while (this.atSymbol(".") && this.isIdentifierToken(this.peek(1))) {
        this.consume();
        parts.push(this.identifier());
      }
      return this.end(frame, "columnReference", { parts });
    }

    throw this.error(`mismatched input '${this.peekText()}' expecting expression`);
  }

  private functionCall(): SyntaxNode<"functionCall"> {
    const frame = this.begin();
    const name = this.qualifiedName();
    this.expectSymbol("(");
    const quantifier = this.acceptKeyword("DISTINCT", "ALL");
    const args = this.atSymbol(")") ? [] : this.commaSeparated(() => this.expression());
    const closeParen = this.expectSymbol(")");
    const window = this.atKeyword("OVER") ? this.windowSpec() : undefined;
    return this.end(frame, "functionCall", { name, quantifier, arguments: args, closeParen, window });
  }

  private windowSpec(): SyntaxNode<"windowSpec"> {
    const frame = this.begin();
    this.expectKeyword("OVER");
    this.expectSymbol("(");
    let partitionBy: SyntaxNode[] = [];
    if (this.acceptKeyword("PARTITION")) {
      this.expectKeyword("BY");
      partitionBy = this.commaSeparated(() => this.expression());
    }
    let orderBy: SyntaxNode<"sortItem">[] = [];
    if (this.acceptKeyword("ORDER")) {
      this.expectKeyword("BY");
      orderBy = this.commaSeparated(() => this.sortItem());
    }
    const bounds = this.atKeyword("ROWS", "RANGE") ? this.windowFrame() : undefined;
    this.expectSymbol(")");
    return this.end(frame, "windowSpec", { partitionBy, orderBy, frame: bounds });
  }

  private windowFrame(): SyntaxNode<"windowFrame"> {
    const frame = this.begin();
    const unit = this.consume();
    if (this.acceptKeyword("BETWEEN")) {
      const lower = this.frameBound();
      this.expectKeyword("AND");
      const upper = this.frameBound();
      return this.end(frame, "windowFrame", { unit, lower, upper });
    }
    const lower = this.frameBound();
    return this.end(frame, "windowFrame", { unit, lower });
  }

  private frameBound(): SyntaxNode<"frameBound"> {
    const frame = this.begin();
    if (this.acceptKeyword("UNBOUNDED")) {
      const boundType = this.expectKeyword("PRECEDING", "FOLLOWING");
      return this.end(frame, "frameBound", { boundType });
    }
    if (this.acceptKeyword("CURRENT")) {
      const boundType = this.expectKeyword("ROW");
      return this.end(frame, "frameBound", { boundType });
    }
    const offset = this.valueExpression();
    const boundType = this.expectKeyword("PRECEDING", "FOLLOWING");
    return this.end(frame, "frameBound", { offset, boundType });
  }

  private caseExpression(): SyntaxNode<"caseExpression"> {
    const frame = this.begin();
    this.expectKeyword("CASE");
    const operand = this.atKeyword("WHEN") ? undefined : this.expression();
    const whenClauses: SyntaxNode<"whenClause">[] = [];
    while (this.atKeyword("WHEN")) {
      const clause = this.begin();
      this.consume();
      const condition = this.expression();
      this.expectKeyword("THEN");
      const result = this.expression();
      whenClauses.push(this.end(clause, "whenClause", { condition, result }));
    }
    if (whenClauses.length === 0) {
      throw this.error(`mismatched input '${this.peekText()}' expecting WHEN`);
    }
    const elseExpression = this.acceptKeyword("ELSE") ? this.expression() : undefined;
    this.expectKeyword("END");
    return this.end(frame, "caseExpression", { operand, whenClauses, elseExpression });
  }

  private stringLiteral(): SyntaxNode<"stringLiteral"> {
    if (this.peek().type !== HiveTokenType.STRING) {
      throw this.error(`mismatched input '${this.peekText()}' expecting string literal`);
    }
    const frame = this.begin();
    const segments = [this.consume()];
    while (this.peek().type === HiveTokenType.STRING) {
      segments.push(this.consume());
    }
    return this.end(frame, "stringLiteral", { segments });
  }

  // ===== Names and types =====

  private qualifiedName(): SyntaxNode<"qualifiedName"> {
    const frame = this.begin();
    const parts = [this.identifier()];
    while (this.atSymbol(".") && this.isIdentifierToken(this.peek(1))) {
      this.consume();
      parts.push(this.identifier());
    }
    return this.end(frame, "qualifiedName", { parts });
  }

  /** Number of main tokens forming `id (. id)*` at `offset`; 0 when absent. */
  private qualifiedNameLength(offset: number): number {
    if (!this.isIdentifierToken(this.peek(offset))) {
      return 0;
    }
    let length = 1;
    while (this.atSymbol(".", offset + length) && this.isIdentifierToken(this.peek(offset + length + 1))) {
      length += 2;
    }
    return length;
  }

  private identifier(): IdentifierNode {
    const token = this.peek();
    if (token.type === HiveTokenType.BACKQUOTED_IDENTIFIER) {
      const frame = this.begin();
      return this.end(frame, "quotedIdentifier", { token: this.consume() });
    }
    if (this.isIdentifierToken(token)) {
      const frame = this.begin();
      return this.end(frame, "unquotedIdentifier", { token: this.consume() });
    }
    throw this.error(`mismatched input '${this.peekText()}' expecting identifier`);
  }

  private dataType(): DataTypeNode {
    if (!this.isIdentifierToken(this.peek())) {
      throw this.error(`mismatched input '${this.peekText()}' expecting data type`);
    }
    const frame = this.begin();
    if (this.atKeyword("ARRAY") && this.atSymbol("<", 1)) {
      this.consume();
      this.consume();
      const element = this.dataType();
      this.expectSymbol(">");
      return this.end(frame, "arrayType", { element });
    }
    if (this.atKeyword("MAP") && this.atSymbol("<", 1)) {
      this.consume();
      this.consume();
      const key = this.dataType();
      this.expectSymbol(",");
      const value = this.dataType();
      this.expectSymbol(">");
      return this.end(frame, "mapType", { key, value });
    }
    if (this.atKeyword("STRUCT") && this.atSymbol("<", 1)) {
      this.consume();
      this.consume();
      const fields = this.atSymbol(">") ? [] : this.commaSeparated(() => this.structField());
      this.expectSymbol(">");
      return this.end(frame, "structType", { fields });
    }
    const name = this.consume();
    const parameters: Token[] = [];
    if (this.acceptSymbol("(")) {
      parameters.push(this.expectType(HiveTokenType.INTEGER_VALUE, "integer"));
      while (this.acceptSymbol(",")) {
        parameters.push(this.expectType(HiveTokenType.INTEGER_VALUE, "integer"));
      }
      this.expectSymbol(")");
    }
    return this.end(frame, "primitiveType", { name, parameters });
  }

  private structField(): SyntaxNode<"structField"> {
    const frame = this.begin();
    const name = this.identifier();
    this.expectSymbol(":");
    const dataType = this.dataType();
    return this.end(frame, "structField", { name, dataType });
  }

  // ===== Tree assembly =====

  private begin(): Frame {
    const frame: Frame = { start: this.peek().tokenIndex, children: [] };
    this.frames.push(frame);
    return frame;
  }

  /** Opens a frame around a node that was already finished, for left-recursive rules. */
  private beginWith(node: SyntaxNode): Frame {
    const parent = this.frames[this.frames.length - 1];
    if (parent && parent.children[parent.children.length - 1] === node) {
      parent.children.pop();
    }
    const frame: Frame = { start: node.start, children: [node] };
    this.frames.push(frame);
    return frame;
  }

  private end<K extends NodeKind>(frame: Frame, kind: K, fields: NodeFieldMap[K]): SyntaxNode<K> {
    const top = this.frames.pop();
    if (top !== frame) {
      throw new Error(`Unbalanced parse frames while closing ${kind}`);
    }
    const node: SyntaxNode<K> = {
      kind,
      start: frame.start,
      stop: Math.max(this.lastConsumed, frame.start),
      children: frame.children,
      fields,
    };
    this.frames[this.frames.length - 1]?.children.push(node);
    return node;
  }

  private commaSeparated<T>(item: () => T): T[] {
    const items = [item()];
    while (this.acceptSymbol(",")) {
      items.push(item());
    }
    return items;
  }

  // ===== Token access =====

  private peek(offset = 0): Token {
    const index = Math.min(this.cursor + offset, this.main.length - 1);
    return this.tokens.get(this.main[index]);
  }

  private peekText(offset = 0): string {
    const token = this.peek(offset);
    return token.type === Token.EOF ? "<EOF>" : token.text ?? "";
  }

  private consume(): Token {
    const token = this.peek();
    if (token.type === Token.EOF) {
      throw this.error("mismatched input '<EOF>'");
    }
    this.cursor += 1;
    this.lastConsumed = token.tokenIndex;
    this.frames[this.frames.length - 1]?.children.push(token);
    return token;
  }

  private isKeyword(token: Token, ...words: string[]): boolean {
    return token.type === HiveTokenType.KEYWORD && words.includes((token.text ?? "").toUpperCase());
  }

  private atKeyword(...words: string[]): boolean {
    return this.isKeyword(this.peek(), ...words);
  }

  private acceptKeyword(...words: string[]): Token | undefined {
    return this.atKeyword(...words) ? this.consume() : undefined;
  }

  private expectKeyword(...words: string[]): Token {
    if (!this.atKeyword(...words)) {
      throw this.error(`mismatched input '${this.peekText()}' expecting ${words.join(" or ")}`);
    }
    return this.consume();
  }

  private atSymbol(symbol: string, offset = 0): boolean {
    const token = this.peek(offset);
    return (
      (token.type === HiveTokenType.PUNCTUATION || token.type === HiveTokenType.OPERATOR) &&
      token.text === symbol
    );
  }

  private atOperator(operators: ReadonlySet<string>): boolean {
    const token = this.peek();
    return token.type === HiveTokenType.OPERATOR && operators.has(token.text ?? "");
  }

  private acceptSymbol(symbol: string): Token | undefined {
    return this.atSymbol(symbol) ? this.consume() : undefined;
  }

  private expectSymbol(symbol: string): Token {
    if (!this.atSymbol(symbol)) {
      throw this.error(`mismatched input '${this.peekText()}' expecting '${symbol}'`);
    }
    return this.consume();
  }

  private expectType(type: number, description: string): Token {
    if (this.peek().type !== type) {
      throw this.error(`mismatched input '${this.peekText()}' expecting ${description}`);
    }
    return this.consume();
  }

  private isIdentifierToken(token: Token): boolean {
    if (token.type === HiveTokenType.IDENTIFIER || token.type === HiveTokenType.BACKQUOTED_IDENTIFIER) {
      return true;
    }
    return token.type === HiveTokenType.KEYWORD && !isReservedText(token.text ?? "");
  }

  /** True when a query (possibly parenthesized) begins at `offset`. */
  private startsQuery(offset: number): boolean {
    let index = offset;
    while (this.atSymbol("(", index)) {
      index += 1;
    }
    return this.isKeyword(this.peek(index), "SELECT", "WITH");
  }

  private error(reason: string): SqlParseError {
    const token = this.peek();
    return new SqlParseError(
      reason,
      { line: token.line, column: token.column, tokenIndex: token.tokenIndex },
      this.peekText()
    );
  }
}
