import type { Token } from "antlr4ng";

export interface TokenRange {
  /** Index of the first token, inclusive. */
  readonly start: number;
  /** Index of the last token, inclusive. */
  readonly stop: number;
}

export type IdentifierNode = SyntaxNode<"quotedIdentifier" | "unquotedIdentifier">;

export type DataTypeNode = SyntaxNode<"primitiveType" | "arrayType" | "mapType" | "structType">;

/**
 * Named children per node kind, the counterpart of grammar labels. Every node
 * and token listed here is also present, in source order, in `children`.
 */
export interface NodeFieldMap {
  singleStatement: { readonly statement: SyntaxNode };
  explain: { readonly statement: SyntaxNode };
  createTable: {
    readonly name: SyntaxNode<"qualifiedName">;
    readonly columns: readonly SyntaxNode<"columnDefinition">[];
    readonly partitionColumns: readonly SyntaxNode<"columnDefinition">[];
    readonly query?: SyntaxNode<"query">;
  };
  columnDefinition: {
    readonly name: IdentifierNode;
    readonly dataType: DataTypeNode;
    readonly comment?: SyntaxNode<"stringLiteral">;
  };
  insertInto: {
    readonly overwrite: boolean;
    readonly table: SyntaxNode<"qualifiedName">;
    readonly partition?: SyntaxNode<"partitionSpec">;
    readonly query: SyntaxNode<"query">;
  };
  partitionSpec: { readonly entries: readonly SyntaxNode<"partitionValue">[] };
  partitionValue: { readonly name: IdentifierNode; readonly value?: SyntaxNode };
  query: {
    readonly ctes: readonly SyntaxNode<"namedQuery">[];
    readonly body: SyntaxNode;
    readonly organization?: SyntaxNode<"queryOrganization">;
  };
  namedQuery: { readonly name: IdentifierNode; readonly query: SyntaxNode<"query"> };
  setOperation: {
    readonly left: SyntaxNode;
    readonly operator: Token;
    readonly quantifier?: Token;
    readonly right: SyntaxNode;
  };
  parenthesizedQuery: { readonly query: SyntaxNode<"query"> };
  querySpecification: {
    readonly quantifier?: Token;
    readonly items: readonly SyntaxNode<"selectItem">[];
    readonly from?: SyntaxNode<"fromClause">;
    readonly where?: SyntaxNode;
    readonly groupBy: readonly SyntaxNode[];
    readonly having?: SyntaxNode;
  };
  selectItem: {
    readonly expression: SyntaxNode;
    readonly as?: Token;
    readonly aliases: readonly IdentifierNode[];
  };
  fromClause: {
    readonly relations: readonly SyntaxNode[];
    readonly lateralViews: readonly SyntaxNode<"lateralView">[];
  };
  join: {
    readonly left: SyntaxNode;
    readonly joinType: readonly Token[];
    readonly right: SyntaxNode;
    readonly condition?: SyntaxNode;
    readonly using: readonly IdentifierNode[];
  };
  tableReference: {
    readonly name: SyntaxNode<"qualifiedName">;
    readonly alias?: SyntaxNode<"tableAlias">;
  };
  tableFunction: {
    readonly call: SyntaxNode<"functionCall">;
    readonly alias?: SyntaxNode<"tableAlias">;
  };
  subqueryRelation: {
    readonly query: SyntaxNode<"query">;
    readonly alias?: SyntaxNode<"tableAlias">;
  };
  parenthesizedRelation: { readonly relation: SyntaxNode };
  tableAlias: {
    readonly as?: Token;
    readonly name: IdentifierNode;
    readonly columns: readonly IdentifierNode[];
  };
  lateralView: {
    readonly outer?: Token;
    readonly udtf: SyntaxNode<"qualifiedName">;
    readonly arguments: readonly SyntaxNode[];
    readonly closeParen: Token;
    readonly tableName: IdentifierNode;
    readonly as?: Token;
    readonly columnAliases: readonly IdentifierNode[];
  };
  queryOrganization: {
    readonly orderBy?: SyntaxNode<"organizationClause">;
    readonly clusterBy?: SyntaxNode<"organizationClause">;
    readonly distributeBy?: SyntaxNode<"organizationClause">;
    readonly sortBy?: SyntaxNode<"organizationClause">;
    readonly limit?: SyntaxNode<"organizationClause">;
  };
  organizationClause: { readonly keyword: Token; readonly items: readonly SyntaxNode[] };
  sortItem: {
    readonly expression: SyntaxNode;
    readonly direction?: Token;
    readonly nullOrder?: Token;
  };
  logicalNot: { readonly operator: Token; readonly operand: SyntaxNode };
  logicalBinary: { readonly left: SyntaxNode; readonly operator: Token; readonly right: SyntaxNode };
  exists: { readonly query: SyntaxNode<"query"> };
  comparison: { readonly left: SyntaxNode; readonly operator: Token; readonly right: SyntaxNode };
  /**
   * `left [NOT] BETWEEN lo AND hi`, `left [NOT] IN (...)`,
   * `left [NOT] LIKE|RLIKE|REGEXP pattern`, `left IS [NOT] NULL|TRUE|FALSE`.
   */
  predicate: {
    readonly left: SyntaxNode;
    readonly negation?: Token;
    readonly operator: Token;
    readonly operands: readonly SyntaxNode[];
    readonly target?: Token;
  };
  arithmeticBinary: { readonly left: SyntaxNode; readonly operator: Token; readonly right: SyntaxNode };
  arithmeticUnary: { readonly operator: Token; readonly operand: SyntaxNode };
  functionCall: {
    readonly name: SyntaxNode<"qualifiedName">;
    readonly quantifier?: Token;
    readonly arguments: readonly SyntaxNode[];
    readonly closeParen: Token;
    readonly window?: SyntaxNode<"windowSpec">;
  };
  windowSpec: {
    readonly partitionBy: readonly SyntaxNode[];
    readonly orderBy: readonly SyntaxNode<"sortItem">[];
    readonly frame?: SyntaxNode<"windowFrame">;
  };
  windowFrame: {
    readonly unit: Token;
    readonly lower: SyntaxNode<"frameBound">;
    readonly upper?: SyntaxNode<"frameBound">;
  };
  frameBound: { readonly offset?: SyntaxNode; readonly boundType: Token };
  cast: { readonly expression: SyntaxNode; readonly dataType: DataTypeNode };
  caseExpression: {
    readonly operand?: SyntaxNode;
    readonly whenClauses: readonly SyntaxNode<"whenClause">[];
    readonly elseExpression?: SyntaxNode;
  };
  whenClause: { readonly condition: SyntaxNode; readonly result: SyntaxNode };
  columnReference: { readonly parts: readonly IdentifierNode[] };
  dereference: { readonly base: SyntaxNode; readonly field: IdentifierNode };
  subscript: { readonly base: SyntaxNode; readonly index: SyntaxNode };
  star: { readonly qualifier?: SyntaxNode<"qualifiedName"> };
  parenthesizedExpression: { readonly expression: SyntaxNode };
  subqueryExpression: { readonly query: SyntaxNode<"query"> };
  numericLiteral: { readonly token: Token };
  stringLiteral: { readonly segments: readonly Token[] };
  booleanLiteral: { readonly token: Token };
  nullLiteral: { readonly token: Token };
  typedLiteral: { readonly type: Token; readonly value: SyntaxNode<"stringLiteral"> };
  intervalLiteral: { readonly value: SyntaxNode; readonly unit: IdentifierNode };
  qualifiedName: { readonly parts: readonly IdentifierNode[] };
  quotedIdentifier: { readonly token: Token };
  unquotedIdentifier: { readonly token: Token };
  primitiveType: { readonly name: Token; readonly parameters: readonly Token[] };
  arrayType: { readonly element: DataTypeNode };
  mapType: { readonly key: DataTypeNode; readonly value: DataTypeNode };
  structType: { readonly fields: readonly SyntaxNode<"structField">[] };
  structField: { readonly name: IdentifierNode; readonly dataType: DataTypeNode };
}

export type NodeKind = keyof NodeFieldMap;

/**
 * Immutable concrete syntax tree node. `children` holds main-channel tokens and
 * nested nodes in source order; trivia is reachable through the span only.
 */
export interface SyntaxNode<K extends NodeKind = NodeKind> extends TokenRange {
  readonly kind: K;
  readonly children: readonly SyntaxElement[];
  readonly fields: NodeFieldMap[K];
}

export type SyntaxElement = SyntaxNode | Token;

export interface HiveSyntaxTree {
  /** Root node of the `singleStatement` production. */
  readonly root: SyntaxNode<"singleStatement">;
}

export function isSyntaxNode(element: SyntaxElement): element is SyntaxNode {
  return "kind" in element && "fields" in element;
}

export function isNodeOfKind<K extends NodeKind>(
  node: SyntaxNode,
  kind: K
): node is SyntaxNode<K> {
  return node.kind === kind;
}
