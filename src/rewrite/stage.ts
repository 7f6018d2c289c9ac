import type { NodeKind, SyntaxNode } from "../parser/syntaxTypes.js";
import type { TokenView } from "../parser/tokenView.js";
import type { EditLedger } from "./editLedger.js";

export type RuleResult =
  | { readonly status: "applied" }
  | { readonly status: "skipped" }
  | { readonly status: "unsupported"; readonly reason: string };

export const applied: RuleResult = { status: "applied" };
export const skipped: RuleResult = { status: "skipped" };

export function unsupported(reason: string): RuleResult {
  return { status: "unsupported", reason };
}

export interface RuleContext {
  readonly tokens: TokenView;
  readonly ledger: EditLedger;
}

export type RuleHandler<K extends NodeKind> = (node: SyntaxNode<K>, context: RuleContext) => RuleResult;

export interface NodeHandlers<K extends NodeKind> {
  readonly enter?: RuleHandler<K>;
  readonly exit?: RuleHandler<K>;
}

export type StageHandlers = { readonly [K in NodeKind]?: NodeHandlers<K> };

export type RulePhase = "enter" | "exit";

/** One rewrite rule: a handler bound to a node kind and a traversal phase. */
export interface Rule<K extends NodeKind> {
  readonly name: string;
  readonly kind: K;
  readonly phase: RulePhase;
  readonly apply: RuleHandler<K>;
}

export interface Stage {
  readonly name: string;
  /** The token stream every edit of this stage is recorded against. */
  readonly tokens: TokenView;
  readonly handlers: StageHandlers;
}

/** Binds a stage to a freshly lexed token stream. */
export type StageFactory = (tokens: TokenView) => Stage;

export function defineRule<K extends NodeKind>(
  name: string,
  kind: K,
  phase: RulePhase,
  apply: RuleHandler<K>
): Rule<K> {
  return { name, kind, phase, apply };
}

/**
 * Collects rules into the handler table of one stage. Rules sharing a node kind
 * and phase run in registration order; the first `unsupported` result stops
 * the rest.
 */
export class StageBuilder {
  private readonly name: string;
  private readonly tokens: TokenView;
  private handlers: StageHandlers = {};

  constructor(name: string, tokens: TokenView) {
    this.name = name;
    this.tokens = tokens;
  }

  use<K extends NodeKind>(rule: Rule<K>): this {
    const table: { [P in NodeKind]?: NodeHandlers<P> } = { ...this.handlers };
    const existing: NodeHandlers<K> | undefined = table[rule.kind];
    const previous = existing?.[rule.phase];
    const handler = previous ? chain(previous, rule.apply) : rule.apply;
    table[rule.kind] =
      rule.phase === "enter"
        ? { enter: handler, exit: existing?.exit }
        : { enter: existing?.enter, exit: handler };
    this.handlers = table;
    return this;
  }

  build(): Stage {
    return { name: this.name, tokens: this.tokens, handlers: this.handlers };
  }
}

function chain<K extends NodeKind>(first: RuleHandler<K>, second: RuleHandler<K>): RuleHandler<K> {
  return (node, context) => {
    const head = first(node, context);
    if (head.status === "unsupported") {
      return head;
    }
    const tail = second(node, context);
    if (tail.status === "unsupported") {
      return tail;
    }
    return head.status === "applied" ? head : tail;
  };
}

/** Upper-cased text of an identifier or keyword token, for case-insensitive matches. */
export function upperText(text: string | undefined): string {
  return (text ?? "").toUpperCase();
}
