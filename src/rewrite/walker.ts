import type { NodeKind, SyntaxNode, TokenRange } from "../parser/syntaxTypes.js";
import { isSyntaxNode } from "../parser/syntaxTypes.js";
import type { RuleContext, RuleResult, Stage } from "./stage.js";

export type WalkResult =
  | { readonly ok: true; readonly applied: number }
  | {
      readonly ok: false;
      readonly reason: string;
      readonly kind: NodeKind;
      readonly range: TokenRange;
    };

type WalkFailure = Extract<WalkResult, { ok: false }>;

/**
 * Depth-first, pre-order traversal. A node's enter handler runs before any of
 * its descendants and its exit handler after all of them. The walk stops at the
 * first `unsupported` result.
 */
export function walk(root: SyntaxNode, stage: Stage, context: RuleContext): WalkResult {
  let applied = 0;

  const settle = (node: SyntaxNode, result: RuleResult | undefined): WalkFailure | undefined => {
    if (!result) {
      return undefined;
    }
    if (result.status === "unsupported") {
      return {
        ok: false,
        reason: result.reason,
        kind: node.kind,
        range: { start: node.start, stop: node.stop },
      };
    }
    if (result.status === "applied") {
      applied += 1;
    }
    return undefined;
  };

  const visit = <K extends NodeKind>(node: SyntaxNode<K>): WalkFailure | undefined => {
    const handlers = stage.handlers[node.kind];
    const entered = settle(node, handlers?.enter?.(node, context));
    if (entered) {
      return entered;
    }
    for (const child of node.children) {
      if (!isSyntaxNode(child)) {
        continue;
      }
      const failure = visit(child);
      if (failure) {
        return failure;
      }
    }
    return settle(node, handlers?.exit?.(node, context));
  };

  return visit(root) ?? { ok: true, applied };
}
