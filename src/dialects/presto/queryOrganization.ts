import type { SyntaxNode } from "../../parser/syntaxTypes.js";
import type { EditLedger } from "../../rewrite/editLedger.js";
import { applied, defineRule, skipped } from "../../rewrite/stage.js";

/**
 * Presto has no CLUSTER BY or DISTRIBUTE BY; both clauses are dropped together
 * with one blank in front of them. SORT BY turns into ORDER BY.
 */
export const queryOrganizationRule = defineRule(
  "query-organization",
  "queryOrganization",
  "exit",
  (node, { ledger }) => {
    const { clusterBy, distributeBy, sortBy } = node.fields;
    if (!clusterBy && !distributeBy && !sortBy) {
      return skipped;
    }
    for (const clause of [clusterBy, distributeBy]) {
      if (clause) {
        deleteClause(ledger, clause);
      }
    }
    if (sortBy) {
      const keyword = sortBy.fields.keyword.tokenIndex;
      ledger.replace(keyword, keyword, "order");
    }
    return applied;
  }
);

function deleteClause(ledger: EditLedger, clause: SyntaxNode<"organizationClause">): void {
  const start = ledger.isBlankTrivia(clause.start - 1) ? clause.start - 1 : clause.start;
  ledger.delete(start, clause.stop);
}
