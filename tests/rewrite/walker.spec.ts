import { describe, expect, it } from "vitest";

import {
  EditLedger,
  StageBuilder,
  applied,
  defineRule,
  parseHive,
  skipped,
  unsupported,
  walk,
} from "../../src/index.js";
import type { NodeKind, RulePhase } from "../../src/index.js";

// 0 SELECT, 1 " ", 2 f, 3 (, 4 a, 5 ), 6 " ", 7 FROM, 8 " ", 9 t, 10 EOF
const SQL = "SELECT f(a) FROM t";

function recorder<K extends NodeKind>(events: string[], kind: K, phase: RulePhase) {
  return defineRule(`${phase}-${kind}`, kind, phase, () => {
    events.push(`${phase}:${kind}`);
    return applied;
  });
}

describe("walk", () => {
  it("enters before the children and exits after them", () => {
    const { root, tokens } = parseHive(SQL);
    const events: string[] = [];
    const stage = new StageBuilder("Recorder", tokens)
      .use(recorder(events, "querySpecification", "enter"))
      .use(recorder(events, "querySpecification", "exit"))
      .use(recorder(events, "functionCall", "enter"))
      .use(recorder(events, "functionCall", "exit"))
      .use(recorder(events, "columnReference", "enter"))
      .use(recorder(events, "columnReference", "exit"))
      .build();

    const result = walk(root, stage, { tokens, ledger: new EditLedger(tokens) });

    expect(events).toEqual([
      "enter:querySpecification",
      "enter:functionCall",
      "enter:columnReference",
      "exit:columnReference",
      "exit:functionCall",
      "exit:querySpecification",
    ]);
    expect(result).toEqual({ ok: true, applied: 6 });
  });

  it("does not count skipped rules", () => {
    const { root, tokens } = parseHive(SQL);
    const stage = new StageBuilder("Idle", tokens)
      .use(defineRule("idle", "columnReference", "enter", () => skipped))
      .build();

    expect(walk(root, stage, { tokens, ledger: new EditLedger(tokens) })).toEqual({ ok: true, applied: 0 });
  });

  it("stops at the first unsupported result", () => {
    const { root, tokens } = parseHive(SQL);
    const events: string[] = [];
    const stage = new StageBuilder("Stopper", tokens)
      .use(defineRule("refuse", "columnReference", "enter", () => unsupported("nope")))
      .use(recorder(events, "functionCall", "exit"))
      .use(recorder(events, "tableReference", "enter"))
      .build();

    const result = walk(root, stage, { tokens, ledger: new EditLedger(tokens) });

    expect(result).toEqual({ ok: false, reason: "nope", kind: "columnReference", range: { start: 4, stop: 4 } });
    expect(events).toEqual([]);
  });

  it("runs rules sharing a node kind in registration order", () => {
    const { root, tokens } = parseHive(SQL);
    const events: string[] = [];
    const stage = new StageBuilder("Chained", tokens)
      .use(
        defineRule("first", "functionCall", "enter", () => {
          events.push("first");
          return skipped;
        })
      )
      .use(
        defineRule("second", "functionCall", "enter", () => {
          events.push("second");
          return applied;
        })
      )
      .build();

    expect(walk(root, stage, { tokens, ledger: new EditLedger(tokens) })).toEqual({ ok: true, applied: 1 });
    expect(events).toEqual(["first", "second"]);
  });

  it("skips later rules once one is unsupported", () => {
    const { root, tokens } = parseHive(SQL);
    const events: string[] = [];
    const stage = new StageBuilder("Guarded", tokens)
      .use(defineRule("guard", "functionCall", "enter", () => unsupported("guarded")))
      .use(recorder(events, "functionCall", "enter"))
      .build();

    const result = walk(root, stage, { tokens, ledger: new EditLedger(tokens) });

    expect(result.ok).toBe(false);
    expect(events).toEqual([]);
  });
});
