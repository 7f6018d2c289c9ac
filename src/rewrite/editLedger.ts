import { EditConflictError, RewriteErrorCode, SqlRewriteError } from "../errors.js";
import type { TokenRange } from "../parser/syntaxTypes.js";
import type { TokenView } from "../parser/tokenView.js";

export type Edit =
  | { readonly kind: "insertBefore"; readonly anchor: number; readonly text: string }
  | { readonly kind: "insertAfter"; readonly anchor: number; readonly text: string }
  | { readonly kind: "replace"; readonly start: number; readonly stop: number; readonly text: string }
  | {
      readonly kind: "delete";
      readonly start: number;
      readonly stop: number;
      /** Also drop the next token when it is blank trivia. */
      readonly absorbTrailingBlank: boolean;
    };

export type RangeEdit = Extract<Edit, { kind: "replace" | "delete" }>;

export type BlankPredicate = (text: string) => boolean;

export interface EditLedgerOptions {
  /** Decides which trivia a deletion may absorb. Defaults to whitespace only. */
  readonly isBlank?: BlankPredicate;
}

export const isWhitespaceOnly: BlankPredicate = (text) => /^[ \t\r\n\f]+$/.test(text);

/**
 * Pending edits against one token stream, keyed by token index. Recording is
 * append-only; `materialize` replays the stream once with the edits applied.
 *
 * Inserts anchored inside a Replace survive only on its first token (before)
 * and last token (after). A Delete spanning several tokens swallows every
 * insert anchored to it; a single-token Delete keeps its own.
 */
export class EditLedger {
  readonly tokens: TokenView;

  private readonly isBlank: BlankPredicate;

  private readonly edits: Edit[] = [];

  constructor(tokens: TokenView, options: EditLedgerOptions = {}) {
    this.tokens = tokens;
    this.isBlank = options.isBlank ?? isWhitespaceOnly;
  }

  record(edit: Edit): void {
    this.edits.push(edit);
  }

  insertBefore(anchor: number, text: string): void {
    this.record({ kind: "insertBefore", anchor, text });
  }

  insertAfter(anchor: number, text: string): void {
    this.record({ kind: "insertAfter", anchor, text });
  }

  replace(start: number, stop: number, text: string): void {
    this.record({ kind: "replace", start, stop, text });
  }

  delete(start: number, stop: number, options: { absorbTrailingBlank?: boolean } = {}): void {
    this.record({
      kind: "delete",
      start,
      stop,
      absorbTrailingBlank: options.absorbTrailingBlank ?? false,
    });
  }

  /** Deletes a single token together with one following blank. */
  deleteToken(index: number): void {
    this.delete(index, index, { absorbTrailingBlank: true });
  }

  /** Whether the token at `index` is trivia this ledger's deletions may absorb. */
  isBlankTrivia(index: number): boolean {
    return this.tokens.isTrivia(index) && this.isBlank(this.tokens.text(index));
  }

  pending(): readonly Edit[] {
    return [...this.edits];
  }

  get isEmpty(): boolean {
    return this.edits.length === 0;
  }

  materialize(tokens: TokenView = this.tokens): string {
    if (tokens !== this.tokens) {
      throw new SqlRewriteError(
        RewriteErrorCode.ForeignTokenStream,
        "Edits can only be materialized against the token stream they were recorded for"
      );
    }

    const before = new Map<number, string[]>();
    const after = new Map<number, string[]>();
    const ranges: RangeEdit[] = [];

    for (const edit of this.edits) {
      switch (edit.kind) {
        case "insertBefore":
          this.assertAnchor(edit.anchor);
          append(before, edit.anchor, edit.text);
          break;
        case "insertAfter":
          this.assertAnchor(edit.anchor);
          append(after, edit.anchor, edit.text);
          break;
        case "replace":
        case "delete":
          this.assertAnchor(edit.start);
          this.assertAnchor(edit.stop);
          if (edit.start > edit.stop) {
            throw new RangeError(`Edit range ${edit.start}..${edit.stop} is reversed`);
          }
          ranges.push(edit);
          break;
      }
    }

    const cover = this.coverage(resolveRanges(ranges), before, after);

    let output = "";
    for (let i = 0; i < this.tokens.size; i += 1) {
      const range = cover[i];
      if (!range) {
        output += joinTexts(before.get(i)) + this.tokens.text(i) + joinTexts(after.get(i));
        continue;
      }
      const keepsBoundaryInserts = range.kind === "replace" || range.start === range.stop;
      if (i === range.start) {
        if (keepsBoundaryInserts) {
          output += joinTexts(before.get(i));
        }
        if (range.kind === "replace") {
          output += range.text;
        }
      }
      if (i === range.stop && keepsBoundaryInserts) {
        output += joinTexts(after.get(i));
      }
    }
    return output;
  }

  /** Maps every token index to the range edit that owns it, if any. */
  private coverage(
    ranges: readonly RangeEdit[],
    before: ReadonlyMap<number, string[]>,
    after: ReadonlyMap<number, string[]>
  ): Array<RangeEdit | undefined> {
    const cover = new Array<RangeEdit | undefined>(this.tokens.size);
    for (const range of ranges) {
      for (let i = range.start; i <= range.stop; i += 1) {
        cover[i] = range;
      }
    }

    for (const range of ranges) {
      if (range.kind !== "delete" || !range.absorbTrailingBlank) {
        continue;
      }
      const next = range.stop + 1;
      const claimed = cover[next] !== undefined || before.has(next) || after.has(next);
      if (!claimed && this.isBlankTrivia(next)) {
        cover[next] = { kind: "delete", start: next, stop: next, absorbTrailingBlank: false };
      }
    }
    return cover;
  }

  private assertAnchor(anchor: number): void {
    if (!Number.isInteger(anchor) || !this.tokens.has(anchor)) {
      throw new RangeError(`Edit anchor ${anchor} is outside 0..${this.tokens.size - 1}`);
    }
  }
}

/**
 * Keeps pairwise disjoint ranges: an enclosing range swallows the ranges it
 * contains, the later of two identical ranges wins, and a partial overlap is a
 * rule defect.
 */
function resolveRanges(ranges: readonly RangeEdit[]): RangeEdit[] {
  let accepted: RangeEdit[] = [];
  for (const range of ranges) {
    const conflict = accepted.find((other) => overlapsPartially(other, range));
    if (conflict) {
      throw new EditConflictError(toRange(conflict), toRange(range));
    }
    if (accepted.some((other) => contains(other, range) && !sameRange(other, range))) {
      continue;
    }
    accepted = accepted.filter((other) => !contains(range, other));
    accepted.push(range);
  }
  return accepted;
}

function contains(outer: TokenRange, inner: TokenRange): boolean {
  return outer.start <= inner.start && inner.stop <= outer.stop;
}

function sameRange(a: TokenRange, b: TokenRange): boolean {
  return a.start === b.start && a.stop === b.stop;
}

function overlapsPartially(a: TokenRange, b: TokenRange): boolean {
  const intersect = a.start <= b.stop && b.start <= a.stop;
  return intersect && !contains(a, b) && !contains(b, a);
}

function toRange(range: TokenRange): TokenRange {
  return { start: range.start, stop: range.stop };
}

function append(target: Map<number, string[]>, anchor: number, text: string): void {
  const texts = target.get(anchor);
  if (texts) {
    texts.push(text);
  } else {
    target.set(anchor, [text]);
  }
}

function joinTexts(texts: readonly string[] | undefined): string {
  return texts ? texts.join("") : "";
}
