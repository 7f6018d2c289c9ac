import { Token, type TokenStream } from "antlr4ng";

/**
 * Read-only view over one lexed token stream. Token indices are only meaningful
 * against the view that produced them.
 */
export class TokenView {
  private readonly tokens: readonly Token[];

  constructor(stream: TokenStream) {
    const tokens: Token[] = [];
    for (let i = 0; i < stream.size; i += 1) {
      tokens.push(stream.get(i));
    }
    this.tokens = tokens;
  }

  get size(): number {
    return this.tokens.length;
  }

  get(index: number): Token {
    const token = this.tokens[index];
    if (!token) {
      throw new RangeError(`Token index ${index} is outside 0..${this.tokens.length - 1}`);
    }
    return token;
  }

  has(index: number): boolean {
    return index >= 0 && index < this.tokens.length;
  }

  /** Source text of a token; `EOF` renders as the empty string. */
  text(index: number): string {
    const token = this.get(index);
    return token.type === Token.EOF ? "" : token.text ?? "";
  }

  isTrivia(index: number): boolean {
    return this.has(index) && this.get(index).channel !== Token.DEFAULT_CHANNEL;
  }

  /** Concatenated source text of tokens `start..stop`, trivia included. */
  textOf(start: number, stop: number): string {
    let text = "";
    for (let i = start; i <= stop; i += 1) {
      text += this.text(i);
    }
    return text;
  }

  /**
   * First index at or after `from` whose text equals `text`, ignoring case;
   * -1 when there is none.
   */
  indexOf(text: string, from: number): number {
    const wanted = text.toLowerCase();
    for (let i = Math.max(from, 0); i < this.tokens.length; i += 1) {
      if (this.text(i).toLowerCase() === wanted) {
        return i;
      }
    }
    return -1;
  }

  /** The whole input, reassembled from the tokens. */
  get source(): string {
    return this.textOf(0, this.tokens.length - 1);
  }
}
