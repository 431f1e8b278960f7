/**
 * Forward-only cursor over the code points of an immutable string.
 *
 * Lookahead never consumes: `peek` reads ahead, and `fork` returns an
 * independent cursor at the same position for speculative scanning. Forks
 * share the code point array, so forking is O(1).
 */
export class CharCursor {
  private readonly chars: readonly string[];
  private position: number;

  constructor(text: string | readonly string[], position = 0) {
    this.chars = typeof text === "string" ? Array.from(text) : text;
    this.position = position;
  }

  get done(): boolean {
    return this.position >= this.chars.length;
  }

  /** Code point `ahead` positions past the current one, if any. */
  peek(ahead = 0): string | undefined {
    return this.chars[this.position + ahead];
  }

  next(): string | undefined {
    const ch = this.chars[this.position];
    if (ch !== undefined) this.position += 1;
    return ch;
  }

  /** Consumes the next code point only when it equals `expected`. */
  eat(expected: string): boolean {
    if (this.chars[this.position] !== expected) return false;
    this.position += 1;
    return true;
  }

  fork(): CharCursor {
    return new CharCursor(this.chars, this.position);
  }

  /** Moves to the position of a fork taken from this cursor. */
  commit(fork: CharCursor): void {
    if (fork.chars !== this.chars || fork.position < this.position) {
      throw new RangeError("Cannot commit a cursor that was not forked from this one");
    }
    this.position = fork.position;
  }

  rest(): string {
    return this.chars.slice(this.position).join("");
  }
}
