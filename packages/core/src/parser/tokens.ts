/**
 * One-token lookahead over any iterable of raw arguments.
 */
export class TokenCursor {
  private readonly iterator: Iterator<string>;
  private buffered?: IteratorResult<string>;
  private taken = 0;

  constructor(tokens: Iterable<string>) {
    this.iterator = tokens[Symbol.iterator]();
  }

  /** Number of tokens handed out by `next()`. */
  get consumed(): number {
    return this.taken;
  }

  peek(): string | undefined {
    this.buffered ??= this.iterator.next();
    return this.buffered.done ? undefined : this.buffered.value;
  }

  next(): string | undefined {
    const token = this.peek();
    this.buffered = undefined;
    if (token !== undefined) this.taken++;
    return token;
  }
}
