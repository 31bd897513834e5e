/** Half-open `[start, end)` range of code points. */
export interface Span {
  start: number;
  end: number;
}

export type SentenceTerminal = "." | "!" | "?";

export interface SentenceSpan extends Span {
  /** Mark that closed the sentence, or null for an unterminated final sentence. */
  terminal: SentenceTerminal | null;
  /**
   * Offset where the next sentence begins. `[end, next)` holds the terminal
   * and the whitespace after it, copied through untouched.
   */
  next: number;
}

/** Token offsets are relative to the sentence they were read from. */
export type WordToken = Span;

export type WordClass = "AllCaps" | "Exception" | "ProtectedSuccessor" | "TitleCase" | "Other";

export interface Lexicon {
  exceptions: ReadonlySet<string>;
  protectedHeads: ReadonlySet<string>;
}
