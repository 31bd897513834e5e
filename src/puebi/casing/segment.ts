import { isSpace } from "../unicode.ts";
import type { SentenceSpan, SentenceTerminal } from "./types.ts";

function asTerminal(ch: string | undefined): SentenceTerminal | null {
  return ch === "." || ch === "!" || ch === "?" ? ch : null;
}

/**
 * Splits a document into sentence spans. The result is lazy and can be
 * iterated any number of times; each pass starts from the beginning.
 */
export function segmentSentences(chars: readonly string[]): Iterable<SentenceSpan> {
  return {
    *[Symbol.iterator]() {
      const n = chars.length;
      let i = 0;
      while (i < n) {
        let j = i;
        while (j < n && !asTerminal(chars[j])) { j++; }

        const end = j;
        const terminal = asTerminal(chars[j]);
        if (terminal) { j++; }
        while (j < n && isSpace(chars[j]!)) { j++; }

        yield { start: i, end, terminal, next: j };
        i = j;
      }
    },
  };
}
