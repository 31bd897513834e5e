import { debugPuebi } from "../diag.ts";
import { toCodePoints, toLowerRune } from "../unicode.ts";
import { classifyWord } from "./classify.ts";
import { DEFAULT_LEXICON } from "./lexicon.ts";
import { segmentSentences } from "./segment.ts";
import { tokenizeWords } from "./tokenize.ts";
import type { Lexicon, Span } from "./types.ts";

export interface DecapitalizeOptions {
  /** Document spans (code points) whose tokens are never lowered. */
  protectedSpans?: readonly Span[];
}

function startsInside(offset: number, spans: readonly Span[]): boolean {
  return spans.some((sp) => offset >= sp.start && offset < sp.end);
}

/**
 * Lowers stray capitals in the middle of sentences. The first word of every
 * sentence is left alone, as are acronyms, lexicon exceptions and the word
 * following a protected head.
 */
export function decapitalizeMidSentence(
  input: string,
  lexicon: Lexicon = DEFAULT_LEXICON,
  opts?: DecapitalizeOptions,
): string {
  const source = toCodePoints(input);
  const out = source.slice();
  const protectedSpans = opts?.protectedSpans ?? [];
  const lowered: string[] = [];

  for (const sentence of segmentSentences(source)) {
    const words = tokenizeWords(source, sentence);

    for (let wi = 1; wi < words.length; wi++) {
      const wp = words[wi]!;
      const prev = words[wi - 1]!;
      const start = sentence.start + wp.start;
      const end = sentence.start + wp.end;

      // Classification reads the untouched source, so lowering a word never
      // changes how its successor is judged.
      const word = source.slice(start, end).join("");
      const previous = source.slice(sentence.start + prev.start, sentence.start + prev.end).join("");

      if (classifyWord(word, previous, lexicon) !== "TitleCase") { continue; }
      if (startsInside(start, protectedSpans)) { continue; }

      for (let t = start; t < end; t++) {
        out[t] = toLowerRune(source[t]!);
      }
      lowered.push(word);
    }
  }

  if (lowered.length > 0) {
    debugPuebi("casing.decapitalize", "lowered", { count: lowered.length, words: lowered });
  }

  return out.join("");
}
