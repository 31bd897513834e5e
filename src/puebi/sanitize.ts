import { decapitalizeMidSentence } from "./casing/decapitalize.ts";
import { createLexicon } from "./casing/lexicon.ts";
import { debugPuebi } from "./diag.ts";
import { resolveSanitizeOptionsOrThrow, type SanitizeOptions } from "./options.ts";
import { capitalizeSentences } from "./text/capitalize.ts";
import { fixIdrCurrency } from "./text/currency.ts";
import { capitalizeGreetingName } from "./text/greeting.ts";
import { normalizeRealTime } from "./text/phrases.ts";
import { fixCommonPrepositions } from "./text/prepositions.ts";
import { fixPunctuationSpacing, normalizeSpaces } from "./text/spacing.ts";

/**
 * Rewrites text toward PUEBI spelling and punctuation.
 *
 * Empty and whitespace-only input comes back unchanged; anything else is
 * normalized and trimmed. Throws only when `opts` fails validation
 * (`code: "INVALID_SANITIZE_OPTIONS"`).
 */
export function sanitize(input: string, opts?: SanitizeOptions): string {
  const options = resolveSanitizeOptionsOrThrow(opts);

  if (input.trim() === "") { return input; }

  let s = normalizeSpaces(input);
  s = fixPunctuationSpacing(s);
  s = fixCommonPrepositions(s);
  s = normalizeRealTime(s);
  s = capitalizeSentences(s);

  const greeting = capitalizeGreetingName(s, options.greetingNameLimit);
  s = greeting.text;

  const lexicon = createLexicon({
    exceptions: options.exceptions,
    protectedHeads: options.protectedHeads,
  });
  s = decapitalizeMidSentence(s, lexicon, {
    protectedSpans: options.protectGreetingName ? greeting.nameSpans : [],
  });

  s = fixIdrCurrency(s);

  const out = s.trim();
  debugPuebi("sanitize", "done", { inputLength: input.length, outputLength: out.length, changed: out !== input });
  return out;
}
