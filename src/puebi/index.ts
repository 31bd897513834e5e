export { sanitize } from "./sanitize.ts";
export { isSentenceCapitalized, titleCase } from "./text/capitalize.ts";

export { parseSanitizeOptions, sanitizeOptionsSchema } from "./options.ts";
export type { ParseOptionsResult, PuebiError, ResolvedSanitizeOptions, SanitizeOptions } from "./options.ts";
export { loadSanitizeOptionsFromEnv } from "./config.ts";

export { segmentSentences } from "./casing/segment.ts";
export { tokenizeWords } from "./casing/tokenize.ts";
export { classifyWord, isAllCaps, isTitleCase } from "./casing/classify.ts";
export { decapitalizeMidSentence } from "./casing/decapitalize.ts";
export type { DecapitalizeOptions } from "./casing/decapitalize.ts";
export { createLexicon, DEFAULT_EXCEPTIONS, DEFAULT_PROTECTED_HEADS } from "./casing/lexicon.ts";
export type { Lexicon, SentenceSpan, Span, WordClass, WordToken } from "./casing/types.ts";
