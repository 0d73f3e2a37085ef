// Utilities for turning a raw practice text into an ordered list of sentences.
// Sentence indices are persisted as progress, so the output must stay stable
// for a given input.

const SENTENCE_TERMINATORS = '.!?。！？';

// A hyphen at a line break between two word characters, e.g. "exam-\nple".
const LINE_BREAK_HYPHEN = /([\p{L}\p{N}_])-\r?\n([\p{L}\p{N}_])/gu;

// Split after a terminator when the next visible character starts a new
// sentence; the whitespace in between is consumed by the split.
const SENTENCE_BOUNDARY = new RegExp(
  `(?<=[${SENTENCE_TERMINATORS}])\\s*(?=[^${SENTENCE_TERMINATORS}\\s])`,
  'u'
);

/**
 * Rejoin hyphenated words broken across lines, collapse whitespace runs
 * into single spaces and trim the result.
 */
export function normalizeText(text: string): string {
  if (!text) return '';
  return text
    .replace(LINE_BREAK_HYPHEN, '$1$2')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Split normalized text into sentences at ASCII and CJK end-of-sentence
 * punctuation. Fragments of one character or less are dropped.
 */
export function splitSentences(text: string): string[] {
  if (!text) return [];
  // Count code points, not UTF-16 units, so a lone emoji is dropped too.
  return text.split(SENTENCE_BOUNDARY).filter(s => Array.from(s).length > 1);
}

export function loadSentences(rawText: string): string[] {
  return splitSentences(normalizeText(rawText));
}

export default {
  normalizeText,
  splitSentences,
  loadSentences,
};
