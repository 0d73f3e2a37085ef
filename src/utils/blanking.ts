// Picks the word to hide in a sentence and builds the cloze prompt for it.

export const BLANK_PLACEHOLDER = '_____';

// A word is a run of CJK ideographs or of ASCII letters; everything up to the
// next word is its suffix.
const TOKEN_PATTERN = /([\u4e00-\u9fff]+|[a-zA-Z]+)([^\u4e00-\u9fffa-zA-Z]*)/g;

export interface Token {
  core: string;
  suffix: string;
}

export interface TokenizedSentence {
  // Text before the first word, such as an opening quote. The whole
  // sentence when it has no word.
  leading: string;
  tokens: Token[];
}

export interface WordSets {
  vocabularyWords?: ReadonlySet<string>;
  highFrequencyWords?: ReadonlySet<string>;
  practicedWords?: ReadonlySet<string>;
}

export interface BlankedSentence {
  blanked: string;
  answer: string;
  tokenIndex: number;
}

/**
 * Returns an index in `[0, size)`. Injected so callers can make the pick
 * deterministic.
 */
export type RandomChoice = (size: number) => number;

export const randomIndex: RandomChoice = size =>
  Math.floor(Math.random() * size);

export function tokenizeSentence(sentence: string): TokenizedSentence {
  const tokens: Token[] = [];
  let leading = sentence;
  for (const match of sentence.matchAll(TOKEN_PATTERN)) {
    if (tokens.length === 0) {
      leading = sentence.slice(0, match.index);
    }
    tokens.push({ core: match[1], suffix: match[2] });
  }
  return { leading, tokens };
}

const lowerCased = (words: ReadonlySet<string>): Set<string> =>
  new Set(Array.from(words, w => w.toLowerCase()));

function candidateIndices(
  tokens: Token[],
  predicate: (token: Token) => boolean
): number[] {
  const indices: number[] = [];
  tokens.forEach((token, i) => {
    if (predicate(token)) indices.push(i);
  });
  return indices;
}

/**
 * Choose one word of `sentence` to blank out.
 *
 * Candidates are taken from the first non-empty tier:
 * 1. vocabulary words that are neither high-frequency nor practiced
 *    (needs all three sets),
 * 2. any word that is neither high-frequency nor practiced
 *    (needs both exclusion sets),
 * 3. any word at all.
 *
 * Returns `null` when the sentence has no word to blank.
 */
export function selectBlank(
  sentence: string,
  words: WordSets = {},
  choose: RandomChoice = randomIndex
): BlankedSentence | null {
  const { leading, tokens } = tokenizeSentence(sentence);
  if (tokens.length === 0) return null;

  const { vocabularyWords, highFrequencyWords, practicedWords } = words;

  let primary: number[] = [];
  let secondary: number[] = [];

  if (highFrequencyWords && practicedWords) {
    const frequent = lowerCased(highFrequencyWords);
    const practiced = lowerCased(practicedWords);
    const isUnseen = (core: string) => {
      const lower = core.toLowerCase();
      return !frequent.has(lower) && !practiced.has(lower);
    };

    if (vocabularyWords) {
      const vocabulary = lowerCased(vocabularyWords);
      // The exact-case check and the lower-cased check are both required.
      primary = candidateIndices(
        tokens,
        ({ core }) =>
          vocabularyWords.has(core) &&
          vocabulary.has(core.toLowerCase()) &&
          isUnseen(core)
      );
    }
    secondary = candidateIndices(tokens, ({ core }) => isUnseen(core));
  }

  let chosen: number;
  if (primary.length > 0) {
    chosen = primary[choose(primary.length)];
  } else if (secondary.length > 0) {
    chosen = secondary[choose(secondary.length)];
  } else {
    chosen = choose(tokens.length);
  }

  const blanked =
    leading +
    tokens
      .map(({ core, suffix }, i) =>
        i === chosen ? BLANK_PLACEHOLDER + suffix : core + suffix
      )
      .join('');

  return { blanked, answer: tokens[chosen].core, tokenIndex: chosen };
}
