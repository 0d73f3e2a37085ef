import { describe, it, expect } from 'vitest';
import { loadSentences, normalizeText, splitSentences } from '../reading';

describe('normalizeText', () => {
  it('rejoins words hyphenated across a line break', () => {
    expect(normalizeText('an exam-\nple of wrap-\nping')).toBe(
      'an example of wrapping'
    );
  });

  it('keeps hyphens that are not followed by a line break', () => {
    expect(normalizeText('a well-known fact')).toBe('a well-known fact');
  });

  it('collapses whitespace runs and trims', () => {
    expect(normalizeText('  one\n\ntwo\t three  ')).toBe('one two three');
  });

  it('handles empty input', () => {
    expect(normalizeText('')).toBe('');
    expect(normalizeText(' \n ')).toBe('');
  });
});

describe('splitSentences', () => {
  it('splits at ASCII sentence punctuation', () => {
    expect(splitSentences('Hello world. How are you? Fine!')).toEqual([
      'Hello world.',
      'How are you?',
      'Fine!',
    ]);
  });

  it('splits at CJK sentence punctuation without spaces', () => {
    expect(splitSentences('你好。今天天气很好！我们走吧？')).toEqual([
      '你好。',
      '今天天气很好！',
      '我们走吧？',
    ]);
  });

  it('keeps runs of punctuation with their sentence', () => {
    expect(splitSentences('Wait... what?! Really.')).toEqual([
      'Wait...',
      'what?!',
      'Really.',
    ]);
  });

  it('splits even without whitespace after the punctuation', () => {
    expect(splitSentences('One.Two.')).toEqual(['One.', 'Two.']);
  });

  it('keeps a trailing fragment without punctuation', () => {
    expect(splitSentences('Done. And then')).toEqual(['Done.', 'And then']);
  });

  it('drops fragments of one character', () => {
    expect(splitSentences('. Hello there.')).toEqual(['Hello there.']);
  });

  it('drops a single astral character after a sentence', () => {
    expect(splitSentences('Hi there. 😀')).toEqual(['Hi there.']);
    expect(splitSentences('Hi there. 😀! Bye now.')).toEqual([
      'Hi there.',
      '😀!',
      'Bye now.',
    ]);
  });

  it('handles empty input', () => {
    expect(splitSentences('')).toEqual([]);
  });
});

describe('loadSentences', () => {
  it('normalizes before splitting', () => {
    const raw = 'The cat\nsat on the mat.  It was\n\nhappy. Dogs in-\nstead bark.\n';
    expect(loadSentences(raw)).toEqual([
      'The cat sat on the mat.',
      'It was happy.',
      'Dogs instead bark.',
    ]);
  });
});
