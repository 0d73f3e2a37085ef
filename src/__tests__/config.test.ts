import { describe, expect, it } from 'vitest';
import {
  DEFAULT_PRACTICED_FILE,
  DEFAULT_TEXT_FILE,
  loadConfig,
} from '../config';
import { UsageError } from '../errors';

describe('loadConfig', () => {
  it('uses defaults when no arguments are given', () => {
    expect(loadConfig([], {})).toEqual({
      textPath: DEFAULT_TEXT_FILE,
      vocabularyPath: undefined,
      highFrequencyPath: undefined,
      practicedLogPath: DEFAULT_PRACTICED_FILE,
      color: true,
    });
  });

  it('reads the positional arguments in order', () => {
    const config = loadConfig(['book.txt', 'cet4.txt', 'common.txt'], {});
    expect(config.textPath).toBe('book.txt');
    expect(config.vocabularyPath).toBe('cet4.txt');
    expect(config.highFrequencyPath).toBe('common.txt');
  });

  it('takes overrides from the environment', () => {
    const config = loadConfig([], {
      CLOZE_DRILL_DEFAULT_TEXT: 'novel.txt',
      CLOZE_DRILL_PRACTICED_FILE: 'done.txt',
      NO_COLOR: '1',
    });
    expect(config.textPath).toBe('novel.txt');
    expect(config.practicedLogPath).toBe('done.txt');
    expect(config.color).toBe(false);
  });

  it('rejects more than three arguments', () => {
    expect(() => loadConfig(['a', 'b', 'c', 'd'], {})).toThrow(UsageError);
  });
});
