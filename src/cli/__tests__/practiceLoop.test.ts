import { PassThrough, Writable } from 'node:stream';
import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryProgressStore } from '../../storage/progressStore';
import { PracticeSession } from '../../session/PracticeSession';
import { runPracticeLoop } from '../practiceLoop';

const SOURCE = 'story.txt';

function collectOutput() {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { output, text: () => chunks.join('') };
}

describe('runPracticeLoop', () => {
  let store: MemoryProgressStore;
  let session: PracticeSession;

  beforeEach(() => {
    store = new MemoryProgressStore();
    session = new PracticeSession({
      sentences: ['The cat sat.', 'Dogs bark loudly.'],
      store,
      sourceId: SOURCE,
      practicedLogId: 'log',
      choose: () => 0,
    });
  });

  const run = async (lines: string) => {
    const input = new PassThrough();
    input.end(lines);
    const { output, text } = collectOutput();
    await runPracticeLoop(session, { input, output });
    return text();
  };

  it('drills, reveals wrong answers and quits', async () => {
    const output = await run('wrong\nThe\nQ\n');
    expect(output).toBe(
      [
        '\n=== 1/2 ===\n_____ cat sat.\n',
        ': ',
        'The\n\n',
        '\n=== 1/2 ===\n_____ cat sat.\n',
        ': ',
        'The cat sat.\n\n',
        '\n=== 2/2 ===\n_____ bark loudly.\n',
        ': ',
        '\nPractice stopped. Progress saved.\n',
      ].join('')
    );
    expect(store.loadCursor(SOURCE)).toBe(1);
    expect(session.state).toEqual({ kind: 'terminated' });
  });

  it('prompts for a sentence number on g', async () => {
    const output = await run('g\n2\n  Dogs  \n');
    expect(output).toBe(
      [
        '\n=== 1/2 ===\n_____ cat sat.\n',
        ': ',
        'Jump to sentence (1-2): ',
        '\n=== 2/2 ===\n_____ bark loudly.\n',
        ': ',
        'Dogs bark loudly.\n\n',
        '\nAll sentences practiced. Well done!\n',
      ].join('')
    );
    expect(store.loadCursor(SOURCE)).toBe(2);
  });

  it('shows the previous sentence on p', async () => {
    const output = await run('p\nThe\nP\nq\n');
    expect(output).toContain('There is no previous sentence yet.\n');
    expect(output).toContain('\nPrevious: The cat sat.\nMissing word: The\n\n');
  });

  it('saves progress when input ends', async () => {
    store.saveCursor(1, SOURCE);
    const output = await run('');
    expect(output.endsWith('\nPractice stopped. Progress saved.\n')).toBe(true);
    expect(store.loadCursor(SOURCE)).toBe(1);
  });

  it('saves progress when input ends at the jump prompt', async () => {
    await run('g\n');
    expect(session.state).toEqual({ kind: 'terminated' });
    expect(store.loadCursor(SOURCE)).toBe(0);
  });
});
