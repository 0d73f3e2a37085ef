import { describe, expect, it } from 'vitest';
import { parseInput } from '../commands';

describe('parseInput', () => {
  it.each([
    ['q', 'quit'],
    ['Q', 'quit'],
    [' p ', 'previous'],
    ['G', 'goto'],
  ] as const)('maps %s to %s', (line, type) => {
    expect(parseInput(line)).toEqual({ type });
  });

  it('treats anything else as a trimmed answer', () => {
    expect(parseInput('  Apple \n')).toEqual({ type: 'answer', text: 'Apple' });
    expect(parseInput('quit')).toEqual({ type: 'answer', text: 'quit' });
    expect(parseInput('')).toEqual({ type: 'answer', text: '' });
  });
});
