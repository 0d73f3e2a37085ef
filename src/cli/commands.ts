// Maps a line typed at the answer prompt to a drill command.

export type ParsedInput =
  | { type: 'quit' }
  | { type: 'previous' }
  | { type: 'goto' }
  | { type: 'answer'; text: string };

const SHORTCUTS: Record<string, ParsedInput> = {
  q: { type: 'quit' },
  p: { type: 'previous' },
  g: { type: 'goto' },
};

export function parseInput(line: string): ParsedInput {
  const text = line.trim();
  return SHORTCUTS[text.toLowerCase()] ?? { type: 'answer', text };
}
