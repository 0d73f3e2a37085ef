// User-facing text for the drill loop.

export const USAGE =
  'Usage: cloze-drill [practice text] [vocabulary list (optional)] [high-frequency list (optional)]';

export const MESSAGES = {
  answerPrompt: ': ',
  jumpPrompt: (total: number) => `Jump to sentence (1-${total}): `,
  position: (current: number, total: number) => `=== ${current}/${total} ===`,
  previousSentence: (sentence: string) => `Previous: ${sentence}`,
  previousAnswer: (answer: string) => `Missing word: ${answer}`,
  noPrevious: 'There is no previous sentence yet.',
  jumpOutOfRange: 'That sentence number is out of range.',
  jumpNotANumber: 'Please enter a valid number.',
  terminated: 'Practice stopped. Progress saved.',
  finished: 'All sentences practiced. Well done!',
  emptyText: 'The practice text contains no sentences.',
} as const;
