import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { MESSAGES } from '../constants/messages';
import type { PracticeSession } from '../session/PracticeSession';
import type { SessionCommand, SessionEvent } from '../session/PracticeSession.types';
import { createTerminalStyle } from '../theme/terminal';
import { parseInput } from './commands';
import { renderEvent } from './render';

export interface PracticeLoopIO {
  input: Readable;
  output: Writable;
  color?: boolean;
}

/**
 * Read commands line by line until the session finishes or the user quits.
 * End of input counts as quitting, so progress is saved on Ctrl-D.
 */
export async function runPracticeLoop(
  session: PracticeSession,
  { input, output, color = false }: PracticeLoopIO
): Promise<void> {
  const style = createTerminalStyle(color);
  const render = (events: SessionEvent[]) => {
    for (const event of events) output.write(renderEvent(event, style));
  };

  const rl = readline.createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  const ask = async (prompt: string): Promise<string | null> => {
    output.write(prompt);
    const next = await lines.next();
    return next.done ? null : next.value;
  };

  try {
    render(session.start());

    while (!session.isDone) {
      const line = await ask(MESSAGES.answerPrompt);
      if (line === null) {
        render(session.handle({ type: 'quit' }));
        break;
      }

      const parsed = parseInput(line);
      let command: SessionCommand;
      if (parsed.type === 'goto') {
        const target = await ask(MESSAGES.jumpPrompt(session.total));
        if (target === null) {
          render(session.handle({ type: 'quit' }));
          break;
        }
        command = { type: 'jump', target };
      } else {
        command = parsed;
      }

      render(session.handle(command));
    }
  } finally {
    rl.close();
  }
}
