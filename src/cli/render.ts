import { MESSAGES } from '../constants/messages';
import type { SessionEvent } from '../session/PracticeSession.types';
import type { TerminalStyle } from '../theme/terminal';

export function renderEvent(event: SessionEvent, style: TerminalStyle): string {
  switch (event.type) {
    case 'prompt':
      return `\n${style.heading(MESSAGES.position(event.position, event.total))}\n${event.blanked}\n`;
    case 'correct':
      return `${style.success(event.sentence)}\n\n`;
    case 'incorrect':
      return `${style.failure(event.answer)}\n\n`;
    case 'previous':
      return `\n${MESSAGES.previousSentence(event.sentence)}\n${MESSAGES.previousAnswer(event.answer)}\n\n`;
    case 'notice':
      return event.tone === 'error'
        ? `${style.warning(event.message)}\n`
        : `${event.message}\n`;
    case 'finished':
      return `\n${style.success(MESSAGES.finished)}\n`;
    case 'terminated':
      return `\n${MESSAGES.terminated}\n`;
  }
}
