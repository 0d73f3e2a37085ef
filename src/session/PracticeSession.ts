import { MESSAGES } from '../constants/messages';
import type { ProgressStore } from '../storage/progressStore';
import { randomIndex, selectBlank, type RandomChoice } from '../utils/blanking';
import logger from '../utils/logger';
import type {
  PracticeSessionOptions,
  SessionCommand,
  SessionEvent,
  SessionMemory,
  SessionState,
} from './PracticeSession.types';

const JUMP_TARGET = /^[+-]?\d+$/;

/**
 * Drives one run of the drill over a fixed list of sentences.
 *
 * The session is a small state machine: it presents a sentence, waits for a
 * command, and either stays on the sentence or moves on. Every transition
 * returns the events the caller should render. The cursor is saved when an
 * answer is confirmed and when the user quits; jumps and skipped sentences
 * are not saved.
 */
export class PracticeSession {
  private readonly sentences: readonly string[];
  private readonly store: ProgressStore;
  private readonly sourceId: string;
  private readonly practicedLogId: string;
  private readonly vocabularyWords?: ReadonlySet<string>;
  private readonly highFrequencyWords?: ReadonlySet<string>;
  private readonly practicedWords: Set<string>;
  private readonly choose: RandomChoice;

  private current: SessionState = { kind: 'presenting', index: 0 };
  private memory: SessionMemory | null = null;

  constructor(options: PracticeSessionOptions) {
    this.sentences = options.sentences;
    this.store = options.store;
    this.sourceId = options.sourceId;
    this.practicedLogId = options.practicedLogId;
    this.vocabularyWords = options.vocabularyWords;
    this.highFrequencyWords = options.highFrequencyWords;
    this.practicedWords = options.practicedWords ?? new Set();
    this.choose = options.choose ?? randomIndex;
  }

  get state(): SessionState {
    return this.current;
  }

  get total(): number {
    return this.sentences.length;
  }

  get isDone(): boolean {
    return (
      this.current.kind === 'finished' || this.current.kind === 'terminated'
    );
  }

  get previous(): SessionMemory | null {
    return this.memory;
  }

  /** Resume from the saved cursor and present the first sentence. */
  start(): SessionEvent[] {
    let cursor = this.store.loadCursor(this.sourceId);
    if (cursor > this.total) {
      logger.warn(
        `Saved cursor ${cursor} is past the last sentence (${this.total}), clamping`
      );
      cursor = this.total;
    }
    this.memory = null;
    this.current = { kind: 'presenting', index: cursor };
    return this.present();
  }

  handle(command: SessionCommand): SessionEvent[] {
    const state = this.current;
    if (state.kind !== 'awaiting') {
      logger.debug(`Ignoring ${command.type} in state ${state.kind}`);
      return [];
    }

    switch (command.type) {
      case 'quit':
        this.store.saveCursor(state.index, this.sourceId);
        this.current = { kind: 'terminated' };
        return [{ type: 'terminated' }];

      case 'previous':
        return [
          this.memory
            ? {
                type: 'previous',
                sentence: this.memory.sentence,
                answer: this.memory.answer,
              }
            : { type: 'notice', tone: 'info', message: MESSAGES.noPrevious },
          this.prompt(),
        ];

      case 'jump':
        return this.jump(command.target);

      case 'answer':
        if (command.text !== state.answer) {
          return [{ type: 'incorrect', answer: state.answer }, this.prompt()];
        }
        this.store.appendWord(state.answer, this.practicedLogId);
        this.practicedWords.add(state.answer);
        this.store.saveCursor(state.index + 1, this.sourceId);
        this.memory = {
          sentence: state.sentence,
          blanked: state.blanked,
          answer: state.answer,
        };
        this.current = { kind: 'presenting', index: state.index + 1 };
        return [{ type: 'correct', sentence: state.sentence }, ...this.present()];
    }
  }

  private jump(target: string): SessionEvent[] {
    const trimmed = target.trim();
    if (!JUMP_TARGET.test(trimmed)) {
      return [
        { type: 'notice', tone: 'error', message: MESSAGES.jumpNotANumber },
        this.prompt(),
      ];
    }

    const position = Number(trimmed);
    if (position < 1 || position > this.total) {
      return [
        { type: 'notice', tone: 'error', message: MESSAGES.jumpOutOfRange },
        this.prompt(),
      ];
    }

    this.current = { kind: 'presenting', index: position - 1 };
    return this.present();
  }

  // Resolve a presenting state into either an awaiting state or the end.
  private present(): SessionEvent[] {
    while (this.current.kind === 'presenting') {
      const { index } = this.current;
      if (index >= this.total) {
        this.current = { kind: 'finished' };
        return [{ type: 'finished' }];
      }

      const sentence = this.sentences[index];
      const selection = selectBlank(
        sentence,
        {
          vocabularyWords: this.vocabularyWords,
          highFrequencyWords: this.highFrequencyWords,
          practicedWords: this.practicedWords,
        },
        this.choose
      );
      if (!selection) {
        // Not saved: a restart lands on this sentence again.
        logger.debug(`Skipping sentence ${index + 1}: nothing to blank`);
        this.current = { kind: 'presenting', index: index + 1 };
        continue;
      }

      this.current = {
        kind: 'awaiting',
        index,
        sentence,
        blanked: selection.blanked,
        answer: selection.answer,
      };
    }
    return [this.prompt()];
  }

  private prompt(): SessionEvent {
    if (this.current.kind !== 'awaiting') {
      throw new Error(`No sentence to prompt in state ${this.current.kind}`);
    }
    return {
      type: 'prompt',
      position: this.current.index + 1,
      total: this.total,
      blanked: this.current.blanked,
    };
  }
}

export default PracticeSession;
