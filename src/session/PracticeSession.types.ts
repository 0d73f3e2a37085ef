import type { RandomChoice } from '../utils/blanking';
import type { ProgressStore } from '../storage/progressStore';

export type SessionState =
  | { kind: 'presenting'; index: number }
  | {
      kind: 'awaiting';
      index: number;
      sentence: string;
      blanked: string;
      answer: string;
    }
  | { kind: 'finished' }
  | { kind: 'terminated' };

export type SessionCommand =
  | { type: 'quit' }
  | { type: 'previous' }
  | { type: 'jump'; target: string }
  | { type: 'answer'; text: string };

export type NoticeTone = 'info' | 'error';

// Semantic outcomes; styling is left to the renderer.
export type SessionEvent =
  | { type: 'prompt'; position: number; total: number; blanked: string }
  | { type: 'correct'; sentence: string }
  | { type: 'incorrect'; answer: string }
  | { type: 'previous'; sentence: string; answer: string }
  | { type: 'notice'; tone: NoticeTone; message: string }
  | { type: 'finished' }
  | { type: 'terminated' };

export interface SessionMemory {
  sentence: string;
  blanked: string;
  answer: string;
}

export interface PracticeSessionOptions {
  sentences: readonly string[];
  store: ProgressStore;
  // Key of the cursor, normally the practice text path.
  sourceId: string;
  // Key of the practiced-word log.
  practicedLogId: string;
  vocabularyWords?: ReadonlySet<string>;
  highFrequencyWords?: ReadonlySet<string>;
  // Grows as answers are confirmed.
  practicedWords?: Set<string>;
  choose?: RandomChoice;
}
