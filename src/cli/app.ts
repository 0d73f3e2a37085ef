import type { Readable, Writable } from 'node:stream';
import { loadConfig, type AppConfig } from '../config';
import { MESSAGES } from '../constants/messages';
import { ClozeDrillError } from '../errors';
import { PracticeSession } from '../session/PracticeSession';
import { FileProgressStore, type ProgressStore } from '../storage/progressStore';
import { FileTextSource, type TextSource } from '../storage/textSource';
import type { RandomChoice } from '../utils/blanking';
import logger from '../utils/logger';
import { loadSentences } from '../utils/reading';
import { createTerminalStyle } from '../theme/terminal';
import { runPracticeLoop } from './practiceLoop';

export interface AppIO {
  input: Readable;
  output: Writable;
  errorOutput: Writable;
  // Colour is used only when the config allows it and the output is a TTY.
  isTTY?: boolean;
}

export interface AppDependencies {
  textSource?: TextSource;
  store?: ProgressStore;
  choose?: RandomChoice;
}

function createSession(
  config: AppConfig,
  sentences: string[],
  store: ProgressStore,
  choose?: RandomChoice
): PracticeSession {
  const vocabularyWords = config.vocabularyPath
    ? store.loadWordSet(config.vocabularyPath)
    : undefined;
  const highFrequencyWords = config.highFrequencyPath
    ? store.loadWordSet(config.highFrequencyPath)
    : undefined;
  const practicedWords = store.loadWordSet(config.practicedLogPath);

  logger.info(
    `Loaded ${sentences.length} sentences, ${vocabularyWords?.size ?? 0} vocabulary words, ` +
      `${highFrequencyWords?.size ?? 0} high-frequency words, ${practicedWords.size} practiced words`
  );

  return new PracticeSession({
    sentences,
    store,
    sourceId: config.textPath,
    practicedLogId: config.practicedLogPath,
    vocabularyWords,
    highFrequencyWords,
    practicedWords,
    choose,
  });
}

/**
 * Run the drill for the given command-line arguments and resolve with the
 * process exit code. Usage and source errors end the run before a session
 * starts.
 */
export async function runApp(
  args: readonly string[],
  io: AppIO,
  env: NodeJS.ProcessEnv = process.env,
  deps: AppDependencies = {}
): Promise<number> {
  let config: AppConfig;
  let text: string;
  try {
    config = loadConfig(args, env);
    text = await (deps.textSource ?? new FileTextSource()).read(config.textPath);
  } catch (error: unknown) {
    if (error instanceof ClozeDrillError) {
      const style = createTerminalStyle(!env.NO_COLOR && io.isTTY === true);
      io.errorOutput.write(`${style.failure(error.message)}\n`);
      logger.debug(error);
      return 1;
    }
    throw error;
  }

  const sentences = loadSentences(text);
  if (sentences.length === 0) {
    io.output.write(`${MESSAGES.emptyText}\n`);
    return 0;
  }

  const store = deps.store ?? new FileProgressStore();
  const session = createSession(config, sentences, store, deps.choose);
  await runPracticeLoop(session, {
    input: io.input,
    output: io.output,
    color: config.color && io.isTTY === true,
  });
  return 0;
}
