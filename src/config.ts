import { USAGE } from './constants/messages';
import { UsageError } from './errors';

export const DEFAULT_TEXT_FILE = 'default_practice.txt';
export const DEFAULT_PRACTICED_FILE = 'practiced_words.txt';
export const MAX_POSITIONAL_ARGS = 3;

export interface AppConfig {
  textPath: string;
  // Omitted lists switch off the selection tiers that need them.
  vocabularyPath?: string;
  highFrequencyPath?: string;
  practicedLogPath: string;
  color: boolean;
}

/**
 * Build the run configuration from positional arguments
 * (`[text] [vocabulary] [high-frequency]`) and environment variables.
 */
export function loadConfig(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  if (args.length > MAX_POSITIONAL_ARGS) {
    throw new UsageError(USAGE);
  }

  const [textArg, vocabularyPath, highFrequencyPath] = args;

  return {
    textPath: textArg || env.CLOZE_DRILL_DEFAULT_TEXT || DEFAULT_TEXT_FILE,
    vocabularyPath,
    highFrequencyPath,
    practicedLogPath: env.CLOZE_DRILL_PRACTICED_FILE || DEFAULT_PRACTICED_FILE,
    color: !env.NO_COLOR,
  };
}
