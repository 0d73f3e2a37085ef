import fs from 'node:fs';
import logger from '../utils/logger';

/**
 * Persistence used by a practice session: newline-delimited word lists, an
 * append-only practiced-word log and one integer cursor per practice text.
 * Every operation is synchronous; a read right after a write sees the write.
 */
export interface ProgressStore {
  loadWordSet(sourceId: string): Set<string>;
  appendWord(word: string, sourceId: string): void;
  loadCursor(sourceId: string): number;
  saveCursor(value: number, sourceId: string): void;
}

export const PROGRESS_SUFFIX = '.progress';

export function parseWordList(content: string): Set<string> {
  const words = new Set<string>();
  for (const line of content.split(/\r?\n/)) {
    const word = line.trim();
    if (word) words.add(word);
  }
  return words;
}

export function parseCursor(content: string): number {
  const trimmed = content.trim();
  if (!/^\d+$/.test(trimmed)) return 0;
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : 0;
}

const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === 'ENOENT';

export class FileProgressStore implements ProgressStore {
  /** Path of the cursor file kept beside a practice text. */
  static cursorPath(sourceId: string): string {
    return `${sourceId}${PROGRESS_SUFFIX}`;
  }

  private readOptional(path: string): string | null {
    try {
      return fs.readFileSync(path, 'utf8');
    } catch (error: unknown) {
      if (!isMissingFile(error)) {
        logger.warn(`Could not read ${path}, treating it as empty:`, error);
      }
      return null;
    }
  }

  loadWordSet(sourceId: string): Set<string> {
    const content = this.readOptional(sourceId);
    const words = content === null ? new Set<string>() : parseWordList(content);
    logger.debug(`Loaded ${words.size} words from ${sourceId}`);
    return words;
  }

  appendWord(word: string, sourceId: string): void {
    fs.appendFileSync(sourceId, `${word}\n`, 'utf8');
  }

  loadCursor(sourceId: string): number {
    const content = this.readOptional(FileProgressStore.cursorPath(sourceId));
    return content === null ? 0 : parseCursor(content);
  }

  saveCursor(value: number, sourceId: string): void {
    const path = FileProgressStore.cursorPath(sourceId);
    fs.writeFileSync(path, String(value), 'utf8');
    logger.debug(`Saved cursor ${value} to ${path}`);
  }
}

/** In-process store for tests and dry runs. */
export class MemoryProgressStore implements ProgressStore {
  readonly lists = new Map<string, string[]>();
  readonly cursors = new Map<string, number>();

  loadWordSet(sourceId: string): Set<string> {
    return parseWordList((this.lists.get(sourceId) ?? []).join('\n'));
  }

  appendWord(word: string, sourceId: string): void {
    const list = this.lists.get(sourceId) ?? [];
    list.push(word);
    this.lists.set(sourceId, list);
  }

  loadCursor(sourceId: string): number {
    return this.cursors.get(sourceId) ?? 0;
  }

  saveCursor(value: number, sourceId: string): void {
    this.cursors.set(sourceId, value);
  }
}
