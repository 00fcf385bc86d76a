import fs from 'fs';
import path from 'path';
import type { VocabularyEntry } from '../shared/types.js';
import { DataError, errorMessage } from '../errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJson(filePath: string): unknown {
  const text = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DataError(`${path.basename(filePath)} is not valid JSON: ${errorMessage(error)}`);
  }
}

/**
 * Validate a parsed vocabulary list.
 * `staleHint` is appended to the message for entries without an index, which is what an
 * old-format progress store looks like.
 */
export function parseEntries(raw: unknown, source: string, staleHint = ''): VocabularyEntry[] {
  if (!Array.isArray(raw)) {
    throw new DataError(`${source} must contain a JSON array of vocabulary entries`);
  }

  const items: unknown[] = raw;
  const records = items.filter(isRecord);
  if (records.length !== items.length || records.some((item) => !('index' in item))) {
    throw new DataError(`Vocabulary missing 'index' field.${staleHint}`);
  }

  return records.map((item, position) => {
    const { index } = item;
    if (typeof index !== 'number' || !Number.isInteger(index) || index <= 0) {
      throw new DataError(`${source}: entry ${position + 1} has an invalid index ${JSON.stringify(index)}`);
    }

    const text = (field: string): string => {
      const value = item[field];
      if (typeof value !== 'string') {
        throw new DataError(`${source}: entry ${index} is missing '${field}'`);
      }
      return value;
    };

    return {
      index,
      english: text('english'),
      arabic: text('arabic'),
      pronunciation: text('pronunciation'),
    };
  });
}

export function loadVocabulary(vocabularyPath: string): VocabularyEntry[] {
  if (!fs.existsSync(vocabularyPath)) {
    throw new DataError(`Vocabulary file not found at ${vocabularyPath}`);
  }
  return parseEntries(readJson(vocabularyPath), path.basename(vocabularyPath));
}

/** The "remaining words" file: vocabulary entries not yet imported into Anki */
export class ProgressStore {
  constructor(
    readonly progressPath: string,
    private readonly vocabularyPath: string
  ) {}

  exists(): boolean {
    return fs.existsSync(this.progressPath);
  }

  /**
   * Seed the store from the static vocabulary on first use.
   * Returns true if the store was created by this call.
   */
  initialize(): boolean {
    if (this.exists()) {
      return false;
    }

    const name = path.basename(this.progressPath);
    console.log(`Creating ${name} from ${path.basename(this.vocabularyPath)}...`);
    const words = loadVocabulary(this.vocabularyPath);
    fs.copyFileSync(this.vocabularyPath, this.progressPath);
    console.log(`Initialized with ${words.length} words`);
    return true;
  }

  load(): VocabularyEntry[] {
    const name = path.basename(this.progressPath);
    return parseEntries(readJson(this.progressPath), name, ` Delete ${name} and restart to regenerate.`);
  }

  save(words: readonly VocabularyEntry[]): void {
    fs.writeFileSync(this.progressPath, JSON.stringify(words, null, 2), 'utf-8');
  }
}
