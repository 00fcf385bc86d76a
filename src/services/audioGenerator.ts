import fs from 'fs';
import type { GenerationSummary, VocabularyEntry } from '../shared/types.js';
import type { SpeechSynthesizer } from './tts.js';
import { audioFileName, audioPath, hasAudio } from './audio.js';
import { ConfigError, errorMessage } from '../errors.js';

/**
 * Render the Arabic text of every entry that has no audio file yet.
 * A failed entry is counted and left for the next run; it never stops the batch.
 */
export async function generateAudioFiles(
  words: readonly VocabularyEntry[],
  synthesizer: SpeechSynthesizer,
  audioDir: string
): Promise<GenerationSummary> {
  if (!fs.existsSync(audioDir)) {
    fs.mkdirSync(audioDir, { recursive: true });
  }

  const total = words.length;
  let successful = 0;
  let skipped = 0;
  let failed = 0;

  for (const word of words) {
    const label = `[${String(word.index).padStart(3, '0')}/${total}]`;
    const fileName = audioFileName(word.index);

    if (hasAudio(audioDir, word.index)) {
      console.log(`${label} Skipping (already exists): ${word.arabic}`);
      skipped++;
      continue;
    }

    try {
      const audio = await synthesizer.synthesize(word.arabic);
      fs.writeFileSync(audioPath(audioDir, word.index), audio);
      console.log(`${label} Generated: ${word.arabic} -> ${fileName}`);
      successful++;
    } catch (error) {
      console.error(`${label} FAILED: ${word.arabic} - ${errorMessage(error)}`);
      failed++;
    }
  }

  return { successful, skipped, failed, total };
}

export interface IndexRange {
  start?: number;
  end?: number;
}

function indexArg(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/** `--start=N` and `--end=N`, both inclusive vocabulary indexes */
export function parseIndexRange(args: readonly string[]): IndexRange {
  const range: IndexRange = {};

  for (const arg of args) {
    if (arg.startsWith('--start=')) {
      range.start = indexArg('--start', arg.slice('--start='.length));
    } else if (arg.startsWith('--end=')) {
      range.end = indexArg('--end', arg.slice('--end='.length));
    }
  }

  return range;
}

export function selectIndexRange(
  words: readonly VocabularyEntry[],
  { start = 1, end = Infinity }: IndexRange
): VocabularyEntry[] {
  return words.filter((word) => word.index >= start && word.index <= end);
}
