import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { generateAudioFiles, parseIndexRange, selectIndexRange } from './audioGenerator.js';
import { ConfigError } from '../errors.js';
import { audioFileName } from './audio.js';
import type { SpeechSynthesizer } from './tts.js';
import type { VocabularyEntry } from '../shared/types.js';

const words: VocabularyEntry[] = [
  { index: 1, english: 'hello', arabic: 'مرحبا', pronunciation: 'marḥaba' },
  { index: 2, english: 'thank you', arabic: 'شكراً', pronunciation: 'shukran' },
  { index: 3, english: 'yes', arabic: 'إي', pronunciation: 'ee' },
  { index: 4, english: 'no', arabic: 'لأ', pronunciation: "la'" },
];

function fakeSynthesizer(fail: (text: string) => boolean = () => false) {
  const synthesize = vi.fn(async (text: string) => {
    if (fail(text)) {
      throw new Error('quota exceeded');
    }
    return new TextEncoder().encode(`audio:${text}`);
  });
  const synthesizer: SpeechSynthesizer = { description: 'fake', synthesize };
  return { synthesizer, synthesize };
}

describe('audioFileName', () => {
  it('zero-pads the index to three digits', () => {
    expect(audioFileName(1)).toBe('001.mp3');
    expect(audioFileName(42)).toBe('042.mp3');
    expect(audioFileName(250)).toBe('250.mp3');
    expect(audioFileName(1234)).toBe('1234.mp3');
  });
});

describe('generateAudioFiles', () => {
  let audioDir: string;

  beforeEach(() => {
    audioDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'audio-')), 'audio');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(path.dirname(audioDir), { recursive: true, force: true });
  });

  it('creates the output directory and writes one file per entry', async () => {
    const { synthesizer, synthesize } = fakeSynthesizer();

    const summary = await generateAudioFiles(words, synthesizer, audioDir);

    expect(summary).toEqual({ successful: 4, skipped: 0, failed: 0, total: 4 });
    expect(synthesize.mock.calls.map(([text]) => text)).toEqual(['مرحبا', 'شكراً', 'إي', 'لأ']);
    expect(fs.readdirSync(audioDir).sort()).toEqual(['001.mp3', '002.mp3', '003.mp3', '004.mp3']);
    expect(fs.readFileSync(path.join(audioDir, '002.mp3'), 'utf-8')).toBe('audio:شكراً');
  });

  it('does not call the service for an existing file and keeps its bytes', async () => {
    fs.mkdirSync(audioDir, { recursive: true });
    fs.writeFileSync(path.join(audioDir, '003.mp3'), 'original take');
    const { synthesizer, synthesize } = fakeSynthesizer();

    const summary = await generateAudioFiles(words, synthesizer, audioDir);

    expect(summary).toEqual({ successful: 3, skipped: 1, failed: 0, total: 4 });
    expect(synthesize).not.toHaveBeenCalledWith('إي');
    expect(fs.readFileSync(path.join(audioDir, '003.mp3'), 'utf-8')).toBe('original take');
  });

  it('counts failures and carries on with the rest', async () => {
    const { synthesizer } = fakeSynthesizer((text) => text === 'شكراً');

    const summary = await generateAudioFiles(words, synthesizer, audioDir);

    expect(summary).toEqual({ successful: 3, skipped: 0, failed: 1, total: 4 });
    expect(fs.existsSync(path.join(audioDir, '002.mp3'))).toBe(false);
    expect(fs.existsSync(path.join(audioDir, '004.mp3'))).toBe(true);
  });

  it('retries a previously failed entry on the next run', async () => {
    await generateAudioFiles(words, fakeSynthesizer((text) => text === 'شكراً').synthesizer, audioDir);
    const { synthesizer, synthesize } = fakeSynthesizer();

    const summary = await generateAudioFiles(words, synthesizer, audioDir);

    expect(summary).toEqual({ successful: 1, skipped: 3, failed: 0, total: 4 });
    expect(synthesize).toHaveBeenCalledTimes(1);
    expect(synthesize).toHaveBeenCalledWith('شكراً');
  });
});

describe('parseIndexRange', () => {
  it('reads inclusive start and end indexes', () => {
    expect(parseIndexRange(['--start=2', '--end=3'])).toEqual({ start: 2, end: 3 });
    expect(parseIndexRange([])).toEqual({});
  });

  it('rejects an index that is not a positive integer', () => {
    expect(() => parseIndexRange(['--start=abc'])).toThrow('--start must be a positive integer, got "abc"');
    expect(() => parseIndexRange(['--end='])).toThrow(ConfigError);
    expect(() => parseIndexRange(['--end=0'])).toThrow(ConfigError);
  });
});

describe('selectIndexRange', () => {
  it('keeps the words whose index falls inside the range', () => {
    expect(selectIndexRange(words, { start: 2, end: 3 }).map((word) => word.index)).toEqual([2, 3]);
    expect(selectIndexRange(words, { start: 3 }).map((word) => word.index)).toEqual([3, 4]);
    expect(selectIndexRange(words, {})).toEqual(words);
  });
});
