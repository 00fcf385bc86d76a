import fs from 'fs';
import path from 'path';
import type { AppConfig } from '../config.js';
import type { ImportSummary, VocabularyEntry } from '../shared/types.js';
import type { AnkiApi } from './ankiConnect.js';
import type { Notifier } from './notifier.js';
import type { AnkiSession } from './session.js';
import type { ProgressStore } from './vocabulary.js';
import { audioFileName, audioPath } from './audio.js';
import { ensureDeck, ensureNoteType } from './noteType.js';
import { AnkiConnectError, errorMessage } from '../errors.js';
import { sample, type RandomSource } from '../utils/random.js';

// One note renders as English → Arabic and Arabic → English
const CARDS_PER_NOTE = 2;

export interface ImporterOptions {
  deckName: string;
  modelName: string;
  tags: readonly string[];
  audioDir: string;
  wordsPerDay: number;
}

export class CardImporter {
  constructor(
    private readonly anki: AnkiApi,
    private readonly store: ProgressStore,
    private readonly options: ImporterOptions,
    private readonly random: RandomSource = Math.random
  ) {}

  /**
   * Upload the entry's audio into Anki's media folder and return the field markup.
   * A missing file only costs the card its audio.
   */
  async storeAudio(index: number): Promise<string> {
    const fileName = audioFileName(index);
    const filePath = audioPath(this.options.audioDir, index);

    if (!fs.existsSync(filePath)) {
      console.warn(`Warning: Audio file not found: ${fileName}`);
      return '';
    }

    const data = fs.readFileSync(filePath).toString('base64');
    const stored = await this.anki.storeMediaFile(fileName, data);
    // Manual playback only
    return `<audio src="${stored}" controls preload="metadata"></audio>`;
  }

  async addWord(word: VocabularyEntry, audio: string): Promise<number> {
    return this.anki.addNote({
      deckName: this.options.deckName,
      modelName: this.options.modelName,
      fields: {
        English: word.english,
        Arabic: word.arabic,
        Pronunciation: word.pronunciation,
        Audio: audio,
      },
      options: {
        allowDuplicate: false,
      },
      tags: [...this.options.tags],
    });
  }

  /**
   * Import one random batch from the progress store.
   *
   * Added and duplicate words are consumed. Any other failure stops the batch: the
   * words consumed before it are still removed from the store, then the error propagates.
   */
  async importBatch(): Promise<ImportSummary> {
    const remaining = this.store.load();

    if (remaining.length === 0) {
      return { status: 'already-complete', selected: 0, wordsAdded: 0, duplicates: 0, cardsAdded: 0, remaining: 0 };
    }

    const selected = sample(remaining, this.options.wordsPerDay, this.random);
    console.log(`Randomly selected ${selected.length} words from ${remaining.length} remaining`);
    console.log('-'.repeat(50));

    const consumed = new Set<VocabularyEntry>();
    let cardsAdded = 0;
    let duplicates = 0;

    try {
      for (const word of selected) {
        const audio = await this.storeAudio(word.index);
        try {
          await this.addWord(word, audio);
          cardsAdded += CARDS_PER_NOTE;
          console.log(
            `✓ Added: ${word.english} (${word.pronunciation}) ↔ ${word.arabic} [Audio: ${audioFileName(word.index)}]`
          );
        } catch (error) {
          if (!(error instanceof AnkiConnectError) || error.code !== 'duplicate') {
            throw error;
          }
          console.log(`⊘ Skipped (duplicate): ${word.english} ↔ ${word.arabic}`);
          duplicates++;
        }
        consumed.add(word);
      }
    } catch (error) {
      if (consumed.size > 0) {
        const left = this.commit(remaining, consumed);
        console.log(`Saved progress before failing: ${consumed.size} words done, ${left.length} remaining`);
      }
      throw error;
    }

    const left = this.commit(remaining, consumed);
    return {
      status: left.length === 0 ? 'complete' : 'imported',
      selected: selected.length,
      wordsAdded: consumed.size,
      duplicates,
      cardsAdded,
      remaining: left.length,
    };
  }

  private commit(remaining: VocabularyEntry[], consumed: ReadonlySet<VocabularyEntry>): VocabularyEntry[] {
    const left = remaining.filter((word) => !consumed.has(word));
    this.store.save(left);
    return left;
  }
}

export interface DailyImportDeps {
  config: AppConfig;
  anki: AnkiApi;
  session: AnkiSession;
  store: ProgressStore;
  notifier: Notifier;
  random?: RandomSource;
}

async function report(summary: ImportSummary, deps: DailyImportDeps): Promise<void> {
  const { notifier, store, config } = deps;

  if (summary.status === 'already-complete') {
    const message = 'All words have been added to Anki! 🎉';
    console.log(`No words remaining! ${message}`);
    console.log(`To start over, delete ${path.basename(store.progressPath)}`);
    await notifier.notify('Arabic Learning Complete!', message, 'normal');
    return;
  }

  console.log('-'.repeat(50));
  console.log(`Successfully added ${summary.cardsAdded} cards (${summary.wordsAdded} words)`);
  console.log(`Remaining: ${summary.remaining} words`);

  if (summary.status === 'complete') {
    console.log('🎉 All words have been added!');
    await notifier.notify('Arabic Learning Complete!', 'All vocabulary words have been added! 🎉', 'normal');
    return;
  }

  console.log(`Next run will add ${Math.min(config.wordsPerDay, summary.remaining)} more random words`);
  await notifier.notify(
    'Arabic Words Added! 📚',
    `Added ${summary.wordsAdded} new words (${summary.cardsAdded} cards)\n${summary.remaining} words remaining`,
    'normal'
  );
}

/**
 * One scheduled run: reach Anki, provision deck and note type, import a batch, notify.
 * Resolves to the process exit code; Anki is shut down again if this run started it.
 */
export async function runDailyImport(deps: DailyImportDeps): Promise<number> {
  const { config, anki, session, store, notifier } = deps;

  try {
    await session.open();
    const version = await anki.version();
    console.log(`Connected to AnkiConnect (version ${version})`);

    await ensureDeck(anki, config.deckName);
    await ensureNoteType(anki, config.modelName, config.cssPath);
    store.initialize();

    const importer = new CardImporter(
      anki,
      store,
      {
        deckName: config.deckName,
        modelName: config.modelName,
        tags: config.tags,
        audioDir: config.audioDir,
        wordsPerDay: config.wordsPerDay,
      },
      deps.random
    );
    const summary = await importer.importBatch();
    await report(summary, deps);
    return 0;
  } catch (error) {
    const message = errorMessage(error);
    console.error(`Error: ${message}`);
    await notifier.notify('Arabic Words Error ⚠️', `Failed to add words: ${message}`, 'critical');
    return 1;
  } finally {
    await session.close();
  }
}
