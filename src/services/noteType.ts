import fs from 'fs';
import type { CardTemplate, NoteTypeDefinition } from '../shared/types.js';
import type { AnkiApi } from './ankiConnect.js';
import { ConfigError } from '../errors.js';

export const NOTE_FIELDS = ['English', 'Arabic', 'Pronunciation', 'Audio'];

export const CARD_TEMPLATES: CardTemplate[] = [
  {
    Name: 'English → Arabic',
    Front: '<div class="english">{{English}}</div>',
    Back:
      '{{FrontSide}}<hr id="answer"><div class="arabic">{{Arabic}}</div>' +
      '<div class="pronunciation">{{Pronunciation}}</div><div class="audio">{{Audio}}</div>',
  },
  {
    Name: 'Arabic → English',
    Front: '<div class="arabic">{{Arabic}}</div><div class="audio">{{Audio}}</div>',
    Back:
      '{{FrontSide}}<hr id="answer"><div class="english">{{English}}</div>' +
      '<div class="pronunciation">{{Pronunciation}}</div>',
  },
];

export function loadCss(cssPath: string): string {
  if (!fs.existsSync(cssPath)) {
    throw new ConfigError(`CSS file not found: ${cssPath}`);
  }
  return fs.readFileSync(cssPath, 'utf-8');
}

export function buildNoteType(modelName: string, css: string): NoteTypeDefinition {
  return {
    modelName,
    inOrderFields: [...NOTE_FIELDS],
    css,
    cardTemplates: CARD_TEMPLATES.map((template) => ({ ...template })),
  };
}

export async function ensureDeck(anki: AnkiApi, deckName: string): Promise<boolean> {
  const decks = await anki.deckNames();
  if (decks.includes(deckName)) {
    return false;
  }
  await anki.createDeck(deckName);
  console.log(`Created deck: ${deckName}`);
  return true;
}

/**
 * Create the bidirectional note type unless a model with that name already exists.
 * The stylesheet is only read when the model has to be created.
 */
export async function ensureNoteType(anki: AnkiApi, modelName: string, cssPath: string): Promise<boolean> {
  const models = await anki.modelNames();
  if (models.includes(modelName)) {
    return false;
  }

  console.log(`Creating note type '${modelName}'...`);
  await anki.createModel(buildNoteType(modelName, loadCss(cssPath)));
  console.log(`✓ Note type created: ${modelName}`);
  return true;
}
