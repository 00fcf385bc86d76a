export interface VocabularyEntry {
  index: number; // 1-based position in the static vocabulary, also the audio file key
  english: string;
  arabic: string;
  pronunciation: string;
}

export type Urgency = 'low' | 'normal' | 'critical';

export interface CardTemplate {
  Name: string;
  Front: string;
  Back: string;
}

export interface NoteTypeDefinition {
  modelName: string;
  inOrderFields: string[];
  css: string;
  cardTemplates: CardTemplate[];
}

export interface NoteFields {
  English: string;
  Arabic: string;
  Pronunciation: string;
  Audio: string;
}

export interface Note {
  deckName: string;
  modelName: string;
  fields: NoteFields;
  options: {
    allowDuplicate: boolean;
  };
  tags: string[];
}

export interface ImportSummary {
  status: 'already-complete' | 'imported' | 'complete';
  selected: number;
  wordsAdded: number; // includes duplicates, which count as already imported
  duplicates: number;
  cardsAdded: number;
  remaining: number;
}

export interface GenerationSummary {
  successful: number;
  skipped: number;
  failed: number;
  total: number;
}
