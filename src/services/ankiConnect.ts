import type { Note, NoteTypeDefinition } from '../shared/types.js';
import type { AnkiConnectConfig } from '../config.js';
import { AnkiConnectError, errorMessage } from '../errors.js';

export type FetchFn = typeof fetch;

/** The AnkiConnect actions this project relies on */
export interface AnkiApi {
  isReady(): Promise<boolean>;
  version(): Promise<number>;
  deckNames(): Promise<string[]>;
  createDeck(deck: string): Promise<void>;
  modelNames(): Promise<string[]>;
  createModel(model: NoteTypeDefinition): Promise<void>;
  /** Returns the filename Anki stored the media under */
  storeMediaFile(filename: string, base64Data: string): Promise<string>;
  /** Returns the id of the created note */
  addNote(note: Note): Promise<number>;
  sync(): Promise<void>;
}

// AnkiConnect has no error codes, only messages like
// "cannot create note because it is a duplicate"
const DUPLICATE_PATTERN = /duplicate/i;

export function classifyActionError(message: string): 'duplicate' | 'action' {
  return DUPLICATE_PATTERN.test(message) ? 'duplicate' : 'action';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export class AnkiConnect implements AnkiApi {
  constructor(
    private readonly config: AnkiConnectConfig,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  /**
   * Call an AnkiConnect action and return its `result`.
   * A non-null `error` in the response becomes an AnkiConnectError.
   */
  async invoke(
    action: string,
    params: Record<string, unknown> = {},
    timeoutMs: number = this.config.timeoutMs
  ): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchFn(this.config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ action, version: this.config.version, params }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new AnkiConnectError('unreachable', `Failed to connect to AnkiConnect: ${errorMessage(error)}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new AnkiConnectError(
        'protocol',
        `AnkiConnect returned an unreadable response to "${action}" (HTTP ${response.status}): ${errorMessage(error)}`
      );
    }

    if (!isRecord(body) || !('result' in body) || !('error' in body)) {
      throw new AnkiConnectError(
        'protocol',
        `AnkiConnect response to "${action}" is missing "result" or "error"`
      );
    }

    if (body.error !== null && body.error !== undefined) {
      const message = String(body.error);
      throw new AnkiConnectError(classifyActionError(message), `AnkiConnect error: ${message}`);
    }

    return body.result;
  }

  async isReady(): Promise<boolean> {
    try {
      await this.invoke('version', {}, this.config.probeTimeoutMs);
      return true;
    } catch {
      return false;
    }
  }

  async version(): Promise<number> {
    const result = await this.invoke('version');
    if (typeof result !== 'number') {
      throw this.unexpected('version', result);
    }
    return result;
  }

  async deckNames(): Promise<string[]> {
    return this.stringList('deckNames');
  }

  async createDeck(deck: string): Promise<void> {
    await this.invoke('createDeck', { deck });
  }

  async modelNames(): Promise<string[]> {
    return this.stringList('modelNames');
  }

  async createModel(model: NoteTypeDefinition): Promise<void> {
    await this.invoke('createModel', { ...model });
  }

  async storeMediaFile(filename: string, base64Data: string): Promise<string> {
    const result = await this.invoke('storeMediaFile', { filename, data: base64Data });
    // Older AnkiConnect releases return null instead of the stored name
    if (result === null) return filename;
    if (typeof result !== 'string') {
      throw this.unexpected('storeMediaFile', result);
    }
    return result;
  }

  async addNote(note: Note): Promise<number> {
    const result = await this.invoke('addNote', { note });
    if (typeof result !== 'number') {
      throw this.unexpected('addNote', result);
    }
    return result;
  }

  async sync(): Promise<void> {
    await this.invoke('sync');
  }

  private async stringList(action: string): Promise<string[]> {
    const result = await this.invoke(action);
    if (!isStringArray(result)) {
      throw this.unexpected(action, result);
    }
    return result;
  }

  private unexpected(action: string, result: unknown): AnkiConnectError {
    return new AnkiConnectError(
      'protocol',
      `Unexpected result from AnkiConnect "${action}": ${JSON.stringify(result)}`
    );
  }
}
