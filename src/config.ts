import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { ConfigError } from './errors.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const defaultDataDir = path.join(__dirname, '../data');
export const defaultEnvPath = path.join(__dirname, '../.env');

export type TtsProvider = 'elevenlabs' | 'google';

// MP3 encodings ElevenLabs offers; the files are saved as .mp3
export type ElevenLabsOutputFormat =
  | 'mp3_22050_32'
  | 'mp3_44100_64'
  | 'mp3_44100_96'
  | 'mp3_44100_128'
  | 'mp3_44100_192';

export interface ElevenLabsConfig {
  apiKey: string | undefined;
  voiceId: string;
  modelId: string;
  outputFormat: ElevenLabsOutputFormat;
  stability: number;
  style: number;
}

export interface GoogleTtsConfig {
  keyFilename: string | undefined;
  languageCode: string;
  voiceName: string;
}

export interface AnkiConnectConfig {
  url: string;
  version: number;
  timeoutMs: number;
  probeTimeoutMs: number;
}

export interface AnkiProcessConfig {
  command: string;
  processName: string;
  startupAttempts: number;
  existingProcessAttempts: number;
  pollIntervalMs: number;
  settleMs: number;
  syncGraceMs: number;
  terminateTimeoutMs: number;
}

export interface AppConfig {
  vocabularyPath: string;
  progressPath: string;
  cssPath: string;
  logPath: string;
  audioDir: string;
  wordsPerDay: number;
  deckName: string;
  modelName: string;
  tags: readonly string[];
  notificationApp: string;
  ankiConnect: AnkiConnectConfig;
  anki: AnkiProcessConfig;
  tts: {
    provider: TtsProvider;
    elevenLabs: ElevenLabsConfig;
    google: GoogleTtsConfig;
  };
}

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function ttsProvider(raw: string | undefined): TtsProvider {
  if (raw === undefined || raw === '' || raw === 'elevenlabs') return 'elevenlabs';
  if (raw === 'google') return 'google';
  throw new ConfigError(`Unknown TTS_PROVIDER "${raw}" (expected "elevenlabs" or "google")`);
}

/** Variables from a `.env` file fill in whatever the environment leaves unset */
export function withEnvFile(env: Env = process.env, envPath: string = defaultEnvPath): Env {
  if (!fs.existsSync(envPath)) {
    return env;
  }
  return { ...dotenv.parse(fs.readFileSync(envPath)), ...env };
}

/**
 * Build the configuration from environment variables.
 * Everything a component needs is passed in from here; nothing reads process.env later.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const dataDir = env.LEVANTINE_DATA_DIR || defaultDataDir;
  const command = env.ANKI_COMMAND || 'anki';

  const config: AppConfig = {
    vocabularyPath: path.join(dataDir, 'levantine_vocabulary.json'),
    progressPath: path.join(dataDir, 'remaining_words.json'),
    cssPath: path.join(dataDir, 'anki_card_style.css'),
    logPath: path.join(dataDir, 'notifs.log'),
    audioDir: env.LEVANTINE_AUDIO_DIR || path.join(dataDir, 'audio'),
    wordsPerDay: positiveInt(env, 'WORDS_PER_DAY', 10),
    deckName: env.ANKI_DECK || 'Arabic',
    modelName: 'Arabic-Bidirectional-v2',
    tags: Object.freeze(['arabic', 'levantine']),
    notificationApp: 'Anki Arabic',
    ankiConnect: Object.freeze({
      url: env.ANKI_CONNECT_URL || 'http://localhost:8765',
      version: 6,
      timeoutMs: 10_000,
      probeTimeoutMs: 1_000,
    }),
    anki: Object.freeze({
      command,
      processName: path.basename(command),
      startupAttempts: 30,
      existingProcessAttempts: 10,
      pollIntervalMs: 1_000,
      settleMs: 5_000, // offscreen Anki answers "version" before its collection is loaded
      syncGraceMs: 1_000,
      terminateTimeoutMs: 5_000,
    }),
    tts: Object.freeze({
      provider: ttsProvider(env.TTS_PROVIDER),
      elevenLabs: Object.freeze({
        apiKey: env.ELEVENLABS_API_KEY || undefined,
        voiceId: 'drMurExmkWVIH5nW8snR',
        modelId: 'eleven_flash_v2_5',
        outputFormat: 'mp3_44100_128',
        stability: 1.0,
        style: 0.0,
      }),
      google: Object.freeze({
        keyFilename: env.GOOGLE_APPLICATION_CREDENTIALS || undefined,
        languageCode: 'ar-XA',
        voiceName: env.GOOGLE_TTS_VOICE || 'ar-XA-Wavenet-B',
      }),
    }),
  };

  return Object.freeze(config);
}
