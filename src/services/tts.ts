import textToSpeech from '@google-cloud/text-to-speech';
import { ElevenLabsClient } from '@elevenlabs/elevenlabs-js';
import type { AppConfig, ElevenLabsConfig, ElevenLabsOutputFormat, GoogleTtsConfig } from '../config.js';
import { ConfigError } from '../errors.js';

export interface SpeechSynthesizer {
  readonly description: string;
  synthesize(text: string): Promise<Uint8Array>;
}

export interface ElevenLabsSpeechRequest {
  text: string;
  modelId: string;
  outputFormat: ElevenLabsOutputFormat;
  voiceSettings: { stability: number; style: number };
}

export interface ElevenLabsSpeechClient {
  convert(voiceId: string, request: ElevenLabsSpeechRequest): Promise<ReadableStream<Uint8Array>>;
}

function createElevenLabsClient(apiKey: string): ElevenLabsSpeechClient {
  const client = new ElevenLabsClient({ apiKey });
  return {
    convert: (voiceId, request) => client.textToSpeech.convert(voiceId, request),
  };
}

async function collect(stream: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  const reader = stream.getReader();
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    chunks.push(value);
  }
  return Buffer.concat(chunks);
}

export class ElevenLabsSynthesizer implements SpeechSynthesizer {
  private readonly client: ElevenLabsSpeechClient;

  constructor(
    private readonly settings: ElevenLabsConfig & { apiKey: string },
    client?: ElevenLabsSpeechClient
  ) {
    this.client = client ?? createElevenLabsClient(settings.apiKey);
  }

  get description(): string {
    return `ElevenLabs voice ${this.settings.voiceId} (${this.settings.outputFormat})`;
  }

  async synthesize(text: string): Promise<Uint8Array> {
    const { voiceId, modelId, outputFormat, stability, style } = this.settings;
    const stream = await this.client.convert(voiceId, {
      text,
      modelId,
      outputFormat,
      voiceSettings: { stability, style },
    });

    const audio = await collect(stream);
    if (audio.length === 0) {
      throw new Error('ElevenLabs returned no audio');
    }
    return audio;
  }
}

export interface GoogleSpeechRequest {
  input: { text: string };
  voice: { languageCode: string; name: string };
  audioConfig: { audioEncoding: 'MP3'; speakingRate?: number };
}

export interface GoogleSpeechClient {
  synthesize(request: GoogleSpeechRequest): Promise<{ audioContent?: Uint8Array | string | null }>;
}

function createGoogleClient(keyFilename: string | undefined): GoogleSpeechClient {
  const client = new textToSpeech.TextToSpeechClient(keyFilename ? { keyFilename } : {});
  return {
    async synthesize(request) {
      const [response] = await client.synthesizeSpeech(request);
      return response;
    },
  };
}

export class GoogleSynthesizer implements SpeechSynthesizer {
  private readonly client: GoogleSpeechClient;

  constructor(
    private readonly settings: GoogleTtsConfig,
    client?: GoogleSpeechClient
  ) {
    this.client = client ?? createGoogleClient(settings.keyFilename);
  }

  get description(): string {
    return `Google Cloud voice ${this.settings.voiceName}`;
  }

  async synthesize(text: string): Promise<Uint8Array> {
    const response = await this.client.synthesize({
      input: { text },
      voice: {
        languageCode: this.settings.languageCode,
        name: this.settings.voiceName,
      },
      audioConfig: {
        audioEncoding: 'MP3',
        speakingRate: 0.9, // Slightly slower for learners
      },
    });

    const { audioContent } = response;
    if (!audioContent || audioContent.length === 0) {
      throw new Error('Google Text-to-Speech returned no audio');
    }
    return typeof audioContent === 'string' ? Buffer.from(audioContent, 'base64') : audioContent;
  }
}

export function createSynthesizer(tts: AppConfig['tts']): SpeechSynthesizer {
  if (tts.provider === 'google') {
    return new GoogleSynthesizer(tts.google);
  }

  const { apiKey } = tts.elevenLabs;
  if (!apiKey) {
    throw new ConfigError('ELEVENLABS_API_KEY is not set. Export it or add it to .env before running the generator.');
  }
  return new ElevenLabsSynthesizer({ ...tts.elevenLabs, apiKey });
}
