import { loadConfig, withEnvFile } from '../config.js';
import { loadVocabulary } from '../services/vocabulary.js';
import { createSynthesizer } from '../services/tts.js';
import { generateAudioFiles, parseIndexRange, selectIndexRange } from '../services/audioGenerator.js';
import { FatalError, errorMessage } from '../errors.js';

async function generateAudioForAllWords(args: string[]): Promise<void> {
  const range = parseIndexRange(args);
  const config = loadConfig(withEnvFile());
  const synthesizer = createSynthesizer(config.tts);

  const vocabulary = loadVocabulary(config.vocabularyPath);
  const words = selectIndexRange(vocabulary, range);

  console.log(`Generating audio for ${words.length} of ${vocabulary.length} vocabulary words...`);
  console.log(`Voice: ${synthesizer.description}`);
  console.log(`Output directory: ${config.audioDir}`);
  console.log('-'.repeat(60));

  const summary = await generateAudioFiles(words, synthesizer, config.audioDir);

  console.log('-'.repeat(60));
  console.log('Complete!');
  console.log(`  Successful: ${summary.successful}`);
  console.log(`  Skipped (already exists): ${summary.skipped}`);
  console.log(`  Failed: ${summary.failed}`);
  console.log(`  Total: ${summary.total}`);
}

generateAudioForAllWords(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  if (!(error instanceof FatalError)) {
    console.error(error);
  }
  process.exitCode = 1;
});
