import { loadConfig, withEnvFile } from '../config.js';
import { AnkiConnect } from '../services/ankiConnect.js';
import { SystemAnkiHost } from '../services/ankiProcess.js';
import { AnkiSession } from '../services/session.js';
import { ProgressStore } from '../services/vocabulary.js';
import { DesktopNotifier } from '../services/notifier.js';
import { runDailyImport } from '../services/importer.js';
import { errorMessage } from '../errors.js';

async function addDailyWords(): Promise<number> {
  const config = loadConfig(withEnvFile());
  const anki = new AnkiConnect(config.ankiConnect);
  const session = new AnkiSession(anki, new SystemAnkiHost(config.anki), config.anki);

  // Interrupted runs still sync and stop an Anki they started
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      console.log(`\nReceived ${signal}`);
      session
        .close()
        .catch((error: unknown) => console.error(`Cleanup failed: ${errorMessage(error)}`))
        .finally(() => process.exit(130));
    });
  }

  return runDailyImport({
    config,
    anki,
    session,
    store: new ProgressStore(config.progressPath, config.vocabularyPath),
    notifier: new DesktopNotifier({ appName: config.notificationApp, logPath: config.logPath }),
  });
}

addDailyWords()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
