import type { AnkiProcessConfig } from '../config.js';
import type { AnkiApi } from './ankiConnect.js';
import type { AnkiHost, LaunchedApp } from './ankiProcess.js';
import { AvailabilityError, ConfigError, errorMessage } from '../errors.js';
import { sleep, waitUntil, type Sleep } from '../utils/poll.js';

function isMissingExecutable(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

/**
 * Makes AnkiConnect reachable for the duration of a run, starting Anki when needed,
 * and puts things back the way they were afterwards.
 */
export class AnkiSession {
  private launched: LaunchedApp | null = null;
  private closed = false;

  constructor(
    private readonly anki: AnkiApi,
    private readonly host: AnkiHost,
    private readonly config: AnkiProcessConfig,
    private readonly wait: Sleep = sleep
  ) {}

  /** True when this session launched Anki and is responsible for shutting it down */
  get startedAnki(): boolean {
    return this.launched !== null;
  }

  async open(): Promise<void> {
    if (await this.anki.isReady()) {
      console.log('Anki is already running');
      return;
    }

    if (await this.host.isRunning()) {
      console.log('Anki process found, waiting for AnkiConnect...');
      const attempts = this.config.existingProcessAttempts;
      if (!(await this.poll(attempts, () => this.anki.isReady()))) {
        throw new AvailabilityError(
          `Anki is running but AnkiConnect did not respond within ${this.seconds(attempts)}s. Is the AnkiConnect add-on installed?`
        );
      }
      return;
    }

    console.log('Anki is not running');
    console.log('Starting Anki...');
    const app = this.host.launch();
    // Recorded before polling so close() cleans up after a failed start too
    this.launched = app;

    const attempts = this.config.startupAttempts;
    const ready = await this.poll(attempts, async () => {
      const spawnError = app.spawnError();
      if (spawnError) {
        throw isMissingExecutable(spawnError)
          ? new ConfigError(`Anki executable not found (${this.config.command}). Is Anki installed?`)
          : new ConfigError(`Failed to start Anki: ${spawnError.message}`);
      }
      if (!app.isAlive()) {
        throw new AvailabilityError('Anki exited before AnkiConnect became available');
      }
      return this.anki.isReady();
    });

    if (!ready) {
      throw new AvailabilityError(`Anki started but AnkiConnect did not respond within ${this.seconds(attempts)}s`);
    }

    console.log(`Anki started successfully (PID: ${app.pid})`);
    console.log('Waiting for Anki to fully initialize...');
    await this.wait(this.config.settleMs);
  }

  /** Sync and stop Anki if this session started it. Safe to call more than once. */
  async close(): Promise<void> {
    const app = this.launched;
    if (!app || this.closed) {
      return;
    }
    this.closed = true;

    console.log('\nCleaning up...');
    if (app.isAlive()) {
      try {
        await this.anki.sync();
        await this.wait(this.config.syncGraceMs);
        console.log('Anki sync completed');
      } catch (error) {
        console.log(`Note: Could not sync Anki before closing: ${errorMessage(error)}`);
      }
    }

    if (app.isAlive()) {
      console.log(`Terminating Anki process (PID: ${app.pid})`);
      await app.stop(this.config.terminateTimeoutMs);
    }
  }

  private poll(attempts: number, check: () => Promise<boolean>): Promise<boolean> {
    return waitUntil(check, { attempts, intervalMs: this.config.pollIntervalMs, sleep: this.wait });
  }

  private seconds(attempts: number): number {
    return (attempts * this.config.pollIntervalMs) / 1000;
  }
}
