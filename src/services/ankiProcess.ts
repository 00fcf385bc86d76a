import { execFile, spawn, type ChildProcess } from 'child_process';
import { once } from 'events';
import { setTimeout as delay } from 'timers/promises';
import { promisify } from 'util';
import type { AnkiProcessConfig } from '../config.js';

const execFileAsync = promisify(execFile);

// Anki runs headless: no display, no GPU
export const OFFSCREEN_ENV: Record<string, string> = {
  QT_QPA_PLATFORM: 'offscreen',
  QTWEBENGINE_DISABLE_SANDBOX: '1',
  QTWEBENGINE_CHROMIUM_FLAGS: '--disable-gpu --disable-software-rasterizer --disable-dev-shm-usage',
};

export type StopOutcome = 'exited' | 'terminated' | 'killed';

/** An Anki process this tool started */
export interface LaunchedApp {
  readonly pid: number | undefined;
  /** Set when the executable could not be started */
  spawnError(): Error | undefined;
  isAlive(): boolean;
  /** SIGTERM, then SIGKILL if it is still running after `timeoutMs` */
  stop(timeoutMs: number): Promise<StopOutcome>;
}

export interface AnkiHost {
  isRunning(): Promise<boolean>;
  launch(): LaunchedApp;
}

class ChildApp implements LaunchedApp {
  private error: Error | undefined;

  constructor(private readonly child: ChildProcess) {
    child.on('error', (error) => {
      this.error = error;
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  spawnError(): Error | undefined {
    return this.error;
  }

  isAlive(): boolean {
    return this.error === undefined && this.child.exitCode === null && this.child.signalCode === null;
  }

  async stop(timeoutMs: number): Promise<StopOutcome> {
    if (!this.isAlive()) {
      return 'exited';
    }

    this.child.kill('SIGTERM');
    if (await this.waitForExit(timeoutMs)) {
      return 'terminated';
    }

    console.log('Force killing Anki process');
    this.child.kill('SIGKILL');
    await this.waitForExit(timeoutMs);
    return 'killed';
  }

  private async waitForExit(timeoutMs: number): Promise<boolean> {
    if (!this.isAlive()) {
      return true;
    }
    const controller = new AbortController();
    try {
      return await Promise.race([
        once(this.child, 'exit', { signal: controller.signal }).then(() => true),
        delay(timeoutMs, false, { signal: controller.signal }),
      ]);
    } finally {
      controller.abort();
    }
  }
}

export class SystemAnkiHost implements AnkiHost {
  constructor(private readonly config: AnkiProcessConfig) {}

  /** pgrep exits 1 when nothing matches; a missing pgrep also counts as "not running" */
  async isRunning(): Promise<boolean> {
    try {
      await execFileAsync('pgrep', ['-x', this.config.processName]);
      return true;
    } catch {
      return false;
    }
  }

  launch(): LaunchedApp {
    const child = spawn(this.config.command, [], {
      env: { ...process.env, ...OFFSCREEN_ENV },
      stdio: 'ignore',
    });
    return new ChildApp(child);
  }
}
