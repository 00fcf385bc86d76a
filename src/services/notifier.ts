import fs from 'fs';
import { execFile } from 'child_process';
import { promisify } from 'util';
import type { Urgency } from '../shared/types.js';
import { errorMessage } from '../errors.js';

const execFileAsync = promisify(execFile);

/**
 * Best-effort outcome reporting. Implementations must never reject:
 * a broken notification channel has no say in how a run ends.
 */
export interface Notifier {
  notify(title: string, message: string, urgency?: Urgency): Promise<void>;
}

export type CommandRunner = (command: string, args: string[]) => Promise<void>;

const runCommand: CommandRunner = async (command, args) => {
  await execFileAsync(command, args, { timeout: 5000 });
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

// Local time, "2024-01-15 10:30:00"
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export interface DesktopNotifierOptions {
  appName: string;
  logPath: string;
  run?: CommandRunner;
  now?: () => Date;
}

/** Desktop pop-up through notify-send, plus one line appended to the notification log */
export class DesktopNotifier implements Notifier {
  private readonly run: CommandRunner;
  private readonly now: () => Date;

  constructor(private readonly options: DesktopNotifierOptions) {
    this.run = options.run ?? runCommand;
    this.now = options.now ?? (() => new Date());
  }

  async notify(title: string, message: string, urgency: Urgency = 'normal'): Promise<void> {
    try {
      await this.run('notify-send', ['-u', urgency, '-a', this.options.appName, title, message]);
    } catch (error) {
      console.warn(`Could not show desktop notification: ${errorMessage(error)}`);
    }

    try {
      const line = `[${formatTimestamp(this.now())}] ${title}: ${message}\n`;
      fs.appendFileSync(this.options.logPath, line, 'utf-8');
    } catch (error) {
      console.warn(`Could not write notification log: ${errorMessage(error)}`);
    }
  }
}
