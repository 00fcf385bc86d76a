import { setTimeout as delay } from 'timers/promises';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};

export interface PollOptions {
  attempts: number;
  intervalMs: number;
  sleep?: Sleep;
}

/**
 * Sleep, then check, up to `attempts` times.
 * Resolves true on the first check that passes, false once attempts run out.
 */
export async function waitUntil(
  check: () => Promise<boolean>,
  { attempts, intervalMs, sleep: wait = sleep }: PollOptions
): Promise<boolean> {
  for (let attempt = 0; attempt < attempts; attempt++) {
    await wait(intervalMs);
    if (await check()) {
      return true;
    }
  }
  return false;
}
