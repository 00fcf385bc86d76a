import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { AnkiSession } from './session.js';
import type { AnkiProcessConfig } from '../config.js';
import { FakeAnki } from '../testing/fakeAnki.js';
import { FakeHost } from '../testing/fakeHost.js';
import { AvailabilityError, ConfigError } from '../errors.js';

const config: AnkiProcessConfig = {
  command: 'anki',
  processName: 'anki',
  startupAttempts: 5,
  existingProcessAttempts: 3,
  pollIntervalMs: 1000,
  settleMs: 5000,
  syncGraceMs: 1000,
  terminateTimeoutMs: 5000,
};

describe('AnkiSession', () => {
  let anki: FakeAnki;
  let host: FakeHost;
  let sleeps: number[];
  const wait = async (ms: number) => {
    sleeps.push(ms);
  };

  beforeEach(() => {
    anki = new FakeAnki();
    host = new FakeHost();
    sleeps = [];
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('open', () => {
    it('proceeds immediately when AnkiConnect already answers', async () => {
      const session = new AnkiSession(anki, host, config, wait);

      await session.open();

      expect(session.startedAnki).toBe(false);
      expect(host.launches).toEqual([]);
      expect(sleeps).toEqual([]);
    });

    it('waits for an Anki process that is already starting', async () => {
      anki.ready = false;
      host.running = true;
      let checks = 0;
      vi.spyOn(anki, 'isReady').mockImplementation(async () => ++checks >= 3);
      const session = new AnkiSession(anki, host, config, wait);

      await session.open();

      expect(session.startedAnki).toBe(false);
      expect(host.launches).toEqual([]);
      // one probe before polling, then two polls
      expect(sleeps).toEqual([1000, 1000]);
    });

    it('fails when a running Anki never answers', async () => {
      anki.ready = false;
      host.running = true;
      const session = new AnkiSession(anki, host, config, wait);

      await expect(session.open()).rejects.toThrow(AvailabilityError);
      expect(sleeps).toEqual([1000, 1000, 1000]);
      expect(host.launches).toEqual([]);
    });

    it('launches Anki, polls until ready and waits for it to settle', async () => {
      anki.ready = false;
      let polls = 0;
      const isReady = vi.spyOn(anki, 'isReady').mockImplementation(async () => polls++ >= 2);
      const session = new AnkiSession(anki, host, config, wait);

      await session.open();

      expect(host.launches).toHaveLength(1);
      expect(session.startedAnki).toBe(true);
      expect(isReady).toHaveBeenCalledTimes(3);
      expect(sleeps).toEqual([1000, 1000, 5000]);
    });

    it('fails after the startup budget and still stops the launched process', async () => {
      anki.ready = false;
      const session = new AnkiSession(anki, host, config, wait);

      await expect(session.open()).rejects.toThrow(
        'Anki started but AnkiConnect did not respond within 5s'
      );
      expect(sleeps).toEqual([1000, 1000, 1000, 1000, 1000]);

      await session.close();
      expect(host.launches[0].stops).toEqual([5000]);
    });

    it('reports a missing executable as a configuration error', async () => {
      anki.ready = false;
      host.onLaunch = (app) => {
        app.alive = false;
        app.error = Object.assign(new Error('spawn anki ENOENT'), { code: 'ENOENT' });
      };
      const session = new AnkiSession(anki, host, config, wait);

      await expect(session.open()).rejects.toThrow(ConfigError);
      await expect(session.open()).rejects.toThrow('Anki executable not found (anki). Is Anki installed?');
    });

    it('stops polling when the launched process exits', async () => {
      anki.ready = false;
      host.onLaunch = (app) => {
        app.alive = false;
      };
      const session = new AnkiSession(anki, host, config, wait);

      await expect(session.open()).rejects.toThrow('Anki exited before AnkiConnect became available');
      expect(sleeps).toEqual([1000]);
    });
  });

  describe('close', () => {
    async function launchedSession(): Promise<AnkiSession> {
      anki.ready = false;
      host.onLaunch = () => {
        anki.ready = true;
      };
      const session = new AnkiSession(anki, host, config, wait);
      await session.open();
      sleeps = [];
      return session;
    }

    it('syncs then terminates an Anki it started', async () => {
      const session = await launchedSession();

      await session.close();

      expect(anki.syncs).toBe(1);
      expect(sleeps).toEqual([1000]);
      expect(host.launches[0].stops).toEqual([5000]);
    });

    it('terminates even when the sync fails', async () => {
      const session = await launchedSession();
      vi.spyOn(anki, 'sync').mockRejectedValue(new Error('sync failed'));

      await expect(session.close()).resolves.toBeUndefined();
      expect(host.launches[0].stops).toEqual([5000]);
    });

    it('only cleans up once', async () => {
      const session = await launchedSession();

      await session.close();
      await session.close();

      expect(anki.syncs).toBe(1);
      expect(host.launches[0].stops).toEqual([5000]);
    });

    it('leaves an Anki it did not start untouched', async () => {
      const session = new AnkiSession(anki, host, config, wait);
      await session.open();

      await session.close();

      expect(anki.syncs).toBe(0);
      expect(anki.actions).toEqual([]);
    });
  });
});
