/**
 * Tests for SessionManager (src/browser/session-manager.ts).
 */

import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  EngineLaunchError,
  ProfileInUseError,
  SessionLimitError,
  UnknownSessionError,
} from '../../src/utils/errors.js';
import { type Harness, createHarness, deferred, handleOf } from '../helpers/fake-engine.js';

let h: Harness;

afterEach(async () => {
  await h.cleanup();
  vi.useRealTimers();
});

describe('SessionManager', () => {
  describe('createSession', () => {
    beforeEach(async () => {
      h = await createHarness({ sessions: { maxSessions: 2 } });
    });

    it('launches on the canonical profile by default', async () => {
      const session = await h.sessions.createSession();

      expect(session.state).toBe('created');
      expect(session.profile).toEqual({ path: path.join(h.root, 'default'), ephemeral: false });
      expect(h.engine.handles[0]?.profilePath).toBe(path.join(h.root, 'default'));
      expect(h.engine.handles[0]?.headless).toBe(true);
    });

    it('passes headless through to the engine', async () => {
      const session = await h.sessions.createSession({ headless: false, profileDir: 'auto' });
      expect(session.headless).toBe(false);
      expect(h.engine.handles[0]?.headless).toBe(false);
    });

    it('refuses a profile that another live session holds', async () => {
      await h.sessions.createSession();

      await expect(h.sessions.createSession()).rejects.toThrow(ProfileInUseError);
      expect(h.engine.handles).toHaveLength(1);
    });

    it('frees the profile once its session is closed', async () => {
      const first = await h.sessions.createSession();
      await h.sessions.closeSession(first.id);

      const second = await h.sessions.createSession();
      expect(second.profile.path).toBe(first.profile.path);
    });

    it('throws SessionLimitError when max sessions reached', async () => {
      await h.sessions.createSession({ profileDir: 'auto' });
      await h.sessions.createSession({ profileDir: 'auto' });

      await expect(h.sessions.createSession({ profileDir: 'auto' })).rejects.toThrow(
        'Maximum session limit reached (2)',
      );
      await expect(h.sessions.createSession({ profileDir: 'auto' })).rejects.toThrow(SessionLimitError);
    });

    it('counts launches still in progress against the limit', async () => {
      const pending = [
        h.sessions.createSession({ profileDir: 'auto' }),
        h.sessions.createSession({ profileDir: 'auto' }),
      ];

      await expect(h.sessions.createSession({ profileDir: 'auto' })).rejects.toThrow(SessionLimitError);
      await Promise.all(pending);
    });

    it('releases the profile when the engine fails to launch', async () => {
      h.engine.launchError = 'no browser binary';

      await expect(h.sessions.createSession()).rejects.toThrow(
        new EngineLaunchError('no browser binary'),
      );
      expect(h.profiles.isInUse(path.join(h.root, 'default'))).toBe(false);
      expect(h.sessions.size).toBe(0);
    });
  });

  describe('getSession and closeSession', () => {
    beforeEach(async () => {
      h = await createHarness();
    });

    it('returns a session and marks it active', async () => {
      const session = await h.sessions.createSession();
      expect(h.sessions.getSession(session.id)).toBe(session);
      expect(session.state).toBe('active');
    });

    it('throws UnknownSessionError for unknown id', () => {
      expect(() => h.sessions.getSession('nonexistent')).toThrow(UnknownSessionError);
    });

    it('closes the engine and forgets the session', async () => {
      const session = await h.sessions.createSession();
      const handle = handleOf(h, session.id);

      await h.sessions.closeSession(session.id);

      expect(handle.closed).toBe(true);
      expect(session.state).toBe('closed');
      expect(h.sessions.isClosed(session.id)).toBe(true);
      expect(() => h.sessions.getSession(session.id)).toThrow(UnknownSessionError);
    });

    it('treats a second close as a no-op', async () => {
      const session = await h.sessions.createSession();
      await h.sessions.closeSession(session.id);

      await expect(h.sessions.closeSession(session.id)).resolves.toBeUndefined();
    });

    it('keeps a repeated close a no-op after many other sessions have closed', async () => {
      const first = await h.sessions.createSession();
      await h.sessions.closeSession(first.id);

      for (let i = 0; i < 1001; i++) {
        const other = await h.sessions.createSession();
        await h.sessions.closeSession(other.id);
      }

      await expect(h.sessions.closeSession(first.id)).resolves.toBeUndefined();
      expect(h.sessions.isClosed(first.id)).toBe(true);
      expect(h.sessions.has(first.id)).toBe(false);
    });

    it('rejects closing an id that was never issued', async () => {
      await expect(h.sessions.closeSession('nonexistent')).rejects.toThrow(UnknownSessionError);
    });

    it('fails calls still queued on a closed session', async () => {
      const session = await h.sessions.createSession();
      const gate = deferred();
      handleOf(h, session.id).beforeOp = () => gate.promise;

      const running = h.dispatcher.dispatch({ tool: 'browser_snapshot', sessionId: session.id });
      const queued = h.dispatcher.dispatch({ tool: 'browser_take_screenshot', sessionId: session.id });

      await h.sessions.closeSession(session.id);
      gate.resolve();

      // The running capture is signalled and discards its result.
      const [first, second] = await Promise.all([running, queued]);
      expect(first).toMatchObject({ ok: false, error: { kind: 'UnknownSession' } });
      expect(second).toMatchObject({ ok: false, error: { kind: 'UnknownSession' } });
    });

    it('lists live sessions', async () => {
      const a = await h.sessions.createSession();
      const b = await h.sessions.createSession({ profileDir: 'auto' });

      const list = h.sessions.listSessions();
      expect(list.map((s) => s.id)).toEqual([a.id, b.id]);
      expect(list[0]).toMatchObject({
        state: 'created',
        headless: true,
        profileDir: path.join(h.root, 'default'),
        snapshotGeneration: 0,
      });
    });

    it('destroys every session', async () => {
      await h.sessions.createSession();
      await h.sessions.createSession({ profileDir: 'auto' });

      await h.sessions.destroyAll();

      expect(h.sessions.size).toBe(0);
      expect(h.engine.handles.every((handle) => handle.closed)).toBe(true);
    });
  });

  describe('idle sweep', () => {
    beforeEach(async () => {
      // Fake timers first so the sweep interval is created under them.
      vi.useFakeTimers();
      h = await createHarness({
        sessions: { idleAfterMs: 1000, sessionTimeoutMs: 5000, sweepIntervalMs: 500 },
      });
    });

    it('marks an unused session idle, then closes it', async () => {
      const session = await h.sessions.createSession();
      const handle = handleOf(h, session.id);

      await vi.advanceTimersByTimeAsync(1500);
      expect(session.state).toBe('idle');

      await vi.advanceTimersByTimeAsync(4000);
      expect(h.sessions.isClosed(session.id)).toBe(true);
      expect(handle.closed).toBe(true);
    });

    it('wakes an idle session on the next call', async () => {
      const session = await h.sessions.createSession();
      h.sessions.getSession(session.id);
      await vi.advanceTimersByTimeAsync(1500);

      h.sessions.getSession(session.id);
      expect(session.state).toBe('active');
    });

    it('never expires a session with a call in flight', async () => {
      const session = await h.sessions.createSession();
      const gate = deferred();
      handleOf(h, session.id).beforeOp = () => gate.promise;

      const call = h.dispatcher.dispatch({
        tool: 'browser_snapshot',
        sessionId: session.id,
        timeoutMs: 60_000,
      });
      await vi.advanceTimersByTimeAsync(10_000);
      expect(h.sessions.isClosed(session.id)).toBe(false);

      gate.resolve();
      expect((await call).ok).toBe(true);
    });
  });

  describe('engine faults', () => {
    beforeEach(async () => {
      h = await createHarness();
    });

    it('closes the session when its engine dies', async () => {
      const session = await h.sessions.createSession();
      handleOf(h, session.id).crash('browser context closed unexpectedly');

      expect(h.sessions.isClosed(session.id)).toBe(true);
      expect(h.sessions.size).toBe(0);
    });
  });
});
