import { nanoid } from 'nanoid';
import { config } from '../config.js';
import { SessionLimitError, UnknownSessionError, type EngineFaultError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { BrowserEngine } from './engine.js';
import type { Profile, ProfileAllocator } from './profiles.js';
import { Session, type SessionCreateOptions, type SessionInfo } from './session.js';

export interface SessionManagerOptions {
  maxSessions: number;
  /** Inactivity after which an active session is marked idle. */
  idleAfterMs: number;
  /** Inactivity after which a session is closed. */
  sessionTimeoutMs: number;
  sweepIntervalMs: number;
  defaultHeadless: boolean;
}

export class SessionManager {
  private sessions: Map<string, Session> = new Map();
  // Every closed id is kept; closing one again is a no-op.
  private closedIds: Set<string> = new Set();
  private launching = 0;
  private engine: BrowserEngine;
  private profiles: ProfileAllocator;
  private options: SessionManagerOptions;
  private cleanupInterval: ReturnType<typeof setInterval>;

  constructor(
    engine: BrowserEngine,
    profiles: ProfileAllocator,
    options: Partial<SessionManagerOptions> = {},
  ) {
    this.engine = engine;
    this.profiles = profiles;
    this.options = {
      maxSessions: options.maxSessions ?? config.maxSessions,
      idleAfterMs: options.idleAfterMs ?? config.idleAfterMs,
      sessionTimeoutMs: options.sessionTimeoutMs ?? config.sessionTimeoutMs,
      sweepIntervalMs: options.sweepIntervalMs ?? config.sweepIntervalMs,
      defaultHeadless: options.defaultHeadless ?? config.headless,
    };

    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, this.options.sweepIntervalMs);

    // Allow the process to exit even if the interval is still active
    if (this.cleanupInterval.unref) {
      this.cleanupInterval.unref();
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  async createSession(options: SessionCreateOptions = {}): Promise<Session> {
    if (this.sessions.size + this.launching >= this.options.maxSessions) {
      throw new SessionLimitError(this.options.maxSessions);
    }

    const id = nanoid();
    const headless = options.headless ?? this.options.defaultHeadless;
    let profile: Profile | undefined;

    this.launching++;
    try {
      profile = await this.profiles.acquire(options.profileDir);
      const handle = await this.engine.launch({
        profilePath: profile.path,
        headless,
        onFault: (err) => this.handleFault(id, err),
      });

      const session = new Session(handle, profile, headless, id);
      this.sessions.set(id, session);

      logger.info(
        { sessionId: id, profileDir: profile.path, headless, activeSessions: this.sessions.size },
        'Session registered',
      );

      return session;
    } catch (err) {
      if (profile) await this.profiles.release(profile);
      throw err;
    } finally {
      this.launching--;
    }
  }

  getSession(id: string): Session {
    const session = this.sessions.get(id);
    if (!session) {
      throw new UnknownSessionError(id);
    }
    session.touch();
    return session;
  }

  /**
   * Close a session and release its engine and profile. Closing an already
   * closed session is a no-op; an id that was never issued is unknown.
   */
  async closeSession(id: string, reason = 'requested'): Promise<void> {
    if (this.closedIds.has(id)) return;

    const session = this.sessions.get(id);
    if (!session) {
      throw new UnknownSessionError(id);
    }

    this.sessions.delete(id);
    this.closedIds.add(id);
    session.markClosed();
    session.queue.clear(new UnknownSessionError(id));

    try {
      await session.handle.close();
    } finally {
      await this.profiles.release(session.profile);
    }

    logger.info({ sessionId: id, reason, activeSessions: this.sessions.size }, 'Session closed');
  }

  /** Whether `id` names a live session. Does not count as activity. */
  has(id: string): boolean {
    return this.sessions.has(id);
  }

  isClosed(id: string): boolean {
    return this.closedIds.has(id);
  }

  listSessions(): SessionInfo[] {
    return [...this.sessions.values()].map((s) => s.info());
  }

  async destroyAll(): Promise<void> {
    logger.info({ count: this.sessions.size }, 'Destroying all sessions');

    const closeTasks = [...this.sessions.keys()].map((id) => this.closeSession(id, 'shutdown'));
    await Promise.allSettled(closeTasks);
  }

  stopCleanup(): void {
    clearInterval(this.cleanupInterval);
  }

  private handleFault(id: string, err: EngineFaultError): void {
    if (!this.sessions.has(id)) return;
    this.closeSession(id, `engine fault: ${err.message}`).catch((closeErr: unknown) => {
      logger.error({ sessionId: id, err: closeErr }, 'Error closing faulted session');
    });
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [id, session] of this.sessions) {
      // Busy sessions are mid-call; their activity clock restarts when it ends.
      if (session.queue.isBusy()) continue;

      if (session.isExpired(this.options.sessionTimeoutMs, now)) {
        logger.info({ sessionId: id }, 'Session expired, cleaning up');
        this.closeSession(id, 'idle timeout').catch((err: unknown) => {
          logger.error({ sessionId: id, err }, 'Error closing expired session');
        });
      } else if (session.isExpired(this.options.idleAfterMs, now)) {
        session.markIdle();
      }
    }
  }
}
