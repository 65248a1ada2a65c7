import { nanoid } from 'nanoid';
import { SerialQueue } from '../utils/serial-queue.js';
import type { EngineHandle } from './engine.js';
import type { Profile } from './profiles.js';

export type SessionState = 'created' | 'active' | 'idle' | 'closed';

export interface SessionCreateOptions {
  headless?: boolean;
  /** `'auto'` for a fresh profile, a path, or omitted for the canonical one. */
  profileDir?: string;
}

export interface SessionInfo {
  id: string;
  state: SessionState;
  headless: boolean;
  profileDir: string;
  createdAt: number;
  lastActivity: number;
  snapshotGeneration: number;
}

/**
 * One isolated browser profile and the engine running it.
 *
 * ```
 * created ──► active ◄──► idle
 *    └──────────┴──────────┴──► closed
 * ```
 */
export class Session {
  readonly id: string;
  readonly handle: EngineHandle;
  readonly profile: Profile;
  readonly headless: boolean;
  readonly queue = new SerialQueue();
  readonly createdAt: number;
  lastActivity: number;
  private _state: SessionState = 'created';

  constructor(handle: EngineHandle, profile: Profile, headless: boolean, id: string = nanoid()) {
    this.id = id;
    this.handle = handle;
    this.profile = profile;
    this.headless = headless;
    this.createdAt = Date.now();
    this.lastActivity = this.createdAt;
  }

  get state(): SessionState {
    return this._state;
  }

  get isClosed(): boolean {
    return this._state === 'closed';
  }

  /** Record activity; wakes an idle session. */
  touch(): void {
    if (this._state === 'closed') return;
    this.lastActivity = Date.now();
    this._state = 'active';
  }

  markIdle(): void {
    if (this._state === 'active') this._state = 'idle';
  }

  markClosed(): void {
    this._state = 'closed';
  }

  inactiveFor(now: number = Date.now()): number {
    return now - this.lastActivity;
  }

  isExpired(timeoutMs: number, now: number = Date.now()): boolean {
    return this.inactiveFor(now) > timeoutMs;
  }

  info(): SessionInfo {
    return {
      id: this.id,
      state: this._state,
      headless: this.headless,
      profileDir: this.profile.path,
      createdAt: this.createdAt,
      lastActivity: this.lastActivity,
      snapshotGeneration: this.handle.generation,
    };
  }
}
