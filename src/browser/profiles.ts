import fs from 'node:fs/promises';
import path from 'node:path';
import { EngineLaunchError, InvalidProfileError, ProfileInUseError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const CANONICAL_PROFILE = 'default';

export interface Profile {
  path: string;
  /** Allocated for one session and deleted when it is released. */
  ephemeral: boolean;
}

/**
 * Hands out browser profile directories under one root and keeps every
 * directory exclusive to a single live session.
 *
 * - `'auto'` allocates a fresh temporary directory.
 * - `undefined` reuses the canonical per-install profile, so logins persist
 *   across runs.
 * - any other string names a directory inside the root, relative or
 *   absolute; anything resolving outside it is refused.
 */
export class ProfileAllocator {
  private readonly inUse = new Set<string>();

  constructor(readonly root: string) {}

  async acquire(profileDir?: string): Promise<Profile> {
    if (profileDir === 'auto') {
      const dir = await this.mkdtemp();
      this.inUse.add(dir);
      return { path: dir, ephemeral: true };
    }

    const dir = this.confine(profileDir ?? CANONICAL_PROFILE);
    if (this.inUse.has(dir)) {
      throw new ProfileInUseError(dir);
    }
    // Reserve before the first await so a concurrent acquire sees it.
    this.inUse.add(dir);

    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (err) {
      this.inUse.delete(dir);
      throw new EngineLaunchError(`profile directory ${dir} is not writable: ${errorMessage(err)}`);
    }

    return { path: dir, ephemeral: false };
  }

  async release(profile: Profile): Promise<void> {
    if (!this.inUse.delete(profile.path)) return;
    if (!profile.ephemeral) return;

    try {
      await fs.rm(profile.path, { recursive: true, force: true });
    } catch (err) {
      logger.warn({ err, profile: profile.path }, 'Could not remove ephemeral profile');
    }
  }

  isInUse(profilePath: string): boolean {
    return this.inUse.has(profilePath);
  }

  private confine(profileDir: string): string {
    const root = path.resolve(this.root);
    const dir = path.resolve(root, profileDir);
    const relative = path.relative(root, dir);
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new InvalidProfileError(profileDir, root);
    }
    return dir;
  }

  private async mkdtemp(): Promise<string> {
    try {
      await fs.mkdir(this.root, { recursive: true });
      return await fs.mkdtemp(path.join(this.root, 'session-'));
    } catch (err) {
      throw new EngineLaunchError(
        `cannot allocate a profile under ${this.root}: ${errorMessage(err)}`,
      );
    }
  }
}
