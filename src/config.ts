import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { TOOL_NAMES, type ToolName, isToolName } from './tools/schemas.js';
import { InvalidConfigError, errorMessage } from './utils/errors.js';

export type BrowserName = 'chromium' | 'firefox' | 'webkit';

const APP_DIR = 'browser-bridge';

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envInt(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function envBool(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  return raw === 'true' || raw === '1';
}

function envList(key: string, fallback: string[]): string[] {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function envBrowser(key: string, fallback: BrowserName): BrowserName {
  const raw = process.env[key];
  if (raw === 'chromium' || raw === 'firefox' || raw === 'webkit') return raw;
  return fallback;
}

function envTools(key: string, fallback: ToolName[]): ToolName[] {
  return envList(key, fallback).filter(isToolName);
}

/**
 * Per-install root for browser profiles, following each platform's cache
 * location convention.
 */
export function defaultProfileRoot(
  platform: NodeJS.Platform = process.platform,
  environment: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
): string {
  if (platform === 'win32') {
    const base = environment.LOCALAPPDATA ?? path.win32.join(home, 'AppData', 'Local');
    return path.win32.join(base, APP_DIR, 'profiles');
  }
  if (platform === 'darwin') {
    return path.posix.join(home, 'Library', 'Caches', APP_DIR, 'profiles');
  }
  const base = environment.XDG_CACHE_HOME ?? path.posix.join(home, '.cache');
  return path.posix.join(base, APP_DIR, 'profiles');
}

export const config = {
  port: envInt('BRIDGE_PORT', 8931),
  host: env('BRIDGE_HOST', '127.0.0.1'),
  headless: envBool('BRIDGE_HEADLESS', true),
  allowedTools: envTools('BRIDGE_ALLOWED_TOOLS', [...TOOL_NAMES]),
  browser: envBrowser('BRIDGE_BROWSER', 'chromium'),
  executablePath: process.env.BRIDGE_EXECUTABLE_PATH || undefined,
  profileRoot: env('BRIDGE_PROFILE_ROOT', defaultProfileRoot()),
  maxSessions: envInt('BRIDGE_MAX_SESSIONS', 10),
  idleAfterMs: envInt('BRIDGE_IDLE_AFTER_MS', 60_000),
  sessionTimeoutMs: envInt('BRIDGE_SESSION_TIMEOUT_MS', 300_000),
  sweepIntervalMs: envInt('BRIDGE_SWEEP_INTERVAL_MS', 30_000),
  toolTimeoutMs: envInt('BRIDGE_TOOL_TIMEOUT_MS', 30_000),
  navigationTimeoutMs: envInt('BRIDGE_NAVIGATION_TIMEOUT_MS', 20_000),
  maxSnapshotNodes: envInt('BRIDGE_MAX_SNAPSHOT_NODES', 2000),
  allowedDomains: envList('BRIDGE_ALLOWED_DOMAINS', []),
  viewportWidth: envInt('BRIDGE_VIEWPORT_WIDTH', 1280),
  viewportHeight: envInt('BRIDGE_VIEWPORT_HEIGHT', 720),
  rateLimitMax: envInt('BRIDGE_RATE_LIMIT_MAX', 100),
  rateLimitWindowMs: envInt('BRIDGE_RATE_LIMIT_WINDOW_MS', 60_000),
  corsOrigins: envList('BRIDGE_CORS_ORIGINS', []),
  configFile: process.env.BRIDGE_CONFIG || undefined,
} as const;

export type Config = typeof config;

// ── Listener configuration ──────────────────────────────────────────────────

export interface ListenerConfig {
  host: string;
  port: number;
  headless: boolean;
  allowedTools: ToolName[];
}

const listenerConfigSchema = z
  .object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(0).max(65535).optional(),
    headless: z.boolean().optional(),
    allowedTools: z
      .array(z.string())
      .superRefine((names, ctx) => {
        for (const name of names) {
          if (!isToolName(name)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown tool name "${name}"` });
          }
        }
      })
      .optional(),
  })
  .strict();

/**
 * Validate an external listener configuration object and merge it over
 * `base`. Unknown keys and unknown tool names are rejected.
 */
export function resolveListenerConfig(
  raw: unknown,
  base: ListenerConfig = {
    host: config.host,
    port: config.port,
    headless: config.headless,
    allowedTools: [...config.allowedTools],
  },
): ListenerConfig {
  const parsed = listenerConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new InvalidConfigError(detail);
  }

  const { host, port, headless, allowedTools } = parsed.data;
  return {
    host: host ?? base.host,
    port: port ?? base.port,
    headless: headless ?? base.headless,
    allowedTools: allowedTools ? allowedTools.filter(isToolName) : base.allowedTools,
  };
}

export function loadListenerConfig(file: string | undefined, base?: ListenerConfig): ListenerConfig {
  if (!file) return resolveListenerConfig({}, base);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new InvalidConfigError(`cannot read ${file}: ${errorMessage(err)}`);
  }
  return resolveListenerConfig(raw, base);
}
