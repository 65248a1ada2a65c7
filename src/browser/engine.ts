import fs from 'node:fs/promises';
import { nanoid } from 'nanoid';
import {
  type BrowserContext,
  type BrowserType,
  type ElementHandle,
  type Page,
  chromium,
  errors,
  firefox,
  webkit,
} from 'playwright-core';
import { type BrowserName, config } from '../config.js';
import { RefTable } from '../processing/refs.js';
import { type SnapshotTree, captureTree, flattenTree, refSelector } from '../processing/snapshot.js';
import {
  AppError,
  DomainNotAllowedError,
  ElementNotInteractableError,
  EngineFaultError,
  EngineLaunchError,
  NavigationFailedError,
  NavigationTimeoutError,
  OperationCancelledError,
  OperationTimeoutError,
  errorMessage,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { isDomainAllowed, sanitizeUrl } from '../utils/sanitize.js';

// ── Engine-neutral contract ─────────────────────────────────────────────────

export interface PageInfo {
  url: string;
  title: string;
}

export type InputAction = { kind: 'click' } | { kind: 'type'; text: string; submit?: boolean };

export interface ScreenshotOptions {
  /** Lossless PNG instead of the default JPEG. */
  raw?: boolean;
}

export interface LaunchOptions {
  profilePath: string;
  headless: boolean;
  /** Called once if the engine dies without being asked to close. */
  onFault?: (err: EngineFaultError) => void;
}

/**
 * One live browser engine instance bound to one session. All engine errors
 * leave this boundary translated into {@link AppError} subclasses.
 */
export interface EngineHandle {
  readonly id: string;
  /** Generation of the latest committed snapshot; 0 before the first one. */
  readonly generation: number;
  isAlive(): boolean;
  navigate(url: string, timeoutMs: number, signal?: AbortSignal): Promise<PageInfo>;
  captureAccessibilityTree(signal?: AbortSignal): Promise<SnapshotTree>;
  dispatchInput(referenceId: string, action: InputAction, signal?: AbortSignal): Promise<void>;
  captureScreenshot(options?: ScreenshotOptions, signal?: AbortSignal): Promise<Buffer>;
  close(): Promise<void>;
}

export interface BrowserEngine {
  launch(options: LaunchOptions): Promise<EngineHandle>;
}

export function screenshotMimeType(options: ScreenshotOptions = {}): 'image/png' | 'image/jpeg' {
  return options.raw ? 'image/png' : 'image/jpeg';
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (!signal?.aborted) return;
  throw signal.reason instanceof Error ? signal.reason : new OperationCancelledError('unknown');
}

// ── Playwright implementation ───────────────────────────────────────────────

const browserTypes: Record<BrowserName, BrowserType> = {
  chromium,
  firefox,
  webkit,
};

const FATAL_PATTERN =
  /Target page, context or browser has been closed|Browser has been closed|browser has disconnected|Target closed|Page crashed/i;

// tsx/esbuild with keepNames:true wraps const assignments inside
// page.evaluate() with __name(), which doesn't exist in the browser.
const NAME_SHIM =
  "if(typeof __name==='undefined'){var __name=(t,v)=>(Object.defineProperty(t,'name',{value:v,configurable:true}),t)}";

export interface PlaywrightEngineOptions {
  browser?: BrowserName;
  executablePath?: string;
  viewport?: { width: number; height: number };
  allowedDomains?: readonly string[];
  maxSnapshotNodes?: number;
  inputTimeoutMs?: number;
}

interface HandleSettings {
  allowedDomains: readonly string[];
  maxSnapshotNodes: number;
  inputTimeoutMs: number;
}

export class PlaywrightEngine implements BrowserEngine {
  private readonly options: PlaywrightEngineOptions;

  constructor(options: PlaywrightEngineOptions = {}) {
    this.options = options;
  }

  async launch({ profilePath, headless, onFault }: LaunchOptions): Promise<EngineHandle> {
    const browserName = this.options.browser ?? config.browser;
    const browserType = browserTypes[browserName];
    const executablePath = this.options.executablePath ?? config.executablePath;

    try {
      await fs.access(profilePath, fs.constants.W_OK);
    } catch (err) {
      throw new EngineLaunchError(`profile path ${profilePath} is not writable: ${errorMessage(err)}`);
    }

    logger.info({ browser: browserName, headless, profilePath }, 'Launching browser');

    let context: BrowserContext;
    try {
      context = await browserType.launchPersistentContext(profilePath, {
        headless,
        executablePath,
        viewport: this.options.viewport ?? {
          width: config.viewportWidth,
          height: config.viewportHeight,
        },
        acceptDownloads: false,
        args:
          browserName === 'chromium' ? ['--no-sandbox', '--disable-gpu', '--disable-dev-shm-usage'] : [],
      });
    } catch (err) {
      throw new EngineLaunchError(errorMessage(err));
    }

    let page: Page;
    try {
      await context.addInitScript(NAME_SHIM);
      page = context.pages()[0] ?? (await context.newPage());
    } catch (err) {
      await context.close().catch((closeErr: unknown) => {
        logger.warn({ err: closeErr }, 'Error closing half-launched context');
      });
      throw new EngineLaunchError(errorMessage(err));
    }

    const handle = new PlaywrightHandle(
      context,
      page,
      {
        allowedDomains: this.options.allowedDomains ?? config.allowedDomains,
        maxSnapshotNodes: this.options.maxSnapshotNodes ?? config.maxSnapshotNodes,
        inputTimeoutMs: this.options.inputTimeoutMs ?? 5000,
      },
      onFault,
    );

    logger.info({ browser: browserName, handleId: handle.id }, 'Browser launched successfully');
    return handle;
  }
}

export class PlaywrightHandle implements EngineHandle {
  readonly id = nanoid(10);
  private readonly refs = new RefTable();
  private closing = false;
  private faulted = false;

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly settings: HandleSettings,
    private readonly onFault?: (err: EngineFaultError) => void,
  ) {
    context.on('close', () => this.fault('browser context closed unexpectedly'));
    page.on('crash', () => this.fault('page crashed'));
  }

  get generation(): number {
    return this.refs.generation;
  }

  isAlive(): boolean {
    return !this.closing && !this.faulted && !this.page.isClosed();
  }

  async navigate(url: string, timeoutMs: number, signal?: AbortSignal): Promise<PageInfo> {
    const target = sanitizeUrl(url);
    if (!isDomainAllowed(target, this.settings.allowedDomains)) {
      throw new DomainNotAllowedError(new URL(target).hostname);
    }
    this.assertAlive();
    throwIfAborted(signal);

    logger.info({ handleId: this.id, url: target }, 'Navigating');

    try {
      await this.page.goto(target, { waitUntil: 'load', timeout: timeoutMs });
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        throw new NavigationTimeoutError(target, timeoutMs);
      }
      throw this.translate(err, (message) => new NavigationFailedError(target, message));
    }

    return { url: this.page.url(), title: await this.page.title().catch(() => '') };
  }

  async captureAccessibilityTree(signal?: AbortSignal): Promise<SnapshotTree> {
    this.assertAlive();
    const generation = this.refs.nextGeneration();

    let tree: SnapshotTree;
    try {
      tree = await withRetry(
        () =>
          captureTree(this.page, {
            generation,
            keepGeneration: this.refs.generation,
            maxNodes: this.settings.maxSnapshotNodes,
          }),
        { operation: 'snapshot' },
      );
    } catch (err) {
      throw this.translate(err, (message) => new EngineFaultError(`snapshot failed: ${message}`));
    }

    // A cancelled capture leaves the committed generation untouched.
    throwIfAborted(signal);
    this.refs.commit(generation, flattenTree(tree));
    return tree;
  }

  async dispatchInput(referenceId: string, action: InputAction, signal?: AbortSignal): Promise<void> {
    this.assertAlive();
    const target = this.refs.resolve(referenceId);
    throwIfAborted(signal);

    let element: ElementHandle | null;
    try {
      element = await this.page.$(refSelector(target.generation, target.index));
    } catch (err) {
      throw this.translate(err, (message) => new ElementNotInteractableError(referenceId, message));
    }
    if (!element) {
      throw new ElementNotInteractableError(
        referenceId,
        'element is no longer on the page; take a new snapshot',
      );
    }

    const timeout = this.settings.inputTimeoutMs;
    try {
      await element.scrollIntoViewIfNeeded({ timeout: 2000 }).catch((err: unknown) => {
        logger.debug({ ref: referenceId, err }, 'scrollIntoViewIfNeeded failed');
      });

      if (action.kind === 'click') {
        await element.click({ timeout });
      } else {
        await this.fill(element, action.text, timeout);
        if (action.submit) await element.press('Enter', { timeout });
      }

      await this.page.waitForLoadState('domcontentloaded', { timeout: 3000 }).catch(() => {
        logger.debug({ ref: referenceId }, 'No load state change after input');
      });
    } catch (err) {
      throw this.translate(err, (message) => new ElementNotInteractableError(referenceId, message));
    } finally {
      await element.dispose().catch((err: unknown) => {
        logger.debug({ ref: referenceId, err }, 'Element handle already disposed');
      });
    }
  }

  async captureScreenshot(options: ScreenshotOptions = {}, signal?: AbortSignal): Promise<Buffer> {
    this.assertAlive();
    throwIfAborted(signal);

    const timeout = this.settings.inputTimeoutMs * 2;
    try {
      return await this.page.screenshot(
        options.raw ? { type: 'png', timeout } : { type: 'jpeg', quality: 80, timeout },
      );
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        throw new OperationTimeoutError('browser_take_screenshot', timeout);
      }
      throw this.translate(err, (message) => new EngineFaultError(`screenshot failed: ${message}`));
    }
  }

  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;
    logger.info({ handleId: this.id }, 'Closing browser');
    try {
      await this.context.close();
    } catch (err) {
      logger.error({ handleId: this.id, err }, 'Error closing browser context');
    }
  }

  // fill() handles inputs, textareas and contenteditable; some custom
  // widgets reject it and need select-all plus keystrokes.
  private async fill(element: ElementHandle, text: string, timeout: number): Promise<void> {
    try {
      await element.fill(text, { timeout });
    } catch (err) {
      if (err instanceof errors.TimeoutError || FATAL_PATTERN.test(errorMessage(err))) throw err;
      logger.warn({ handleId: this.id, err }, 'fill() failed, falling back to triple-click + type');
      await element.click({ clickCount: 3, timeout });
      await this.page.keyboard.press('Delete');
      await this.page.keyboard.type(text);
    }
  }

  private fault(reason: string): void {
    if (this.closing || this.faulted) return;
    this.faulted = true;
    const err = new EngineFaultError(reason);
    logger.error({ handleId: this.id, reason }, 'Browser engine fault');
    this.onFault?.(err);
  }

  private assertAlive(): void {
    if (!this.isAlive()) {
      throw new EngineFaultError('browser is no longer running');
    }
  }

  private translate(err: unknown, fallback: (message: string) => AppError): AppError {
    if (err instanceof AppError) return err;
    const message = errorMessage(err);
    if (!this.isAlive() || FATAL_PATTERN.test(message)) {
      return new EngineFaultError(message);
    }
    return fallback(message);
  }
}
