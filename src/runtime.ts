import { type BrowserEngine, PlaywrightEngine } from './browser/engine.js';
import { ProfileAllocator } from './browser/profiles.js';
import { SessionManager } from './browser/session-manager.js';
import { type ListenerConfig, config } from './config.js';
import { ToolDispatcher } from './tools/dispatcher.js';
import { logger } from './utils/logger.js';

export interface Runtime {
  sessions: SessionManager;
  dispatcher: ToolDispatcher;
  shutdown(): Promise<void>;
}

/** Wire the session manager and dispatcher shared by both transports. */
export function createRuntime(
  listener: ListenerConfig,
  engine: BrowserEngine = new PlaywrightEngine(),
  profileRoot: string = config.profileRoot,
): Runtime {
  const sessions = new SessionManager(engine, new ProfileAllocator(profileRoot), {
    defaultHeadless: listener.headless,
  });
  const dispatcher = new ToolDispatcher(sessions, { allowedTools: listener.allowedTools });

  return {
    sessions,
    dispatcher,
    async shutdown() {
      sessions.stopCleanup();
      await sessions.destroyAll();
      logger.info('All sessions closed');
    },
  };
}
