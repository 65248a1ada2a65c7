import type { BrowserEngine } from './browser/engine.js';
import type { ListenerConfig } from './config.js';
import { McpBrowserServer } from './mcp/server.js';
import { type Runtime, createRuntime } from './runtime.js';
import { buildApp } from './server/app.js';
import { startServer } from './server/listen.js';
import { PortInUseError } from './utils/errors.js';
import { logger } from './utils/logger.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_BIND_FAILURE = 2;

export function exitCodeFor(err: unknown): number {
  return err instanceof PortInUseError ? EXIT_BIND_FAILURE : EXIT_FATAL;
}

function onShutdownSignal(stop: () => Promise<void>): void {
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down gracefully...');
    try {
      await stop();
      logger.info('Shutdown complete');
      process.exit(EXIT_OK);
    } catch (err) {
      logger.fatal({ err }, 'Error during shutdown');
      process.exit(EXIT_FATAL);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

async function closeQuietly(runtime: Runtime): Promise<void> {
  await runtime.shutdown().catch((err: unknown) => {
    logger.error({ err }, 'Error destroying sessions');
  });
}

export interface RunningBridge {
  /** Bound URL, or null for the stdio transport. */
  address: string | null;
  stop(): Promise<void>;
}

export async function startRest(
  listener: ListenerConfig,
  engine?: BrowserEngine,
  profileRoot?: string,
): Promise<RunningBridge> {
  const runtime = createRuntime(listener, engine, profileRoot);
  const app = buildApp({ sessionManager: runtime.sessions, dispatcher: runtime.dispatcher });

  let address: string;
  try {
    address = await startServer(app, listener);
  } catch (err) {
    await closeQuietly(runtime);
    throw err;
  }

  logger.info({ url: address, tools: listener.allowedTools }, 'browser-bridge REST transport started');

  return {
    address,
    async stop() {
      try {
        await app.close();
      } catch (err) {
        logger.error({ err }, 'Error closing Fastify server');
      }
      await runtime.shutdown();
    },
  };
}

/** The HTTP transport binds the listener's host and port, like REST. */
export async function startMcp(
  listener: ListenerConfig,
  transport: 'stdio' | 'http',
  engine?: BrowserEngine,
  profileRoot?: string,
): Promise<RunningBridge> {
  const runtime = createRuntime(listener, engine, profileRoot);
  const server = new McpBrowserServer({ sessions: runtime.sessions, dispatcher: runtime.dispatcher });

  let address: string | null = null;
  try {
    if (transport === 'http') {
      const bound = (await server.startHttp(listener.port, listener.host)).address();
      const port = bound !== null && typeof bound === 'object' ? bound.port : listener.port;
      address = `http://${listener.host}:${port}/mcp`;
    } else {
      await server.startStdio();
    }
  } catch (err) {
    await closeQuietly(runtime);
    throw err;
  }

  return {
    address,
    async stop() {
      await server.stop();
      await runtime.shutdown();
    },
  };
}

export async function runRest(listener: ListenerConfig): Promise<void> {
  const bridge = await startRest(listener);
  onShutdownSignal(() => bridge.stop());
}

export async function runMcp(listener: ListenerConfig, transport: 'stdio' | 'http'): Promise<void> {
  const bridge = await startMcp(listener, transport);
  onShutdownSignal(() => bridge.stop());
}
