import type { FastifyInstance } from 'fastify';
import { PortInUseError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export function isAddressInUse(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EADDRINUSE';
}

/**
 * Bind the REST transport. When the port is taken the app is closed so no
 * half-started listener is left behind.
 */
export async function startServer(
  app: FastifyInstance,
  { host, port }: { host: string; port: number },
): Promise<string> {
  try {
    const address = await app.listen({ host, port });
    logger.info({ address }, 'REST transport listening');
    return address;
  } catch (err) {
    await app.close().catch((closeErr: unknown) => {
      logger.warn({ err: closeErr }, 'Error closing app after failed listen');
    });
    if (isAddressInUse(err)) {
      throw new PortInUseError(host, port);
    }
    throw err;
  }
}
