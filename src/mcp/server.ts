/**
 * MCP transport: exposes the bridge's browser tools to MCP clients over
 * stdio or Streamable HTTP. Calls go through the same dispatcher as the
 * REST transport; a call without `sessionId` runs on a default session that
 * is created on the canonical profile the first time it is needed.
 */

import { randomUUID } from 'node:crypto';
import http from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { nanoid } from 'nanoid';

import type { SessionManager } from '../browser/session-manager.js';
import { isAddressInUse } from '../server/listen.js';
import { enabledTools } from '../tools/definitions.js';
import type { ToolDispatcher, ToolPayload, ToolResult } from '../tools/dispatcher.js';
import { type ErrorDescriptor, InvalidToolCallError, PortInUseError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const SERVER_INFO = { name: 'browser-bridge', version: '0.1.0' };

export interface McpServerOptions {
  sessions: SessionManager;
  dispatcher: ToolDispatcher;
}

export class McpBrowserServer {
  private readonly server: Server;
  private readonly sessions: SessionManager;
  private readonly dispatcher: ToolDispatcher;
  private defaultSessionId: string | null = null;
  private pendingDefault: Promise<string> | null = null;
  private httpServer: http.Server | null = null;
  private readonly transports = new Map<string, StreamableHTTPServerTransport>();

  constructor({ sessions, dispatcher }: McpServerOptions) {
    this.sessions = sessions;
    this.dispatcher = dispatcher;
    this.server = this.createServer();
  }

  // ── Handlers ────────────────────────────────────────────────────────────

  private createServer(): Server {
    const server = new Server(SERVER_INFO, { capabilities: { tools: {} } });

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: enabledTools(this.dispatcher.allowedTools),
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request, extra) =>
      this.callTool(request.params.name, request.params.arguments, extra.signal),
    );

    return server;
  }

  /**
   * Run one tool call. Aborting `signal` (the client's cancellation
   * notification) cancels the dispatcher call.
   */
  async callTool(
    name: string,
    args: Record<string, unknown> = {},
    signal?: AbortSignal,
  ): Promise<CallToolResult> {
    if (!this.dispatcher.isEnabled(name)) {
      return errorContent(new InvalidToolCallError(`Unknown tool "${name}"`).toDescriptor());
    }

    const { sessionId, ...params } = args;

    let resolvedSessionId: unknown;
    try {
      resolvedSessionId = sessionId ?? (await this.ensureDefaultSession());
    } catch (err) {
      logger.error({ tool: name, err }, 'Could not open default MCP session');
      return errorContent(describeError(err));
    }

    const requestId = nanoid();
    const onAbort = () => this.dispatcher.cancel(requestId);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await this.dispatcher.dispatch({
        tool: name,
        sessionId: resolvedSessionId,
        params,
        requestId,
      });
      return toContent(result);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  // ── Session management ──────────────────────────────────────────────────

  /**
   * Id of the default session, created on first use and replaced if it has
   * been closed since (idle expiry, engine fault).
   */
  async ensureDefaultSession(): Promise<string> {
    if (this.defaultSessionId && this.sessions.has(this.defaultSessionId)) {
      return this.defaultSessionId;
    }

    if (!this.pendingDefault) {
      this.pendingDefault = this.sessions
        .createSession()
        .then((session) => {
          this.defaultSessionId = session.id;
          logger.info({ sessionId: session.id }, 'Default MCP session created');
          return session.id;
        })
        .finally(() => {
          this.pendingDefault = null;
        });
    }
    return this.pendingDefault;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  async startStdio(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.info('MCP server started (stdio transport)');
  }

  async startHttp(port: number, host: string): Promise<http.Server> {
    const httpServer = http.createServer((req, res) => {
      this.handleHttp(req, res).catch((err: unknown) => {
        logger.error({ err }, 'MCP HTTP request failed');
        if (!res.headersSent) {
          sendJson(res, 500, { error: 'Internal server error' });
        } else {
          res.end();
        }
      });
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        httpServer.close();
        reject(isAddressInUse(err) ? new PortInUseError(host, port) : err);
      };
      httpServer.once('error', onError);
      httpServer.listen(port, host, () => {
        httpServer.off('error', onError);
        resolve();
      });
    });

    this.httpServer = httpServer;
    logger.info({ port, host }, 'MCP server started (Streamable HTTP transport)');
    return httpServer;
  }

  async stop(): Promise<void> {
    logger.info('Stopping MCP server');

    const httpServer = this.httpServer;
    if (httpServer) {
      this.httpServer = null;
      await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    }

    for (const transport of this.transports.values()) {
      await transport.close().catch((err: unknown) => {
        logger.warn({ err }, 'Error closing MCP HTTP transport');
      });
    }
    this.transports.clear();

    await this.server.close();
    logger.info('MCP server stopped');
  }

  private async handleHttp(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

    if (url.pathname === '/health' && req.method === 'GET') {
      sendJson(res, 200, { status: 'ok', transport: 'streamable-http' });
      return;
    }

    if (url.pathname !== '/mcp') {
      sendJson(res, 404, { error: 'Not found' });
      return;
    }

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, mcp-session-id');
    res.setHeader('Access-Control-Expose-Headers', 'mcp-session-id');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const header = req.headers['mcp-session-id'];
    const mcpSessionId = typeof header === 'string' ? header : undefined;
    let transport = mcpSessionId ? this.transports.get(mcpSessionId) : undefined;

    let body: unknown;
    if (req.method === 'POST') {
      try {
        body = JSON.parse(await readBody(req));
      } catch {
        sendJson(res, 400, {
          jsonrpc: '2.0',
          error: { code: -32700, message: 'Parse error' },
          id: null,
        });
        return;
      }
    }

    // New MCP session: a fresh transport and server, sharing this bridge's
    // browser sessions.
    if (!transport && req.method === 'POST') {
      const newTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (id) => {
          this.transports.set(id, newTransport);
          logger.info({ mcpSessionId: id }, 'MCP HTTP session created');
        },
      });

      newTransport.onclose = () => {
        const id = newTransport.sessionId;
        if (id) this.transports.delete(id);
        logger.info({ mcpSessionId: id }, 'MCP HTTP session closed');
      };

      transport = newTransport;
      await this.createServer().connect(transport);
    }

    if (!transport) {
      sendJson(res, 400, { error: 'No valid session. Send a POST to initialize.' });
      return;
    }

    await transport.handleRequest(req, res, body);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function describePayload(payload: ToolPayload): CallToolResult['content'] {
  switch (payload.type) {
    case 'page':
      return [{ type: 'text', text: `Navigated to ${payload.page.url}\nTitle: ${payload.page.title}` }];
    case 'snapshot':
      return [{ type: 'text', text: payload.text }];
    case 'input':
      return [
        {
          type: 'text',
          text: `${payload.action === 'click' ? 'Clicked' : 'Typed into'} ${payload.referenceId}. Take a new snapshot to see the result.`,
        },
      ];
    case 'screenshot':
      return [{ type: 'image', data: payload.data, mimeType: payload.mimeType }];
  }
}

function toContent(result: ToolResult): CallToolResult {
  if (!result.ok) return errorContent(result.error);
  return { content: describePayload(result.payload) };
}

function errorContent(error: ErrorDescriptor): CallToolResult {
  return {
    content: [{ type: 'text', text: `Error [${error.kind}]: ${error.message}` }],
    isError: true,
  };
}

function sendJson(res: http.ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(payload));
}

async function readBody(req: http.IncomingMessage): Promise<string> {
  req.setEncoding('utf8');
  let body = '';
  for await (const chunk of req) {
    body += chunk;
  }
  return body;
}
