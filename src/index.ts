export { PlaywrightEngine } from './browser/engine.js';
export type { BrowserEngine, EngineHandle, InputAction, PageInfo } from './browser/engine.js';
export { ProfileAllocator } from './browser/profiles.js';
export { SessionManager } from './browser/session-manager.js';
export type { SessionCreateOptions, SessionInfo, SessionState } from './browser/session.js';
export { loadListenerConfig, resolveListenerConfig } from './config.js';
export type { ListenerConfig } from './config.js';
export { McpBrowserServer } from './mcp/server.js';
export { formatSnapshot } from './processing/snapshot.js';
export type { SnapshotNode, SnapshotTree } from './processing/snapshot.js';
export { createRuntime } from './runtime.js';
export { buildApp } from './server/app.js';
export { startServer } from './server/listen.js';
export { TOOLS, enabledTools } from './tools/definitions.js';
export { ToolDispatcher } from './tools/dispatcher.js';
export type { ToolPayload, ToolResult } from './tools/dispatcher.js';
export { TOOL_NAMES } from './tools/schemas.js';
export type { ToolName } from './tools/schemas.js';
export { AppError, ERROR_STATUS } from './utils/errors.js';
export type { ErrorKind } from './utils/errors.js';
