import { InvalidConfigError } from './utils/errors.js';

export type CliMode = 'rest' | 'mcp-stdio' | 'mcp-http' | 'help';

export interface CliOptions {
  mode: CliMode;
  configFile?: string;
}

export function parseCliArgs(args: readonly string[]): CliOptions {
  let mode: CliMode = 'rest';
  let configFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        return { mode: 'help' };
      case '--mcp':
        if (mode !== 'mcp-http') mode = 'mcp-stdio';
        break;
      case '--mcp-http':
        mode = 'mcp-http';
        break;
      case '--config': {
        const value = args[i + 1];
        if (value === undefined || value.startsWith('-')) {
          throw new InvalidConfigError('--config needs a file path');
        }
        configFile = value;
        i++;
        break;
      }
      default:
        if (arg.startsWith('--config=')) {
          configFile = arg.slice('--config='.length);
          break;
        }
        throw new InvalidConfigError(`unknown argument "${arg}"`);
    }
  }

  return { mode, configFile };
}

export const HELP_TEXT = `
browser-bridge: browser sessions as tools for language-model agents

Usage:
  browser-bridge [--config <file>]             Start the REST transport (default: http://127.0.0.1:8931)
  browser-bridge --mcp [--config <file>]       Start the MCP server (stdio transport)
  browser-bridge --mcp-http [--config <file>]  Start the MCP server (Streamable HTTP on the listener port)
  browser-bridge --help                        Show this help message

Listener config file (JSON):
  { "host": "127.0.0.1", "port": 8931, "headless": true,
    "allowedTools": ["browser_navigate", "browser_snapshot"] }

Environment variables:
  BRIDGE_PORT                  Listener port, REST or MCP HTTP (default: 8931)
  BRIDGE_HOST                  Bind host (default: 127.0.0.1)
  BRIDGE_CONFIG                Listener config file, same as --config
  BRIDGE_HEADLESS              Run browsers headless (default: true)
  BRIDGE_ALLOWED_TOOLS         Comma-separated tool allowlist (default: all)
  BRIDGE_BROWSER               chromium|firefox|webkit (default: chromium)
  BRIDGE_EXECUTABLE_PATH       Custom browser executable
  BRIDGE_PROFILE_ROOT          Directory holding browser profiles
  BRIDGE_MAX_SESSIONS          Max concurrent sessions (default: 10)
  BRIDGE_IDLE_AFTER_MS         Inactivity before a session is idle (default: 60000)
  BRIDGE_SESSION_TIMEOUT_MS    Inactivity before a session is closed (default: 300000)
  BRIDGE_TOOL_TIMEOUT_MS       Per-call timeout (default: 30000)
  BRIDGE_NAVIGATION_TIMEOUT_MS Page load timeout (default: 20000)
  BRIDGE_MAX_SNAPSHOT_NODES    Snapshot node cap (default: 2000)
  BRIDGE_ALLOWED_DOMAINS       Comma-separated domain allowlist (default: all)
  BRIDGE_CORS_ORIGINS          Comma-separated CORS origins (default: any)
  BRIDGE_RATE_LIMIT_MAX        REST requests per client per window (default: 100)
  BRIDGE_RATE_LIMIT_WINDOW_MS  Rate limit window (default: 60000)
  BRIDGE_LOG_LEVEL             silent|debug|info|warn|error (default: info)

Exit codes: 0 clean shutdown, 2 port already in use, 1 any other fatal error.

MCP client setup (stdio):
  { "mcpServers": { "browser": { "command": "browser-bridge", "args": ["--mcp"] } } }
`.trim();
