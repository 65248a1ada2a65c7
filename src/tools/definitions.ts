/**
 * Tool definitions advertised to calling agents.
 *
 * Each entry follows the @modelcontextprotocol/sdk Tool interface with
 * name, description, and a JSON-Schema inputSchema. The REST transport
 * serves the same list from GET /tools.
 */

import type { ToolName } from './schemas.js';

type PropertySchema = { type: 'string' | 'boolean'; description: string };

// Type aliases rather than interfaces so the list is assignable to the SDK's
// index-signature Tool type.
export type ToolDefinition = {
  name: ToolName;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, PropertySchema>;
    required?: string[];
  };
};

const sessionIdProperty: PropertySchema = {
  type: 'string',
  description: 'Session to act on. Over MCP it may be omitted to use the default session.',
};

const elementProperty: PropertySchema = {
  type: 'string',
  description: 'Human-readable description of the element, used for logging.',
};

const referenceIdProperty: PropertySchema = {
  type: 'string',
  description: 'Exact element ref from the latest browser_snapshot (e.g. "s2e7").',
};

export const TOOLS: ToolDefinition[] = [
  {
    name: 'browser_navigate',
    description: 'Navigate the session to a URL and wait for the page to load. Returns the final URL and title.',
    inputSchema: {
      type: 'object',
      properties: {
        url: {
          type: 'string',
          description: 'The URL to navigate to (must include protocol, e.g. https://)',
        },
        sessionId: sessionIdProperty,
      },
      required: ['url'],
    },
  },
  {
    name: 'browser_snapshot',
    description:
      'Capture an accessibility snapshot of the current page. Every node carries a ref for browser_click and browser_type; refs from earlier snapshots stop working.',
    inputSchema: {
      type: 'object',
      properties: {
        sessionId: sessionIdProperty,
      },
    },
  },
  {
    name: 'browser_click',
    description: 'Click an element identified by a ref from the latest snapshot.',
    inputSchema: {
      type: 'object',
      properties: {
        referenceId: referenceIdProperty,
        element: elementProperty,
        sessionId: sessionIdProperty,
      },
      required: ['referenceId'],
    },
  },
  {
    name: 'browser_type',
    description: 'Replace the contents of an editable element with text, optionally pressing Enter afterwards.',
    inputSchema: {
      type: 'object',
      properties: {
        referenceId: referenceIdProperty,
        text: {
          type: 'string',
          description: 'Text to enter into the element.',
        },
        submit: {
          type: 'boolean',
          description: 'Press Enter after typing. Defaults to false.',
        },
        element: elementProperty,
        sessionId: sessionIdProperty,
      },
      required: ['referenceId', 'text'],
    },
  },
  {
    name: 'browser_take_screenshot',
    description: 'Capture a screenshot of the visible viewport. JPEG by default.',
    inputSchema: {
      type: 'object',
      properties: {
        raw: {
          type: 'boolean',
          description: 'Return a lossless PNG instead of JPEG.',
        },
        sessionId: sessionIdProperty,
      },
    },
  },
];

export function enabledTools(allowed: readonly ToolName[]): ToolDefinition[] {
  return TOOLS.filter((tool) => allowed.includes(tool.name));
}
