import { z } from 'zod';
import { REF_PATTERN } from '../processing/refs.js';

export const TOOL_NAMES = [
  'browser_navigate',
  'browser_snapshot',
  'browser_click',
  'browser_type',
  'browser_take_screenshot',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

const referenceId = z
  .string()
  .regex(REF_PATTERN, 'must be an element ref from a snapshot, e.g. "s1e4"');

// Human-readable description of the target; used for logging only.
const element = z.string().max(500).optional();

const navigateParams = z.object({ url: z.string().min(1) }).strict();
const snapshotParams = z.object({}).strict();
const clickParams = z.object({ referenceId, element }).strict();
const typeParams = z
  .object({ referenceId, text: z.string(), submit: z.boolean().optional(), element })
  .strict();
const screenshotParams = z.object({ raw: z.boolean().optional() }).strict();

/** One tagged variant per tool; `params` is checked against its tool. */
export const toolInvocationSchema = z.discriminatedUnion('tool', [
  z.object({ tool: z.literal('browser_navigate'), params: navigateParams }),
  z.object({ tool: z.literal('browser_snapshot'), params: snapshotParams }),
  z.object({ tool: z.literal('browser_click'), params: clickParams }),
  z.object({ tool: z.literal('browser_type'), params: typeParams }),
  z.object({ tool: z.literal('browser_take_screenshot'), params: screenshotParams }),
]);

export type ToolInvocation = z.infer<typeof toolInvocationSchema>;

export const MAX_CALL_TIMEOUT_MS = 300_000;

export const toolCallEnvelopeSchema = z
  .object({
    tool: z.string().min(1),
    sessionId: z.string().min(1),
    params: z.record(z.unknown()).optional(),
    requestId: z.string().min(1).max(128).optional(),
    timeoutMs: z.number().int().positive().max(MAX_CALL_TIMEOUT_MS).optional(),
  })
  .strict();

export type ToolCallEnvelope = z.infer<typeof toolCallEnvelopeSchema>;

export type ToolCall = ToolInvocation & {
  sessionId: string;
  requestId: string;
  timeoutMs?: number;
};

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
