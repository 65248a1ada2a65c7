import { nanoid } from 'nanoid';
import type { PageInfo } from '../browser/engine.js';
import { screenshotMimeType } from '../browser/engine.js';
import type { Session } from '../browser/session.js';
import type { SessionManager } from '../browser/session-manager.js';
import { config } from '../config.js';
import { type SnapshotTree, formatSnapshot } from '../processing/snapshot.js';
import {
  type AppError,
  type ErrorDescriptor,
  InvalidToolCallError,
  OperationCancelledError,
  OperationTimeoutError,
  describeError,
  isFatalToSession,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { CancelOutcome } from '../utils/serial-queue.js';
import {
  type ToolCall,
  type ToolCallEnvelope,
  type ToolName,
  TOOL_NAMES,
  formatIssues,
  isToolName,
  toolCallEnvelopeSchema,
  toolInvocationSchema,
} from './schemas.js';

export type ToolPayload =
  | { type: 'page'; page: PageInfo }
  | { type: 'snapshot'; snapshot: SnapshotTree; text: string }
  | { type: 'input'; referenceId: string; action: 'click' | 'type' }
  | { type: 'screenshot'; mimeType: 'image/png' | 'image/jpeg'; data: string };

export type ToolResult =
  | { ok: true; requestId: string; tool: ToolName; sessionId: string; payload: ToolPayload }
  | {
      ok: false;
      requestId: string;
      tool?: string;
      sessionId?: string;
      error: ErrorDescriptor;
    };

export interface DispatcherOptions {
  allowedTools: readonly ToolName[];
  toolTimeoutMs: number;
  navigationTimeoutMs: number;
  /** How many finished results are kept for repeated request ids. */
  resultCacheSize: number;
}

interface CallControl {
  stop?: (err: AppError) => CancelOutcome;
}

interface InFlight {
  tool: string;
  sessionId: string;
  promise: Promise<ToolResult>;
  control: CallControl;
}

/**
 * Single entry point for tool calls.
 *
 * Validation and session lookup happen before anything touches a browser.
 * Calls on one session run strictly one after another through the session's
 * queue; each call is bounded by a timeout and can be cancelled by request id.
 */
export class ToolDispatcher {
  private readonly sessions: SessionManager;
  private readonly options: DispatcherOptions;
  private readonly inflight = new Map<string, InFlight>();
  private readonly results = new Map<string, ToolResult>();

  constructor(sessions: SessionManager, options: Partial<DispatcherOptions> = {}) {
    this.sessions = sessions;
    this.options = {
      allowedTools: options.allowedTools ?? [...TOOL_NAMES],
      toolTimeoutMs: options.toolTimeoutMs ?? config.toolTimeoutMs,
      navigationTimeoutMs: options.navigationTimeoutMs ?? config.navigationTimeoutMs,
      resultCacheSize: options.resultCacheSize ?? 200,
    };
  }

  get allowedTools(): readonly ToolName[] {
    return this.options.allowedTools;
  }

  isEnabled(name: string): name is ToolName {
    return isToolName(name) && this.options.allowedTools.includes(name);
  }

  async dispatch(raw: unknown): Promise<ToolResult> {
    const envelope = toolCallEnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      return {
        ok: false,
        requestId: requestIdOf(raw) ?? nanoid(),
        error: new InvalidToolCallError(formatIssues(envelope.error)).toDescriptor(),
      };
    }

    const requestId = envelope.data.requestId ?? nanoid();

    // A request id stands for one call: a repeat joins or replays it, while
    // the same id on another tool or session is refused.
    const target = { requestId, tool: envelope.data.tool, sessionId: envelope.data.sessionId };
    const cached = this.results.get(requestId);
    if (cached) return sameCall(cached, target) ? cached : reusedId(target);
    const running = this.inflight.get(requestId);
    if (running) return sameCall(running, target) ? running.promise : reusedId(target);

    let call: ToolCall;
    try {
      call = this.validate(envelope.data, requestId);
    } catch (err) {
      return failure(target, err);
    }

    const control: CallControl = {};
    const promise = this.run(call, control)
      .then((result) => {
        this.remember(result);
        return result;
      })
      .finally(() => {
        this.inflight.delete(requestId);
      });
    this.inflight.set(requestId, { tool: call.tool, sessionId: call.sessionId, promise, control });

    return promise;
  }

  /**
   * Cancel a call by request id. A queued call never starts; a running call
   * is signalled and its caller gets OperationCancelled right away, while the
   * session stays blocked until the engine action settles.
   */
  cancel(requestId: string): CancelOutcome {
    const entry = this.inflight.get(requestId);
    if (!entry?.control.stop) return 'not-found';
    return entry.control.stop(new OperationCancelledError(requestId));
  }

  private validate(envelope: ToolCallEnvelope, requestId: string): ToolCall {
    const { tool, sessionId, params, timeoutMs } = envelope;

    if (!isToolName(tool)) {
      throw new InvalidToolCallError(`Unknown tool "${tool}"`);
    }
    if (!this.options.allowedTools.includes(tool)) {
      throw new InvalidToolCallError(`Tool "${tool}" is not enabled on this bridge`);
    }

    const parsed = toolInvocationSchema.safeParse({ tool, params: params ?? {} });
    if (!parsed.success) {
      throw new InvalidToolCallError(`Invalid parameters for ${tool}: ${formatIssues(parsed.error)}`);
    }

    return { ...parsed.data, sessionId, requestId, timeoutMs };
  }

  private async run(call: ToolCall, control: CallControl): Promise<ToolResult> {
    let session: Session;
    try {
      session = this.sessions.getSession(call.sessionId);
    } catch (err) {
      return failure(call, err);
    }

    const timeoutMs = call.timeoutMs ?? this.options.toolTimeoutMs;
    const startedAt = Date.now();

    let interrupt: (err: AppError) => void = () => {};
    const interruption = new Promise<never>((_resolve, reject) => {
      interrupt = reject;
    });

    control.stop = (err) => {
      const outcome = session.queue.cancel(call.requestId, err);
      if (outcome !== 'not-found') interrupt(err);
      return outcome;
    };

    const timer = setTimeout(() => {
      control.stop?.(new OperationTimeoutError(call.tool, timeoutMs));
    }, timeoutMs);

    const task = session.queue.enqueue(call.requestId, async (signal) => {
      session.touch();
      try {
        return await this.execute(session, call, timeoutMs, signal);
      } finally {
        session.touch();
      }
    });

    try {
      const payload = await Promise.race([task, interruption]);
      logger.info(
        {
          requestId: call.requestId,
          sessionId: call.sessionId,
          tool: call.tool,
          durationMs: Date.now() - startedAt,
        },
        'Tool call completed',
      );
      return {
        ok: true,
        requestId: call.requestId,
        tool: call.tool,
        sessionId: call.sessionId,
        payload,
      };
    } catch (err) {
      if (isFatalToSession(err)) {
        await this.sessions.closeSession(call.sessionId, 'engine fault').catch((closeErr: unknown) => {
          logger.error({ sessionId: call.sessionId, err: closeErr }, 'Error closing faulted session');
        });
      }
      return failure(call, err);
    } finally {
      clearTimeout(timer);
    }
  }

  private async execute(
    session: Session,
    call: ToolCall,
    timeoutMs: number,
    signal: AbortSignal,
  ): Promise<ToolPayload> {
    const { handle } = session;

    switch (call.tool) {
      case 'browser_navigate': {
        // Leave room for the navigation's own timeout to report first.
        const navTimeout = Math.min(this.options.navigationTimeoutMs, timeoutMs);
        const page = await handle.navigate(call.params.url, navTimeout, signal);
        return { type: 'page', page };
      }

      case 'browser_snapshot': {
        const snapshot = await handle.captureAccessibilityTree(signal);
        return { type: 'snapshot', snapshot, text: formatSnapshot(snapshot) };
      }

      case 'browser_click': {
        const { referenceId, element } = call.params;
        logger.debug({ sessionId: session.id, referenceId, element }, 'Clicking element');
        await handle.dispatchInput(referenceId, { kind: 'click' }, signal);
        return { type: 'input', referenceId, action: 'click' };
      }

      case 'browser_type': {
        const { referenceId, text, submit, element } = call.params;
        logger.debug({ sessionId: session.id, referenceId, element, submit }, 'Typing into element');
        await handle.dispatchInput(referenceId, { kind: 'type', text, submit }, signal);
        return { type: 'input', referenceId, action: 'type' };
      }

      case 'browser_take_screenshot': {
        const buffer = await handle.captureScreenshot(call.params, signal);
        return {
          type: 'screenshot',
          mimeType: screenshotMimeType(call.params),
          data: buffer.toString('base64'),
        };
      }
    }
  }

  private remember(result: ToolResult): void {
    this.results.set(result.requestId, result);
    if (this.results.size > this.options.resultCacheSize) {
      const oldest = this.results.keys().next();
      if (!oldest.done) this.results.delete(oldest.value);
    }
  }
}

function sameCall(
  prior: { tool?: string; sessionId?: string },
  next: { tool: string; sessionId: string },
): boolean {
  return prior.tool === next.tool && prior.sessionId === next.sessionId;
}

function reusedId(call: { requestId: string; tool: string; sessionId: string }): ToolResult {
  return failure(
    call,
    new InvalidToolCallError(`Request id "${call.requestId}" already belongs to another call`),
  );
}

function failure(
  call: { requestId: string; tool?: string; sessionId?: string },
  err: unknown,
): ToolResult {
  const error = describeError(err);
  if (error.kind === 'InternalError') {
    logger.error({ requestId: call.requestId, tool: call.tool, err }, 'Unexpected tool call failure');
  } else {
    logger.warn(
      { requestId: call.requestId, sessionId: call.sessionId, tool: call.tool, kind: error.kind },
      error.message,
    );
  }
  return {
    ok: false,
    requestId: call.requestId,
    tool: call.tool,
    sessionId: call.sessionId,
    error,
  };
}

function requestIdOf(raw: unknown): string | undefined {
  if (typeof raw === 'object' && raw !== null && 'requestId' in raw && typeof raw.requestId === 'string') {
    return raw.requestId;
  }
  return undefined;
}
