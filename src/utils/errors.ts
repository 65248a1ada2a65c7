export type ErrorKind =
  | 'InvalidToolCall'
  | 'ProtocolError'
  | 'InvalidURL'
  | 'DomainNotAllowed'
  | 'UnknownSession'
  | 'StaleReference'
  | 'ProfileInUse'
  | 'InvalidProfile'
  | 'ElementNotInteractable'
  | 'SessionLimitReached'
  | 'OperationCancelled'
  | 'NavigationFailed'
  | 'EngineFault'
  | 'EngineLaunchError'
  | 'NavigationTimeout'
  | 'OperationTimeout'
  | 'InvalidConfig'
  | 'PortInUseError'
  | 'InternalError';

export const ERROR_STATUS: Record<ErrorKind, number> = {
  InvalidToolCall: 400,
  ProtocolError: 400,
  InvalidURL: 400,
  DomainNotAllowed: 403,
  UnknownSession: 404,
  StaleReference: 409,
  ProfileInUse: 409,
  InvalidProfile: 400,
  ElementNotInteractable: 422,
  SessionLimitReached: 429,
  OperationCancelled: 499,
  NavigationFailed: 502,
  EngineFault: 502,
  EngineLaunchError: 500,
  NavigationTimeout: 504,
  OperationTimeout: 504,
  InvalidConfig: 500,
  PortInUseError: 500,
  InternalError: 500,
};

export interface ErrorDescriptor {
  kind: ErrorKind;
  message: string;
}

export class AppError extends Error {
  readonly statusCode: number;
  readonly kind: ErrorKind;

  constructor(message: string, kind: ErrorKind) {
    super(message);
    this.name = this.constructor.name;
    this.kind = kind;
    this.statusCode = ERROR_STATUS[kind];
  }

  toDescriptor(): ErrorDescriptor {
    return { kind: this.kind, message: this.message };
  }
}

export class InvalidToolCallError extends AppError {
  constructor(message: string) {
    super(message, 'InvalidToolCall');
  }
}

export class ProtocolError extends AppError {
  constructor(message: string) {
    super(message, 'ProtocolError');
  }
}

export class InvalidUrlError extends AppError {
  constructor(message: string) {
    super(message, 'InvalidURL');
  }
}

export class DomainNotAllowedError extends AppError {
  constructor(domain: string) {
    super(`Domain not allowed: ${domain}`, 'DomainNotAllowed');
  }
}

export class UnknownSessionError extends AppError {
  constructor(sessionId: string) {
    super(`Unknown session: ${sessionId}`, 'UnknownSession');
  }
}

export class StaleReferenceError extends AppError {
  constructor(ref: string, generation: number) {
    const hint =
      generation === 0
        ? 'No snapshot has been taken yet; call browser_snapshot first.'
        : `Current snapshot generation is ${generation}; call browser_snapshot for fresh refs.`;
    super(`Element ref "${ref}" does not belong to the current snapshot. ${hint}`, 'StaleReference');
  }
}

export class ProfileInUseError extends AppError {
  constructor(profilePath: string) {
    super(`Profile directory is already in use by another session: ${profilePath}`, 'ProfileInUse');
  }
}

export class InvalidProfileError extends AppError {
  constructor(profileDir: string, root: string) {
    super(`Profile directory ${profileDir} must lie inside ${root}`, 'InvalidProfile');
  }
}

export class ElementNotInteractableError extends AppError {
  constructor(ref: string, reason?: string) {
    const detail = reason ? `: ${reason}` : '';
    super(`Element ${ref} cannot receive input${detail}`, 'ElementNotInteractable');
  }
}

export class SessionLimitError extends AppError {
  constructor(max: number) {
    super(`Maximum session limit reached (${max})`, 'SessionLimitReached');
  }
}

export class OperationCancelledError extends AppError {
  constructor(requestId: string) {
    super(`Tool call ${requestId} was cancelled`, 'OperationCancelled');
  }
}

export class NavigationFailedError extends AppError {
  constructor(url: string, reason?: string) {
    const detail = reason ? `: ${reason}` : '';
    super(`Navigation failed for ${url}${detail}`, 'NavigationFailed');
  }
}

export class NavigationTimeoutError extends AppError {
  constructor(url: string, timeoutMs: number) {
    super(`Navigation to ${url} did not finish loading within ${timeoutMs}ms`, 'NavigationTimeout');
  }
}

export class OperationTimeoutError extends AppError {
  constructor(tool: string, timeoutMs: number) {
    super(`${tool} timed out after ${timeoutMs}ms`, 'OperationTimeout');
  }
}

export class EngineLaunchError extends AppError {
  constructor(reason: string) {
    super(`Browser engine failed to launch: ${reason}`, 'EngineLaunchError');
  }
}

export class EngineFaultError extends AppError {
  constructor(reason: string) {
    super(`Browser engine fault: ${reason}`, 'EngineFault');
  }
}

export class InvalidConfigError extends AppError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`, 'InvalidConfig');
  }
}

export class PortInUseError extends AppError {
  constructor(host: string, port: number) {
    super(`Port ${port} on ${host} is already in use`, 'PortInUseError');
  }
}

/** Engine faults and launch failures end the session they happen in. */
export function isFatalToSession(err: unknown): boolean {
  return err instanceof EngineFaultError || err instanceof EngineLaunchError;
}

export function describeError(err: unknown): ErrorDescriptor {
  if (err instanceof AppError) return err.toDescriptor();
  const message = err instanceof Error ? err.message : String(err);
  return { kind: 'InternalError', message };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
