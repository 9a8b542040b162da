/** Failure categories surfaced to callers of the router and the HTTP surface. */
export type ErrorKind =
  | 'InvalidInput'
  | 'UnknownAgent'
  | 'AuthorizationDenied'
  | 'DelegationFailure'
  | 'RegistryUnavailable'
  | 'Cancelled'
  | 'Internal';

export interface OrchestrationError {
  kind: ErrorKind;
  message: string;
}

export function orchestrationError(kind: ErrorKind, message: string): OrchestrationError {
  return { kind, message: message.trim() || kind };
}

const HTTP_STATUS: Record<ErrorKind, number> = {
  InvalidInput: 400,
  UnknownAgent: 400,
  AuthorizationDenied: 403,
  DelegationFailure: 500,
  RegistryUnavailable: 500,
  Cancelled: 500,
  Internal: 500,
};

export function httpStatusFor(kind: ErrorKind): number {
  return HTTP_STATUS[kind];
}

/** Formats anything thrown into a single line suitable for a caller-facing message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    if (err.name === 'TimeoutError') return 'request timed out';
    if (err.name === 'AbortError') return 'request aborted';
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}
