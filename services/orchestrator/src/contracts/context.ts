import { randomUUID } from 'crypto';
import type { IncomingHttpHeaders } from 'http';
import type { SessionId } from '../types';

export interface RequestContextInit {
  sessionId?: SessionId;
  callerIdentity?: string;
  credential?: string;
  requestId?: string;
}

/** Redacted view used in logs and events; the credential only shows up as present/absent. */
export interface RequestContextLogFields {
  session_id?: SessionId;
  caller_identity?: string;
  request_id?: string;
  credential: 'present' | 'absent';
}

/**
 * Identity and session data for one inbound request.
 * Built once at the boundary and passed explicitly to every delegated call;
 * the credential is forwarded as received and never serialized.
 */
export class RequestContext {
  readonly sessionId?: SessionId;
  readonly callerIdentity?: string;
  readonly requestId?: string;
  readonly #credential?: string;

  constructor(init: RequestContextInit = {}) {
    this.sessionId = blankToUndefined(init.sessionId);
    this.callerIdentity = blankToUndefined(init.callerIdentity);
    this.requestId = blankToUndefined(init.requestId);
    this.#credential = blankToUndefined(init.credential);
    Object.freeze(this);
  }

  get credential(): string | undefined {
    return this.#credential;
  }

  hasCredential(): boolean {
    return this.#credential !== undefined;
  }

  toLogFields(): RequestContextLogFields {
    const fields: RequestContextLogFields = {
      credential: this.hasCredential() ? 'present' : 'absent',
    };
    if (this.sessionId) fields.session_id = this.sessionId;
    if (this.callerIdentity) fields.caller_identity = this.callerIdentity;
    if (this.requestId) fields.request_id = this.requestId;
    return fields;
  }

  toJSON(): RequestContextLogFields {
    return this.toLogFields();
  }

  /**
   * Body fields win over headers. Session falls back to X-Session-ID, then
   * X-Request-ID, then a generated id.
   */
  static fromHttp(
    headers: IncomingHttpHeaders,
    body: { session_id?: string; user_email?: string } = {},
  ): RequestContext {
    const requestId = firstHeader(headers['x-request-id']);
    const sessionId =
      blankToUndefined(body.session_id) ??
      blankToUndefined(firstHeader(headers['x-session-id'])) ??
      blankToUndefined(requestId) ??
      generateSessionId();

    return new RequestContext({
      sessionId,
      callerIdentity: body.user_email ?? firstHeader(headers['x-user-email']),
      credential: firstHeader(headers.authorization),
      requestId,
    });
  }
}

export function generateSessionId(): SessionId {
  return `gen-${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function blankToUndefined(value: string | undefined): string | undefined {
  if (typeof value !== 'string') return undefined;
  return value.trim() ? value : undefined;
}
