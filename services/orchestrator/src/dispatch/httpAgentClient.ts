import { z } from 'zod';
import type {
  AgentDescriptor,
  AgentReply,
  CallOptions,
  DelegationPayload,
  SpecialistAgentClient,
} from '../contracts/agents';
import type { RequestContext } from '../contracts/context';
import { describeError } from '../errors';
import { type FetchImpl, withDeadline } from '../http/fetch';

const DEFAULT_TIMEOUT_MS = 600_000;

const agentBodySchema = z
  .object({
    success: z.boolean().optional(),
    data: z.unknown().optional(),
    response: z.unknown().optional(),
    error: z.unknown().optional(),
    message: z.string().optional(),
  })
  .passthrough();

type AgentBody = z.infer<typeof agentBodySchema>;

export interface HttpAgentClientOptions {
  timeoutMs?: number;
  fetch?: FetchImpl;
}

/** Calls `POST {network_endpoint}` with the prompt and the caller's identity attached. */
export class HttpAgentClient implements SpecialistAgentClient {
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchImpl;

  constructor(options: HttpAgentClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? globalThis.fetch.bind(globalThis);
  }

  async execute(
    agent: AgentDescriptor,
    payload: DelegationPayload,
    context: RequestContext,
    options: CallOptions = {},
  ): Promise<AgentReply> {
    const deadline = withDeadline(this.timeoutMs, options.signal);
    try {
      const res = await this.fetchImpl(agent.network_endpoint, {
        method: 'POST',
        headers: buildHeaders(context),
        body: JSON.stringify({
          ...payload,
          user_email: context.callerIdentity ?? null,
          session_id: context.sessionId ?? null,
        }),
        signal: deadline.signal,
      });

      const text = await res.text();
      const body = parseBody(text);

      if (!res.ok) {
        const detail = body ? errorText(body) : text.slice(0, 200);
        return {
          success: false,
          error: `${agent.agent_id} returned ${res.status}${detail ? `: ${detail}` : ''}`,
        };
      }

      if (!body) return { success: true, data: { response: text } };
      if (body.success === false) {
        return { success: false, error: errorText(body) || `${agent.agent_id} reported failure` };
      }
      return { success: true, data: body.data ?? body.response ?? body };
    } catch (err) {
      if (deadline.timedOut()) {
        return { success: false, error: `${agent.agent_id} timed out after ${this.timeoutMs}ms` };
      }
      if (options.signal?.aborted) {
        return { success: false, error: 'cancelled' };
      }
      return { success: false, error: `${agent.agent_id} unreachable: ${describeError(err)}` };
    } finally {
      deadline.dispose();
    }
  }
}

function buildHeaders(context: RequestContext): Record<string, string> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (context.credential) headers.Authorization = context.credential;
  if (context.sessionId) headers['X-Session-ID'] = context.sessionId;
  if (context.callerIdentity) headers['X-User-Email'] = context.callerIdentity;
  if (context.requestId) headers['X-Request-ID'] = context.requestId;
  return headers;
}

function parseBody(text: string): AgentBody | null {
  if (!text) return null;
  try {
    const parsed = agentBodySchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function errorText(body: AgentBody): string {
  if (typeof body.error === 'string') return body.error;
  if (
    body.error &&
    typeof body.error === 'object' &&
    'message' in body.error &&
    typeof body.error.message === 'string'
  ) {
    return body.error.message;
  }
  return body.message ?? '';
}
