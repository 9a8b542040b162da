import { z } from 'zod';
import type { AgentDescriptor, AuthorizationDecision, AuthorizationGate, CallOptions } from '../contracts/agents';
import type { RequestContext } from '../contracts/context';
import { describeError } from '../errors';
import type { Logger } from '../logger';
import { type FetchImpl, safeReadBody, withDeadline } from '../http/fetch';
import type { AgentId } from '../types';

const DEFAULT_TIMEOUT_MS = 5_000;
const DEFAULT_DENY_REASON = 'denied by policy';

const policyResponseSchema = z.object({
  result: z.object({
    allow: z.boolean(),
    reason: z.string().optional(),
  }),
});

export interface PolicyGateOptions {
  baseUrl: string;
  path: string;
  timeoutMs?: number;
  logger: Logger;
  fetch?: FetchImpl;
}

/**
 * Asks the external policy service whether a caller may reach an agent.
 * Fail-closed: any transport, status or shape problem is a denial.
 * Decisions are never cached.
 */
export class PolicyAuthorizationGate implements AuthorizationGate {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly fetchImpl: FetchImpl;

  constructor(options: PolicyGateOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}${options.path}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = options.logger;
    this.fetchImpl = options.fetch ?? globalThis.fetch.bind(globalThis);
  }

  async authorize(
    context: RequestContext,
    targetAgentId: AgentId,
    agent?: AgentDescriptor,
    options: CallOptions = {},
  ): Promise<AuthorizationDecision> {
    const identityGated = agent?.requires_identity ?? true;
    if (identityGated && !context.callerIdentity) {
      return deny(`caller identity required for ${targetAgentId}`);
    }
    if (identityGated && !context.hasCredential()) {
      return deny(`bearer credential required for ${targetAgentId}`);
    }

    const deadline = withDeadline(this.timeoutMs, options.signal);
    try {
      const res = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          input: {
            user_email: context.callerIdentity ?? null,
            target_agent: targetAgentId,
          },
        }),
        signal: deadline.signal,
      });

      if (!res.ok) {
        const detail = await safeReadBody(res);
        return this.serviceError(`status ${res.status}${detail}`, targetAgentId);
      }

      const parsed = policyResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        return this.serviceError('malformed policy response', targetAgentId);
      }

      const { allow, reason } = parsed.data.result;
      if (allow) return { allowed: true, reason: reason || 'allowed by policy' };
      return deny(reason || DEFAULT_DENY_REASON);
    } catch (err) {
      const message = deadline.timedOut() ? `timed out after ${this.timeoutMs}ms` : describeError(err);
      return this.serviceError(message, targetAgentId);
    } finally {
      deadline.dispose();
    }
  }

  private serviceError(detail: string, targetAgentId: AgentId): AuthorizationDecision {
    this.log.error({ targetAgent: targetAgentId, detail }, 'Authorization check failed');
    return deny(`Authorization service error: ${detail}`);
  }
}

function deny(reason: string): AuthorizationDecision {
  return { allowed: false, reason: reason.trim() || DEFAULT_DENY_REASON };
}
