import type { AgentId, AgentRecord } from '../types';
import type { OrchestrationError } from '../errors';
import type { RequestContext } from './context';

/** Catalog entry for one specialist agent. Frozen once the registry has loaded it. */
export type AgentDescriptor = Readonly<
  Omit<AgentRecord, 'declared_capabilities' | 'keywords'> & {
    declared_capabilities: ReadonlySet<string>;
    keywords: readonly string[];
  }
>;

export interface AuthorizationDecision {
  allowed: boolean;
  reason: string;
}

/** Fields sent to an agent's execute operation besides the propagated identity. */
export interface DelegationPayload {
  prompt: string;
  [field: string]: unknown;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/** Normalized reply from a specialist agent. */
export type AgentReply =
  | { success: true; data: unknown }
  | { success: false; error: string };

/** Transport used by the router to reach an agent's execute operation. */
export interface SpecialistAgentClient {
  execute(
    agent: AgentDescriptor,
    payload: DelegationPayload,
    context: RequestContext,
    options?: CallOptions,
  ): Promise<AgentReply>;
}

export interface AuthorizationGate {
  authorize(
    context: RequestContext,
    targetAgentId: AgentId,
    agent?: AgentDescriptor,
    options?: CallOptions,
  ): Promise<AuthorizationDecision>;
}

export type DelegationResult =
  | { ok: true; agentId: AgentId; data: unknown; latencyMs: number }
  | { ok: false; agentId: AgentId; error: OrchestrationError; latencyMs: number };
