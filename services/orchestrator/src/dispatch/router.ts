import type {
  AgentDescriptor,
  AgentReply,
  AuthorizationDecision,
  AuthorizationGate,
  CallOptions,
  DelegationPayload,
  DelegationResult,
  SpecialistAgentClient,
} from '../contracts/agents';
import type { RequestContext } from '../contracts/context';
import type { ObservabilityEvent, ObservabilitySink } from '../contracts/observability';
import { type OrchestrationError, describeError, orchestrationError } from '../errors';
import type { Logger } from '../logger';
import type { AgentRegistry } from '../registry/agentRegistry';
import type { AgentId } from '../types';
import { resolveIntent } from './intent';

export interface DispatchRouterOptions {
  registry: AgentRegistry;
  gate: AuthorizationGate;
  client: SpecialistAgentClient;
  sink: ObservabilitySink;
  logger: Logger;
  /** Used by `dispatchTask` when no agent's keywords match. */
  fallbackAgentId?: AgentId;
  now?: () => number;
}

export interface TaskOptions extends CallOptions {
  targetAgent?: AgentId;
  projectId?: string;
}

/**
 * Registry lookup, authorization and the outbound call for one delegation.
 * Returns a result value for every outcome; retries are the caller's decision.
 */
export class DispatchRouter {
  private readonly registry: AgentRegistry;
  private readonly gate: AuthorizationGate;
  private readonly client: SpecialistAgentClient;
  private readonly sink: ObservabilitySink;
  private readonly log: Logger;
  private readonly fallbackAgentId?: AgentId;
  private readonly now: () => number;

  constructor(options: DispatchRouterOptions) {
    this.registry = options.registry;
    this.gate = options.gate;
    this.client = options.client;
    this.sink = options.sink;
    this.log = options.logger;
    this.fallbackAgentId = options.fallbackAgentId;
    this.now = options.now ?? Date.now;
  }

  async route(
    targetAgentId: AgentId,
    payload: DelegationPayload,
    context: RequestContext,
    options: CallOptions = {},
  ): Promise<DelegationResult> {
    const started = this.now();
    this.report(context, { phase: 'pre_dispatch', outcome: 'started', targetAgent: targetAgentId });

    const agent = this.registry.resolve(targetAgentId);
    if (!agent) {
      const error = this.registry.isAvailable()
        ? orchestrationError('UnknownAgent', `Unknown agent: ${targetAgentId}`)
        : orchestrationError('RegistryUnavailable', `Agent registry unavailable; cannot route to ${targetAgentId}`);
      return this.fail(targetAgentId, error, started, context);
    }

    const decision = await this.authorize(context, targetAgentId, agent, options);
    if (options.signal?.aborted) {
      return this.fail(targetAgentId, orchestrationError('Cancelled', 'cancelled'), started, context);
    }
    if (!decision.allowed) {
      return this.fail(targetAgentId, orchestrationError('AuthorizationDenied', decision.reason), started, context);
    }

    let reply: AgentReply;
    try {
      reply = await this.client.execute(agent, payload, context, options);
    } catch (err) {
      reply = { success: false, error: `${targetAgentId} call failed: ${describeError(err)}` };
    }

    // A reply that already succeeded is kept even if the caller went away meanwhile.
    if (!reply.success && options.signal?.aborted) {
      return this.fail(targetAgentId, orchestrationError('Cancelled', 'cancelled'), started, context);
    }
    if (!reply.success) {
      return this.fail(targetAgentId, orchestrationError('DelegationFailure', reply.error), started, context);
    }

    const latencyMs = this.now() - started;
    this.report(context, { phase: 'post_dispatch', outcome: 'success', targetAgent: targetAgentId, latencyMs });
    return { ok: true, agentId: targetAgentId, data: reply.data, latencyMs };
  }

  /** Routes a free-text task, choosing the agent from the catalog keywords when none is named. */
  async dispatchTask(task: string, context: RequestContext, options: TaskOptions = {}): Promise<DelegationResult> {
    const targetAgent =
      options.targetAgent ?? resolveIntent(task, this.registry.list(), this.fallbackAgentId)?.agentId;

    if (!targetAgent) {
      const error = this.registry.isAvailable()
        ? orchestrationError('UnknownAgent', 'No agent matches the task')
        : orchestrationError('RegistryUnavailable', 'Agent registry unavailable');
      return { ok: false, agentId: '', error, latencyMs: 0 };
    }

    const payload: DelegationPayload = { prompt: task };
    if (options.projectId) payload.project_id = options.projectId;
    return this.route(targetAgent, payload, context, { signal: options.signal });
  }

  private async authorize(
    context: RequestContext,
    targetAgentId: AgentId,
    agent: AgentDescriptor,
    options: CallOptions,
  ): Promise<AuthorizationDecision> {
    try {
      return await this.gate.authorize(context, targetAgentId, agent, options);
    } catch (err) {
      return { allowed: false, reason: `Authorization service error: ${describeError(err)}` };
    }
  }

  private fail(
    targetAgentId: AgentId,
    error: OrchestrationError,
    started: number,
    context: RequestContext,
  ): DelegationResult {
    const latencyMs = this.now() - started;
    this.log.warn({ targetAgent: targetAgentId, kind: error.kind, reason: error.message, latencyMs }, 'Dispatch failed');
    this.report(context, {
      phase: 'post_dispatch',
      outcome: 'failure',
      targetAgent: targetAgentId,
      latencyMs,
      message: error.message,
      metadata: { kind: error.kind },
    });
    return { ok: false, agentId: targetAgentId, error, latencyMs };
  }

  private report(
    context: RequestContext,
    event: Omit<ObservabilityEvent, 'component' | 'sessionId' | 'callerIdentity'>,
  ): void {
    try {
      this.sink.emit({
        component: 'dispatch_router',
        sessionId: context.sessionId,
        callerIdentity: context.callerIdentity,
        ...event,
      });
    } catch (err) {
      this.log.warn({ err }, 'Observability sink rejected event');
    }
  }
}
