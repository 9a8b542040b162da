import type { AgentId, SessionId } from '../types';

export type EventOutcome = 'started' | 'success' | 'failure';

/** Structured event handed to the observability sink. */
export interface ObservabilityEvent {
  component: 'dispatch_router' | 'remediation';
  phase: string;
  outcome: EventOutcome;
  latencyMs?: number;
  targetAgent?: AgentId;
  sessionId?: SessionId;
  callerIdentity?: string;
  message?: string;
  metadata?: Record<string, unknown>;
}

/** Fire-and-forget receiver. `emit` returns immediately and never throws. */
export interface ObservabilitySink {
  emit(event: ObservabilityEvent): void;
}
