import { randomUUID } from 'crypto';
import type { ObservabilityEvent, ObservabilitySink } from '../contracts/observability';
import type { Logger } from '../logger';

export type EventType = 'ACTION' | 'OBSERVATION' | 'STATUS_UPDATE' | 'ERROR';
export type EventSeverity = 'INFO' | 'WARN' | 'ERROR' | 'SUCCESS';

/** Wire shape read by the session gateway subscribed to the channel. */
export interface AgentEventEnvelope {
  header: {
    event_id: string;
    timestamp: string;
    agent_name: string;
    agent_role: string;
    session_id: string;
  };
  type: EventType;
  payload: {
    message: string;
    severity: EventSeverity;
    metadata: Record<string, unknown>;
  };
}

export interface EventPublisher {
  publish(channel: string, message: string): Promise<number>;
}

export interface RedisEventSinkOptions {
  publisher: EventPublisher;
  logger: Logger;
  channelPrefix?: string;
  agentName?: string;
  agentRole?: string;
  clock?: () => Date;
}

export function channelFor(prefix: string, callerIdentity: string | undefined, sessionId: string): string {
  const user = callerIdentity || 'anonymous';
  const session = sessionId.startsWith('session_') ? sessionId.slice('session_'.length) : sessionId;
  return `${prefix}:user_${user}:session_${session}`;
}

/**
 * Publishes events on the per-session pub/sub channel.
 * Events without a session id have no channel and are dropped.
 */
export class RedisEventSink implements ObservabilitySink {
  private readonly publisher: EventPublisher;
  private readonly log: Logger;
  private readonly channelPrefix: string;
  private readonly agentName: string;
  private readonly agentRole: string;
  private readonly clock: () => Date;

  constructor(options: RedisEventSinkOptions) {
    this.publisher = options.publisher;
    this.log = options.logger;
    this.channelPrefix = options.channelPrefix ?? 'channel';
    this.agentName = options.agentName ?? 'orchestrator';
    this.agentRole = options.agentRole ?? 'orchestration';
    this.clock = options.clock ?? (() => new Date());
  }

  emit(event: ObservabilityEvent): void {
    if (!event.sessionId) return;

    const channel = channelFor(this.channelPrefix, event.callerIdentity, event.sessionId);
    let body: string;
    try {
      body = JSON.stringify(this.toEnvelope(event, event.sessionId));
    } catch (err) {
      this.log.warn({ err, channel }, 'Failed to serialize observability event');
      return;
    }

    void this.publisher
      .publish(channel, body)
      .then((subscribers) => this.log.debug({ channel, subscribers }, 'Published observability event'))
      .catch((err: unknown) => this.log.error({ err, channel }, 'Failed to publish observability event'));
  }

  toEnvelope(event: ObservabilityEvent, sessionId: string): AgentEventEnvelope {
    const metadata: Record<string, unknown> = { component: event.component, phase: event.phase, ...event.metadata };
    if (event.targetAgent) metadata.target_agent = event.targetAgent;
    if (typeof event.latencyMs === 'number') metadata.latency_ms = event.latencyMs;

    return {
      header: {
        event_id: randomUUID(),
        timestamp: this.clock().toISOString(),
        agent_name: this.agentName,
        agent_role: this.agentRole,
        session_id: sessionId,
      },
      type: eventType(event),
      payload: {
        message: event.message ?? defaultMessage(event),
        severity: severity(event),
        metadata,
      },
    };
  }
}

function eventType(event: ObservabilityEvent): EventType {
  if (event.outcome === 'failure') return 'ERROR';
  if (event.component === 'remediation') return 'STATUS_UPDATE';
  return event.outcome === 'started' ? 'ACTION' : 'OBSERVATION';
}

function severity(event: ObservabilityEvent): EventSeverity {
  switch (event.outcome) {
    case 'success':
      return 'SUCCESS';
    case 'failure':
      return 'ERROR';
    default:
      return 'INFO';
  }
}

function defaultMessage(event: ObservabilityEvent): string {
  const target = event.targetAgent ? ` ${event.targetAgent}` : '';
  return `${event.component} ${event.phase}${target}: ${event.outcome}`;
}
