import { afterEach, describe, expect, it, vi } from 'vitest';
import { config } from '../src/config';
import { createObservabilitySink } from '../src/observability';
import { LogEventSink } from '../src/observability/logSink';
import { type AgentEventEnvelope, type EventPublisher, RedisEventSink, channelFor } from '../src/observability/redisSink';
import { silentLogger } from './helpers';

const fakeRedis = vi.hoisted(() => ({ publish: vi.fn(async () => 1) }));

vi.mock('../src/redis/client', () => ({
  getRedis: () => fakeRedis,
  closeRedis: async () => {},
}));

const FIXED = new Date('2026-01-15T09:30:00.000Z');

function makeSink(publish: EventPublisher['publish'] = async () => 1) {
  const publisher = { publish: vi.fn(publish) };
  const sink = new RedisEventSink({ publisher, logger: silentLogger, clock: () => FIXED });
  return { sink, publisher };
}

function envelopeOf(publisher: { publish: { mock: { calls: unknown[][] } } }, call = 0): AgentEventEnvelope {
  const raw = publisher.publish.mock.calls[call]?.[1];
  if (typeof raw !== 'string') throw new Error('no message published');
  return JSON.parse(raw);
}

describe('channelFor', () => {
  it('builds the per-session channel', () => {
    expect(channelFor('channel', 'ops@example.com', 'abc')).toBe('channel:user_ops@example.com:session_abc');
  });

  it('strips a session_ prefix and defaults the user', () => {
    expect(channelFor('channel', undefined, 'session_abc')).toBe('channel:user_anonymous:session_abc');
  });
});

describe('RedisEventSink', () => {
  it('publishes a dispatch event envelope', () => {
    const { sink, publisher } = makeSink();

    sink.emit({
      component: 'dispatch_router',
      phase: 'post_dispatch',
      outcome: 'success',
      targetAgent: 'gcs_storage_specialist',
      latencyMs: 42,
      sessionId: 's-1',
      callerIdentity: 'ops@example.com',
    });

    expect(publisher.publish).toHaveBeenCalledTimes(1);
    expect(publisher.publish.mock.calls[0]?.[0]).toBe('channel:user_ops@example.com:session_s-1');
    const envelope = envelopeOf(publisher);
    expect(envelope.header).toMatchObject({
      timestamp: '2026-01-15T09:30:00.000Z',
      agent_name: 'orchestrator',
      agent_role: 'orchestration',
      session_id: 's-1',
    });
    expect(envelope.header.event_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(envelope.type).toBe('OBSERVATION');
    expect(envelope.payload).toEqual({
      message: 'dispatch_router post_dispatch gcs_storage_specialist: success',
      severity: 'SUCCESS',
      metadata: {
        component: 'dispatch_router',
        phase: 'post_dispatch',
        target_agent: 'gcs_storage_specialist',
        latency_ms: 42,
      },
    });
  });

  it('maps outcomes and components to event types', () => {
    const { sink, publisher } = makeSink();
    const base = { sessionId: 's-1', phase: 'x' };

    sink.emit({ ...base, component: 'dispatch_router', outcome: 'started' });
    sink.emit({ ...base, component: 'remediation', outcome: 'success', message: 'VALIDATE completed' });
    sink.emit({ ...base, component: 'remediation', outcome: 'failure', metadata: { kind: 'Cancelled' } });

    expect([0, 1, 2].map((i) => envelopeOf(publisher, i).type)).toEqual(['ACTION', 'STATUS_UPDATE', 'ERROR']);
    expect(envelopeOf(publisher, 1).payload.message).toBe('VALIDATE completed');
    expect(envelopeOf(publisher, 2).payload).toMatchObject({
      severity: 'ERROR',
      metadata: { component: 'remediation', phase: 'x', kind: 'Cancelled' },
    });
  });

  it('drops events without a session', () => {
    const { sink, publisher } = makeSink();
    sink.emit({ component: 'dispatch_router', phase: 'pre_dispatch', outcome: 'started' });
    expect(publisher.publish).not.toHaveBeenCalled();
  });

  it('does not throw when publishing fails', async () => {
    const { sink, publisher } = makeSink(async () => {
      throw new Error('connection lost');
    });

    expect(() => sink.emit({ component: 'remediation', phase: 'DONE', outcome: 'success', sessionId: 's-1' })).not.toThrow();
    await expect(publisher.publish.mock.results[0]?.value).rejects.toThrow('connection lost');
  });
});

describe('createObservabilitySink', () => {
  const previousUrl = config.redisUrl;

  afterEach(() => {
    config.redisUrl = previousUrl;
  });

  it('logs only when no redis url is configured', () => {
    config.redisUrl = '';
    expect(createObservabilitySink(silentLogger)).toBeInstanceOf(LogEventSink);
  });

  it('publishes through the shared redis client when configured', () => {
    config.redisUrl = 'redis://localhost:6379';
    const sink = createObservabilitySink(silentLogger);
    expect(sink).toBeInstanceOf(RedisEventSink);

    sink.emit({ component: 'remediation', phase: 'START', outcome: 'success', sessionId: 'abc' });
    expect(fakeRedis.publish).toHaveBeenCalledWith('channel:user_anonymous:session_abc', expect.any(String));
  });
});
