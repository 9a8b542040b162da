import { describe, expect, it, vi } from 'vitest';
import { config } from '../src/config';
import type { FetchImpl } from '../src/http/fetch';
import { createOrchestrator } from '../src/orchestrator';
import { buildApp } from '../src/server';
import { RecordingSink, bodyOf, jsonResponse, registryFrom, silentLogger } from './helpers';

const testConfig = {
  ...config,
  policy: { ...config.policy, url: 'http://policy.test/' },
  agents: { timeoutMs: 1_000 },
};

const AUTH = { authorization: 'Bearer test-token' };

// Policy allows everyone except the outsider; agents answer by the endpoint's name segment.
const fakeFetch = vi.fn<FetchImpl>(async (input, init) => {
  const url = String(input);
  const body = bodyOf(init);
  if (url === 'http://policy.test/v1/data/orchestration/authz') {
    const policyInput = body.input;
    const outsider =
      typeof policyInput === 'object' &&
      policyInput !== null &&
      'user_email' in policyInput &&
      policyInput.user_email === 'outsider@example.com';
    return jsonResponse({ result: outsider ? { allow: false, reason: 'not in allowlist' } : { allow: true } });
  }

  switch (url.split('/')[4]) {
    case 'gcloud':
      return jsonResponse({ success: true, data: { response: 'binding added' } });
    case 'monitoring':
      return jsonResponse({ success: true, data: { error_rate: 0.001 } });
    case 'storage':
      return jsonResponse({ success: true, data: { signed_url: 'https://storage.example.com/r.md' } });
    default:
      return jsonResponse({ success: false, error: 'unexpected agent' }, 500);
  }
});

async function makeApp(pingRedis?: () => Promise<unknown>) {
  fakeFetch.mockClear();
  const core = createOrchestrator({ config: testConfig, logger: silentLogger, sink: new RecordingSink(), fetch: fakeFetch });
  return buildApp({ ...core, pingRedis });
}

describe('GET /health', () => {
  it('reports the registry and a disabled event bus', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', registry: { available: true, count: 9 }, redis: 'disabled' });
  });

  it('is degraded when redis does not answer', async () => {
    const app = await makeApp(async () => {
      throw new Error('ECONNREFUSED');
    });
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.json()).toMatchObject({ status: 'degraded', redis: 'error' });
  });
});

describe('GET /agents', () => {
  it('lists agents without their endpoints', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/agents' });
    const body = res.json();

    expect(res.statusCode).toBe(200);
    expect(body.available).toBe(true);
    expect(body.agents).toHaveLength(9);
    expect(body.agents[0]).toMatchObject({ agent_id: 'gcloud_infrastructure_specialist', requires_identity: true });
    expect(body.agents[0]).not.toHaveProperty('network_endpoint');
  });

  it('answers 503 when the catalog cannot be read', async () => {
    const registry = registryFrom(() => {
      throw new Error('ENOENT');
    });
    const app = await buildApp({
      registry,
      router: { dispatchTask: vi.fn() },
      remediation: { run: vi.fn() },
    });
    const res = await app.inject({ method: 'GET', url: '/agents' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({ available: false, agents: [] });
  });
});

describe('POST /ask', () => {
  it('rejects a missing prompt', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'POST', url: '/ask', payload: { prompt: '   ' } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      success: false,
      error: { kind: 'InvalidInput', message: 'prompt: prompt required' },
    });
    expect(fakeFetch).not.toHaveBeenCalled();
  });

  it('delegates to the named agent with the caller identity', async () => {
    const app = await makeApp();
    const res = await app.inject({
      method: 'POST',
      url: '/ask',
      headers: AUTH,
      payload: {
        prompt: 'What is the error rate?',
        target_agent: 'monitoring_observability_specialist',
        user_email: 'ops@example.com',
        session_id: 'sess-9',
      },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      success: true,
      agent: 'monitoring_observability_specialist',
      session_id: 'sess-9',
      data: { error_rate: 0.001 },
    });
    const agentCall = fakeFetch.mock.calls[1];
    expect(agentCall?.[0]).toBe('http://agent-gateway:9080/agent/monitoring/execute');
    expect(bodyOf(agentCall?.[1])).toMatchObject({ user_email: 'ops@example.com', session_id: 'sess-9' });
  });

  it('answers 403 when policy denies the caller', async () => {
    const app = await makeApp();
    const res = await app.inject({
      method: 'POST',
      url: '/ask',
      headers: { ...AUTH, 'x-user-email': 'outsider@example.com', 'x-session-id': 'sess-2' },
      payload: { prompt: 'list vms', target_agent: 'gcloud_infrastructure_specialist' },
    });

    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({
      success: false,
      agent: 'gcloud_infrastructure_specialist',
      session_id: 'sess-2',
      error: { kind: 'AuthorizationDenied', message: 'not in allowlist' },
    });
    expect(fakeFetch).toHaveBeenCalledTimes(1);
  });

  it('answers 400 for an unknown agent', async () => {
    const app = await makeApp();
    const res = await app.inject({
      method: 'POST',
      url: '/ask',
      headers: AUTH,
      payload: { prompt: 'hi', target_agent: 'nonexistent_agent', user_email: 'ops@example.com' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({ kind: 'UnknownAgent', message: 'Unknown agent: nonexistent_agent' });
    expect(fakeFetch).not.toHaveBeenCalled();
  });
});

describe('POST /remediate', () => {
  it('rejects a body that is not an object', async () => {
    const app = await makeApp();
    const res = await app.inject({ method: 'POST', url: '/remediate', payload: [] });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      status: 'aborted',
      error: { kind: 'InvalidInput', message: 'request body required' },
    });
  });

  it('answers 400 when the run aborts on invalid input', async () => {
    const app = await makeApp();
    const res = await app.inject({
      method: 'POST',
      url: '/remediate',
      payload: { rca_document: 'IAM role missing', resolution_plan: '' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({
      status: 'aborted',
      abort_reason: 'invalid input',
      error: { kind: 'InvalidInput', message: 'Remediation aborted (invalid input): resolution_plan is missing.' },
    });
    expect(fakeFetch).not.toHaveBeenCalled();
  });

  it('runs the remediation flow', async () => {
    const app = await makeApp();
    const res = await app.inject({
      method: 'POST',
      url: '/remediate',
      headers: AUTH,
      payload: {
        rca_document: 'Checkout returns 403: the service account lost its IAM role.',
        resolution_plan: 'Grant the IAM role back to the service account.',
        user_email: 'ops@example.com',
        session_id: 'sess-7',
      },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({
      status: 'success',
      session_id: 'sess-7',
      report_url: 'https://storage.example.com/r.md',
    });
    expect(body.steps.map((s: { phase: string }) => s.phase)).toEqual(['INFRA_FIX', 'VALIDATE', 'REPORT']);
  });
});

describe('error handling', () => {
  it('returns a structured 500 for unexpected errors', async () => {
    const app = await buildApp({
      registry: registryFrom(() => '[]'),
      router: {
        dispatchTask: vi.fn(async () => {
          throw new Error('router exploded');
        }),
      },
      remediation: { run: vi.fn() },
    });
    const res = await app.inject({ method: 'POST', url: '/ask', payload: { prompt: 'hi' } });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ success: false, error: { kind: 'Internal', message: 'router exploded' } });
  });

  it('keeps the client error status for a body that is not JSON', async () => {
    const app = await makeApp();
    const res = await app.inject({
      method: 'POST',
      url: '/ask',
      headers: { 'content-type': 'application/json' },
      payload: '{"prompt": ',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ success: false, error: { kind: 'InvalidInput' } });
    expect(fakeFetch).not.toHaveBeenCalled();
  });
});
