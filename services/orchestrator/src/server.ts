import Fastify from 'fastify';
import type { DispatchRouter } from './dispatch/router';
import { describeError, orchestrationError } from './errors';
import { REDACT_PATHS } from './logger';
import type { AgentRegistry } from './registry/agentRegistry';
import type { RemediationStateMachine } from './remediation/stateMachine';
import { registerAgentRoutes } from './routes/agents';
import { registerAskRoutes } from './routes/ask';
import { registerRemediateRoutes } from './routes/remediate';

export interface AppDeps {
  registry: Pick<AgentRegistry, 'list' | 'status'>;
  router: Pick<DispatchRouter, 'dispatchTask'>;
  remediation: Pick<RemediationStateMachine, 'run'>;
  /** Omitted when no event bus is configured. */
  pingRedis?: () => Promise<unknown>;
  /** Request logging is off unless a level is given. */
  logLevel?: string;
}

export async function buildApp(deps: AppDeps) {
  const app = Fastify({
    logger: deps.logLevel ? { level: deps.logLevel, redact: REDACT_PATHS } : false,
    requestIdHeader: 'x-request-id',
  });

  // Fastify's own 4xx errors (unparseable JSON, wrong content type) keep their status.
  app.setErrorHandler((err, req, reply) => {
    const status = err.statusCode && err.statusCode >= 400 && err.statusCode < 500 ? err.statusCode : 500;
    if (status === 500) {
      req.log.error({ err }, 'Unhandled request error');
    }
    const error = orchestrationError(status === 500 ? 'Internal' : 'InvalidInput', describeError(err));
    return reply.code(status).send({ success: false, error });
  });

  app.get('/health', async () => {
    const registry = deps.registry.status();
    let redis: 'ok' | 'error' | 'disabled' = 'disabled';
    if (deps.pingRedis) {
      try {
        await deps.pingRedis();
        redis = 'ok';
      } catch (err) {
        app.log.error({ err }, 'Redis health check failed');
        redis = 'error';
      }
    }
    const healthy = registry.available && redis !== 'error';
    return { status: healthy ? 'ok' : 'degraded', registry, redis };
  });

  await registerAgentRoutes(app, deps);
  await registerAskRoutes(app, deps);
  await registerRemediateRoutes(app, deps);
  return app;
}
