import { PolicyAuthorizationGate } from './auth/policyGate';
import type { AppConfig } from './config';
import type { ObservabilitySink } from './contracts/observability';
import { HttpAgentClient } from './dispatch/httpAgentClient';
import { DispatchRouter } from './dispatch/router';
import type { FetchImpl } from './http/fetch';
import type { Logger } from './logger';
import { AgentRegistry } from './registry/agentRegistry';
import { RemediationStateMachine } from './remediation/stateMachine';

export interface OrchestratorDeps {
  config: AppConfig;
  logger: Logger;
  sink: ObservabilitySink;
  fetch?: FetchImpl;
}

/** Composition root: one registry per process, shared read-only by every request. */
export function createOrchestrator({ config, logger, sink, fetch }: OrchestratorDeps) {
  const registry = new AgentRegistry({ path: config.registryPath, logger: logger.child({ component: 'registry' }) });

  const gate = new PolicyAuthorizationGate({
    baseUrl: config.policy.url,
    path: config.policy.path,
    timeoutMs: config.policy.timeoutMs,
    logger: logger.child({ component: 'authorization' }),
    fetch,
  });

  const router = new DispatchRouter({
    registry,
    gate,
    client: new HttpAgentClient({ timeoutMs: config.agents.timeoutMs, fetch }),
    sink,
    logger: logger.child({ component: 'dispatch' }),
    fallbackAgentId: config.remediation.infraAgentId,
  });

  const remediation = new RemediationStateMachine({
    router,
    agents: {
      infra: config.remediation.infraAgentId,
      monitoring: config.remediation.monitoringAgentId,
      browser: config.remediation.browserAgentId,
      storage: config.remediation.storageAgentId,
    },
    sink,
    logger: logger.child({ component: 'remediation' }),
    reportBucket: config.remediation.reportBucket,
  });

  return { registry, gate, router, remediation };
}
