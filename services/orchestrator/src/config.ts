import 'dotenv/config';
import path from 'path';

const DEFAULT_REGISTRY_PATH = path.resolve(__dirname, '../config/agent_registry.json');

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export const config = {
  port: intFromEnv(process.env.PORT, 8080),
  host: process.env.HOST || '0.0.0.0',
  log: {
    level: process.env.LOG_LEVEL || 'info',
    pretty: process.env.LOG_PRETTY === 'true',
  },
  registryPath: process.env.REGISTRY_PATH || DEFAULT_REGISTRY_PATH,
  policy: {
    url: process.env.POLICY_URL || 'http://localhost:8181',
    path: process.env.POLICY_PATH || '/v1/data/orchestration/authz',
    timeoutMs: intFromEnv(process.env.POLICY_TIMEOUT_MS, 5_000),
  },
  agents: {
    timeoutMs: intFromEnv(process.env.AGENT_TIMEOUT_MS, 600_000),
  },
  // unset means events only go to the process log
  redisUrl: process.env.REDIS_URL || '',
  events: {
    channelPrefix: process.env.EVENT_CHANNEL_PREFIX || 'channel',
    agentName: process.env.EVENT_AGENT_NAME || 'orchestrator',
  },
  remediation: {
    infraAgentId: process.env.INFRA_AGENT_ID || 'gcloud_infrastructure_specialist',
    monitoringAgentId: process.env.MONITORING_AGENT_ID || 'monitoring_observability_specialist',
    browserAgentId: process.env.BROWSER_AGENT_ID || 'browser_automation_specialist',
    storageAgentId: process.env.STORAGE_AGENT_ID || 'gcs_storage_specialist',
    reportBucket: process.env.REPORT_BUCKET || 'remediation-reports',
  },
};

export type AppConfig = typeof config;
