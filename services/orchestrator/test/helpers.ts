import pino from 'pino';
import { z } from 'zod';
import type { ObservabilityEvent, ObservabilitySink } from '../src/contracts/observability';
import { AgentRegistry } from '../src/registry/agentRegistry';
import type { AgentRecord } from '../src/types';

export const silentLogger = pino({ level: 'silent' });

export type CatalogEntry = Partial<AgentRecord> & Pick<AgentRecord, 'agent_id'>;

export const TEST_AGENTS: CatalogEntry[] = [
  {
    agent_id: 'gcloud_infrastructure_specialist',
    network_endpoint: 'http://agents.test/gcloud/execute',
    declared_capabilities: ['infrastructure'],
    keywords: ['vm', 'firewall', 'google cloud'],
  },
  {
    agent_id: 'monitoring_observability_specialist',
    network_endpoint: 'http://agents.test/monitoring/execute',
    declared_capabilities: ['monitoring'],
    keywords: ['metrics', 'latency', 'cpu'],
  },
  {
    agent_id: 'browser_automation_specialist',
    network_endpoint: 'http://agents.test/browser/execute',
    declared_capabilities: ['browser_automation'],
    keywords: ['browser', 'screenshot'],
  },
  {
    agent_id: 'gcs_storage_specialist',
    network_endpoint: 'http://agents.test/storage/execute',
    declared_capabilities: ['storage'],
    keywords: ['bucket', 'upload'],
  },
  {
    agent_id: 'google_search_specialist',
    network_endpoint: 'http://agents.test/search/execute',
    declared_capabilities: ['search'],
    keywords: ['search'],
    requires_identity: false,
  },
];

export function catalogJson(entries: CatalogEntry[] = TEST_AGENTS): string {
  return JSON.stringify(
    entries.map((entry) => ({
      display_name: entry.agent_id,
      network_endpoint: `http://agents.test/${entry.agent_id}/execute`,
      ...entry,
    })),
  );
}

export function registryFrom(raw: string | (() => string)): AgentRegistry {
  const read = typeof raw === 'string' ? () => raw : raw;
  return new AgentRegistry({ path: 'catalog.json', logger: silentLogger, readCatalog: read });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export class RecordingSink implements ObservabilitySink {
  readonly events: ObservabilityEvent[] = [];

  emit(event: ObservabilityEvent): void {
    this.events.push(event);
  }
}

export function bodyOf(init: RequestInit | undefined): Record<string, unknown> {
  if (typeof init?.body !== 'string') return {};
  return z.record(z.unknown()).parse(JSON.parse(init.body));
}

/** Header names come back lower-cased. */
export function headersOf(init: RequestInit | undefined): Record<string, string> {
  return Object.fromEntries(new Headers(init?.headers).entries());
}
