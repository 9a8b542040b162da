import { readFileSync } from 'fs';
import type { AgentDescriptor } from '../contracts/agents';
import { describeError } from '../errors';
import type { Logger } from '../logger';
import type { AgentId, AgentRecord } from '../types';
import { parseCatalog } from './schema';

export interface RegistryStatus {
  available: boolean;
  count: number;
  error?: string;
}

export interface AgentRegistryOptions {
  path: string;
  logger: Logger;
  readCatalog?: (path: string) => string;
}

/**
 * Static catalog of specialist agents, read once and cached until `invalidate`.
 * A failed load leaves an empty catalog and flags the registry unavailable;
 * it never throws to callers.
 */
export class AgentRegistry {
  private readonly path: string;
  private readonly log: Logger;
  private readonly readCatalog: (path: string) => string;
  private cache: Map<AgentId, AgentDescriptor> | null = null;
  private loadError: string | undefined;

  constructor(options: AgentRegistryOptions) {
    this.path = options.path;
    this.log = options.logger;
    this.readCatalog = options.readCatalog ?? ((file) => readFileSync(file, 'utf8'));
  }

  load(): ReadonlySet<AgentDescriptor> {
    return new Set(this.entries().values());
  }

  resolve(agentId: AgentId): AgentDescriptor | undefined {
    return this.entries().get(agentId);
  }

  list(): AgentDescriptor[] {
    return [...this.entries().values()];
  }

  isAvailable(): boolean {
    this.entries();
    return this.loadError === undefined;
  }

  status(): RegistryStatus {
    const count = this.entries().size;
    return this.loadError === undefined
      ? { available: true, count }
      : { available: false, count, error: this.loadError };
  }

  invalidate(): void {
    this.cache = null;
    this.loadError = undefined;
  }

  private entries(): Map<AgentId, AgentDescriptor> {
    if (this.cache) return this.cache;

    const entries = new Map<AgentId, AgentDescriptor>();
    try {
      for (const record of parseCatalog(this.readCatalog(this.path))) {
        entries.set(record.agent_id, toDescriptor(record));
      }
      this.loadError = undefined;
      this.log.info({ path: this.path, agents: entries.size }, 'Agent registry loaded');
    } catch (err) {
      entries.clear();
      this.loadError = describeError(err);
      this.log.error({ err, path: this.path }, 'Agent registry unavailable');
    }

    this.cache = entries;
    return entries;
  }
}

function toDescriptor(record: AgentRecord): AgentDescriptor {
  return Object.freeze({
    ...record,
    declared_capabilities: new Set(record.declared_capabilities),
    keywords: Object.freeze([...record.keywords]),
  });
}
