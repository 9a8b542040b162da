import type { FastifyInstance } from 'fastify';
import type { AgentRegistry } from '../registry/agentRegistry';

export interface AgentRouteDeps {
  registry: Pick<AgentRegistry, 'list' | 'status'>;
}

// Endpoints stay internal; callers only see identities and capabilities.
export async function registerAgentRoutes(app: FastifyInstance, deps: AgentRouteDeps) {
  app.get('/agents', async (_req, reply) => {
    const status = deps.registry.status();
    const agents = deps.registry.list().map((agent) => ({
      agent_id: agent.agent_id,
      display_name: agent.display_name,
      declared_capabilities: [...agent.declared_capabilities],
      requires_identity: agent.requires_identity,
      ...(agent.description ? { description: agent.description } : {}),
    }));
    return reply.code(status.available ? 200 : 503).send({ available: status.available, agents });
  });
}
