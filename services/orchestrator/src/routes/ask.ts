import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RequestContext } from '../contracts/context';
import type { DispatchRouter } from '../dispatch/router';
import { httpStatusFor } from '../errors';
import { disconnectSignal, invalidInput } from './shared';

const askSchema = z.object({
  prompt: z.string().trim().min(1, 'prompt required'),
  target_agent: z.string().min(1).optional(),
  session_id: z.string().min(1).optional(),
  user_email: z.string().min(1).optional(),
  project_id: z.string().min(1).optional(),
});

export interface AskRouteDeps {
  router: Pick<DispatchRouter, 'dispatchTask'>;
}

export async function registerAskRoutes(app: FastifyInstance, deps: AskRouteDeps) {
  app.post('/ask', async (req, reply) => {
    const parsed = askSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ success: false, error: invalidInput(parsed.error) });
    }

    const { prompt, target_agent, project_id } = parsed.data;
    const context = RequestContext.fromHttp(req.headers, parsed.data);
    req.log.info({ context: context.toLogFields(), targetAgent: target_agent }, 'Received task request');

    const result = await deps.router.dispatchTask(prompt, context, {
      targetAgent: target_agent,
      projectId: project_id,
      signal: disconnectSignal(reply),
    });

    if (!result.ok) {
      req.log.warn({ kind: result.error.kind, targetAgent: result.agentId }, 'Task request failed');
      return reply.code(httpStatusFor(result.error.kind)).send({
        success: false,
        agent: result.agentId || undefined,
        session_id: context.sessionId,
        error: result.error,
      });
    }

    return reply.send({
      success: true,
      agent: result.agentId,
      session_id: context.sessionId,
      data: result.data,
    });
  });
}
