import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RequestContext } from '../contracts/context';
import { orchestrationError } from '../errors';
import { INVALID_INPUT, type RemediationStateMachine } from '../remediation/stateMachine';
import { disconnectSignal, invalidInput } from './shared';

// Blank or missing documents are left to the state machine, which aborts the run.
const remediateSchema = z.object({
  rca_document: z.string().optional(),
  resolution_plan: z.string().optional(),
  session_id: z.string().min(1).optional(),
  user_email: z.string().min(1).optional(),
});

export interface RemediateRouteDeps {
  remediation: Pick<RemediationStateMachine, 'run'>;
}

export async function registerRemediateRoutes(app: FastifyInstance, deps: RemediateRouteDeps) {
  app.post('/remediate', async (req, reply) => {
    const parsed = remediateSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ status: 'aborted', error: invalidInput(parsed.error) });
    }

    const context = RequestContext.fromHttp(req.headers, parsed.data);
    req.log.info({ context: context.toLogFields() }, 'Received remediation request');

    const result = await deps.remediation.run(
      { rcaDocument: parsed.data.rca_document, resolutionPlan: parsed.data.resolution_plan },
      context,
      { signal: disconnectSignal(reply) },
    );
    req.log.info({ sessionId: context.sessionId, status: result.status, steps: result.steps.length }, 'Remediation finished');

    if (result.abort_reason === INVALID_INPUT) {
      return reply.code(400).send({ ...result, error: orchestrationError('InvalidInput', result.explanation) });
    }
    return reply.send(result);
  });
}
