import type { FastifyReply } from 'fastify';
import type { z } from 'zod';
import { type OrchestrationError, orchestrationError } from '../errors';

export function invalidInput(error: z.ZodError): OrchestrationError {
  const message = error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : 'request body required'))
    .join('; ');
  return orchestrationError('InvalidInput', message);
}

/** Aborts when the client goes away before the reply has been written. */
export function disconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableFinished) controller.abort();
  });
  return controller.signal;
}
