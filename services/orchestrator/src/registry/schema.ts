import { z } from 'zod';
import type { AgentRecord } from '../types';

export const agentRecordSchema = z.object({
  agent_id: z.string().min(1, 'agent_id required'),
  display_name: z.string().min(1).optional(),
  network_endpoint: z.string().url('network_endpoint must be a URL'),
  declared_capabilities: z.array(z.string().min(1)).default([]),
  keywords: z.array(z.string().min(1)).default([]),
  requires_identity: z.boolean().default(true),
  description: z.string().optional(),
});

export const catalogSchema = z.array(agentRecordSchema).superRefine((records, ctx) => {
  const seen = new Set<string>();
  records.forEach((record, index) => {
    if (seen.has(record.agent_id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'agent_id'],
        message: `duplicate agent_id ${record.agent_id}`,
      });
    }
    seen.add(record.agent_id);
  });
});

export function parseCatalog(raw: string): AgentRecord[] {
  const parsed = catalogSchema.parse(JSON.parse(raw));
  return parsed.map((record) => ({
    ...record,
    display_name: record.display_name ?? record.agent_id,
  }));
}
