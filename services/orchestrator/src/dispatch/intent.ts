import type { AgentDescriptor } from '../contracts/agents';
import type { AgentId } from '../types';
import { escapeRegExp } from '../util/text';

export interface IntentMatch {
  agentId: AgentId;
  score: number;
}

/**
 * Scores one agent's keywords against a lower-cased task.
 * Keywords of three characters or fewer must match a whole word (+2);
 * longer ones match as substrings (+1, +2 more for multi-word phrases).
 */
export function scoreKeywords(task: string, keywords: readonly string[]): number {
  let score = 0;
  for (const keyword of keywords) {
    const k = keyword.toLowerCase();
    if (k.length <= 3) {
      if (new RegExp(`\\b${escapeRegExp(k)}\\b`).test(task)) score += 2;
    } else if (task.includes(k)) {
      score += 1;
      if (k.includes(' ')) score += 2;
    }
  }
  return score;
}

/**
 * Picks the catalog agent whose keywords best match the task text.
 * Ties go to the agent listed first; no match yields the fallback, if any.
 */
export function resolveIntent(
  task: string,
  agents: readonly AgentDescriptor[],
  fallbackAgentId?: AgentId,
): IntentMatch | undefined {
  const lowered = task.toLowerCase();
  let best: IntentMatch | undefined;

  for (const agent of agents) {
    const score = scoreKeywords(lowered, agent.keywords);
    if (score >= 1 && (!best || score > best.score)) {
      best = { agentId: agent.agent_id, score };
    }
  }

  if (best) return best;
  return fallbackAgentId ? { agentId: fallbackAgentId, score: 0 } : undefined;
}
