import { z } from 'zod';
import type { PlanDirectives } from '../contracts/remediation';
import { containsTerm } from '../util/text';

export const DEFAULT_VALIDATION_QUERY = 'error_rate';

const INFRA_COMMAND_RE = /^[ \t]*(?:\$[ \t]*)?((?:gcloud|gsutil|kubectl|terraform)[ \t]+[^\r\n]+)$/m;
const NO_INFRA_RE = /\bno\s+infra(?:structure)?\s+(?:change|fix|mutation)s?\b/;
const NO_BROWSER_RE = /\bno\s+(?:browser|end-to-end|e2e|ui)\s+(?:test|verification|check)s?\b/;
const URL_RE = /https?:\/\/[^\s)"'<>]+/;

const INFRA_TERMS = [
  'iam',
  'role',
  'service account',
  'permission',
  'firewall',
  'redeploy',
  'rollback',
  'roll back',
  'scale',
  'restart',
  'environment variable',
  'env var',
  'quota',
  'infrastructure',
  'infra',
];

const BROWSER_TERMS = [
  'browser',
  'end-to-end',
  'end to end',
  'e2e',
  'user-facing',
  'user facing',
  'puppeteer',
  'screenshot',
  'ui verification',
];

const structuredPlanSchema = z.object({
  infra_change: z.union([z.boolean(), z.string().min(1)]).optional(),
  browser_test: z.union([z.boolean(), z.object({ url: z.string().url().optional() })]).optional(),
  validation_query: z.string().min(1).optional(),
  target_url: z.string().url().optional(),
});

export type PlanParseResult = { ok: true; directives: PlanDirectives } | { ok: false; reason: string };

/**
 * Derives what a remediation run has to do from the RCA and the resolution plan.
 * A plan that opens with `{` is read as a structured plan and must parse;
 * anything else is free text scanned for commands and vocabulary.
 */
export function parsePlan(rcaDocument: string | undefined, resolutionPlan: string | undefined): PlanParseResult {
  const rca = rcaDocument?.trim() ?? '';
  const plan = resolutionPlan?.trim() ?? '';
  if (!rca) return { ok: false, reason: 'rca_document is missing' };
  if (!plan) return { ok: false, reason: 'resolution_plan is missing' };

  if (plan.startsWith('{')) return parseStructured(plan, rca);
  return { ok: true, directives: parseFreeText(plan, rca) };
}

function parseStructured(plan: string, rca: string): PlanParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(plan);
  } catch {
    return { ok: false, reason: 'resolution_plan is not valid JSON' };
  }

  const parsed = structuredPlanSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: 'resolution_plan does not match the structured plan format' };
  }

  const { infra_change, browser_test, validation_query, target_url } = parsed.data;
  const directives: PlanDirectives = {
    infraChange: Boolean(infra_change),
    browserTest: Boolean(browser_test),
    validationQuery: validation_query ?? DEFAULT_VALIDATION_QUERY,
  };
  if (typeof infra_change === 'string') directives.infraCommand = infra_change;

  const url = (typeof browser_test === 'object' ? browser_test.url : undefined) ?? target_url ?? firstUrl(rca);
  if (url) directives.targetUrl = url;
  return { ok: true, directives };
}

function parseFreeText(plan: string, rca: string): PlanDirectives {
  const lowered = plan.toLowerCase();
  const command = INFRA_COMMAND_RE.exec(plan)?.[1]?.trim();

  const infraChange =
    command !== undefined || (!NO_INFRA_RE.test(lowered) && INFRA_TERMS.some((term) => containsTerm(lowered, term)));
  const browserTest = !NO_BROWSER_RE.test(lowered) && BROWSER_TERMS.some((term) => containsTerm(lowered, term));

  const directives: PlanDirectives = {
    infraChange,
    browserTest,
    validationQuery: DEFAULT_VALIDATION_QUERY,
  };
  if (command) directives.infraCommand = command;

  const url = firstUrl(plan) ?? firstUrl(rca);
  if (url) directives.targetUrl = url;
  return directives;
}

function firstUrl(text: string): string | undefined {
  return URL_RE.exec(text)?.[0]?.replace(/[.,;:]+$/, '');
}
