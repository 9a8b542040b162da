import type { DelegationStep, RemediationStatus } from '../contracts/remediation';

const SUMMARY_LIMIT = 200;
const HTTPS_URL_RE = /https:\/\/[^\s)"'<>]+/;

/** Short human-readable text for an agent payload or error. */
export function summarizePayload(payload: unknown): string {
  let text: string;
  if (typeof payload === 'string') {
    text = payload;
  } else if (payload && typeof payload === 'object' && 'response' in payload && typeof payload.response === 'string') {
    text = payload.response;
  } else {
    text = JSON.stringify(payload) ?? '';
  }
  return text.length > SUMMARY_LIMIT ? `${text.slice(0, SUMMARY_LIMIT)}…` : text;
}

export interface ReportInput {
  sessionId?: string;
  rcaDocument: string;
  resolutionPlan: string;
  steps: readonly DelegationStep[];
  status: RemediationStatus;
}

export function buildReport(input: ReportInput): string {
  const lines = [
    '# Remediation Report',
    '',
    `**Session:** ${input.sessionId ?? 'n/a'}`,
    `**Outcome:** ${input.status}`,
    '',
    '## Root Cause Analysis',
    input.rcaDocument,
    '',
    '## Resolution Plan',
    input.resolutionPlan,
    '',
    '## Steps',
  ];

  input.steps.forEach((step, index) => {
    const result = step.outcome.success ? 'succeeded' : 'failed';
    lines.push(
      `${index + 1}. ${step.phase} via ${step.targetAgent} ${result} at ${new Date(step.timestamp).toISOString()}`,
      `   ${summarizePayload(step.outcome.payload)}`,
    );
  });

  return lines.join('\n');
}

export function reportFileName(sessionId: string | undefined, timestamp: number): string {
  return `remediation_${sessionId ?? timestamp}.md`;
}

/** Storage agents answer with either a `signed_url` field or free text holding the link. */
export function extractReportUrl(data: unknown): string | undefined {
  if (data && typeof data === 'object' && 'signed_url' in data && typeof data.signed_url === 'string') {
    return data.signed_url;
  }
  const text = typeof data === 'string' ? data : summarizeForUrl(data);
  return HTTPS_URL_RE.exec(text)?.[0]?.replace(/[.,;:]+$/, '');
}

function summarizeForUrl(data: unknown): string {
  if (data && typeof data === 'object' && 'response' in data && typeof data.response === 'string') {
    return data.response;
  }
  return JSON.stringify(data) ?? '';
}
