import type { DelegationStep, RemediationPhase, RemediationStatus } from '../contracts/remediation';

function lastOutcome(steps: readonly DelegationStep[], phase: RemediationPhase): boolean | undefined {
  for (let i = steps.length - 1; i >= 0; i -= 1) {
    if (steps[i].phase === phase) return steps[i].outcome.success;
  }
  return undefined;
}

/**
 * Final status of a run from its step list alone, so a stored record
 * replays to the same answer. REPORT never affects the result.
 */
export function aggregateStatus(steps: readonly DelegationStep[], abortReason?: string): RemediationStatus {
  if (abortReason) return 'aborted';
  if (steps.some((step) => step.outcome.cancelled)) return 'aborted';
  if (lastOutcome(steps, 'INFRA_FIX') === false) return 'aborted';

  const validated = lastOutcome(steps, 'VALIDATE');
  const browser = lastOutcome(steps, 'BROWSER_TEST');
  if (validated === undefined) return 'failed';

  if (validated && browser !== false) return 'success';
  if (!validated && browser === false) return 'failed';
  return 'partial';
}
