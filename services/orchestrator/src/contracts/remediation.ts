import type { AgentId } from '../types';
import type { RequestContext } from './context';

export type RemediationPhase = 'INFRA_FIX' | 'VALIDATE' | 'BROWSER_TEST' | 'REPORT';

/** Machine position; DONE and ABORTED are terminal. */
export type MachineState = 'START' | RemediationPhase | 'DONE' | 'ABORTED';

export type RemediationStatus = 'success' | 'partial' | 'failed' | 'aborted';

export interface StepOutcome {
  success: boolean;
  /** Agent data on success, error message on failure. */
  payload: unknown;
  cancelled?: boolean;
}

/** One delegated call inside a run. Appended in execution order, never rewritten. */
export interface DelegationStep {
  phase: RemediationPhase;
  targetAgent: AgentId;
  request: Record<string, unknown>;
  outcome: StepOutcome;
  timestamp: number;
}

/** What the resolution plan asks for, derived once at START. */
export interface PlanDirectives {
  infraChange: boolean;
  infraCommand?: string;
  browserTest: boolean;
  targetUrl?: string;
  validationQuery: string;
}

export interface RemediationInput {
  rcaDocument?: string;
  resolutionPlan?: string;
}

export interface RemediationState {
  readonly rcaDocument: string;
  readonly resolutionPlan: string;
  readonly context: RequestContext;
  readonly steps: DelegationStep[];
  directives?: PlanDirectives;
  phase: MachineState;
  terminal: boolean;
  abortReason?: string;
  abortDetail?: string;
  finalStatus?: RemediationStatus;
  reportUrl?: string;
}

export interface StepSummary {
  phase: RemediationPhase;
  agent: AgentId;
  success: boolean;
  summary: string;
  timestamp: string;
}

export interface RemediationResult {
  status: RemediationStatus;
  steps: StepSummary[];
  explanation: string;
  session_id?: string;
  report_url?: string;
  abort_reason?: string;
}
