import type { CallOptions, DelegationPayload } from '../contracts/agents';
import type { RequestContext } from '../contracts/context';
import type { EventOutcome, ObservabilitySink } from '../contracts/observability';
import type {
  DelegationStep,
  RemediationInput,
  RemediationPhase,
  RemediationResult,
  RemediationState,
} from '../contracts/remediation';
import type { DispatchRouter } from '../dispatch/router';
import type { Logger } from '../logger';
import type { AgentId } from '../types';
import { parsePlan } from './plan';
import { buildReport, extractReportUrl, reportFileName, summarizePayload } from './report';
import { aggregateStatus } from './status';

export const INVALID_INPUT = 'invalid input';
export const CANCELLED = 'cancelled';

const VALIDATION_WINDOW = '5m';

export interface PhaseAgents {
  infra: AgentId;
  monitoring: AgentId;
  browser: AgentId;
  storage: AgentId;
}

export interface RemediationMachineOptions {
  router: Pick<DispatchRouter, 'route'>;
  agents: PhaseAgents;
  sink: ObservabilitySink;
  logger: Logger;
  reportBucket?: string;
  now?: () => number;
}

type PhaseResult = { ok: true; data: unknown } | { ok: false; message: string; cancelled: boolean };

/**
 * Drives one remediation run:
 * START → INFRA_FIX → VALIDATE → (BROWSER_TEST) → REPORT → DONE, or ABORTED.
 *
 * Only INFRA_FIX failures abort. VALIDATE and BROWSER_TEST failures are kept
 * in the record and lower the final status; REPORT is best-effort.
 * Every delegation goes through the dispatch router.
 */
export class RemediationStateMachine {
  private readonly router: Pick<DispatchRouter, 'route'>;
  private readonly agents: PhaseAgents;
  private readonly sink: ObservabilitySink;
  private readonly log: Logger;
  private readonly reportBucket: string;
  private readonly now: () => number;

  constructor(options: RemediationMachineOptions) {
    this.router = options.router;
    this.agents = options.agents;
    this.sink = options.sink;
    this.log = options.logger;
    this.reportBucket = options.reportBucket ?? 'remediation-reports';
    this.now = options.now ?? Date.now;
  }

  async run(input: RemediationInput, context: RequestContext, options: CallOptions = {}): Promise<RemediationResult> {
    const state = this.start(input, context);
    while (!state.terminal) {
      await this.advance(state, options.signal);
    }
    return this.toResult(state);
  }

  start(input: RemediationInput, context: RequestContext): RemediationState {
    return {
      rcaDocument: input.rcaDocument ?? '',
      resolutionPlan: input.resolutionPlan ?? '',
      context,
      steps: [],
      phase: 'START',
      terminal: false,
    };
  }

  /** Runs the current phase and moves the state to the next one. */
  async advance(state: RemediationState, signal?: AbortSignal): Promise<void> {
    if (state.terminal) return;

    if (state.phase === 'START') {
      const parsed = parsePlan(state.rcaDocument, state.resolutionPlan);
      if (!parsed.ok) {
        this.abort(state, INVALID_INPUT, parsed.reason);
        return;
      }
      state.directives = parsed.directives;
      state.phase = parsed.directives.infraChange ? 'INFRA_FIX' : 'VALIDATE';
      this.report(state, 'START', 'success', `Remediation started; next phase ${state.phase}`);
      return;
    }

    if (signal?.aborted) {
      this.abort(state, CANCELLED);
      return;
    }

    switch (state.phase) {
      case 'INFRA_FIX': {
        const result = await this.delegate(state, 'INFRA_FIX', this.agents.infra, this.infraPayload(state), signal);
        if (!result.ok) {
          this.abort(state, result.cancelled ? CANCELLED : `infrastructure change failed: ${result.message}`);
          return;
        }
        state.phase = 'VALIDATE';
        return;
      }

      case 'VALIDATE': {
        const result = await this.delegate(state, 'VALIDATE', this.agents.monitoring, this.validatePayload(state), signal);
        if (!result.ok && result.cancelled) {
          this.abort(state, CANCELLED);
          return;
        }
        state.phase = state.directives?.browserTest ? 'BROWSER_TEST' : 'REPORT';
        return;
      }

      case 'BROWSER_TEST': {
        const result = await this.delegate(state, 'BROWSER_TEST', this.agents.browser, this.browserPayload(state), signal);
        if (!result.ok && result.cancelled) {
          this.abort(state, CANCELLED);
          return;
        }
        state.phase = 'REPORT';
        return;
      }

      case 'REPORT': {
        const status = aggregateStatus(state.steps);
        const result = await this.delegate(state, 'REPORT', this.agents.storage, this.reportPayload(state, status), signal);
        if (result.ok) {
          state.reportUrl = extractReportUrl(result.data);
        } else if (result.cancelled) {
          this.abort(state, CANCELLED);
          return;
        } else {
          this.log.warn({ sessionId: state.context.sessionId, reason: result.message }, 'Remediation report not stored');
        }
        state.phase = 'DONE';
        state.terminal = true;
        state.finalStatus = aggregateStatus(state.steps);
        this.report(state, 'DONE', 'success', `Remediation finished with status ${state.finalStatus}`);
        return;
      }

      default:
        return;
    }
  }

  toResult(state: RemediationState): RemediationResult {
    const status = state.finalStatus ?? aggregateStatus(state.steps, state.abortReason);
    const result: RemediationResult = {
      status,
      steps: state.steps.map((step) => ({
        phase: step.phase,
        agent: step.targetAgent,
        success: step.outcome.success,
        summary: summarizePayload(step.outcome.payload),
        timestamp: new Date(step.timestamp).toISOString(),
      })),
      explanation: explain(state, status),
    };
    if (state.context.sessionId) result.session_id = state.context.sessionId;
    if (state.reportUrl) result.report_url = state.reportUrl;
    if (state.abortReason) result.abort_reason = state.abortReason;
    return result;
  }

  private async delegate(
    state: RemediationState,
    phase: RemediationPhase,
    agentId: AgentId,
    payload: DelegationPayload,
    signal?: AbortSignal,
  ): Promise<PhaseResult> {
    this.report(state, phase, 'started', `Delegating ${phase} to ${agentId}`);
    const routed = await this.router.route(agentId, payload, state.context, { signal });

    let result: PhaseResult;
    if (!routed.ok) {
      result = { ok: false, message: routed.error.message, cancelled: routed.error.kind === 'Cancelled' };
    } else if (phase === 'BROWSER_TEST' && reportsFailure(routed.data)) {
      result = { ok: false, message: summarizePayload(routed.data), cancelled: false };
    } else {
      result = { ok: true, data: routed.data };
    }

    this.record(state, {
      phase,
      targetAgent: agentId,
      request: { ...payload },
      outcome: result.ok
        ? { success: true, payload: result.data }
        : { success: false, payload: result.message, ...(result.cancelled ? { cancelled: true } : {}) },
      timestamp: this.nextTimestamp(state),
    });
    this.report(
      state,
      phase,
      result.ok ? 'success' : 'failure',
      result.ok ? `${phase} completed` : `${phase} failed: ${result.message}`,
    );
    return result;
  }

  private record(state: RemediationState, step: DelegationStep): void {
    state.steps.push(Object.freeze(step));
  }

  private nextTimestamp(state: RemediationState): number {
    const previous = state.steps[state.steps.length - 1]?.timestamp ?? 0;
    return Math.max(previous, this.now());
  }

  private abort(state: RemediationState, reason: string, detail?: string): void {
    state.phase = 'ABORTED';
    state.terminal = true;
    state.abortReason = reason;
    if (detail) state.abortDetail = detail;
    state.finalStatus = 'aborted';
    this.log.warn({ sessionId: state.context.sessionId, reason, detail }, 'Remediation aborted');
    this.report(state, 'ABORTED', 'failure', detail ? `${reason}: ${detail}` : reason);
  }

  private report(state: RemediationState, phase: string, outcome: EventOutcome, message: string): void {
    try {
      this.sink.emit({
        component: 'remediation',
        phase,
        outcome,
        message,
        sessionId: state.context.sessionId,
        callerIdentity: state.context.callerIdentity,
      });
    } catch (err) {
      this.log.warn({ err }, 'Observability sink rejected event');
    }
  }

  private infraPayload(state: RemediationState): DelegationPayload {
    const command = state.directives?.infraCommand;
    return {
      prompt: command ?? `Apply the following infrastructure remediation.\n\nPLAN:\n${state.resolutionPlan}\n\nROOT CAUSE:\n${state.rcaDocument}`,
      ...(command ? { command } : {}),
    };
  }

  private validatePayload(state: RemediationState): DelegationPayload {
    const query = state.directives?.validationQuery ?? 'error_rate';
    return {
      prompt: `Run this monitoring query and analyze the last ${VALIDATION_WINDOW}: ${query}. Report whether the failure described in the RCA has recovered.`,
      query,
      time_range: VALIDATION_WINDOW,
    };
  }

  private browserPayload(state: RemediationState): DelegationPayload {
    const url = state.directives?.targetUrl;
    const payload: DelegationPayload = {
      prompt:
        `Navigate to ${url ?? 'the affected application'} and verify that the failure described in the RCA no longer reproduces. ` +
        `Return a JSON with 'status' (SUCCESS/FAILURE) and 'screenshot_url' if applicable.`,
    };
    if (url) payload.url = url;
    return payload;
  }

  private reportPayload(state: RemediationState, status: RemediationState['finalStatus']): DelegationPayload {
    const fileName = reportFileName(state.context.sessionId, this.now());
    const content = buildReport({
      sessionId: state.context.sessionId,
      rcaDocument: state.rcaDocument,
      resolutionPlan: state.resolutionPlan,
      steps: state.steps,
      status: status ?? 'failed',
    });
    return {
      prompt: `Upload the following content to bucket '${this.reportBucket}' as file '${fileName}'. Return the public URL.\n\nCONTENT:\n${content}`,
      bucket: this.reportBucket,
      file_name: fileName,
    };
  }
}

/** Browser agents may answer 200 with `{ status: 'FAILURE' }`. */
function reportsFailure(data: unknown): boolean {
  return Boolean(
    data && typeof data === 'object' && 'status' in data && typeof data.status === 'string' && data.status.toUpperCase() === 'FAILURE',
  );
}

function explain(state: RemediationState, status: RemediationResult['status']): string {
  if (status === 'aborted') {
    const reason = state.abortReason ?? 'aborted';
    return state.abortDetail ? `Remediation aborted (${reason}): ${state.abortDetail}.` : `Remediation aborted: ${reason}.`;
  }

  const phases = state.steps
    .filter((step) => step.phase !== 'REPORT')
    .map((step) => `${step.phase} ${step.outcome.success ? 'succeeded' : 'failed'}`);
  const reportStep = state.steps.find((step) => step.phase === 'REPORT');
  const report = !reportStep
    ? 'report not attempted'
    : reportStep.outcome.success
      ? `report stored${state.reportUrl ? ` at ${state.reportUrl}` : ''}`
      : 'report could not be stored';

  return `Remediation ${status}: ${[...phases, report].join('; ')}.`;
}
