import { nanoid } from 'nanoid';
import { Logger, silentLogger } from '../observability/logger.js';
import { MetricsCollector } from '../observability/metrics.js';
import { ApprovalPolicy, evaluateApproval } from '../policy/approvals.js';
import { ToolRegistry } from '../tools/registry.js';
import { CheckpointCorrupt, CoachError, errorMessage } from './errors.js';
import { ToolExecutor } from './executor.js';
import { MemoryStore } from './memory.js';
import { Planner } from './planner.js';
import { Responder } from './responder.js';
import { CheckpointStore } from './store.js';
import {
  ApprovalDecision,
  ApprovalRequest,
  NodeName,
  RunOutcome,
  RunState,
  RunStatus,
  SessionKey,
  Turn,
  approvalDecisionSchema,
} from './types.js';

export const RETRY_APOLOGY = "I'm sorry, I couldn't work on that just now. Please try again in a moment.";
export const TERMINAL_APOLOGY = "I'm sorry, I wasn't able to complete that request.";

export interface OrchestratorDeps {
  planner: Planner;
  executor: ToolExecutor;
  responder: Responder;
  registry: ToolRegistry;
  checkpoints: CheckpointStore;
  memory: MemoryStore;
  policy: ApprovalPolicy;
  // Number of prior turns handed to the planner and responder.
  memoryWindow: number;
  logger?: Logger;
  metrics?: MetricsCollector;
  // Receives a copy of the run after every status change.
  onTransition?: (snapshot: RunState) => void;
  clock?: () => number;
}

/**
 * Drives one run at a time from planning to completion or suspension.
 *
 * Routing is a switch over `RunState.status`; each status has one handler
 * that does its node's work and moves the run to the next status. Everything
 * a later step needs lives in the RunState, so a suspended run can be resumed
 * from its checkpoint by another process.
 */
export class Orchestrator {
  private log: Logger;
  private now: () => number;

  constructor(private deps: OrchestratorDeps) {
    this.log = (deps.logger ?? silentLogger).child('orchestrator');
    this.now = deps.clock ?? Date.now;
  }

  newTurn(session: SessionKey, text: string): Turn {
    return {
      id: nanoid(),
      userId: session.userId,
      sessionId: session.sessionId,
      runId: nanoid(),
      text,
      createdAt: this.now(),
    };
  }

  async start(turn: Turn): Promise<RunOutcome> {
    const at = this.now();
    const state: RunState = {
      runId: turn.runId,
      session: { userId: turn.userId, sessionId: turn.sessionId },
      turn,
      status: 'planning',
      position: 'planner',
      toolResults: [],
      transitions: [],
      createdAt: at,
      updatedAt: at,
    };
    this.deps.metrics?.incrementCounter('runs_started_total');
    this.log.info('run started', { runId: state.runId, user: turn.userId, session: turn.sessionId });
    return this.drive(state);
  }

  async resume(runId: string, decision: ApprovalDecision): Promise<RunOutcome> {
    const checked = approvalDecisionSchema.parse(decision);
    // Throws UnknownRun / RunAlreadyResolved; a second concurrent resume loses here.
    const state = await this.claim(runId);
    if ('type' in state) return state;
    this.deps.metrics?.incrementCounter('decisions_total', { kind: checked.kind });
    this.log.info('decision received', { runId, decision: checked.kind });

    state.decision = checked;
    if (checked.kind === 'approve') this.transition(state, 'executing', 'executor');
    else this.transition(state, 'responding', 'responder');
    return this.drive(state);
  }

  // Aborts a suspended run. No decision is accepted for it afterwards.
  async cancel(runId: string, reason = 'Cancelled by reviewer'): Promise<RunOutcome> {
    const state = await this.claim(runId);
    if ('type' in state) return state;
    return this.abort(state, { code: 'CANCELLED', reason, retryable: false });
  }

  // An undecodable checkpoint has already been retired by the store; the caller gets a Failed outcome.
  private async claim(runId: string): Promise<RunState | RunOutcome> {
    try {
      return await this.deps.checkpoints.claim(runId);
    } catch (err) {
      if (!(err instanceof CheckpointCorrupt)) throw err;
      this.log.error('checkpoint unreadable', { runId, error: err.message });
      this.deps.metrics?.incrementCounter('runs_aborted_total', { code: err.code });
      return { type: 'failed', runId, answer: TERMINAL_APOLOGY, reason: err.message, code: err.code, retryable: false };
    }
  }

  async pending(session?: SessionKey): Promise<ApprovalRequest[]> {
    const states = await this.deps.checkpoints.list();
    return states
      .filter(s => !session || (s.session.userId === session.userId && s.session.sessionId === session.sessionId))
      .flatMap(s => (s.approval ? [s.approval] : []));
  }

  private async drive(state: RunState): Promise<RunOutcome> {
    try {
      for (;;) {
        switch (state.status) {
          case 'planning':
            await this.plan(state);
            break;
          case 'awaiting_approval':
            return await this.suspend(state);
          case 'executing':
            await this.execute(state);
            break;
          case 'responding':
            await this.respond(state);
            break;
          case 'completed':
            return await this.complete(state);
          case 'aborted':
            return this.failedOutcome(state);
        }
      }
    } catch (err) {
      this.log.error('run aborted', { runId: state.runId, status: state.status, error: errorMessage(err) });
      return this.abort(state, {
        code: err instanceof CoachError ? err.code : 'INTERNAL_ERROR',
        reason: errorMessage(err),
        retryable: err instanceof CoachError ? err.retryable : false,
      });
    }
  }

  private async plan(state: RunState) {
    const memory = await this.deps.memory.recent(state.session, this.deps.memoryWindow);
    const plan = await this.deps.planner.plan({ turn: state.turn, memory });
    state.plan = plan;

    // Nothing to run, nothing to approve.
    if (plan.invocations.length === 0) {
      this.transition(state, 'responding', 'responder');
      return;
    }

    const gate = evaluateApproval(state.runId, plan, this.deps.policy, name => this.deps.registry.isSensitive(name), this.now());
    if (gate.kind === 'suspend') {
      state.approval = gate.request;
      this.transition(state, 'awaiting_approval', 'approval_gate');
    } else {
      this.transition(state, 'executing', 'executor');
    }
  }

  private async suspend(state: RunState): Promise<RunOutcome> {
    await this.deps.checkpoints.put(state.runId, state);
    this.deps.metrics?.incrementCounter('approvals_requested_total');
    const request = state.approval;
    if (!request) throw new Error(`Run ${state.runId} suspended without an approval request`);
    this.log.info('waiting for approval', { runId: state.runId, confidence: request.confidence, reasons: request.reasons });
    return { type: 'pending_approval', runId: state.runId, request };
  }

  private async execute(state: RunState) {
    const invocations = state.plan?.invocations ?? [];
    state.toolResults = await this.deps.executor.executeAll(invocations, { runId: state.runId, session: state.session });
    this.transition(state, 'responding', 'responder');
  }

  private async respond(state: RunState) {
    const memory = await this.deps.memory.recent(state.session, this.deps.memoryWindow);
    const decision = state.decision;
    state.answer = await this.deps.responder.respond({
      turn: state.turn,
      memory,
      plan: state.plan,
      toolResults: state.toolResults,
      decision,
    });

    const turn: Turn = { ...state.turn, answer: state.answer, completedAt: this.now() };
    if (decision && decision.kind !== 'approve') {
      turn.feedback = { decision: decision.kind, ...(decision.feedback ? { text: decision.feedback } : {}) };
    }
    state.turn = turn;
    this.transition(state, 'completed', 'end');
  }

  // The checkpoint goes first: a run that fails here leaves no turn in memory.
  private async complete(state: RunState): Promise<RunOutcome> {
    if (state.approval) await this.deps.checkpoints.delete(state.runId);
    await this.deps.memory.append(state.session, state.turn);
    this.deps.metrics?.incrementCounter('runs_completed_total');
    this.deps.metrics?.recordHistogram('run_duration_ms', state.updatedAt - state.createdAt);
    this.log.info('run completed', { runId: state.runId, tools: state.toolResults.length });
    return { type: 'completed', runId: state.runId, answer: state.answer ?? '', toolResults: state.toolResults };
  }

  private async abort(state: RunState, failure: NonNullable<RunState['failure']>): Promise<RunOutcome> {
    state.failure = failure;
    state.answer = failure.retryable ? RETRY_APOLOGY : TERMINAL_APOLOGY;
    if (state.status !== 'aborted') this.transition(state, 'aborted', 'end');
    this.deps.metrics?.incrementCounter('runs_aborted_total', { code: failure.code });
    if (state.approval) {
      try {
        await this.deps.checkpoints.delete(state.runId);
      } catch (err) {
        this.log.error('could not remove checkpoint of aborted run', { runId: state.runId, error: errorMessage(err) });
      }
    }
    return this.failedOutcome(state);
  }

  private failedOutcome(state: RunState): RunOutcome {
    const failure = state.failure ?? { code: 'INTERNAL_ERROR', reason: 'aborted', retryable: false };
    return {
      type: 'failed',
      runId: state.runId,
      answer: state.answer ?? TERMINAL_APOLOGY,
      reason: failure.reason,
      code: failure.code,
      retryable: failure.retryable,
    };
  }

  private transition(state: RunState, to: RunStatus, position: NodeName) {
    const at = this.now();
    state.transitions.push({ from: state.status, to, at });
    this.log.debug(`${state.status} → ${to}`, { runId: state.runId });
    state.status = to;
    state.position = position;
    state.updatedAt = at;
    this.deps.onTransition?.(structuredClone(state));
  }
}
