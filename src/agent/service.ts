import { AppConfig } from '../config.js';
import { LLM } from '../llm/interfaces.js';
import { Logger, silentLogger } from '../observability/logger.js';
import { MetricsCollector } from '../observability/metrics.js';
import { ToolRegistry } from '../tools/registry.js';
import { AnyToolSpec } from '../tools/types.js';
import { SessionAwaitingApproval, UnknownRun } from './errors.js';
import { ToolExecutor } from './executor.js';
import { JsonMemoryStore, MemoryStore } from './memory.js';
import { Orchestrator } from './orchestrator.js';
import { Planner } from './planner.js';
import { Responder } from './responder.js';
import { CheckpointStore, JsonCheckpointStore } from './store.js';
import { ApprovalRequest, DecisionKind, RunOutcome, RunState, SessionKey } from './types.js';

export type TurnResponse =
  | { status: 'answered'; runId: string; answer: string }
  | { status: 'pending_approval'; runId: string; approval: ApprovalRequest }
  | { status: 'failed'; runId: string; answer: string; retryable: boolean };

export interface ChatExchange {
  human: string;
  ai: string;
}

export interface CoachingServiceOptions {
  cfg: AppConfig;
  llm: LLM;
  tools: AnyToolSpec[];
  checkpoints?: CheckpointStore;
  memory?: MemoryStore;
  logger?: Logger;
  metrics?: MetricsCollector;
  onTransition?: (snapshot: RunState) => void;
}

/**
 * Session-facing entry points. Callers speak in (user, session) pairs; the
 * service finds the run behind them and hands it to the orchestrator.
 */
export class CoachingService {
  readonly orchestrator: Orchestrator;
  readonly registry: ToolRegistry;
  readonly metrics: MetricsCollector;
  private memory: MemoryStore;

  constructor(opts: CoachingServiceOptions) {
    const logger = opts.logger ?? silentLogger;
    this.registry = new ToolRegistry(opts.tools);
    this.metrics = opts.metrics ?? new MetricsCollector();
    this.memory = opts.memory ?? new JsonMemoryStore(opts.cfg.DATA_DIR);
    this.orchestrator = new Orchestrator({
      planner: new Planner(opts.llm, this.registry, logger),
      executor: new ToolExecutor(
        this.registry,
        { concurrency: opts.cfg.TOOL_CONCURRENCY, defaultTimeoutMs: opts.cfg.TOOL_TIMEOUT_MS },
        logger,
        this.metrics
      ),
      responder: new Responder(opts.llm, logger),
      registry: this.registry,
      checkpoints: opts.checkpoints ?? new JsonCheckpointStore(opts.cfg.DATA_DIR),
      memory: this.memory,
      policy: { threshold: opts.cfg.APPROVAL_THRESHOLD, enabled: opts.cfg.HUMAN_APPROVAL },
      memoryWindow: opts.cfg.MEMORY_WINDOW,
      logger,
      metrics: this.metrics,
      onTransition: opts.onTransition,
    });
  }

  async submitTurn(userId: string, sessionId: string, text: string): Promise<TurnResponse> {
    const session = { userId, sessionId };
    const waiting = await this.pending(userId, sessionId);
    if (waiting) throw new SessionAwaitingApproval(waiting.runId);
    const turn = this.orchestrator.newTurn(session, text);
    return toResponse(await this.orchestrator.start(turn));
  }

  async submitDecision(userId: string, sessionId: string, decision: DecisionKind, feedback?: string): Promise<TurnResponse> {
    const waiting = await this.pending(userId, sessionId);
    if (!waiting) throw new UnknownRun(`${userId}/${sessionId}`);
    const outcome = await this.orchestrator.resume(waiting.runId, { kind: decision, ...(feedback ? { feedback } : {}) });
    return toResponse(outcome);
  }

  async pending(userId: string, sessionId: string): Promise<ApprovalRequest | undefined> {
    const requests = await this.orchestrator.pending({ userId, sessionId });
    return requests[0];
  }

  async chatHistory(userId: string, sessionId: string): Promise<ChatExchange[]> {
    const key: SessionKey = { userId, sessionId };
    const turns = await this.memory.history(key);
    return turns.flatMap(t => (t.answer === undefined ? [] : [{ human: t.text, ai: t.answer }]));
  }
}

function toResponse(outcome: RunOutcome): TurnResponse {
  switch (outcome.type) {
    case 'completed':
      return { status: 'answered', runId: outcome.runId, answer: outcome.answer };
    case 'pending_approval':
      return { status: 'pending_approval', runId: outcome.runId, approval: outcome.request };
    case 'failed':
      return { status: 'failed', runId: outcome.runId, answer: outcome.answer, retryable: outcome.retryable };
  }
}
