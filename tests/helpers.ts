import type { TestContext } from 'node:test';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ToolExecutor } from '../src/agent/executor.js';
import { InMemoryMemoryStore } from '../src/agent/memory.js';
import { Orchestrator } from '../src/agent/orchestrator.js';
import { Planner } from '../src/agent/planner.js';
import { Responder } from '../src/agent/responder.js';
import { CheckpointStore, InMemoryCheckpointStore } from '../src/agent/store.js';
import { RunState, Turn } from '../src/agent/types.js';
import { CompletionOptions, LLM } from '../src/llm/interfaces.js';
import { MetricsCollector } from '../src/observability/metrics.js';
import { ToolRegistry } from '../src/tools/registry.js';
import { AnyToolSpec, ToolContext, defineTool } from '../src/tools/types.js';

/** Replies in order; an Error in the queue is thrown instead of returned. */
export class ScriptedLLM implements LLM {
  name = 'scripted';
  calls: Array<{ prompt: string; opts?: CompletionOptions }> = [];

  constructor(private replies: Array<string | Error> = []) {}

  push(...replies: Array<string | Error>) {
    this.replies.push(...replies);
  }

  async complete(prompt: string, opts?: CompletionOptions): Promise<string> {
    this.calls.push({ prompt, opts });
    const next = this.replies.shift();
    if (next === undefined) throw new Error('ScriptedLLM ran out of replies');
    if (next instanceof Error) throw next;
    return next;
  }
}

interface PlannedCall {
  tool: string;
  args?: Record<string, unknown>;
  reason?: string;
}

export function planReply(calls: PlannedCall[], confidence?: number | string, reasoning = 'test plan'): string {
  return JSON.stringify({
    needs_tools: calls.length > 0,
    reasoning,
    ...(confidence === undefined ? {} : { confidence }),
    tools_to_use: calls.map(c => ({ tool_name: c.tool, parameters: c.args ?? {}, reason: c.reason ?? '' })),
  });
}

export const noToolsReply = JSON.stringify({ needs_tools: false, reasoning: 'small talk', tools_to_use: [] });

export function makeTempDir(t: TestContext, prefix = 'coach-test-'): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  t.after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return dir;
}

export function toolCtx(overrides: Partial<ToolContext> = {}): ToolContext {
  return { userId: 'u1', sessionId: 's1', runId: 'run-1', signal: new AbortController().signal, ...overrides };
}

/** Fake tools plus the calls they received. */
export function makeTools() {
  const saved: Array<{ userId: string; note: string }> = [];

  const lookup = defineTool({
    name: 'lookup',
    description: 'Look up a fact.',
    schema: z.object({ query: z.string().min(1) }),
    async run({ query }) {
      return { query, hits: 1 };
    },
  });

  const saveNote = defineTool({
    name: 'save_note',
    description: "Write a note to the learner's record.",
    schema: z.object({ userId: z.string(), note: z.string() }),
    sensitive: true,
    async run({ userId, note }) {
      saved.push({ userId, note });
      return { saved: true };
    },
  });

  // Never finishes on its own; settles only when aborted.
  const slow = defineTool({
    name: 'slow',
    description: 'Waits until it is cancelled.',
    timeoutMs: 20,
    run(_args: unknown, ctx: ToolContext) {
      return new Promise(resolve => {
        ctx.signal.addEventListener('abort', () => resolve('late'));
      });
    },
  });

  const broken = defineTool({
    name: 'broken',
    description: 'Always fails.',
    async run() {
      throw new Error('boom');
    },
  });

  return { saved, tools: [lookup, saveNote, slow, broken] };
}

export interface HarnessOptions {
  llm: ScriptedLLM;
  tools?: AnyToolSpec[];
  threshold?: number;
  enabled?: boolean;
  memoryWindow?: number;
  checkpoints?: CheckpointStore;
}

export function makeHarness(opts: HarnessOptions) {
  const registry = new ToolRegistry(opts.tools ?? makeTools().tools);
  const checkpoints = opts.checkpoints ?? new InMemoryCheckpointStore();
  const memory = new InMemoryMemoryStore();
  const metrics = new MetricsCollector();
  const snapshots: RunState[] = [];
  const orchestrator = new Orchestrator({
    planner: new Planner(opts.llm, registry),
    executor: new ToolExecutor(registry, { concurrency: 3, defaultTimeoutMs: 1000 }),
    responder: new Responder(opts.llm),
    registry,
    checkpoints,
    memory,
    policy: { threshold: opts.threshold ?? 0.8, enabled: opts.enabled ?? true },
    memoryWindow: opts.memoryWindow ?? 6,
    metrics,
    onTransition: s => snapshots.push(s),
  });
  return { orchestrator, registry, checkpoints, memory, metrics, snapshots };
}

export const session = { userId: 'u1', sessionId: 's1' };

export function makeTurn(overrides: Partial<Turn> = {}): Turn {
  return {
    id: 'turn-1',
    userId: 'u1',
    sessionId: 's1',
    runId: 'run-1',
    text: 'hello',
    createdAt: 1000,
    ...overrides,
  };
}

export function makeState(runId: string, createdAt = 1000): RunState {
  return {
    runId,
    session,
    turn: makeTurn({ runId, createdAt }),
    status: 'awaiting_approval',
    position: 'approval_gate',
    plan: {
      invocations: [{ id: 'inv-1', tool: 'lookup', args: { query: 'x' }, rationale: 'facts' }],
      confidence: 0.5,
      reasoning: 'needs facts',
      source: 'model',
    },
    toolResults: [],
    transitions: [{ from: 'planning', to: 'awaiting_approval', at: createdAt }],
    createdAt,
    updatedAt: createdAt,
  };
}
