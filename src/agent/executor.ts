import { z } from 'zod';
import { Logger, silentLogger } from '../observability/logger.js';
import { MetricsCollector } from '../observability/metrics.js';
import { ToolRegistry } from '../tools/registry.js';
import { AnyToolSpec, ToolContext } from '../tools/types.js';
import { preview } from '../utils/text.js';
import { CoachError, InvalidArguments, ToolExecutionError, ToolTimeout, UnknownTool, errorMessage } from './errors.js';
import { Json, SessionKey, ToolErrorKind, ToolInvocation, ToolResult } from './types.js';

export interface ExecutorOptions {
  // Upper bound on invocations of one plan running at the same time.
  concurrency: number;
  // Used for tools that do not declare their own timeout.
  defaultTimeoutMs: number;
}

export interface ExecutionContext {
  runId: string;
  session: SessionKey;
}

const KIND_BY_CODE: Record<string, ToolErrorKind> = {
  UNKNOWN_TOOL: 'UnknownTool',
  INVALID_ARGUMENTS: 'InvalidArguments',
  TOOL_TIMEOUT: 'ToolTimeout',
};

/**
 * Runs every invocation of a plan exactly once. Failures are captured per
 * invocation and never cancel siblings; the returned array is in plan order
 * and only resolves once every invocation has settled.
 */
export class ToolExecutor {
  private log: Logger;

  constructor(
    private registry: ToolRegistry,
    private opts: ExecutorOptions,
    logger: Logger = silentLogger,
    private metrics?: MetricsCollector
  ) {
    this.log = logger.child('executor');
  }

  async executeAll(invocations: ToolInvocation[], ctx: ExecutionContext): Promise<ToolResult[]> {
    const results = new Array<ToolResult>(invocations.length);
    let next = 0;
    const worker = async () => {
      while (next < invocations.length) {
        const index = next++;
        results[index] = await this.execute(invocations[index], ctx);
      }
    };
    const slots = Math.max(1, Math.min(this.opts.concurrency, invocations.length));
    await Promise.all(Array.from({ length: slots }, worker));
    return results;
  }

  async execute(invocation: ToolInvocation, ctx: ExecutionContext): Promise<ToolResult> {
    const startedAt = Date.now();
    const base = { invocationId: invocation.id, tool: invocation.tool };
    try {
      const tool = this.registry.get(invocation.tool);
      // The registry can change between planning and a late approval.
      if (!tool) throw new UnknownTool(invocation.tool);
      const input = this.prepareArgs(tool, invocation, ctx.session);
      this.log.info(`running ${tool.name}`, { runId: ctx.runId, invocation: invocation.id });
      const output = await this.runWithTimeout(tool, input, ctx);
      const durationMs = Date.now() - startedAt;
      this.metrics?.recordHistogram('tool_duration_ms', durationMs, { tool: tool.name });
      this.log.debug(`${tool.name} →`, { output: preview(output, 200) });
      return { ...base, ok: true, output: toJson(output), durationMs };
    } catch (err) {
      const durationMs = Date.now() - startedAt;
      const kind = err instanceof CoachError ? KIND_BY_CODE[err.code] ?? 'ToolExecutionError' : 'ToolExecutionError';
      this.metrics?.incrementCounter('tool_failures_total', { tool: invocation.tool, kind });
      this.log.warn(`${invocation.tool} failed`, { runId: ctx.runId, kind, error: errorMessage(err) });
      return { ...base, ok: false, error: { kind, message: errorMessage(err) }, durationMs };
    }
  }

  private prepareArgs(tool: AnyToolSpec, invocation: ToolInvocation, session: SessionKey): unknown {
    const args: Record<string, Json> = { ...invocation.args };
    // A learner-scoped tool always acts for the session's user, whatever the plan says.
    if (tool.schema instanceof z.ZodObject && 'userId' in tool.schema.shape) {
      args.userId = session.userId;
    }
    if (tool.strictArgs === false || !tool.schema) return args;
    const parsed = tool.schema.safeParse(args);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new InvalidArguments(tool.name, issues);
    }
    return parsed.data;
  }

  private async runWithTimeout(tool: AnyToolSpec, input: unknown, ctx: ExecutionContext): Promise<unknown> {
    const timeoutMs = tool.timeoutMs ?? this.opts.defaultTimeoutMs;
    const controller = new AbortController();
    const toolCtx: ToolContext = {
      userId: ctx.session.userId,
      sessionId: ctx.session.sessionId,
      runId: ctx.runId,
      signal: controller.signal,
    };
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ToolTimeout(tool.name, timeoutMs));
      }, timeoutMs);
    });
    try {
      return await Promise.race([invoke(tool, input, toolCtx), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

async function invoke(tool: AnyToolSpec, input: unknown, ctx: ToolContext): Promise<unknown> {
  try {
    return await tool.run(input, ctx);
  } catch (err) {
    if (err instanceof CoachError) throw err;
    throw new ToolExecutionError(tool.name, errorMessage(err), { cause: err });
  }
}

// Tool payloads are stored in checkpoints, so they are reduced to plain JSON.
function toJson(value: unknown): Json {
  const text = JSON.stringify(value);
  return text === undefined ? null : JSON.parse(text);
}
